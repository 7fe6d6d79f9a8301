import pino, { type Logger } from "pino";
import type { LogLevel } from "../config/config.js";

export const SERVICE_NAME = "platform-mcp";

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
}

// stdout carries the MCP channel, so every log line goes to stderr (fd 2).
export function createLogger(opts: LoggerOptions): Logger {
  const base = { service: SERVICE_NAME };

  if (opts.json) {
    return pino({ level: opts.level, base, timestamp: pino.stdTimeFunctions.isoTime }, pino.destination(2));
  }

  return pino({
    level: opts.level,
    base,
    transport: {
      target: "pino-pretty",
      options: {
        destination: 2,
        colorize: false,
        translateTime: "SYS:yyyy-mm-dd'T'HH:MM:ss.l",
        ignore: "pid,hostname,service",
        singleLine: true
      }
    }
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
