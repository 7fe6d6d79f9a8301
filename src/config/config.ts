import { promises as fs } from "fs";
import os from "os";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { ConfigurationError } from "../core/errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Config {
  baseUrl: string;
  token?: string;
  username?: string;
  password?: string;
  logLevel: LogLevel;
  logJson: boolean;
  pollIntervalSeconds: number;
}

/** One source of settings; absent fields defer to lower-precedence sources. */
export interface ConfigLayer {
  baseUrl?: string;
  token?: string;
  username?: string;
  password?: string;
  logLevel?: string;
  logJson?: boolean;
  pollIntervalSeconds?: number;
  configFile?: string;
}

export const DEFAULT_CONFIG_PATHS = ["~/.platform-mcp.yaml", "~/.config/platform-mcp/config.yaml"];

const DEFAULTS = {
  logLevel: "info",
  logJson: false,
  pollIntervalSeconds: 5
} satisfies ConfigLayer;

const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(["debug", "info", "warn", "error"]);

const zConfigFile = z.object({
  base_url: z.string().optional(),
  token: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  log_level: z.string().optional(),
  log_json: z.boolean().optional(),
  poll_interval: z.number().int().positive().optional()
});

function expandEnvToken(value: string | undefined, env: NodeJS.ProcessEnv): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m || !m[1]) return value;
  const v = env[m[1]]?.trim();
  return v ? v : undefined;
}

function expandHome(filePath: string, homeDir: string): string {
  if (filePath === "~") return homeDir;
  if (filePath.startsWith("~/")) return path.join(homeDir, filePath.slice(2));
  return filePath;
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/** Reads a YAML config file; a missing file yields `null`. */
export async function readConfigFile(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir()
): Promise<ConfigLayer | null> {
  const resolved = expandHome(filePath, homeDir);
  let text: string;
  try {
    text = await fs.readFile(resolved, "utf8");
  } catch (err) {
    if (isNotFound(err)) return null;
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`failed to read config file ${resolved}: ${reason}`);
  }

  let raw: unknown;
  try {
    raw = YAML.parse(text) ?? {};
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`failed to parse config file ${resolved}: ${reason}`);
  }

  const parsed = zConfigFile.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`invalid config file ${resolved}: ${z.prettifyError(parsed.error)}`);
  }

  const f = parsed.data;
  return {
    baseUrl: expandEnvToken(f.base_url, env),
    token: expandEnvToken(f.token, env),
    username: expandEnvToken(f.username, env),
    password: expandEnvToken(f.password, env),
    logLevel: f.log_level,
    logJson: f.log_json,
    pollIntervalSeconds: f.poll_interval
  };
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const v = value.trim().toLowerCase();
  if (v === "true" || v === "1") return true;
  if (v === "false" || v === "0") return false;
  return undefined;
}

export function parsePollInterval(value: string | undefined, source: string): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigurationError(`${source} must be a positive integer number of seconds, got: ${value}`);
  }
  return n;
}

export function configFromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  return {
    baseUrl: env.PLATFORM_BASE_URL,
    token: env.PLATFORM_TOKEN,
    username: env.PLATFORM_USERNAME,
    password: env.PLATFORM_PASSWORD,
    logLevel: env.LOG_LEVEL,
    logJson: parseBoolean(env.LOG_JSON),
    pollIntervalSeconds: parsePollInterval(env.POLL_INTERVAL, "POLL_INTERVAL")
  };
}

/** Later layers win; empty strings and undefined never override. */
export function mergeLayers(...layers: ConfigLayer[]): ConfigLayer {
  const out: ConfigLayer = {};
  for (const layer of layers) {
    if (layer.baseUrl) out.baseUrl = layer.baseUrl;
    if (layer.token) out.token = layer.token;
    if (layer.username) out.username = layer.username;
    if (layer.password) out.password = layer.password;
    if (layer.logLevel) out.logLevel = layer.logLevel;
    if (layer.logJson !== undefined) out.logJson = layer.logJson;
    if (layer.pollIntervalSeconds !== undefined) out.pollIntervalSeconds = layer.pollIntervalSeconds;
    if (layer.configFile) out.configFile = layer.configFile;
  }
  return out;
}

function isUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

export function validateConfig(layer: ConfigLayer): Config {
  const baseUrl = layer.baseUrl?.trim().replace(/\/+$/, "");
  if (!baseUrl) throw new ConfigurationError("PLATFORM_BASE_URL is required");
  if (!isUrl(baseUrl)) throw new ConfigurationError(`invalid base URL: ${baseUrl}`);

  const hasToken = Boolean(layer.token);
  const hasCredentials = Boolean(layer.username) && Boolean(layer.password);
  if (!hasToken && !hasCredentials) {
    throw new ConfigurationError("either PLATFORM_TOKEN or PLATFORM_USERNAME+PLATFORM_PASSWORD must be provided");
  }

  const logLevel = (layer.logLevel ?? DEFAULTS.logLevel).toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`invalid log level: ${layer.logLevel} (must be debug, info, warn, or error)`);
  }

  const pollIntervalSeconds = layer.pollIntervalSeconds ?? DEFAULTS.pollIntervalSeconds;
  if (!Number.isInteger(pollIntervalSeconds) || pollIntervalSeconds <= 0) {
    throw new ConfigurationError(`poll interval must be a positive integer, got: ${pollIntervalSeconds}`);
  }

  return {
    baseUrl,
    token: layer.token,
    username: layer.username,
    password: layer.password,
    logLevel,
    logJson: layer.logJson ?? DEFAULTS.logJson,
    pollIntervalSeconds
  };
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

export interface LoadConfigOptions {
  cli?: ConfigLayer;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

/**
 * Assemble configuration with precedence CLI > environment > config file > defaults.
 * Without `--config`, the first existing default location is used.
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<Config> {
  const cli = opts.cli ?? {};
  const env = opts.env ?? process.env;
  const homeDir = opts.homeDir ?? os.homedir();

  let fileLayer: ConfigLayer = {};
  if (cli.configFile) {
    fileLayer = (await readConfigFile(cli.configFile, env, homeDir)) ?? {};
  } else {
    for (const candidate of DEFAULT_CONFIG_PATHS) {
      const found = await readConfigFile(candidate, env, homeDir);
      if (found) {
        fileLayer = found;
        break;
      }
    }
  }

  return validateConfig(mergeLayers(DEFAULTS, fileLayer, configFromEnv(env), cli));
}
