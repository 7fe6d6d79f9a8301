import { spawn, type SpawnOptions } from "child_process";
import type { EventEmitter } from "events";
import { BrowserOpenError } from "../core/errors.js";

export interface BrowserOpener {
  open(url: string): Promise<void>;
}

// The part of ChildProcess the opener touches.
export type SpawnedProcess = EventEmitter & { unref(): void };

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => SpawnedProcess;

export function browserCommand(platform: NodeJS.Platform, url: string): { command: string; args: string[] } {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [url] };
    case "linux":
      return { command: "xdg-open", args: [url] };
    case "win32":
      // The empty string is the window title `start` expects before a quoted target.
      return { command: "cmd", args: ["/c", "start", "", url] };
    default:
      throw new BrowserOpenError(`unsupported platform: ${platform}`);
  }
}

/**
 * Opens URLs with the desktop's default handler. The opener process is
 * detached; only its start is awaited, never its exit.
 */
export class SystemBrowserOpener implements BrowserOpener {
  constructor(
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly spawnFn: SpawnFn = spawn
  ) {}

  async open(url: string): Promise<void> {
    const { command, args } = browserCommand(this.platform, url);
    const child = this.spawnFn(command, args, { detached: true, stdio: "ignore" });

    await new Promise<void>((resolve, reject) => {
      child.once("error", (err: Error) => reject(new BrowserOpenError(`failed to run ${command}: ${err.message}`)));
      child.once("spawn", () => resolve());
    });
    child.unref();
  }
}
