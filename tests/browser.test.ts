import type { SpawnOptions } from "child_process";
import { EventEmitter } from "events";
import { describe, it, expect } from "vitest";
import { BrowserOpenError } from "../src/core/errors.js";
import { SystemBrowserOpener, browserCommand, type SpawnFn } from "../src/workflows/browser.js";

interface SpawnCall {
  command: string;
  args: string[];
  options: SpawnOptions;
}

function fakeSpawn(outcome: "spawn" | Error): { spawn: SpawnFn; calls: SpawnCall[] } {
  const calls: SpawnCall[] = [];
  const spawn: SpawnFn = (command, args, options) => {
    calls.push({ command, args, options });
    const child = Object.assign(new EventEmitter(), { unref: () => undefined });
    setImmediate(() => {
      if (outcome === "spawn") child.emit("spawn");
      else child.emit("error", outcome);
    });
    return child;
  };
  return { spawn, calls };
}

describe("browserCommand", () => {
  it("picks the platform's opener", () => {
    const url = "https://a1.apps.test";
    expect(browserCommand("darwin", url)).toEqual({ command: "open", args: [url] });
    expect(browserCommand("linux", url)).toEqual({ command: "xdg-open", args: [url] });
    expect(browserCommand("win32", url)).toEqual({ command: "cmd", args: ["/c", "start", "", url] });
  });

  it("rejects unsupported platforms", () => {
    expect(() => browserCommand("aix", "https://a1.apps.test")).toThrow(BrowserOpenError);
  });
});

describe("SystemBrowserOpener", () => {
  it("spawns a detached opener", async () => {
    const { spawn, calls } = fakeSpawn("spawn");
    await new SystemBrowserOpener("linux", spawn).open("https://a1.apps.test");

    expect(calls).toEqual([
      { command: "xdg-open", args: ["https://a1.apps.test"], options: { detached: true, stdio: "ignore" } }
    ]);
  });

  it("reports an opener that fails to start", async () => {
    const { spawn } = fakeSpawn(new Error("spawn xdg-open ENOENT"));
    const err = await new SystemBrowserOpener("linux", spawn).open("https://a1.apps.test").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(BrowserOpenError);
    expect(err).toMatchObject({ message: "failed to run xdg-open: spawn xdg-open ENOENT" });
  });

  it("fails on an unsupported platform without spawning", async () => {
    const { spawn, calls } = fakeSpawn("spawn");
    await expect(new SystemBrowserOpener("aix", spawn).open("https://a1.apps.test")).rejects.toThrow(
      "unsupported platform: aix"
    );
    expect(calls).toHaveLength(0);
  });
});
