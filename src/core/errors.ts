/**
 * Snapshot of a launched analysis as last observed by the poll loop.
 * Carried by the launch errors so the caller can follow up on the analysis.
 */
export interface LaunchProgress {
  analysisId: string;
  name: string;
  status: string;
  url: string | null;
}

export class PlatformError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlatformError";
  }
}

export class ConfigurationError extends PlatformError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class AuthenticationError extends PlatformError {
  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`login failed with status ${status}: ${body}`);
    this.name = "AuthenticationError";
  }
}

export class RemoteApiError extends PlatformError {
  constructor(
    readonly method: string,
    readonly path: string,
    readonly status: number,
    readonly body: string
  ) {
    super(`${method} ${path} failed with status ${status}: ${body}`);
    this.name = "RemoteApiError";
  }
}

export class RequestTimeoutError extends PlatformError {
  constructor(
    readonly method: string,
    readonly path: string,
    readonly timeoutMs: number
  ) {
    super(`${method} ${path} timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

export class WorkflowFailureError extends PlatformError {
  constructor(
    readonly status: string,
    readonly progress: LaunchProgress
  ) {
    super(`analysis ${progress.analysisId} failed with status: ${status}`);
    this.name = "WorkflowFailureError";
  }
}

export class LaunchTimeoutError extends PlatformError {
  constructor(
    readonly waitedMs: number,
    readonly progress: LaunchProgress
  ) {
    super(
      `timed out after ${formatSeconds(waitedMs)} waiting for analysis ${progress.analysisId} to become ready (last status: ${progress.status})`
    );
    this.name = "LaunchTimeoutError";
  }
}

export class CancellationError extends PlatformError {
  constructor(
    message: string,
    readonly progress: LaunchProgress | null = null
  ) {
    super(message);
    this.name = "CancellationError";
  }
}

export class BrowserOpenError extends PlatformError {
  constructor(message: string) {
    super(message);
    this.name = "BrowserOpenError";
  }
}

function formatSeconds(ms: number): string {
  const s = ms / 1000;
  return Number.isInteger(s) ? `${s}s` : `${s.toFixed(1)}s`;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}
