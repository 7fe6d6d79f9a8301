import { setTimeout as delay } from "timers/promises";
import type { Logger } from "pino";
import {
  CancellationError,
  LaunchTimeoutError,
  WorkflowFailureError,
  isAbortError,
  type LaunchProgress
} from "../core/errors.js";
import type { AnalysisStatus, AppParameters, LaunchConfig, LaunchSubmission, PlatformApi } from "../platform/types.js";

const INTERACTIVE_JOB_TYPES = new Set(["interactive", "vice"]);
const TERMINAL_FAILURE_STATUSES = new Set(["Failed", "Canceled"]);

export const DEFAULT_MAX_WAIT_MS = 300_000;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface LaunchAndWaitDeps {
  client: PlatformApi;
  logger: Logger;
  pollIntervalMs: number;
  sleep?: Sleep;
  now?: () => number;
}

export interface LaunchRequest {
  appId: string;
  systemId: string;
  name?: string;
  config: LaunchConfig;
  maxWaitMs: number;
  outputDir?: string;
  notify?: boolean;
  debug?: boolean;
}

export type LaunchOutcome =
  | { state: "params_missing"; missing: string[] }
  | { state: "launched"; analysisId: string; name: string; status: string }
  | { state: "ready"; analysisId: string; name: string; status: string; url: string };

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/** Display names of required, visible parameters whose ids are absent from `config`. */
export function checkMissingParams(params: AppParameters, config: LaunchConfig): string[] {
  const missing: string[] = [];
  for (const group of params.groups) {
    for (const param of group.parameters) {
      if (!param.required || param.isVisible === false) continue;
      if (Object.prototype.hasOwnProperty.call(config, param.id)) continue;
      missing.push(param.name || param.id);
    }
  }
  return missing;
}

export function isInteractiveJobType(jobType: string): boolean {
  return INTERACTIVE_JOB_TYPES.has(jobType.trim().toLowerCase());
}

function canceled(progress: LaunchProgress): CancellationError {
  return new CancellationError(`canceled while waiting for analysis ${progress.analysisId}`, progress);
}

/**
 * Launch an app and, for interactive job types, poll its status until the
 * analysis URL is reachable, the analysis fails, or `maxWaitMs` elapses.
 * Batch launches return right after submission.
 */
export async function launchAndWait(
  deps: LaunchAndWaitDeps,
  req: LaunchRequest,
  signal?: AbortSignal
): Promise<LaunchOutcome> {
  const { client, logger } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? Date.now;

  const params = await client.getAppParameters(req.systemId, req.appId, signal);
  const missing = checkMissingParams(params, req.config);
  if (missing.length > 0) {
    logger.info({ app_id: req.appId, missing }, "launch skipped, required parameters missing");
    return { state: "params_missing", missing };
  }

  const interactive = isInteractiveJobType(params.overall_job_type);
  logger.info(
    { app_id: req.appId, system_id: req.systemId, job_type: params.overall_job_type, interactive },
    "launching app"
  );

  const submission: LaunchSubmission = {
    name: req.name,
    config: req.config,
    output_dir: req.outputDir,
    notify: req.notify,
    debug: req.debug
  };
  const launched = await client.launchApp(req.systemId, req.appId, submission, signal);

  const progress: LaunchProgress = {
    analysisId: launched.analysis_id,
    name: launched.name,
    status: launched.status,
    url: launched.url ?? null
  };

  if (!interactive) {
    logger.info({ analysis_id: progress.analysisId }, "batch job launched");
    return { state: "launched", analysisId: progress.analysisId, name: progress.name, status: progress.status };
  }

  logger.info({ analysis_id: progress.analysisId, max_wait_ms: req.maxWaitMs }, "waiting for interactive app");
  const deadline = now() + req.maxWaitMs;

  for (;;) {
    try {
      await sleep(deps.pollIntervalMs, signal);
    } catch (err) {
      if (signal?.aborted || isAbortError(err)) throw canceled(progress);
      throw err;
    }

    if (now() >= deadline) throw new LaunchTimeoutError(req.maxWaitMs, { ...progress, url: null });

    let status: AnalysisStatus;
    try {
      status = await client.getAnalysisStatus(progress.analysisId, signal);
    } catch (err) {
      if (signal?.aborted) throw canceled(progress);
      logger.warn(
        { analysis_id: progress.analysisId, err: err instanceof Error ? err.message : String(err) },
        "failed to get analysis status"
      );
      continue;
    }

    progress.status = status.status;
    progress.url = status.url ?? null;
    logger.debug(
      { analysis_id: progress.analysisId, status: status.status, url_ready: status.url_ready },
      "analysis status"
    );

    if (status.url_ready && status.url) {
      logger.info({ analysis_id: progress.analysisId, url: status.url }, "interactive app ready");
      return {
        state: "ready",
        analysisId: progress.analysisId,
        name: progress.name,
        status: progress.status,
        url: status.url
      };
    }

    if (TERMINAL_FAILURE_STATUSES.has(status.status)) {
      throw new WorkflowFailureError(status.status, progress);
    }
  }
}
