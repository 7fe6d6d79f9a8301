import type { Logger } from "pino";
import type { PlatformApi } from "../platform/types.js";
import type { BrowserOpener } from "./browser.js";
import { launchAndWait, type LaunchOutcome, type LaunchRequest, type Sleep } from "./launchAndWait.js";

export interface PlatformWorkflowsOptions {
  client: PlatformApi;
  browser: BrowserOpener;
  logger: Logger;
  pollIntervalMs: number;
  sleep?: Sleep;
  now?: () => number;
}

export class PlatformWorkflows {
  constructor(private readonly opts: PlatformWorkflowsOptions) {}

  launchAndWait(req: LaunchRequest, signal?: AbortSignal): Promise<LaunchOutcome> {
    return launchAndWait(
      {
        client: this.opts.client,
        logger: this.opts.logger,
        pollIntervalMs: this.opts.pollIntervalMs,
        sleep: this.opts.sleep,
        now: this.opts.now
      },
      req,
      signal
    );
  }

  async stopAnalysis(analysisId: string, saveOutputs: boolean, signal?: AbortSignal): Promise<void> {
    const operation = saveOutputs ? "save_and_exit" : "exit";
    this.opts.logger.info({ analysis_id: analysisId, operation }, "stopping analysis");
    await this.opts.client.controlAnalysis(analysisId, operation, saveOutputs, signal);
  }

  async extendAnalysisTime(analysisId: string, signal?: AbortSignal): Promise<void> {
    this.opts.logger.info({ analysis_id: analysisId }, "extending analysis time limit");
    await this.opts.client.controlAnalysis(analysisId, "extend_time", undefined, signal);
  }

  async openInBrowser(url: string): Promise<void> {
    this.opts.logger.info({ url }, "opening url in browser");
    await this.opts.browser.open(url);
  }
}
