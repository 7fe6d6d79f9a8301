import type {
  Analysis,
  AnalysisStatus,
  App,
  AppParameters,
  BrowseOptions,
  ControlOperation,
  CreateDirectoryResponse,
  DataEntry,
  DeleteOptions,
  LaunchResponse,
  LaunchSubmission,
  ListAppsQuery,
  MetadataInput,
  Parameter,
  PlatformApi
} from "../../src/platform/types.js";
import type { BrowserOpener } from "../../src/workflows/browser.js";

export interface RecordedCall {
  op: string;
  args: unknown[];
}

export function param(id: string, name: string, required: boolean, extra: Partial<Parameter> = {}): Parameter {
  return { id, name, label: name, description: "", required, type: "Text", ...extra };
}

export function status(st: string, urlReady = false, url?: string): AnalysisStatus {
  return { analysis_id: "an-1", status: st, url_ready: urlReady, url };
}

/** In-memory PlatformApi; canned responses are plain fields, every call is recorded. */
export class FakePlatform implements PlatformApi {
  calls: RecordedCall[] = [];
  apps: App[] = [];
  parameters: AppParameters = { overall_job_type: "DE", groups: [] };
  launchResponse: LaunchResponse = { analysis_id: "an-1", name: "job-1", status: "Submitted", url: undefined };
  // Consumed in order; an Error entry is thrown. Once drained, polls report Running.
  statuses: Array<AnalysisStatus | Error> = [];
  analyses: Analysis[] = [];
  entry: DataEntry = { kind: "directory", path: "/", type: "collection", contents: [], metadata: {} };
  failure: Error | null = null;

  private record(op: string, ...args: unknown[]): void {
    this.calls.push({ op, args });
    if (this.failure) throw this.failure;
  }

  callsTo(op: string): RecordedCall[] {
    return this.calls.filter((c) => c.op === op);
  }

  async ensureToken(): Promise<void> {
    this.record("ensureToken");
  }

  async listApps(query: ListAppsQuery): Promise<App[]> {
    this.record("listApps", query);
    return this.apps;
  }

  async getAppParameters(systemId: string, appId: string): Promise<AppParameters> {
    this.record("getAppParameters", systemId, appId);
    return this.parameters;
  }

  async launchApp(systemId: string, appId: string, submission: LaunchSubmission): Promise<LaunchResponse> {
    this.record("launchApp", systemId, appId, submission);
    return this.launchResponse;
  }

  async getAnalysisStatus(analysisId: string): Promise<AnalysisStatus> {
    this.record("getAnalysisStatus", analysisId);
    const next = this.statuses.shift() ?? status("Running");
    if (next instanceof Error) throw next;
    return next;
  }

  async listAnalyses(st?: string): Promise<Analysis[]> {
    this.record("listAnalyses", st);
    return this.analyses;
  }

  async controlAnalysis(analysisId: string, operation: ControlOperation, saveOutputs?: boolean): Promise<void> {
    this.record("controlAnalysis", analysisId, operation, saveOutputs);
  }

  async browseData(path: string, options?: BrowseOptions): Promise<DataEntry> {
    this.record("browseData", path, options);
    return this.entry;
  }

  async createDirectory(path: string, metadata?: MetadataInput): Promise<CreateDirectoryResponse> {
    this.record("createDirectory", path, metadata);
    return { path, type: "collection" };
  }

  async uploadFile(path: string, content: string, metadata?: MetadataInput): Promise<void> {
    this.record("uploadFile", path, content, metadata);
  }

  async setMetadata(path: string, metadata: MetadataInput, replace: boolean): Promise<void> {
    this.record("setMetadata", path, metadata, replace);
  }

  async deleteData(path: string, options?: DeleteOptions): Promise<void> {
    this.record("deleteData", path, options);
  }
}

export class FakeBrowser implements BrowserOpener {
  opened: string[] = [];

  async open(url: string): Promise<void> {
    this.opened.push(url);
  }
}

/** Virtual clock whose sleep advances time instantly. */
export function fakeClock(): { now: () => number; sleep: (ms: number) => Promise<void>; sleeps: number[] } {
  let t = 0;
  const sleeps: number[] = [];
  return {
    now: () => t,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      t += ms;
    },
    sleeps
  };
}
