import * as z from "zod/v4";

const zText = z
  .string()
  .nullish()
  .transform((v) => v ?? "");

const zOptionalText = z
  .string()
  .nullish()
  .transform((v) => (v ? v : undefined));

export const zLoginResponse = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().nonnegative(),
  refresh_token: z.string().optional(),
  token_type: z.string().optional()
});

export const zApp = z.object({
  id: z.string(),
  system_id: z.string(),
  name: zText,
  description: zText,
  integrator_username: zOptionalText
});

export const zAppListResponse = z.object({
  apps: z.array(zApp).nullish().transform((v) => v ?? [])
});

export const zParameter = z.object({
  id: z.string(),
  name: zText,
  label: zText,
  description: zText,
  required: z.boolean().nullish().transform((v) => v ?? false),
  type: zText,
  default_value: z.unknown().optional(),
  isVisible: z.boolean().optional()
});

export const zParameterGroup = z.object({
  id: zOptionalText,
  name: zText,
  label: zText,
  parameters: z.array(zParameter).nullish().transform((v) => v ?? [])
});

export const zAppParameters = z.object({
  overall_job_type: zText,
  groups: z.array(zParameterGroup).nullish().transform((v) => v ?? [])
});

export const zLaunchResponse = z.object({
  analysis_id: z.string(),
  name: zText,
  status: zText,
  url: zOptionalText
});

export const zAnalysisStatus = z.object({
  analysis_id: z.string(),
  status: zText,
  url_ready: z.boolean().nullish().transform((v) => v ?? false),
  url: zOptionalText,
  url_check_details: z.record(z.string(), z.unknown()).optional()
});

export const zAnalysis = z.object({
  analysis_id: z.string(),
  app_id: zText,
  system_id: zText,
  status: zText
});

export const zAnalysisListResponse = z.object({
  analyses: z.array(zAnalysis).nullish().transform((v) => v ?? [])
});

export const zDirectoryEntry = z.object({
  name: z.string(),
  type: z.string()
});

export const zDirectoryContents = z.object({
  path: z.string(),
  type: z.string(),
  contents: z.array(zDirectoryEntry).nullish().transform((v) => v ?? [])
});

export const zCreateDirectoryResponse = z.object({
  path: z.string(),
  type: z.string()
});

export type LoginResponse = z.output<typeof zLoginResponse>;
export type App = z.output<typeof zApp>;
export type Parameter = z.output<typeof zParameter>;
export type ParameterGroup = z.output<typeof zParameterGroup>;
export type AppParameters = z.output<typeof zAppParameters>;
export type LaunchResponse = z.output<typeof zLaunchResponse>;
export type AnalysisStatus = z.output<typeof zAnalysisStatus>;
export type Analysis = z.output<typeof zAnalysis>;
export type DirectoryEntry = z.output<typeof zDirectoryEntry>;
export type CreateDirectoryResponse = z.output<typeof zCreateDirectoryResponse>;

export type Metadata = Record<string, string>;
export type MetadataInput = Record<string, string | number | boolean>;

export type LaunchConfig = Record<string, unknown>;

// Body of POST /app/launch/{system_id}/{app_id}. The server fills in name,
// output_dir and email when they are absent.
export interface LaunchSubmission {
  name?: string;
  email?: string;
  config: LaunchConfig;
  system_id?: string;
  debug?: boolean;
  notify?: boolean;
  output_dir?: string;
  requirements?: Record<string, unknown>;
}

export type ControlOperation = "exit" | "save_and_exit" | "extend_time";

export interface DirectoryListing {
  kind: "directory";
  path: string;
  type: string;
  contents: DirectoryEntry[];
  metadata: Metadata;
}

export interface FilePayload {
  kind: "file";
  path: string;
  contentType: string;
  content: Buffer;
  metadata: Metadata;
}

export type DataEntry = DirectoryListing | FilePayload;

export interface ListAppsQuery {
  name?: string;
  integrator?: string;
  description?: string;
  jobType?: string;
  limit: number;
  offset: number;
}

export interface BrowseOptions {
  offset?: number;
  limit?: number;
  includeMetadata?: boolean;
}

export interface DeleteOptions {
  recurse?: boolean;
  dryRun?: boolean;
}

/**
 * Operations the tools and workflows need from the remote platform.
 * `PlatformClient` is the HTTP implementation; tests substitute fakes.
 */
export interface PlatformApi {
  ensureToken(signal?: AbortSignal): Promise<void>;
  listApps(query: ListAppsQuery, signal?: AbortSignal): Promise<App[]>;
  getAppParameters(systemId: string, appId: string, signal?: AbortSignal): Promise<AppParameters>;
  launchApp(systemId: string, appId: string, submission: LaunchSubmission, signal?: AbortSignal): Promise<LaunchResponse>;
  getAnalysisStatus(analysisId: string, signal?: AbortSignal): Promise<AnalysisStatus>;
  listAnalyses(status?: string, signal?: AbortSignal): Promise<Analysis[]>;
  controlAnalysis(
    analysisId: string,
    operation: ControlOperation,
    saveOutputs?: boolean,
    signal?: AbortSignal
  ): Promise<void>;
  browseData(path: string, options?: BrowseOptions, signal?: AbortSignal): Promise<DataEntry>;
  createDirectory(path: string, metadata?: MetadataInput, signal?: AbortSignal): Promise<CreateDirectoryResponse>;
  uploadFile(path: string, content: string, metadata?: MetadataInput, signal?: AbortSignal): Promise<void>;
  setMetadata(path: string, metadata: MetadataInput, replace: boolean, signal?: AbortSignal): Promise<void>;
  deleteData(path: string, options?: DeleteOptions, signal?: AbortSignal): Promise<void>;
}
