import * as z from "zod/v4";

const zAppId = z.string().min(1).describe("The application ID");
const zSystemId = z.string().min(1).default("de").describe("The system ID (default: de)");
const zAnalysisId = z.string().min(1).describe("The analysis ID");
const zDataPath = z.string().min(1).describe("Slash-delimited data store path");

export const zMetadataInput = z.record(z.string().min(1), z.union([z.string(), z.number(), z.boolean()]));

export const zListAppsInput = z.object({
  name: z.string().optional().describe("Filter by app name"),
  integrator: z.string().optional().describe("Filter by integrator name"),
  description: z.string().optional().describe("Filter by app description"),
  job_type: z.string().optional().describe("Filter by job type (Interactive, DE, OSG, Tapis)"),
  limit: z.number().int().min(1).max(1000).default(10).describe("Maximum number of apps to return (default 10)"),
  offset: z.number().int().min(0).default(0).describe("Offset for pagination (default 0)")
});

export const zGetAppParametersInput = z.object({
  app_id: zAppId,
  system_id: zSystemId
});

export const zLaunchAppAndWaitInput = z.object({
  app_id: zAppId,
  system_id: zSystemId,
  name: z.string().min(1).optional().describe("Name for the analysis (generated by the platform when omitted)"),
  config: z
    .record(z.string(), z.unknown())
    .default({})
    .describe("Parameter values keyed by parameter ID"),
  max_wait: z
    .number()
    .int()
    .min(1)
    .max(3600)
    .default(300)
    .describe("Maximum seconds to wait for an interactive app (default 300)"),
  output_dir: z.string().min(1).optional().describe("Output directory (platform default when omitted)"),
  notify: z.boolean().optional().describe("Send a notification when the analysis changes state"),
  debug: z.boolean().optional().describe("Launch in debug mode")
});

export const zGetAnalysisStatusInput = z.object({
  analysis_id: zAnalysisId
});

export const zListRunningAnalysesInput = z.object({
  status: z
    .string()
    .min(1)
    .default("Running")
    .describe("Status filter (default: Running). Common values: Running, Completed, Failed, Submitted, Canceled")
});

export const zStopAnalysisInput = z.object({
  analysis_id: zAnalysisId,
  save_outputs: z.boolean().default(true).describe("Save outputs before stopping (default true)")
});

export const zExtendAnalysisTimeInput = z.object({
  analysis_id: zAnalysisId
});

export const zOpenInBrowserInput = z.object({
  url: z.url({ protocol: /^https?$/ }).describe("The http(s) URL to open")
});

export const zBrowseDataInput = z.object({
  path: zDataPath,
  offset: z.number().int().min(0).default(0).describe("Offset for pagination (default 0)"),
  limit: z.number().int().min(0).default(100).describe("Limit for pagination (default 100, 0 for server default)"),
  include_metadata: z.boolean().default(false).describe("Include metadata in the response (default false)")
});

export const zCreateDirectoryInput = z.object({
  path: zDataPath,
  metadata: zMetadataInput.optional().describe("Metadata to attach to the directory")
});

export const zUploadFileInput = z.object({
  path: zDataPath,
  content: z.string().describe("The file content"),
  metadata: zMetadataInput.optional().describe("Metadata to attach to the file")
});

export const zSetMetadataInput = z.object({
  path: zDataPath,
  metadata: zMetadataInput.describe("Metadata to set"),
  replace: z.boolean().default(false).describe("Replace all existing metadata instead of merging (default false)")
});

export const zDeleteDataInput = z.object({
  path: zDataPath,
  recurse: z.boolean().default(false).describe("Delete directories recursively (default false)"),
  dry_run: z.boolean().default(false).describe("Report what would be deleted without deleting (default false)")
});
