import type { Analysis, AnalysisStatus, App, AppParameters, DataEntry, Metadata } from "../platform/types.js";
import type { LaunchOutcome } from "../workflows/launchAndWait.js";

// Markdown renderers for tool results. Each returns non-empty text.

function formatValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function metadataLines(metadata: Metadata): string[] {
  const keys = Object.keys(metadata).sort();
  if (keys.length === 0) return [];
  return ["### Metadata", "", ...keys.map((k) => `- **${k}**: ${metadata[k] ?? ""}`), ""];
}

function longestBacktickRun(text: string): number {
  let longest = 0;
  for (const m of text.matchAll(/`+/g)) longest = Math.max(longest, m[0].length);
  return longest;
}

export function renderAppList(apps: App[]): string {
  const lines = [`## Available Applications (${apps.length})`, ""];
  if (apps.length === 0) lines.push("No applications matched the query.");
  for (const app of apps) {
    lines.push(`### ${app.name || app.id}`, `- **ID**: \`${app.id}\``, `- **System**: \`${app.system_id}\``);
    if (app.integrator_username) lines.push(`- **Integrator**: ${app.integrator_username}`);
    if (app.description) lines.push(`- **Description**: ${app.description}`);
    lines.push("");
  }
  return lines.join("\n").trimEnd();
}

export function renderAppParameters(appId: string, params: AppParameters): string {
  const lines = [`## Parameters for \`${appId}\``, "", `**Job Type**: ${params.overall_job_type || "unknown"}`, ""];
  if (params.groups.every((g) => g.parameters.length === 0)) lines.push("This app takes no parameters.");

  for (const group of params.groups) {
    if (group.parameters.length === 0) continue;
    lines.push(`### ${group.label || group.name || "Parameters"}`, "");
    for (const p of group.parameters) {
      const flags = [p.required ? "required" : "optional"];
      if (p.isVisible === false) flags.push("hidden");
      lines.push(`- **${p.label || p.name || p.id}** (${flags.join(", ")})`);
      lines.push(`  - ID: \`${p.id}\``);
      if (p.type) lines.push(`  - Type: ${p.type}`);
      if (p.default_value !== undefined && p.default_value !== null && p.default_value !== "") {
        lines.push(`  - Default: \`${formatValue(p.default_value)}\``);
      }
      if (p.description) lines.push(`  - ${p.description}`);
    }
    lines.push("");
  }
  return lines.join("\n").trimEnd();
}

export function renderLaunchOutcome(outcome: LaunchOutcome): string {
  switch (outcome.state) {
    case "params_missing":
      return [
        "**Missing Required Parameters**",
        "",
        "The app was not launched. Provide values for these parameters in `config`:",
        "",
        ...outcome.missing.map((m) => `- ${m}`)
      ].join("\n");
    case "launched":
      return [
        "**Batch Job Launched**",
        "",
        `- **Analysis ID**: \`${outcome.analysisId}\``,
        `- **Name**: ${outcome.name}`,
        `- **Status**: ${outcome.status}`,
        "",
        "The job runs in the background. Use `get_analysis_status` to follow it."
      ].join("\n");
    case "ready":
      return [
        "**Interactive App Ready**",
        "",
        `- **Analysis ID**: \`${outcome.analysisId}\``,
        `- **Name**: ${outcome.name}`,
        `- **Status**: ${outcome.status}`,
        `- **URL**: ${outcome.url}`
      ].join("\n");
  }
}

export function renderAnalysisStatus(status: AnalysisStatus): string {
  const lines = [
    "## Analysis Status",
    "",
    `- **Analysis ID**: \`${status.analysis_id}\``,
    `- **Status**: ${status.status || "unknown"}`,
    `- **URL Ready**: ${status.url_ready ? "yes" : "no"}`
  ];
  if (status.url) lines.push(`- **URL**: ${status.url}`);
  return lines.join("\n");
}

export function renderAnalysisList(status: string, analyses: Analysis[]): string {
  const lines = [`## ${status} Analyses (${analyses.length})`, ""];
  if (analyses.length === 0) lines.push(`No analyses with status ${status}.`);
  for (const a of analyses) {
    lines.push(
      `### \`${a.analysis_id}\``,
      `- **App ID**: \`${a.app_id}\``,
      `- **System**: \`${a.system_id}\``,
      `- **Status**: ${a.status}`,
      ""
    );
  }
  return lines.join("\n").trimEnd();
}

export function renderStopAnalysis(analysisId: string, saveOutputs: boolean): string {
  return saveOutputs
    ? `Stopped analysis \`${analysisId}\`; outputs were saved.`
    : `Stopped analysis \`${analysisId}\` without saving outputs.`;
}

export function renderExtendAnalysisTime(analysisId: string): string {
  return `Extended the time limit of analysis \`${analysisId}\`.`;
}

export function renderOpenInBrowser(url: string): string {
  return `Opened ${url} in the default browser.`;
}

export function renderDataEntry(entry: DataEntry): string {
  if (entry.kind === "file") {
    const text = entry.content.toString("utf8");
    const fence = "`".repeat(Math.max(3, longestBacktickRun(text) + 1));
    const lines = [`## File: ${entry.path}`, "", ...metadataLines(entry.metadata), fence, text, fence];
    return lines.join("\n");
  }

  const directories = entry.contents.filter((e) => e.type === "collection");
  const files = entry.contents.filter((e) => e.type === "data_object");
  const lines = [`## Directory: ${entry.path}`, "", ...metadataLines(entry.metadata)];
  if (directories.length === 0 && files.length === 0) {
    lines.push("*Empty directory*");
    return lines.join("\n");
  }
  if (directories.length > 0) lines.push("### Directories", "", ...directories.map((d) => `- ${d.name}/`), "");
  if (files.length > 0) lines.push("### Files", "", ...files.map((f) => `- ${f.name}`), "");
  return lines.join("\n").trimEnd();
}

export function renderCreateDirectory(path: string): string {
  return `Created directory: ${path}`;
}

export function renderUploadFile(path: string, sizeBytes: number): string {
  return `Uploaded ${sizeBytes} bytes to ${path}`;
}

export function renderSetMetadata(path: string, keys: string[], replace: boolean): string {
  const verb = replace ? "Replaced metadata on" : "Added metadata to";
  return `${verb} ${path}: ${[...keys].sort().join(", ")}`;
}

export function renderDelete(path: string, recurse: boolean, dryRun: boolean): string {
  const suffix = recurse ? " (recursive)" : "";
  return dryRun ? `Dry run: ${path} would be deleted${suffix}.` : `Deleted ${path}${suffix}.`;
}
