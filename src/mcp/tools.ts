import { defineTool, type ToolDefinition } from "./register.js";
import {
  renderAnalysisList,
  renderAnalysisStatus,
  renderAppList,
  renderAppParameters,
  renderCreateDirectory,
  renderDataEntry,
  renderDelete,
  renderExtendAnalysisTime,
  renderLaunchOutcome,
  renderOpenInBrowser,
  renderSetMetadata,
  renderStopAnalysis,
  renderUploadFile
} from "./render.js";
import {
  zBrowseDataInput,
  zCreateDirectoryInput,
  zDeleteDataInput,
  zExtendAnalysisTimeInput,
  zGetAnalysisStatusInput,
  zGetAppParametersInput,
  zLaunchAppAndWaitInput,
  zListAppsInput,
  zListRunningAnalysesInput,
  zOpenInBrowserInput,
  zSetMetadataInput,
  zStopAnalysisInput,
  zUploadFileInput
} from "./toolSchemas.js";

const listAppsTool = defineTool({
  toolName: "list_apps",
  description: "Search the application catalog. All filters are optional and combined.",
  inputSchema: zListAppsInput,
  async run(args, { client, signal }) {
    const apps = await client.listApps(
      {
        name: args.name,
        integrator: args.integrator,
        description: args.description,
        jobType: args.job_type,
        limit: args.limit,
        offset: args.offset
      },
      signal
    );
    return renderAppList(apps);
  }
});

const getAppParametersTool = defineTool({
  toolName: "get_app_parameters",
  description: "Show the parameter groups of an app, with ids, types, defaults and which parameters are required.",
  inputSchema: zGetAppParametersInput,
  async run(args, { client, signal }) {
    const params = await client.getAppParameters(args.system_id, args.app_id, signal);
    return renderAppParameters(args.app_id, params);
  }
});

const launchAppAndWaitTool = defineTool({
  toolName: "launch_app_and_wait",
  description:
    "Launch an app. Required parameters are checked first. Batch apps return once submitted; " +
    "interactive apps are polled until their URL is ready, they fail, or max_wait seconds pass.",
  inputSchema: zLaunchAppAndWaitInput,
  async run(args, { workflows, signal }) {
    const outcome = await workflows.launchAndWait(
      {
        appId: args.app_id,
        systemId: args.system_id,
        name: args.name,
        config: args.config,
        maxWaitMs: args.max_wait * 1000,
        outputDir: args.output_dir,
        notify: args.notify,
        debug: args.debug
      },
      signal
    );
    return renderLaunchOutcome(outcome);
  }
});

const getAnalysisStatusTool = defineTool({
  toolName: "get_analysis_status",
  description: "Get the status of an analysis and whether its URL is ready.",
  inputSchema: zGetAnalysisStatusInput,
  async run(args, { client, signal }) {
    return renderAnalysisStatus(await client.getAnalysisStatus(args.analysis_id, signal));
  }
});

const listRunningAnalysesTool = defineTool({
  toolName: "list_running_analyses",
  description: "List analyses with the given status (default: Running).",
  inputSchema: zListRunningAnalysesInput,
  async run(args, { client, signal }) {
    const analyses = await client.listAnalyses(args.status, signal);
    return renderAnalysisList(args.status, analyses);
  }
});

const stopAnalysisTool = defineTool({
  toolName: "stop_analysis",
  description: "Stop a running analysis, saving its outputs unless save_outputs is false.",
  inputSchema: zStopAnalysisInput,
  async run(args, { workflows, signal }) {
    await workflows.stopAnalysis(args.analysis_id, args.save_outputs, signal);
    return renderStopAnalysis(args.analysis_id, args.save_outputs);
  }
});

const extendAnalysisTimeTool = defineTool({
  toolName: "extend_analysis_time",
  description: "Extend the time limit of a running interactive analysis.",
  inputSchema: zExtendAnalysisTimeInput,
  async run(args, { workflows, signal }) {
    await workflows.extendAnalysisTime(args.analysis_id, signal);
    return renderExtendAnalysisTime(args.analysis_id);
  }
});

const openInBrowserTool = defineTool({
  toolName: "open_in_browser",
  description: "Open an http(s) URL, such as an interactive app, in the local default browser.",
  inputSchema: zOpenInBrowserInput,
  async run(args, { workflows }) {
    await workflows.openInBrowser(args.url);
    return renderOpenInBrowser(args.url);
  }
});

const browseDataTool = defineTool({
  toolName: "browse_data",
  description: "List a data store directory or read a file's content, optionally with its metadata.",
  inputSchema: zBrowseDataInput,
  async run(args, { client, signal }) {
    const entry = await client.browseData(
      args.path,
      { offset: args.offset, limit: args.limit, includeMetadata: args.include_metadata },
      signal
    );
    return renderDataEntry(entry);
  }
});

const createDirectoryTool = defineTool({
  toolName: "create_directory",
  description: "Create a directory in the data store, optionally with metadata.",
  inputSchema: zCreateDirectoryInput,
  async run(args, { client, signal }) {
    const created = await client.createDirectory(args.path, args.metadata, signal);
    return renderCreateDirectory(created.path || args.path);
  }
});

const uploadFileTool = defineTool({
  toolName: "upload_file",
  description: "Write text content to a file in the data store, optionally with metadata.",
  inputSchema: zUploadFileInput,
  async run(args, { client, signal }) {
    await client.uploadFile(args.path, args.content, args.metadata, signal);
    return renderUploadFile(args.path, Buffer.byteLength(args.content, "utf8"));
  }
});

const setMetadataTool = defineTool({
  toolName: "set_metadata",
  description: "Add metadata to a file or directory, or replace all of its metadata when replace is true.",
  inputSchema: zSetMetadataInput,
  async run(args, { client, signal }) {
    await client.setMetadata(args.path, args.metadata, args.replace, signal);
    return renderSetMetadata(args.path, Object.keys(args.metadata), args.replace);
  }
});

const deleteDataTool = defineTool({
  toolName: "delete_data",
  description: "Delete a file or directory. Non-empty directories need recurse; dry_run only reports.",
  inputSchema: zDeleteDataInput,
  async run(args, { client, signal }) {
    await client.deleteData(args.path, { recurse: args.recurse, dryRun: args.dry_run }, signal);
    return renderDelete(args.path, args.recurse, args.dry_run);
  }
});

export const platformToolDefinitions: ToolDefinition[] = [
  listAppsTool,
  getAppParametersTool,
  launchAppAndWaitTool,
  getAnalysisStatusTool,
  listRunningAnalysesTool,
  stopAnalysisTool,
  extendAnalysisTimeTool,
  openInBrowserTool,
  browseDataTool,
  createDirectoryTool,
  uploadFileTool,
  setMetadataTool,
  deleteDataTool
];
