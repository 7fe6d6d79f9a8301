import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Logger } from "pino";
import type { PlatformApi } from "../platform/types.js";
import type { PlatformWorkflows } from "../workflows/workflows.js";
import { SERVICE_NAME } from "../logging/logger.js";
import { registerToolDefinitions, type ToolDefinition } from "./register.js";
import { platformToolDefinitions } from "./tools.js";

export const SERVER_VERSION = "0.1.0";

export interface GatewayDeps {
  client: PlatformApi;
  workflows: PlatformWorkflows;
  logger: Logger;
  tools?: ToolDefinition[];
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: SERVICE_NAME,
    version: SERVER_VERSION
  });

  registerToolDefinitions(
    mcp,
    { client: deps.client, workflows: deps.workflows, logger: deps.logger },
    deps.tools ?? platformToolDefinitions
  );

  return mcp;
}
