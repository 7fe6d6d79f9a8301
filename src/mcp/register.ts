import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { Logger } from "pino";
import * as z from "zod/v4";
import type { PlatformApi } from "../platform/types.js";
import type { PlatformWorkflows } from "../workflows/workflows.js";

const TOOL_NAME_RE = /^[a-z][a-z0-9_]*$/;

export interface ToolContext {
  client: PlatformApi;
  workflows: PlatformWorkflows;
  logger: Logger;
  // Aborted when the MCP client cancels the request or the transport closes.
  signal?: AbortSignal;
}

export interface ToolDefinition {
  toolName: string;
  description: string;
  inputSchema: z.ZodObject;
  invoke(rawArgs: unknown, ctx: ToolContext): Promise<string>;
}

export interface DefineToolOptions<S extends z.ZodObject> {
  toolName: string;
  description: string;
  inputSchema: S;
  run(args: z.output<S>, ctx: ToolContext): Promise<string>;
}

/** Binds a handler to its input schema; arguments are decoded before `run` sees them. */
export function defineTool<S extends z.ZodObject>(opts: DefineToolOptions<S>): ToolDefinition {
  return {
    toolName: opts.toolName,
    description: opts.description,
    inputSchema: opts.inputSchema,
    async invoke(rawArgs, ctx) {
      const parsed = opts.inputSchema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        throw new McpError(ErrorCode.InvalidParams, `${opts.toolName}: ${z.prettifyError(parsed.error)}`);
      }
      return opts.run(parsed.data, ctx);
    }
  };
}

export function validateToolDefinitions(tools: ToolDefinition[]): void {
  const seen = new Set<string>();
  for (const tool of tools) {
    if (tool.toolName.length > 128 || !TOOL_NAME_RE.test(tool.toolName)) {
      throw new Error(`invalid tool name: ${tool.toolName}`);
    }
    if (seen.has(tool.toolName)) throw new Error(`duplicate tool name: ${tool.toolName}`);
    seen.add(tool.toolName);
    if (tool.description.trim().length === 0) throw new Error(`tool ${tool.toolName}: missing description`);
  }
}

export function registerToolDefinitions(
  mcp: McpServer,
  ctx: Omit<ToolContext, "signal">,
  tools: ToolDefinition[]
): void {
  validateToolDefinitions(tools);

  for (const tool of tools) {
    mcp.registerTool(
      tool.toolName,
      {
        description: tool.description,
        inputSchema: tool.inputSchema
      },
      async (args, extra) => {
        const started = Date.now();
        ctx.logger.debug({ tool: tool.toolName }, "tool call");
        try {
          const text = await tool.invoke(args, { ...ctx, signal: extra.signal });
          ctx.logger.info({ tool: tool.toolName, duration_ms: Date.now() - started }, "tool call completed");
          return { content: [{ type: "text", text }] };
        } catch (err) {
          ctx.logger.error(
            { tool: tool.toolName, duration_ms: Date.now() - started, err: err instanceof Error ? err.message : String(err) },
            "tool call failed"
          );
          throw err;
        }
      }
    );
  }
}
