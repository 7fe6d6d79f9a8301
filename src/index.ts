#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { parseArgs, usage } from "./cli/args.js";
import { loadConfig } from "./config/config.js";
import { ConfigurationError } from "./core/errors.js";
import { createLogger } from "./logging/logger.js";
import { createGatewayServer, SERVER_VERSION } from "./mcp/gatewayServer.js";
import { PlatformClient } from "./platform/client.js";
import { SystemBrowserOpener } from "./workflows/browser.js";
import { PlatformWorkflows } from "./workflows/workflows.js";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  if (args.version) {
    process.stdout.write(`${SERVER_VERSION}\n`);
    return;
  }

  const config = await loadConfig({ cli: args.config });
  const logger = createLogger({ level: config.logLevel, json: config.logJson });

  const client = new PlatformClient({
    baseUrl: config.baseUrl,
    token: config.token,
    username: config.username,
    password: config.password,
    logger
  });
  const workflows = new PlatformWorkflows({
    client,
    browser: new SystemBrowserOpener(),
    logger,
    pollIntervalMs: config.pollIntervalSeconds * 1000
  });

  const server = createGatewayServer({ client, workflows, logger });
  const transport = new StdioServerTransport();

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, "shutting down");
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err: err instanceof Error ? err.message : String(err) }, "shutdown failed");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await server.connect(transport);
  logger.info({ base_url: config.baseUrl, version: SERVER_VERSION }, "platform mcp server ready");
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    process.stderr.write(`configuration error: ${err.message}\n`);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});
