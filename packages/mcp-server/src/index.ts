#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { McpServer } from "./server.js";
import { loadConfig, USAGE, type EngineConfig } from "./config.js";
import { createToolContext } from "./context.js";
import { ConfigError } from "./fingerprints/errors.js";
import { registerAllTools } from "./tools/index.js";
import { logger } from "./utils/logger.js";

// Global error handlers - log all uncaught errors before exiting
process.on("uncaughtException", (error) => {
  logger.fatal({ group: "Process", err: error }, "Uncaught exception");
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ group: "Process", reason }, "Unhandled rejection");
  process.exit(1);
});

let config: EngineConfig;
try {
  config = loadConfig();
} catch (error) {
  if (!(error instanceof ConfigError)) throw error;
  console.error(`Error: ${error.message}`);
  console.error(USAGE);
  process.exit(1);
}

logger.info({ group: "Server" }, "Starting take-finder MCP server");
logger.info(
  {
    group: "Server",
    libraryRoot: config.libraryRoot,
    algorithm: config.algorithm,
    threshold: config.threshold,
    referenceFolders: config.referenceFolders,
  },
  "Library configured"
);

const toolContext = createToolContext(config);

const server = new McpServer({
  name: "take-finder-mcp",
  version: "0.1.0",
});

registerAllTools(server, toolContext);

async function main() {
  logger.info({ group: "Server" }, "Connecting to transport");
  const transport = new StdioServerTransport();

  transport.onerror = (error) => {
    logger.error({ group: "Server", err: error }, "Transport error");
  };

  server.server.onerror = (error) => {
    logger.error({ group: "Server", err: error }, "MCP Server error");
  };

  await server.server.connect(transport);
  logger.info({ group: "Server", tools: server.toolNames.length }, "take-finder MCP server running");

  process.on("SIGINT", () => {
    logger.info({ group: "Server" }, "Shutting down");
    server.server
      .close()
      .catch((error: unknown) => {
        logger.error({ group: "Server", err: error }, "Error closing server");
      })
      .finally(() => process.exit(0));
  });
}

main().catch((error) => {
  logger.fatal({ group: "Server", err: error }, "Fatal error");
  process.exit(1);
});
