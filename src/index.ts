#!/usr/bin/env node

/**
 * Contract Analysis API - stdio MCP Transport
 *
 * Exposes the `analyze_contract` tool to MCP clients over stdio. Logs go to
 * stderr; stdout belongs to the protocol.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { createPipeline } from "./pipeline/index.js";
import { createMcpServer, getServerInfo } from "./server/McpServer.js";
import { errorMessage } from "./types/errors.js";
import { logger } from "./utils/logger.js";

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const info = getServerInfo();
  logger.info(`Starting ${info.name} v${info.version}`);

  const pipeline = await createPipeline();
  const server = createMcpServer(pipeline);
  const transport = new StdioServerTransport();

  await server.connect(transport);

  logger.info(`${info.name} is running on stdio transport`);
  logger.info(`Available tools: ${info.tools.join(", ")}`);
}

// Run the server
main().catch((error: unknown) => {
  logger.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
