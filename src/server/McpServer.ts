/**
 * MCP Server Factory
 *
 * Creates an MCP server whose tools drive the analysis pipeline.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";

import type { AnalysisRunner } from "../pipeline/AnalysisPipeline.js";
import { logger } from "../utils/logger.js";
import { SERVER_NAME, SERVER_VERSION } from "./config.js";
import { executeTool } from "./handlers/toolHandlers.js";
import { TOOLS, getToolNames } from "./tools/toolDefinitions.js";

// ============================================================================
// MCP Server Factory
// ============================================================================

export function createMcpServer(pipeline: AnalysisRunner): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // Handler: List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    logger.info(`ListTools request received - returning ${TOOLS.length} tools`);
    return { tools: TOOLS };
  });

  // Handler: Execute tool
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return executeTool(name, args, pipeline);
  });

  return server;
}

/**
 * Get server info for logging.
 */
export function getServerInfo(): { name: string; version: string; tools: string[] } {
  return {
    name: SERVER_NAME,
    version: SERVER_VERSION,
    tools: getToolNames(),
  };
}
