#!/usr/bin/env node

/**
 * Contract Analysis API - HTTP Transport
 *
 * Usage:
 *   node dist/server.js [--port 3000] [--host 0.0.0.0]
 *
 * Environment variables:
 *   PORT - Server port (default: 3000)
 *   HOST - Server host (default: 0.0.0.0)
 *   STAGING_ROOT - Directory workspaces are created under (default: ./contracts)
 *   <BLOCKCHAIN> - Explorer credentials as "host,apiKey", e.g. ETHEREUM
 *   EXPLORERS_FILE - Optional YAML file with explorer credentials
 */

import { createServer } from "node:http";

import { createPipeline } from "./pipeline/index.js";
import { createRequestHandler, withErrorBoundary } from "./server/app.js";
import { SERVER_NAME, SERVER_VERSION, getHttpServerConfig } from "./server/config.js";
import { formatToolStatus, getCachedHealthStatus } from "./server/health/healthCheck.js";
import { errorMessage } from "./types/errors.js";
import { logger } from "./utils/logger.js";

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const { port, host } = getHttpServerConfig();
  const pipeline = await createPipeline();

  const httpServer = createServer(withErrorBoundary(createRequestHandler(pipeline)));

  httpServer.listen(port, host, () => {
    logger.info(`${SERVER_NAME} v${SERVER_VERSION} running`, { host, port });

    // Log initial tool status
    getCachedHealthStatus()
      .then((health) => logger.info(`Tool status: ${formatToolStatus(health)}`))
      .catch((error: unknown) => logger.warn("Tool check failed", { error: errorMessage(error) }));
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    httpServer.close(() => {
      logger.info("Server closed");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error: unknown) => {
  logger.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
