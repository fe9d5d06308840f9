/**
 * Server Configuration
 *
 * Centralized configuration for the HTTP and stdio servers and the pipeline
 * they share.
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";

// ============================================================================
// Server Identity
// ============================================================================

export const SERVER_NAME = "contract-analysis-api";
export const SERVER_VERSION = "1.0.0";

// ============================================================================
// HTTP Server Configuration
// ============================================================================

export interface HttpServerConfig {
  port: number;
  host: string;
}

/**
 * Parse command line arguments and environment variables for HTTP server config.
 */
export function getHttpServerConfig(argv: string[] = process.argv.slice(2)): HttpServerConfig {
  const { values: args } = parseArgs({
    args: argv,
    options: {
      port: { type: "string", short: "p", default: process.env["PORT"] || "3000" },
      host: { type: "string", short: "h", default: process.env["HOST"] || "0.0.0.0" },
    },
  });

  return {
    port: parseInt(args.port ?? "3000", 10),
    host: args.host ?? "0.0.0.0",
  };
}

// ============================================================================
// Pipeline Configuration
// ============================================================================

const milliseconds = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const PipelineEnvSchema = z.object({
  STAGING_ROOT: z.string().min(1).default("contracts"),
  EXPLORER_TIMEOUT_MS: milliseconds(15_000),
  ANALYSIS_TIMEOUT_MS: milliseconds(120_000),
  SOLC_INSTALL_TIMEOUT_MS: milliseconds(120_000),
  SOURCE_CACHE_TTL_MS: milliseconds(600_000),
  SLITHER_EXCLUDE: z.string().default(""),
});

export interface PipelineConfig {
  /** Absolute directory workspaces are created under */
  stagingRoot: string;
  explorerTimeout: number;
  analysisTimeout: number;
  installTimeout: number;
  sourceCacheTtl: number;
  excludeDetectors: string[];
}

/**
 * @throws ZodError when a variable is set to something unusable
 */
export function getPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = PipelineEnvSchema.parse(env);

  return {
    stagingRoot: resolve(parsed.STAGING_ROOT),
    explorerTimeout: parsed.EXPLORER_TIMEOUT_MS,
    analysisTimeout: parsed.ANALYSIS_TIMEOUT_MS,
    installTimeout: parsed.SOLC_INSTALL_TIMEOUT_MS,
    sourceCacheTtl: parsed.SOURCE_CACHE_TTL_MS,
    excludeDetectors: parsed.SLITHER_EXCLUDE.split(",")
      .map((detector) => detector.trim())
      .filter((detector) => detector.length > 0),
  };
}

// ============================================================================
// Health Check Configuration
// ============================================================================

export const HEALTH_CACHE_TTL = 30000; // 30 seconds
