/**
 * Health Check
 *
 * Reports whether the external tools the pipeline shells out to are present.
 */

import { SERVER_NAME, SERVER_VERSION, HEALTH_CACHE_TTL } from "../config.js";
import {
  checkToolAvailable,
  executeCommand,
  type CommandRunner,
  type ToolAvailability,
} from "../../utils/executor.js";

// ============================================================================
// Types
// ============================================================================

export interface HealthStatus {
  status: "healthy" | "unhealthy";
  server: string;
  version: string;
  uptime: number;
  tools: {
    slither: ToolAvailability;
    "solc-select": ToolAvailability;
  };
  timestamp: string;
}

export interface QuickHealthStatus {
  status: "ok";
  server: string;
  version: string;
  uptime: number;
}

// ============================================================================
// State
// ============================================================================

const startTime = Date.now();
let cachedHealth: HealthStatus | null = null;
let cachedHealthTime = 0;

// ============================================================================
// Tool Checks
// ============================================================================

/**
 * Get full health status with tool availability.
 */
export async function getHealthStatus(run: CommandRunner = executeCommand): Promise<HealthStatus> {
  const [slither, solcSelect] = await Promise.all([
    checkToolAvailable("slither", run),
    checkToolAvailable("solc-select", run),
  ]);

  // both are required for any analysis to run
  const status = slither.available && solcSelect.available ? "healthy" : "unhealthy";

  return {
    status,
    server: SERVER_NAME,
    version: SERVER_VERSION,
    uptime: getUptime(),
    tools: { slither, "solc-select": solcSelect },
    timestamp: new Date().toISOString(),
  };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get uptime in seconds.
 */
export function getUptime(): number {
  return Math.floor((Date.now() - startTime) / 1000);
}

/**
 * Get cached health status (avoids too many subprocess calls).
 */
export async function getCachedHealthStatus(
  run: CommandRunner = executeCommand
): Promise<HealthStatus> {
  const now = Date.now();

  if (cachedHealth && now - cachedHealthTime < HEALTH_CACHE_TTL) {
    // Return cached health with updated uptime
    return { ...cachedHealth, uptime: getUptime() };
  }

  cachedHealth = await getHealthStatus(run);
  cachedHealthTime = now;
  return cachedHealth;
}

/**
 * Get quick health status (no tool verification).
 */
export function getQuickHealthStatus(): QuickHealthStatus {
  return {
    status: "ok",
    server: SERVER_NAME,
    version: SERVER_VERSION,
    uptime: getUptime(),
  };
}

/**
 * Format tool status for logging.
 */
export function formatToolStatus(health: HealthStatus): string {
  return Object.entries(health.tools)
    .map(([name, status]) => `${name}: ${status.available ? "✓" : "✗"}`)
    .join(", ");
}
