/**
 * Executor Utility
 *
 * Runs the external toolchain (slither, solc-select) as subprocesses through
 * execa, with a timeout and without throwing on non-zero exit codes.
 */

import { execa, type Options as ExecaOptions } from "execa";
import { logger } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

export interface ExecuteResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal?: string;
  timedOut?: boolean;
}

export interface ExecuteOptions {
  /** Working directory for the command */
  cwd?: string;
  /** Timeout in milliseconds (default: 120000) */
  timeout?: number;
  /** Variables added on top of the current environment */
  env?: Record<string, string>;
}

/**
 * Signature shared by `executeCommand` and the fakes tests pass in its place.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: ExecuteOptions
) => Promise<ExecuteResult>;

export interface ToolAvailability {
  available: boolean;
  version?: string;
  path?: string;
}

// Slither compiles the whole tree before analyzing; large verified sources are slow
const DEFAULT_TIMEOUT = 120_000;

// ============================================================================
// Execute Command
// ============================================================================

/**
 * Execute a command and capture its output.
 *
 * Does NOT throw on non-zero exit codes: slither exits non-zero whenever it
 * reports findings, so the caller decides what the exit code means.
 *
 * @example
 * ```ts
 * const result = await executeCommand("slither", ["Token.sol", "--json", "-"], { cwd: root });
 * ```
 */
export const executeCommand: CommandRunner = async (command, args, options = {}) => {
  const timeoutMs = options.timeout ?? DEFAULT_TIMEOUT;

  const execaOptions: ExecaOptions = {
    cwd: options.cwd,
    timeout: timeoutMs,
    reject: false,
    env: {
      ...process.env,
      ...options.env,
    },
    encoding: "utf8",
    forceKillAfterDelay: 5000,
  };

  try {
    logger.debug(`Executing command: ${command} ${args.join(" ")}`, {
      cwd: options.cwd,
      timeout: timeoutMs,
    });

    const result = await execa(command, args, execaOptions);

    const executeResult: ExecuteResult = {
      stdout: String(result.stdout ?? ""),
      stderr: String(result.stderr ?? ""),
      exitCode: result.exitCode ?? (result.failed ? 1 : 0),
      timedOut: result.timedOut,
    };

    if (result.signal) {
      executeResult.signal = result.signal;
    }

    return executeResult;
  } catch (error) {
    // invalid options still throw with reject: false
    if (error instanceof Error) {
      return {
        stdout: "",
        stderr: error.message,
        exitCode: 1,
        timedOut: error.message.includes("timed out") || error.message.includes("ETIMEDOUT"),
      };
    }

    return {
      stdout: "",
      stderr: "Unknown error executing command",
      exitCode: 1,
    };
  }
};

// ============================================================================
// Check Tool Availability
// ============================================================================

const TOOL_VERSION_PATTERNS: Record<string, RegExp> = {
  slither: /(\d+\.\d+\.\d+)/,
  "solc-select": /(\d+\.\d+\.\d+)/,
  solc: /Version:\s*(\d+\.\d+\.\d+)/,
};

/**
 * Check whether a tool is on the PATH and, for known tools, read its version.
 */
export async function checkToolAvailable(
  tool: string,
  run: CommandRunner = executeCommand
): Promise<ToolAvailability> {
  const whichCommand = process.platform === "win32" ? "where" : "which";
  const whichResult = await run(whichCommand, [tool], { timeout: 5000 });

  if (whichResult.exitCode !== 0) {
    return { available: false };
  }

  const toolPath = whichResult.stdout.trim().split("\n")[0];
  const versionPattern = TOOL_VERSION_PATTERNS[tool];

  if (!versionPattern) {
    return { available: true, path: toolPath };
  }

  const versionResult = await run(tool, ["--version"], { timeout: 10_000 });
  const versionOutput = versionResult.stdout || versionResult.stderr;

  return {
    available: true,
    version: versionOutput.match(versionPattern)?.[1],
    path: toolPath,
  };
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parse JSON from tool output, tolerating log lines printed around it.
 *
 * @returns The parsed value, or null when nothing parseable is found
 */
export function parseJsonOutput(output: string): unknown {
  try {
    return JSON.parse(output);
  } catch {
    // fall through to extraction
  }

  const jsonMatch = output.match(/(\{[\s\S]*\}|\[[\s\S]*\])/);
  if (jsonMatch?.[1]) {
    try {
      return JSON.parse(jsonMatch[1]);
    } catch {
      return null;
    }
  }

  return null;
}
