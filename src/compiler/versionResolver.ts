/**
 * Version Resolver
 *
 * Derives the solc version a contract needs and makes it available through
 * solc-select. The version is pinned per analysis run through the
 * SOLC_VERSION environment variable that solc-select's `solc` shim reads,
 * so concurrent requests never fight over the global version.
 */

import { executeCommand, type CommandRunner } from "../utils/executor.js";
import { logger } from "../utils/logger.js";
import { PipelineError } from "../types/errors.js";
import type { CompilerVersionSpec } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface CompilerBinding {
  /** Pinned version, or null when none could be resolved */
  version: string | null;
  /** Environment handed to the analysis engine */
  env: Record<string, string>;
}

export interface VersionResolverOptions {
  /** solc-select executable (default: "solc-select") */
  command?: string;
  /** Install timeout in milliseconds (default: 120000) */
  installTimeout?: number;
  runner?: CommandRunner;
}

const VERSION_PATTERN = /\d+\.\d+\.\d+/;
const COMPILER_TAG_PATTERN = /v(\d+\.\d+\.\d+)/;
const WELL_FORMED_VERSION = /^\d+\.\d+\.\d+$/;

// ============================================================================
// Extraction
// ============================================================================

/**
 * Extract the version from an explorer compiler tag such as
 * `v0.8.19+commit.7dd6d404`.
 *
 * @returns `major.minor.patch`, or "" when the tag carries none
 */
export function extractFromCompilerTag(tag: string): CompilerVersionSpec {
  return tag.match(COMPILER_TAG_PATTERN)?.[1] ?? "";
}

/**
 * Extract the version from the first `pragma solidity` line of a source file.
 * Only that line is considered; `pragma solidity ^0.8.10;` yields "0.8.10".
 */
export function extractFromPragma(sourceText: string): CompilerVersionSpec {
  const pragmaLine = sourceText.split("\n").find((line) => line.includes("pragma solidity"));
  if (pragmaLine === undefined) {
    return "";
  }
  return pragmaLine.match(VERSION_PATTERN)?.[0] ?? "";
}

export function isWellFormedVersion(requested: CompilerVersionSpec): boolean {
  return WELL_FORMED_VERSION.test(requested);
}

/**
 * Parse `solc-select versions` output. Each line starts with a version,
 * optionally followed by "(current, set by ...)".
 */
export function parseInstalledVersions(output: string): Set<string> {
  const versions = new Set<string>();
  for (const line of output.split("\n")) {
    const match = line.trim().match(/^(\d+\.\d+\.\d+)/);
    if (match?.[1]) {
      versions.add(match[1]);
    }
  }
  return versions;
}

// ============================================================================
// Resolver
// ============================================================================

export class VersionResolver {
  private readonly command: string;
  private readonly installTimeout: number;
  private readonly run: CommandRunner;
  private readonly installing = new Map<string, Promise<void>>();

  constructor(options: VersionResolverOptions = {}) {
    this.command = options.command ?? "solc-select";
    this.installTimeout = options.installTimeout ?? 120_000;
    this.run = options.runner ?? executeCommand;
  }

  /**
   * Make `requested` available and return the binding that selects it.
   *
   * An empty or malformed version is a no-op: a warning is logged and the
   * binding pins nothing.
   *
   * @throws PipelineError COMPILER_UNAVAILABLE when the install fails
   */
  async resolveAndActivate(requested: CompilerVersionSpec): Promise<CompilerBinding> {
    if (!isWellFormedVersion(requested)) {
      logger.warn("No usable compiler version, leaving solc unpinned", { requested });
      return { version: null, env: {} };
    }

    const installed = await this.listInstalled();
    if (!installed.has(requested)) {
      await this.install(requested);
    }

    logger.debug("Pinned compiler version", { version: requested });
    return { version: requested, env: { SOLC_VERSION: requested } };
  }

  async listInstalled(): Promise<Set<string>> {
    const result = await this.run(this.command, ["versions"], { timeout: 10_000 });
    if (result.exitCode !== 0) {
      logger.warn("Could not list installed solc versions", { stderr: result.stderr.slice(0, 300) });
      return new Set();
    }
    return parseInstalledVersions(result.stdout);
  }

  /**
   * Installs of the same version share one in-flight promise.
   */
  private install(version: string): Promise<void> {
    const pending = this.installing.get(version);
    if (pending) {
      return pending;
    }

    const task = this.runInstall(version).finally(() => {
      this.installing.delete(version);
    });
    this.installing.set(version, task);
    return task;
  }

  private async runInstall(version: string): Promise<void> {
    logger.info(`Installing solc ${version}`);

    const result = await this.run(this.command, ["install", version], {
      timeout: this.installTimeout,
    });

    if (result.exitCode !== 0 || result.timedOut) {
      const detail = result.timedOut ? "install timed out" : result.stderr.trim().slice(0, 300);
      throw new PipelineError(
        "COMPILER_UNAVAILABLE",
        `solc ${version} could not be installed${detail ? `: ${detail}` : ""}`
      );
    }
  }
}
