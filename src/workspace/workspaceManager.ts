/**
 * Workspace Manager
 *
 * Each request stages its sources under its own directory:
 *
 *   <stagingRoot>/<blockchain>/<address>/<requestId>/...
 *   <stagingRoot>/no-bc/contract/<requestId>/contract.sol
 *
 * Nothing here changes the process working directory. Teardown removes only
 * the request's own directory, then prunes parents that were left empty.
 */

import { randomUUID } from "node:crypto";
import { mkdir, readdir, rm, rmdir, unlink, writeFile } from "node:fs/promises";
import { dirname, join, resolve, sep } from "node:path";

import { PipelineError, errorMessage } from "../types/errors.js";
import { logger } from "../utils/logger.js";
import { resolveWithinRoot, validatePathSegment } from "../utils/pathValidation.js";

// ============================================================================
// Types
// ============================================================================

export type WorkspaceKey =
  | { kind: "explorer"; blockchain: string; address: string }
  | { kind: "raw" };

export interface Workspace {
  id: string;
  /** Absolute directory the request's files are written to */
  root: string;
  key: WorkspaceKey;
}

export interface TeardownReport {
  removed: string[];
  failures: Array<{ path: string; error: string }>;
}

/** Directory segments used for raw-code submissions */
export const RAW_WORKSPACE_SEGMENTS = ["no-bc", "contract"] as const;

function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    codes.includes(error.code)
  );
}

// ============================================================================
// Workspace Manager
// ============================================================================

export class WorkspaceManager {
  readonly stagingRoot: string;

  constructor(stagingRoot: string) {
    this.stagingRoot = resolve(stagingRoot);
  }

  /**
   * Compute a fresh workspace for a request. Nothing is created on disk yet.
   *
   * @throws PipelineError STAGING_FAILED when blockchain or address cannot be a directory name
   */
  allocate(key: WorkspaceKey, id: string = randomUUID()): Workspace {
    const segments: string[] =
      key.kind === "raw" ? [...RAW_WORKSPACE_SEGMENTS] : [key.blockchain, key.address];

    for (const segment of [...segments, id]) {
      const checked = validatePathSegment(segment);
      if (!checked.ok) {
        throw new PipelineError("STAGING_FAILED", checked.error.message);
      }
    }

    return { id, root: join(this.stagingRoot, ...segments, id), key };
  }

  /**
   * Create the workspace and write every file, creating the directories each
   * relative path implies. Content is written verbatim.
   *
   * @returns The workspace root
   * @throws PipelineError STAGING_FAILED for a path escaping the root or a write failure
   */
  async stage(workspace: Workspace, files: Record<string, string>): Promise<string> {
    const targets: Array<[string, string]> = [];

    for (const [relativePath, content] of Object.entries(files)) {
      const target = resolveWithinRoot(relativePath, workspace.root);
      if (!target.ok) {
        throw new PipelineError("STAGING_FAILED", target.error.message);
      }
      targets.push([target.value, content]);
    }

    try {
      await mkdir(workspace.root, { recursive: true });
      for (const [target, content] of targets) {
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, content, "utf-8");
      }
    } catch (error) {
      throw new PipelineError(
        "STAGING_FAILED",
        `Could not write workspace ${workspace.id}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    logger.debug("Staged workspace", { root: workspace.root, files: targets.length });
    return workspace.root;
  }

  /**
   * Best-effort removal of the workspace. Failures on single entries are
   * logged and reported, never thrown.
   */
  async teardown(workspace: Workspace): Promise<TeardownReport> {
    const report: TeardownReport = { removed: [], failures: [] };

    let entries: string[] = [];
    try {
      entries = await readdir(workspace.root);
    } catch (error) {
      if (!hasErrorCode(error, "ENOENT")) {
        this.recordFailure(report, workspace.root, error);
      }
    }

    for (const entry of entries) {
      const entryPath = join(workspace.root, entry);
      try {
        await this.removeEntry(entryPath);
        report.removed.push(entryPath);
      } catch (error) {
        this.recordFailure(report, entryPath, error);
      }
    }

    try {
      await rmdir(workspace.root);
      report.removed.push(workspace.root);
    } catch (error) {
      if (!hasErrorCode(error, "ENOENT")) {
        this.recordFailure(report, workspace.root, error);
      }
    }

    await this.pruneEmptyParents(workspace.root);
    return report;
  }

  private async removeEntry(entryPath: string): Promise<void> {
    try {
      await unlink(entryPath);
    } catch (error) {
      // unlink refuses directories: EISDIR on Linux, EPERM on macOS
      if (!hasErrorCode(error, "EISDIR", "EPERM")) {
        throw error;
      }
      await rm(entryPath, { recursive: true, force: true });
    }
  }

  /**
   * Remove now-empty directories between the workspace and the staging root.
   * Stops at the first one another request still uses.
   */
  private async pruneEmptyParents(workspaceRoot: string): Promise<void> {
    let current = dirname(workspaceRoot);

    while (current.startsWith(this.stagingRoot + sep)) {
      try {
        await rmdir(current);
      } catch (error) {
        if (!hasErrorCode(error, "ENOENT")) {
          if (!hasErrorCode(error, "ENOTEMPTY", "EEXIST")) {
            logger.warn("Could not prune staging directory", {
              path: current,
              error: errorMessage(error),
            });
          }
          return;
        }
      }
      current = dirname(current);
    }
  }

  private recordFailure(report: TeardownReport, path: string, error: unknown): void {
    const message = errorMessage(error);
    logger.warn(`Failed to delete ${path}`, { error: message });
    report.failures.push({ path, error: message });
  }
}
