/**
 * Path Validation Utilities
 *
 * Keeps explorer-supplied file names and request identifiers from writing
 * outside the staging area.
 */

import { resolve, relative, isAbsolute, normalize, sep } from "node:path";
import { type Result, ok, err } from "../types/result.js";

// ============================================================================
// Types
// ============================================================================

export interface PathValidationError {
  code: "PATH_TRAVERSAL" | "ABSOLUTE_PATH" | "EMPTY_PATH" | "INVALID_SEGMENT";
  message: string;
  path: string;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Resolve a relative file path against `root`, refusing anything that would
 * land outside it.
 *
 * @example
 * ```ts
 * const result = resolveWithinRoot("@openzeppelin/contracts/token/ERC20.sol", root);
 * if (result.ok) {
 *   await writeFile(result.value, content);
 * }
 * ```
 */
export function resolveWithinRoot(
  relativePath: string,
  root: string
): Result<string, PathValidationError> {
  if (relativePath.trim().length === 0) {
    return err({ code: "EMPTY_PATH", message: "File path is empty", path: relativePath });
  }

  if (relativePath.includes("\0")) {
    return err({
      code: "PATH_TRAVERSAL",
      message: "Path contains null bytes",
      path: relativePath,
    });
  }

  if (isAbsolute(relativePath)) {
    return err({
      code: "ABSOLUTE_PATH",
      message: `Path "${relativePath}" is absolute`,
      path: relativePath,
    });
  }

  const normalizedRoot = normalize(resolve(root));
  const absolutePath = normalize(resolve(normalizedRoot, relativePath));
  const fromRoot = relative(normalizedRoot, absolutePath);

  const escapesRoot = fromRoot === ".." || fromRoot.startsWith(`..${sep}`);
  if (fromRoot === "" || escapesRoot || isAbsolute(fromRoot)) {
    return err({
      code: "PATH_TRAVERSAL",
      message: `Path "${relativePath}" resolves outside the workspace`,
      path: relativePath,
    });
  }

  return ok(absolutePath);
}

const SAFE_SEGMENT = /^[A-Za-z0-9._-]+$/;

/**
 * Check that a value can be used as a single directory name.
 */
export function validatePathSegment(segment: string): Result<string, PathValidationError> {
  if (!SAFE_SEGMENT.test(segment) || segment === "." || segment === "..") {
    return err({
      code: "INVALID_SEGMENT",
      message: `"${segment}" is not a valid path segment`,
      path: segment,
    });
  }
  return ok(segment);
}
