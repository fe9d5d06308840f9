/**
 * Contract Resolver
 *
 * Picks the file of a multi-file source tree that declares the contract the
 * explorer reports. The match is the literal text `contract <Name>`, so
 * `contract VaultFactory` also matches `Vault`; when several files match, the
 * last one in explorer order is used.
 */

import { PipelineError } from "../types/errors.js";
import type { MultiFileSource } from "../types/index.js";

/**
 * @returns Relative path of the entry file within the workspace
 * @throws PipelineError ENTRY_NOT_FOUND when no file declares the contract
 */
export function locateEntry(envelope: MultiFileSource, contractName: string): string {
  const declaration = `contract ${contractName}`;
  let entry: string | undefined;

  for (const [path, content] of Object.entries(envelope.files)) {
    if (content.includes(declaration)) {
      entry = path;
    }
  }

  if (entry === undefined) {
    throw new PipelineError(
      "ENTRY_NOT_FOUND",
      `No source file declares contract ${contractName}`
    );
  }

  return entry;
}
