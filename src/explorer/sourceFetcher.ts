/**
 * Source Fetcher
 *
 * Pulls verified source for a contract from an Etherscan-compatible explorer
 * (`module=contract&action=getsourcecode`) and turns the `SourceCode` field
 * into a single-file or multi-file envelope.
 *
 * Multi-file payloads arrive as standard-JSON input wrapped in an extra pair
 * of braces: `{{"language": "Solidity", "sources": {...}}}`.
 */

import { z } from "zod";

import { extractFromCompilerTag } from "../compiler/versionResolver.js";
import { PipelineError, errorMessage } from "../types/errors.js";
import type { FetchedSource, SourceEnvelope } from "../types/index.js";
import { Cache } from "../utils/cache.js";
import { logger } from "../utils/logger.js";
import type { CredentialTable, ExplorerCredentials } from "./credentials.js";

// ============================================================================
// Types
// ============================================================================

const SourceCodeRowSchema = z.object({
  SourceCode: z.string(),
  CompilerVersion: z.string().default(""),
  ContractName: z.string().default(""),
});

const ExplorerEnvelopeSchema = z.object({
  status: z.string().optional(),
  message: z.string().optional(),
  result: z.union([z.array(SourceCodeRowSchema), z.string()]),
});

const SourcesSchema = z.record(z.object({ content: z.string() }));

export interface SourceFetcherOptions {
  credentials: CredentialTable;
  /** Request timeout in milliseconds (default: 15000) */
  timeout?: number;
  /** How long a fetched source stays cached; 0 disables (default: 600000) */
  cacheTtl?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Lines the explorer's own viewer puts above single-file sources. Prepending
 * them keeps finding line numbers aligned with what users see there.
 */
export const SINGLE_FILE_HEADER = "\n\n\n\n";

// ============================================================================
// Parsing
// ============================================================================

export function buildSourceCodeUrl(credentials: ExplorerCredentials, address: string): string {
  return (
    `https://${credentials.host}/api?module=contract&action=getsourcecode` +
    `&address=${encodeURIComponent(address)}&apikey=${encodeURIComponent(credentials.apiKey)}`
  );
}

function decodeStandardJson(sourceCode: string): unknown {
  // the documented shape is double-braced; some explorers send a single pair
  try {
    return JSON.parse(sourceCode.slice(1, -1));
  } catch {
    return JSON.parse(sourceCode);
  }
}

/**
 * Turn an explorer `SourceCode` value into an envelope.
 *
 * @throws PipelineError UPSTREAM_UNAVAILABLE when a multi-file payload is malformed
 */
export function parseSourceCode(sourceCode: string, contractName: string): SourceEnvelope {
  if (!sourceCode.startsWith("{")) {
    return {
      kind: "single",
      name: `${contractName}.sol`,
      rawCode: SINGLE_FILE_HEADER + sourceCode,
    };
  }

  let decoded: unknown;
  try {
    decoded = decodeStandardJson(sourceCode);
  } catch (error) {
    throw new PipelineError("UPSTREAM_UNAVAILABLE", "Multi-file source is not valid JSON", {
      cause: error,
    });
  }

  const container = z.object({ sources: z.record(z.unknown()) }).safeParse(decoded);
  const sources = SourcesSchema.safeParse(container.success ? container.data.sources : decoded);

  if (!sources.success || Object.keys(sources.data).length === 0) {
    throw new PipelineError("UPSTREAM_UNAVAILABLE", "Multi-file source has no usable sources");
  }

  const files: Record<string, string> = {};
  for (const [path, file] of Object.entries(sources.data)) {
    files[path] = file.content;
  }

  return { kind: "multi", files };
}

// ============================================================================
// Fetcher
// ============================================================================

export class SourceFetcher {
  private readonly credentials: CredentialTable;
  private readonly timeout: number;
  private readonly cacheTtl: number;
  private readonly fetchImpl: typeof fetch;
  private readonly cache = new Cache<FetchedSource>(200);

  constructor(options: SourceFetcherOptions) {
    this.credentials = options.credentials;
    this.timeout = options.timeout ?? 15_000;
    this.cacheTtl = options.cacheTtl ?? 600_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * @throws PipelineError UNSUPPORTED_BLOCKCHAIN or UPSTREAM_UNAVAILABLE
   */
  async fetch(blockchain: string, address: string): Promise<FetchedSource> {
    const cacheKey = `${blockchain.toLowerCase()}:${address.toLowerCase()}`;
    if (this.cacheTtl > 0) {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        logger.debug("Explorer source served from cache", { blockchain, address });
        return cached;
      }
    }

    const credentials = this.credentials.get(blockchain);
    const body = await this.request(buildSourceCodeUrl(credentials, address), blockchain);
    const fetched = this.parseEnvelope(body);

    logger.info("Fetched contract source", {
      blockchain,
      address,
      contractName: fetched.contractName,
      layout: fetched.envelope.kind,
      compilerVersion: fetched.compilerVersion,
    });

    if (this.cacheTtl > 0) {
      this.cache.set(cacheKey, fetched, this.cacheTtl);
    }
    return fetched;
  }

  private async request(url: string, blockchain: string): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (error) {
      throw new PipelineError(
        "UPSTREAM_UNAVAILABLE",
        `Explorer request for ${blockchain} failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new PipelineError(
        "UPSTREAM_UNAVAILABLE",
        `Explorer for ${blockchain} responded ${response.status} ${response.statusText}`
      );
    }

    try {
      return await response.json();
    } catch (error) {
      throw new PipelineError("UPSTREAM_UNAVAILABLE", "Explorer response is not JSON", {
        cause: error,
      });
    }
  }

  private parseEnvelope(body: unknown): FetchedSource {
    const envelope = ExplorerEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new PipelineError("UPSTREAM_UNAVAILABLE", "Unexpected explorer response shape");
    }

    const { result } = envelope.data;
    if (typeof result === "string") {
      // explorers report bad keys and rate limits as a string result
      throw new PipelineError("UPSTREAM_UNAVAILABLE", `Explorer error: ${result}`);
    }

    const row = result[0];
    if (!row) {
      throw new PipelineError("UPSTREAM_UNAVAILABLE", "Explorer returned no records");
    }
    if (row.SourceCode.length === 0) {
      throw new PipelineError("UPSTREAM_UNAVAILABLE", "Contract source code not verified");
    }

    return {
      envelope: parseSourceCode(row.SourceCode, row.ContractName),
      compilerVersion: extractFromCompilerTag(row.CompilerVersion),
      contractName: row.ContractName,
    };
  }
}
