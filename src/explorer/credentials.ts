/**
 * Explorer Credentials
 *
 * One explorer host and API key per blockchain. Each comes from an environment
 * variable named after the blockchain (`ETHEREUM=api.etherscan.io,<key>`), with
 * an optional YAML file supplying entries the environment does not set.
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { PipelineError } from "../types/errors.js";
import { logger } from "../utils/logger.js";

export interface ExplorerCredentials {
  host: string;
  apiKey: string;
}

const ExplorersFileSchema = z.object({
  explorers: z.record(
    z.object({
      host: z.string().min(1),
      apiKey: z.string().min(1),
    })
  ),
});

/**
 * Environment variable holding a blockchain's credentials:
 * "arbitrum-one" reads ARBITRUM_ONE.
 */
export function credentialVariableName(blockchain: string): string {
  return blockchain.toUpperCase().replace(/[^A-Z0-9]/g, "_");
}

/**
 * Parse a `"host,apiKey"` value. Only the first comma separates.
 */
export function parseCredentialValue(value: string): ExplorerCredentials | null {
  const separator = value.indexOf(",");
  if (separator === -1) {
    return null;
  }

  const host = value.slice(0, separator).trim();
  const apiKey = value.slice(separator + 1).trim();
  if (!host || !apiKey) {
    return null;
  }

  return { host, apiKey };
}

export class CredentialTable {
  private readonly env: NodeJS.ProcessEnv;
  private readonly fileEntries: Map<string, ExplorerCredentials>;

  constructor(env: NodeJS.ProcessEnv = process.env, fileEntries = new Map<string, ExplorerCredentials>()) {
    this.env = env;
    this.fileEntries = fileEntries;
  }

  /**
   * Build a table from the environment, reading `EXPLORERS_FILE` when it is set.
   */
  static async load(env: NodeJS.ProcessEnv = process.env): Promise<CredentialTable> {
    const filePath = env["EXPLORERS_FILE"];
    if (!filePath) {
      return new CredentialTable(env);
    }

    const raw = await readFile(filePath, "utf-8");
    const parsed = ExplorersFileSchema.parse(parseYaml(raw));

    const entries = new Map<string, ExplorerCredentials>();
    for (const [name, credentials] of Object.entries(parsed.explorers)) {
      entries.set(credentialVariableName(name), credentials);
    }

    logger.info("Loaded explorer credentials file", { path: filePath, explorers: entries.size });
    return new CredentialTable(env, entries);
  }

  /**
   * @throws PipelineError UNSUPPORTED_BLOCKCHAIN when no usable entry exists
   */
  get(blockchain: string): ExplorerCredentials {
    const variable = credentialVariableName(blockchain);
    const envValue = this.env[variable];

    if (envValue !== undefined) {
      const credentials = parseCredentialValue(envValue);
      if (!credentials) {
        throw new PipelineError(
          "UNSUPPORTED_BLOCKCHAIN",
          `Invalid explorer credentials for blockchain: ${blockchain}`
        );
      }
      return credentials;
    }

    const fromFile = this.fileEntries.get(variable);
    if (fromFile) {
      return fromFile;
    }

    throw new PipelineError("UNSUPPORTED_BLOCKCHAIN", `Unsupported blockchain: ${blockchain}`);
  }
}
