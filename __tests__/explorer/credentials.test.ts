/**
 * Explorer Credentials Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  CredentialTable,
  credentialVariableName,
  parseCredentialValue,
} from "../../src/explorer/credentials.js";
import { PipelineError } from "../../src/types/errors.js";

describe("credentialVariableName", () => {
  it("should upper-case the blockchain name", () => {
    expect(credentialVariableName("ethereum")).toBe("ETHEREUM");
  });

  it("should replace characters that cannot appear in a variable name", () => {
    expect(credentialVariableName("arbitrum-one")).toBe("ARBITRUM_ONE");
  });
});

describe("parseCredentialValue", () => {
  it("should split host and key on the first comma", () => {
    expect(parseCredentialValue("api.etherscan.io,test-key")).toEqual({
      host: "api.etherscan.io",
      apiKey: "test-key",
    });
  });

  it("should keep later commas in the key", () => {
    expect(parseCredentialValue("api.example.org, key,with,commas ")).toEqual({
      host: "api.example.org",
      apiKey: "key,with,commas",
    });
  });

  it("should reject values without both parts", () => {
    expect(parseCredentialValue("api.etherscan.io")).toBeNull();
    expect(parseCredentialValue(",test-key")).toBeNull();
    expect(parseCredentialValue("api.etherscan.io,")).toBeNull();
  });
});

describe("CredentialTable", () => {
  it("should resolve credentials from the environment", () => {
    const table = new CredentialTable({ POLYGON: "api.polygonscan.com,test-key" });

    expect(table.get("polygon")).toEqual({ host: "api.polygonscan.com", apiKey: "test-key" });
  });

  it("should fail with UNSUPPORTED_BLOCKCHAIN for an unknown blockchain", () => {
    const table = new CredentialTable({});

    expect(() => table.get("dogechain")).toThrow(PipelineError);
    expect(() => table.get("dogechain")).toThrow("Unsupported blockchain: dogechain");
  });

  it("should fail with UNSUPPORTED_BLOCKCHAIN for a malformed value", () => {
    const table = new CredentialTable({ ETHEREUM: "missing-separator" });

    try {
      table.get("ethereum");
      expect.unreachable("expected get to throw");
    } catch (error) {
      expect(error).toMatchObject({
        code: "UNSUPPORTED_BLOCKCHAIN",
        message: "Invalid explorer credentials for blockchain: ethereum",
      });
    }
  });

  describe("load", () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = await mkdtemp(join(tmpdir(), "credentials-test-"));
    });

    afterEach(async () => {
      await rm(testDir, { recursive: true, force: true });
    });

    it("should read entries from EXPLORERS_FILE", async () => {
      const file = join(testDir, "explorers.yaml");
      await writeFile(
        file,
        "explorers:\n  base-mainnet:\n    host: api.basescan.org\n    apiKey: test-key\n"
      );

      const table = await CredentialTable.load({ EXPLORERS_FILE: file });

      expect(table.get("base-mainnet")).toEqual({ host: "api.basescan.org", apiKey: "test-key" });
    });

    it("should prefer the environment over the file", async () => {
      const file = join(testDir, "explorers.yaml");
      await writeFile(file, "explorers:\n  ethereum:\n    host: file.example\n    apiKey: file-key\n");

      const table = await CredentialTable.load({
        EXPLORERS_FILE: file,
        ETHEREUM: "env.example,env-key",
      });

      expect(table.get("ethereum")).toEqual({ host: "env.example", apiKey: "env-key" });
    });

    it("should reject a file with the wrong shape", async () => {
      const file = join(testDir, "explorers.yaml");
      await writeFile(file, "explorers:\n  ethereum: just-a-string\n");

      await expect(CredentialTable.load({ EXPLORERS_FILE: file })).rejects.toThrow();
    });

    it("should not touch the filesystem without EXPLORERS_FILE", async () => {
      const table = await CredentialTable.load({ BSC: "api.bscscan.com,test-key" });

      expect(table.get("bsc").host).toBe("api.bscscan.com");
    });
  });
});
