/**
 * Version Resolver Tests
 *
 * solc-select is replaced by a fake command runner.
 */

import { describe, it, expect, vi } from "vitest";
import {
  VersionResolver,
  extractFromCompilerTag,
  extractFromPragma,
  isWellFormedVersion,
  parseInstalledVersions,
} from "../../src/compiler/versionResolver.js";
import { PipelineError } from "../../src/types/errors.js";
import type { CommandRunner, ExecuteResult } from "../../src/utils/executor.js";

// ============================================================================
// Test Fixtures
// ============================================================================

function result(overrides: Partial<ExecuteResult> = {}): ExecuteResult {
  return { stdout: "", stderr: "", exitCode: 0, timedOut: false, ...overrides };
}

function fakeSolcSelect(installed: string[], installResult: ExecuteResult = result()) {
  const runner = vi.fn<CommandRunner>(async (_command, args) => {
    if (args[0] === "versions") {
      return result({ stdout: installed.map((v) => `${v}\n`).join("") });
    }
    return installResult;
  });
  return runner;
}

// ============================================================================
// Extraction
// ============================================================================

describe("extractFromCompilerTag", () => {
  it("should extract the version from an explorer compiler tag", () => {
    expect(extractFromCompilerTag("v0.8.19+commit.7dd6d404")).toBe("0.8.19");
  });

  it("should return an empty string when the tag has no v-prefixed version", () => {
    expect(extractFromCompilerTag("vyper:0.3.7")).toBe("");
    expect(extractFromCompilerTag("")).toBe("");
  });
});

describe("extractFromPragma", () => {
  it("should take the first version on the pragma line", () => {
    const source = "// SPDX-License-Identifier: MIT\npragma solidity ^0.8.10;\ncontract A {}";
    expect(extractFromPragma(source)).toBe("0.8.10");
  });

  it("should take the lower bound of a range", () => {
    expect(extractFromPragma("pragma solidity >=0.6.2 <0.9.0;")).toBe("0.6.2");
  });

  it("should only consider the first pragma line", () => {
    const source = "pragma solidity ^0.7;\npragma solidity 0.8.1;";
    expect(extractFromPragma(source)).toBe("");
  });

  it("should return an empty string without a pragma", () => {
    expect(extractFromPragma("contract A { uint256 v = 1; }")).toBe("");
  });
});

describe("isWellFormedVersion", () => {
  it("should accept major.minor.patch only", () => {
    expect(isWellFormedVersion("0.8.19")).toBe(true);
    expect(isWellFormedVersion("0.8")).toBe(false);
    expect(isWellFormedVersion("")).toBe(false);
    expect(isWellFormedVersion("0.8.19; rm -rf /")).toBe(false);
  });
});

describe("parseInstalledVersions", () => {
  it("should read versions and ignore the current marker", () => {
    const output = "0.8.19 (current, set by /root/.solc-select/global-version)\n0.4.24\n\n";
    expect([...parseInstalledVersions(output)]).toEqual(["0.8.19", "0.4.24"]);
  });

  it("should return an empty set for the no-versions message", () => {
    expect(parseInstalledVersions("No solc version installed. Run `solc-select install --help`").size).toBe(0);
  });
});

// ============================================================================
// Resolver
// ============================================================================

describe("VersionResolver", () => {
  it("should pin an installed version without installing", async () => {
    const runner = fakeSolcSelect(["0.8.19"]);
    const resolver = new VersionResolver({ runner });

    const binding = await resolver.resolveAndActivate("0.8.19");

    expect(binding).toEqual({ version: "0.8.19", env: { SOLC_VERSION: "0.8.19" } });
    expect(runner).toHaveBeenCalledTimes(1);
    expect(runner.mock.calls[0]?.[1]).toEqual(["versions"]);
  });

  it("should install a missing version before pinning it", async () => {
    const runner = fakeSolcSelect(["0.8.19"]);
    const resolver = new VersionResolver({ runner, installTimeout: 5000 });

    const binding = await resolver.resolveAndActivate("0.6.12");

    expect(binding.version).toBe("0.6.12");
    expect(runner).toHaveBeenCalledWith("solc-select", ["install", "0.6.12"], { timeout: 5000 });
  });

  it("should leave solc unpinned for an empty version without running solc-select", async () => {
    const runner = fakeSolcSelect([]);
    const resolver = new VersionResolver({ runner });

    const binding = await resolver.resolveAndActivate("");

    expect(binding).toEqual({ version: null, env: {} });
    expect(runner).not.toHaveBeenCalled();
  });

  it("should fail with COMPILER_UNAVAILABLE when the install fails", async () => {
    const runner = fakeSolcSelect([], result({ exitCode: 1, stderr: "unknown version\n" }));
    const resolver = new VersionResolver({ runner });

    const error = await resolver.resolveAndActivate("0.0.1").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toMatchObject({
      code: "COMPILER_UNAVAILABLE",
      message: "solc 0.0.1 could not be installed: unknown version",
    });
  });

  it("should report a timed-out install", async () => {
    const runner = fakeSolcSelect([], result({ exitCode: 1, timedOut: true }));
    const resolver = new VersionResolver({ runner });

    await expect(resolver.resolveAndActivate("0.8.20")).rejects.toMatchObject({
      code: "COMPILER_UNAVAILABLE",
      message: "solc 0.8.20 could not be installed: install timed out",
    });
  });

  it("should share one install between concurrent requests for the same version", async () => {
    let finishInstall: () => void = () => undefined;
    const installDone = new Promise<void>((resolve) => {
      finishInstall = resolve;
    });

    const runner = vi.fn<CommandRunner>(async (_command, args) => {
      if (args[0] === "install") {
        await installDone;
      }
      return result();
    });
    const resolver = new VersionResolver({ runner });

    const first = resolver.resolveAndActivate("0.8.21");
    const second = resolver.resolveAndActivate("0.8.21");
    await vi.waitFor(() => {
      expect(runner.mock.calls.filter((call) => call[1][0] === "versions")).toHaveLength(2);
    });
    finishInstall();

    const bindings = await Promise.all([first, second]);

    expect(bindings.map((b) => b.version)).toEqual(["0.8.21", "0.8.21"]);
    expect(runner.mock.calls.filter((call) => call[1][0] === "install")).toHaveLength(1);
  });

  it("should treat a failing version listing as nothing installed", async () => {
    const runner = vi.fn<CommandRunner>(async (_command, args) =>
      args[0] === "versions" ? result({ exitCode: 127, stderr: "not found" }) : result()
    );
    const resolver = new VersionResolver({ runner });

    expect((await resolver.listInstalled()).size).toBe(0);
  });
});
