/**
 * Path Validation Tests
 */

import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { resolveWithinRoot, validatePathSegment } from "../../src/utils/pathValidation.js";

const ROOT = "/staging/ethereum/0xAbC/req-1";

describe("resolveWithinRoot", () => {
  it("should resolve nested relative paths inside the root", () => {
    const result = resolveWithinRoot("@openzeppelin/contracts/token/ERC20/ERC20.sol", ROOT);

    expect(result).toEqual({ ok: true, value: join(ROOT, "@openzeppelin/contracts/token/ERC20/ERC20.sol") });
  });

  it("should allow .. that stays inside the root", () => {
    const result = resolveWithinRoot("contracts/../lib/Math.sol", ROOT);

    expect(result).toEqual({ ok: true, value: join(ROOT, "lib/Math.sol") });
  });

  it.each(["..hidden/A.sol", "lib/..Math.sol", "...sol"])(
    "should accept %j, whose name only starts with dots",
    (path) => {
      expect(resolveWithinRoot(path, ROOT)).toEqual({ ok: true, value: join(ROOT, path) });
    }
  );

  it.each([
    ["..", "PATH_TRAVERSAL"],
    ["../escape.sol", "PATH_TRAVERSAL"],
    ["contracts/../../escape.sol", "PATH_TRAVERSAL"],
    [".", "PATH_TRAVERSAL"],
    ["/etc/passwd", "ABSOLUTE_PATH"],
    ["", "EMPTY_PATH"],
    ["A.sol\0.txt", "PATH_TRAVERSAL"],
  ])("should reject %j with %s", (path, code) => {
    const result = resolveWithinRoot(path, ROOT);

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.code).toBe(code);
  });
});

describe("validatePathSegment", () => {
  it("should accept blockchain names, addresses and request ids", () => {
    expect(validatePathSegment("arbitrum-one").ok).toBe(true);
    expect(validatePathSegment("0xAbC123").ok).toBe(true);
    expect(validatePathSegment("3f2a1c9e-4b7d-4f0e-9a61-2c8d5e7b1a00").ok).toBe(true);
  });

  it.each(["", ".", "..", "a/b", "a\\b", "a b"])("should reject %j", (segment) => {
    expect(validatePathSegment(segment).ok).toBe(false);
  });
});
