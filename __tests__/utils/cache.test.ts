/**
 * Cache Tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { Cache } from "../../src/utils/cache.js";

describe("Cache", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should return stored values until they expire", () => {
    vi.useFakeTimers();
    const cache = new Cache<string>();

    cache.set("ethereum:0xabc", "Token", 1000);
    expect(cache.get("ethereum:0xabc")).toBe("Token");

    vi.advanceTimersByTime(1001);
    expect(cache.get("ethereum:0xabc")).toBeUndefined();
  });

  it("should evict the least-hit entries when full", () => {
    const cache = new Cache<number>(5);
    for (const key of ["a", "b", "c", "d", "e"]) {
      cache.set(key, 1);
    }
    for (const key of ["b", "c", "d", "e"]) {
      cache.get(key);
    }

    cache.set("f", 1);

    expect(cache.get("a")).toBeUndefined();
    for (const key of ["b", "c", "d", "e", "f"]) {
      expect(cache.get(key)).toBe(1);
    }
  });
});
