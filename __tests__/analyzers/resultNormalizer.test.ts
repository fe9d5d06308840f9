/**
 * Result Normalizer Tests
 */

import { describe, it, expect } from "vitest";
import { normalizeFinding, normalizeFindings } from "../../src/analyzers/resultNormalizer.js";
import type { RawFinding } from "../../src/analyzers/IAnalyzer.js";

function raw(check: string, overrides: Partial<RawFinding> = {}): RawFinding {
  return {
    check,
    description: `${check} found`,
    impact: "High",
    confidence: "Medium",
    elements: [{ type: "function", name: "withdraw" }],
    first_markdown_element: "Token.sol#L10",
    id: "abc123",
    ...overrides,
  };
}

describe("normalizeFinding", () => {
  it("should keep only the four public fields", () => {
    expect(normalizeFinding(raw("reentrancy-eth"))).toEqual({
      check: "reentrancy-eth",
      description: "reentrancy-eth found",
      impact: "High",
      confidence: "Medium",
    });
  });

  it("should map unrecognized severities to the lowest levels", () => {
    const finding = normalizeFinding(raw("custom", { impact: "Critical", confidence: "Certain" }));

    expect(finding.impact).toBe("Informational");
    expect(finding.confidence).toBe("Low");
  });
});

describe("normalizeFindings", () => {
  it("should skip empty groups and keep order", () => {
    const findings = normalizeFindings([
      [raw("tx-origin"), raw("tx-origin", { description: "second" })],
      [],
      [raw("timestamp", { impact: "Low" })],
    ]);

    expect(findings.map((f) => [f.check, f.description, f.impact])).toEqual([
      ["tx-origin", "tx-origin found", "High"],
      ["tx-origin", "second", "High"],
      ["timestamp", "timestamp found", "Low"],
    ]);
  });

  it("should return an empty list when every group is empty", () => {
    expect(normalizeFindings([[], []])).toEqual([]);
  });
});
