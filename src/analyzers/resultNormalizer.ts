/**
 * Result Normalizer
 *
 * Flattens engine result groups into the four-field findings callers get.
 */

import {
  CONFIDENCES,
  IMPACTS,
  type Confidence,
  type Finding,
  type Impact,
} from "../types/index.js";
import { logger } from "../utils/logger.js";
import type { RawFinding, RawFindingGroup } from "./IAnalyzer.js";

function isImpact(value: string): value is Impact {
  return IMPACTS.some((impact) => impact === value);
}

function isConfidence(value: string): value is Confidence {
  return CONFIDENCES.some((confidence) => confidence === value);
}

export function normalizeFinding(raw: RawFinding): Finding {
  if (!isImpact(raw.impact) || !isConfidence(raw.confidence)) {
    logger.debug("Unrecognized severity in engine result", {
      check: raw.check,
      impact: raw.impact,
      confidence: raw.confidence,
    });
  }

  return {
    check: raw.check,
    description: raw.description,
    impact: isImpact(raw.impact) ? raw.impact : "Informational",
    confidence: isConfidence(raw.confidence) ? raw.confidence : "Low",
  };
}

/**
 * Empty groups are skipped; order is preserved otherwise.
 */
export function normalizeFindings(groups: RawFindingGroup[]): Finding[] {
  return groups.filter((group) => group.length > 0).flatMap((group) => group.map(normalizeFinding));
}
