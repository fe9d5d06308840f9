/**
 * Core types for the contract analysis service
 */

export type Impact = "High" | "Medium" | "Low" | "Informational" | "Optimization";

export type Confidence = "High" | "Medium" | "Low";

export const IMPACTS: readonly Impact[] = ["High", "Medium", "Low", "Informational", "Optimization"];

export const CONFIDENCES: readonly Confidence[] = ["High", "Medium", "Low"];

/**
 * Normalized finding returned to callers, independent of the engine's raw shape.
 */
export interface Finding {
  check: string;
  description: string;
  impact: Impact;
  confidence: Confidence;
}

// ============================================================================
// Source Envelopes
// ============================================================================

export interface SingleFileSource {
  kind: "single";
  /** File name, `<ContractName>.sol` */
  name: string;
  rawCode: string;
}

export interface MultiFileSource {
  kind: "multi";
  /** Relative path to file content, in explorer order */
  files: Record<string, string>;
}

export type SourceEnvelope = SingleFileSource | MultiFileSource;

/**
 * A `major.minor.patch` string, or "" when no version could be derived.
 */
export type CompilerVersionSpec = string;

export interface FetchedSource {
  envelope: SourceEnvelope;
  compilerVersion: CompilerVersionSpec;
  contractName: string;
}

// ============================================================================
// Requests
// ============================================================================

export interface AnalysisRequest {
  blockchain?: string;
  address?: string;
  /** Decoded source text for raw submissions */
  code?: string;
}

export interface AnalysisOutcome {
  requestId: string;
  entryFile: string;
  compilerVersion: CompilerVersionSpec;
  findings: Finding[];
}
