/**
 * IAnalyzer Interface
 *
 * Boundary between the pipeline and a static-analysis engine. The pipeline
 * hands over a staged workspace and an entry file; the engine hands back its
 * raw results, one group per detector.
 */

import type { CompilerBinding } from "../compiler/versionResolver.js";

export interface AnalysisTarget {
  /** Absolute workspace directory; the engine runs from here */
  workspaceRoot: string;
  /** Entry file relative to workspaceRoot */
  entryFile: string;
  compiler: CompilerBinding;
}

/**
 * One result record as the engine reports it. Only these four fields are
 * relied on; engines may carry more.
 */
export interface RawFinding {
  check: string;
  description: string;
  impact: string;
  confidence: string;
  [key: string]: unknown;
}

export type RawFindingGroup = RawFinding[];

export interface IAnalyzer {
  readonly id: string;
  readonly name: string;

  /**
   * Run the engine's full default detector set against the target.
   *
   * @throws PipelineError ANALYSIS_FAILURE when the engine cannot produce results
   */
  analyze(target: AnalysisTarget): Promise<RawFindingGroup[]>;
}
