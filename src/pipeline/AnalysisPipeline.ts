/**
 * Analysis Pipeline
 *
 * Runs one request from input to findings:
 *
 *   idle → fetching → staging → version-resolving → entry-resolving
 *        → analyzing → normalizing → tearing-down → done
 *
 * Any state can move to `failed`. Once staging has begun, teardown runs
 * before the result is returned, whatever happened in between.
 *
 * Raw-code requests skip fetching and entry resolution: the single submitted
 * file is the entry, and its pragma gives the compiler version.
 */

import { randomUUID } from "node:crypto";

import type { IAnalyzer } from "../analyzers/IAnalyzer.js";
import { normalizeFindings } from "../analyzers/resultNormalizer.js";
import { extractFromPragma, type VersionResolver } from "../compiler/versionResolver.js";
import { locateEntry } from "../contracts/contractResolver.js";
import type { SourceFetcher } from "../explorer/sourceFetcher.js";
import { PipelineError, errorMessage, type PipelineErrorCode } from "../types/errors.js";
import type {
  AnalysisOutcome,
  AnalysisRequest,
  CompilerVersionSpec,
  SourceEnvelope,
} from "../types/index.js";
import { type Result, ok, err } from "../types/result.js";
import { logger, type Logger } from "../utils/logger.js";
import type { Workspace, WorkspaceKey, WorkspaceManager } from "../workspace/workspaceManager.js";

// ============================================================================
// Types
// ============================================================================

export type PipelineState =
  | "idle"
  | "fetching"
  | "staging"
  | "version-resolving"
  | "entry-resolving"
  | "analyzing"
  | "normalizing"
  | "tearing-down"
  | "done"
  | "failed";

export interface PipelineDependencies {
  fetcher: SourceFetcher;
  workspaces: WorkspaceManager;
  compiler: VersionResolver;
  analyzer: IAnalyzer;
}

/** What the HTTP and MCP surfaces need from a pipeline */
export type AnalysisRunner = Pick<AnalysisPipeline, "run">;

/** File name raw submissions are staged under */
export const RAW_ENTRY_FILE = "contract.sol";

interface StagingPlan {
  key: WorkspaceKey;
  files: Record<string, string>;
  compilerVersion: CompilerVersionSpec;
  /** Resolves the entry file once the tree is staged */
  resolveEntry: () => string;
}

/**
 * Error code for an unexpected failure, by the state it happened in.
 */
const FAILURE_BY_STATE: Partial<Record<PipelineState, PipelineErrorCode>> = {
  fetching: "UPSTREAM_UNAVAILABLE",
  staging: "STAGING_FAILED",
  "version-resolving": "COMPILER_UNAVAILABLE",
  "entry-resolving": "ENTRY_NOT_FOUND",
};

export function filesOf(envelope: SourceEnvelope): Record<string, string> {
  return envelope.kind === "single" ? { [envelope.name]: envelope.rawCode } : { ...envelope.files };
}

// ============================================================================
// Request Run
// ============================================================================

class PipelineRun {
  state: PipelineState = "idle";
  workspace: Workspace | null = null;

  constructor(
    readonly requestId: string,
    readonly log: Logger
  ) {}

  transition(next: PipelineState): void {
    this.log.debug(`Pipeline ${this.state} → ${next}`);
    this.state = next;
  }
}

// ============================================================================
// Pipeline
// ============================================================================

export class AnalysisPipeline {
  private readonly deps: PipelineDependencies;

  constructor(deps: PipelineDependencies) {
    this.deps = deps;
  }

  async run(request: AnalysisRequest): Promise<Result<AnalysisOutcome, PipelineError>> {
    const requestId = randomUUID();
    const run = new PipelineRun(requestId, logger.child({ requestId }));

    let result: Result<AnalysisOutcome, PipelineError>;
    try {
      result = ok(await this.execute(run, request));
    } catch (error) {
      const failure = this.toPipelineError(error, run.state);
      run.log.warn(`Request failed while ${run.state}`, {
        code: failure.code,
        error: failure.message,
      });
      result = err(failure);
    }

    if (run.workspace) {
      await this.teardown(run, run.workspace);
    }

    run.transition(result.ok ? "done" : "failed");
    return result;
  }

  private async execute(run: PipelineRun, request: AnalysisRequest): Promise<AnalysisOutcome> {
    const plan = await this.plan(run, request);

    run.transition("staging");
    const workspace = this.deps.workspaces.allocate(plan.key, run.requestId);
    run.workspace = workspace;
    await this.deps.workspaces.stage(workspace, plan.files);

    run.transition("version-resolving");
    const compiler = await this.deps.compiler.resolveAndActivate(plan.compilerVersion);

    run.transition("entry-resolving");
    const entryFile = plan.resolveEntry();
    run.log.info("Resolved entry file", { entryFile, solc: compiler.version ?? "unpinned" });

    run.transition("analyzing");
    const groups = await run.log.time(`${this.deps.analyzer.id} analysis`, () =>
      this.deps.analyzer.analyze({ workspaceRoot: workspace.root, entryFile, compiler })
    );

    run.transition("normalizing");
    const findings = normalizeFindings(groups);
    run.log.info(`Analysis produced ${findings.length} findings`);

    return {
      requestId: run.requestId,
      entryFile,
      compilerVersion: plan.compilerVersion,
      findings,
    };
  }

  /**
   * Decide what gets staged, fetching from the explorer when the request
   * names a deployed contract.
   */
  private async plan(run: PipelineRun, request: AnalysisRequest): Promise<StagingPlan> {
    const { blockchain, address, code } = request;

    if (blockchain && address) {
      run.transition("fetching");
      const source = await this.deps.fetcher.fetch(blockchain, address);
      const { envelope, contractName } = source;

      return {
        key: { kind: "explorer", blockchain, address },
        files: filesOf(envelope),
        compilerVersion: source.compilerVersion,
        resolveEntry: () =>
          envelope.kind === "single" ? envelope.name : locateEntry(envelope, contractName),
      };
    }

    if (code) {
      return {
        key: { kind: "raw" },
        files: { [RAW_ENTRY_FILE]: code },
        compilerVersion: extractFromPragma(code),
        resolveEntry: () => RAW_ENTRY_FILE,
      };
    }

    throw new PipelineError(
      "MISSING_IDENTIFIERS",
      "Either blockchain and contract address, or source code, is required"
    );
  }

  private async teardown(run: PipelineRun, workspace: Workspace): Promise<void> {
    run.transition("tearing-down");

    const report = await this.deps.workspaces.teardown(workspace);
    if (report.failures.length > 0) {
      run.log.warn(`Teardown left ${report.failures.length} entries behind`, {
        root: workspace.root,
      });
    }
  }

  private toPipelineError(error: unknown, state: PipelineState): PipelineError {
    if (error instanceof PipelineError) {
      return error;
    }
    return new PipelineError(FAILURE_BY_STATE[state] ?? "ANALYSIS_FAILURE", errorMessage(error), {
      cause: error,
    });
  }
}
