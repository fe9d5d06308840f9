/**
 * Slither Analyzer
 *
 * Wrapper for Slither, the Solidity static analyzer by Trail of Bits.
 * https://github.com/crytic/slither
 *
 * Runs `slither <entry> --json -` from the workspace root with the compiler
 * binding in its environment, and groups the reported detector results by
 * check.
 */

import { z } from "zod";

import { PipelineError } from "../types/errors.js";
import { executeCommand, parseJsonOutput, type CommandRunner } from "../utils/executor.js";
import { logger } from "../utils/logger.js";
import type { AnalysisTarget, IAnalyzer, RawFinding, RawFindingGroup } from "./IAnalyzer.js";

// ============================================================================
// Types
// ============================================================================

const SlitherDetectorSchema = z
  .object({
    check: z.string(),
    description: z.string(),
    impact: z.string(),
    confidence: z.string(),
  })
  .passthrough();

const SlitherOutputSchema = z.object({
  success: z.boolean(),
  error: z.string().nullable().optional(),
  results: z
    .object({
      detectors: z.array(SlitherDetectorSchema).optional(),
    })
    .passthrough()
    .optional(),
});

type SlitherOutput = z.infer<typeof SlitherOutputSchema>;

export interface SlitherOptions {
  /** Timeout in milliseconds (default: 120000) */
  timeout?: number;
  /** Detectors to leave out of the default set */
  excludeDetectors?: string[];
  /** Executable name or path (default: "slither") */
  command?: string;
  runner?: CommandRunner;
}

// ============================================================================
// Output Handling
// ============================================================================

function decodeOutput(raw: string): SlitherOutput | null {
  const parsed = SlitherOutputSchema.safeParse(parseJsonOutput(raw));
  return parsed.success ? parsed.data : null;
}

/**
 * Group detector results by check, in the order each check first appears.
 */
export function groupByCheck(detectors: RawFinding[]): RawFindingGroup[] {
  const groups = new Map<string, RawFindingGroup>();

  for (const detector of detectors) {
    const group = groups.get(detector.check);
    if (group) {
      group.push(detector);
    } else {
      groups.set(detector.check, [detector]);
    }
  }

  return Array.from(groups.values());
}

// ============================================================================
// Analyzer
// ============================================================================

export class SlitherAnalyzer implements IAnalyzer {
  readonly id = "slither";
  readonly name = "Slither Static Analyzer";

  private readonly timeout: number;
  private readonly excludeDetectors: string[];
  private readonly command: string;
  private readonly run: CommandRunner;

  constructor(options: SlitherOptions = {}) {
    this.timeout = options.timeout ?? 120_000;
    this.excludeDetectors = options.excludeDetectors ?? [];
    this.command = options.command ?? "slither";
    this.run = options.runner ?? executeCommand;
  }

  buildArgs(entryFile: string): string[] {
    const args = [entryFile, "--json", "-"];
    if (this.excludeDetectors.length > 0) {
      args.push("--exclude", this.excludeDetectors.join(","));
    }
    return args;
  }

  async analyze(target: AnalysisTarget): Promise<RawFindingGroup[]> {
    const args = this.buildArgs(target.entryFile);

    logger.info(`[slither] Running: slither ${args.join(" ")}`, {
      cwd: target.workspaceRoot,
      solc: target.compiler.version ?? "unpinned",
    });

    const result = await this.run(this.command, args, {
      cwd: target.workspaceRoot,
      timeout: this.timeout,
      env: target.compiler.env,
    });

    if (result.timedOut) {
      throw new PipelineError("ANALYSIS_FAILURE", `Slither timed out after ${this.timeout}ms`);
    }

    // findings make slither exit non-zero, so success comes from the JSON
    const output = decodeOutput(result.stdout) ?? decodeOutput(result.stderr);

    if (!output) {
      logger.error("[slither] Failed to parse Slither output", {
        exitCode: result.exitCode,
        stderr: result.stderr.slice(0, 500),
      });
      throw new PipelineError(
        "ANALYSIS_FAILURE",
        result.stderr.trim().split("\n").pop() || "Slither produced no readable output"
      );
    }

    if (!output.success) {
      throw new PipelineError("ANALYSIS_FAILURE", output.error ?? "Slither reported a failure");
    }

    const detectors = output.results?.detectors ?? [];
    logger.info(`[slither] Found ${detectors.length} detector results`);

    return groupByCheck(detectors);
  }
}
