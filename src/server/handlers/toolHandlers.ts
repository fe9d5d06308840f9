/**
 * Tool Handlers
 *
 * Functions that execute MCP tools against the analysis pipeline.
 */

import { z } from "zod";

import type { AnalysisRunner } from "../../pipeline/AnalysisPipeline.js";
import { clientMessageFor, errorMessage } from "../../types/errors.js";
import { logger } from "../../utils/logger.js";
import { AnalyzeToolInputSchema } from "../schemas/inputSchemas.js";
import { TOOLS } from "../tools/toolDefinitions.js";

// ============================================================================
// Types
// ============================================================================

export interface ToolResult {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
  [key: string]: unknown;
}

export type ToolName = "analyze_contract";

type ToolHandler = (args: unknown, pipeline: AnalysisRunner) => Promise<ToolResult>;

// ============================================================================
// Individual Tool Handlers
// ============================================================================

async function handleAnalyzeContract(args: unknown, pipeline: AnalysisRunner): Promise<ToolResult> {
  const input = AnalyzeToolInputSchema.parse(args ?? {});
  logger.info(`analyze_contract called`, {
    blockchain: input.blockchain ?? null,
    contract: input.contract ?? null,
  });

  const result = await pipeline.run({
    blockchain: input.blockchain,
    address: input.contract,
    code: input.source,
  });

  if (!result.ok) {
    return {
      content: [{ type: "text", text: `Error: ${clientMessageFor(result.error)}` }],
      isError: true,
    };
  }

  return {
    content: [{ type: "text", text: JSON.stringify({ result: result.value.findings }, null, 2) }],
  };
}

// ============================================================================
// Tool Handler Registry
// ============================================================================

const TOOL_HANDLERS: Record<ToolName, ToolHandler> = {
  analyze_contract: handleAnalyzeContract,
};

/**
 * Check if a tool name is valid.
 */
export function isValidToolName(name: string): name is ToolName {
  return name in TOOL_HANDLERS;
}

// ============================================================================
// Main Tool Executor
// ============================================================================

/**
 * Execute a tool by name with the given arguments.
 *
 * @param args - Tool arguments (will be validated)
 * @returns Tool result in MCP format
 */
export async function executeTool(
  name: string,
  args: unknown,
  pipeline: AnalysisRunner
): Promise<ToolResult> {
  logger.info(`CallTool request: ${name}`);

  if (!isValidToolName(name)) {
    logger.error(`Unknown tool requested: ${name}`);
    return {
      content: [
        {
          type: "text",
          text: `Error: Unknown tool "${name}". Available tools: ${TOOLS.map((t) => t.name).join(", ")}`,
        },
      ],
      isError: true,
    };
  }

  try {
    return await TOOL_HANDLERS[name](args, pipeline);
  } catch (error) {
    return handleToolError(name, error);
  }
}

/**
 * Handle tool execution errors.
 */
function handleToolError(toolName: string, error: unknown): ToolResult {
  const message = errorMessage(error);
  logger.error(`Error executing tool ${toolName}: ${message}`);

  // Handle Zod validation errors specially
  if (error instanceof z.ZodError) {
    const issues = error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    return {
      content: [{ type: "text", text: `Validation error: ${issues}` }],
      isError: true,
    };
  }

  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    isError: true,
  };
}
