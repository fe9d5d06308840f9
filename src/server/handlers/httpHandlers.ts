/**
 * HTTP Handlers
 *
 * Request handlers for the REST endpoints. These are separate from the MCP
 * tool handlers but drive the same pipeline.
 */

import type { ServerResponse } from "node:http";
import { z } from "zod";

import type { AnalysisRunner } from "../../pipeline/AnalysisPipeline.js";
import { clientMessageFor, httpStatusFor } from "../../types/errors.js";
import { logger } from "../../utils/logger.js";
import { AnalyzeQuerySchema } from "../schemas/inputSchemas.js";

// ============================================================================
// Types
// ============================================================================

export interface JsonResponse {
  statusCode: number;
  body: unknown;
}

export const WELCOME_MESSAGE = "Contract analysis API. Try GET /analyze?blockchain=<name>&contract=<address>";

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Send JSON response.
 */
export function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body, null, 2));
}

/**
 * Send error response.
 */
export function sendError(res: ServerResponse, statusCode: number, message: string): void {
  sendJson(res, statusCode, { error: message });
}

export function sendText(res: ServerResponse, statusCode: number, text: string): void {
  res.writeHead(statusCode, { "Content-Type": "text/plain; charset=utf-8" });
  res.end(text);
}

/**
 * Decode the `code` query parameter.
 *
 * Form decoding turns `+` into a space, so spaces are put back before the
 * base64 decode. The URL-safe alphabet is accepted as well.
 */
export function decodeSourceParam(encoded: string): string {
  return Buffer.from(encoded.replace(/ /g, "+"), "base64").toString("utf8");
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
}

// ============================================================================
// API Handlers
// ============================================================================

/**
 * Handle GET /analyze - analyze a deployed contract or base64 source.
 */
export async function handleAnalyze(
  searchParams: URLSearchParams,
  pipeline: AnalysisRunner
): Promise<JsonResponse> {
  const parsed = AnalyzeQuerySchema.safeParse(Object.fromEntries(searchParams));

  if (!parsed.success) {
    return { statusCode: 400, body: { error: `Invalid query: ${formatIssues(parsed.error)}` } };
  }

  const { blockchain, contract, code } = parsed.data;

  logger.info("Analyze request", {
    blockchain: blockchain ?? null,
    contract: contract ?? null,
    codeLength: code?.length ?? 0,
  });

  const result = await pipeline.run({
    blockchain,
    address: contract,
    code: code === undefined ? undefined : decodeSourceParam(code),
  });

  if (!result.ok) {
    return {
      statusCode: httpStatusFor(result.error.code),
      body: { error: clientMessageFor(result.error) },
    };
  }

  return { statusCode: 200, body: { result: result.value.findings } };
}
