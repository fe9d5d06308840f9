/**
 * Pipeline Errors
 *
 * Every failure a request can end in carries one of these codes. The HTTP and
 * MCP surfaces derive the status and the client-visible message from it.
 */

export type PipelineErrorCode =
  | "MISSING_IDENTIFIERS"
  | "UNSUPPORTED_BLOCKCHAIN"
  | "UPSTREAM_UNAVAILABLE"
  | "STAGING_FAILED"
  | "ENTRY_NOT_FOUND"
  | "COMPILER_UNAVAILABLE"
  | "ANALYSIS_FAILURE";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

// ============================================================================
// Client Mapping
// ============================================================================

const CLIENT_ERROR_CODES: ReadonlySet<PipelineErrorCode> = new Set([
  "MISSING_IDENTIFIERS",
  "UNSUPPORTED_BLOCKCHAIN",
  "UPSTREAM_UNAVAILABLE",
  "STAGING_FAILED",
  "ENTRY_NOT_FOUND",
]);

/**
 * Input-shape and source-resolution failures are the caller's problem (400);
 * toolchain and engine failures are ours (500).
 */
export function httpStatusFor(code: PipelineErrorCode): 400 | 500 {
  return CLIENT_ERROR_CODES.has(code) ? 400 : 500;
}

export function clientMessageFor(error: PipelineError): string {
  switch (error.code) {
    case "MISSING_IDENTIFIERS":
      return "Missing blockchain or contract address";
    case "UNSUPPORTED_BLOCKCHAIN":
      return error.message;
    case "UPSTREAM_UNAVAILABLE":
    case "STAGING_FAILED":
    case "ENTRY_NOT_FOUND":
      return "Unable to retrieve contract code";
    case "COMPILER_UNAVAILABLE":
      return `Compiler unavailable: ${error.message}`;
    case "ANALYSIS_FAILURE":
      return `Analysis failed: ${error.message}`;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
