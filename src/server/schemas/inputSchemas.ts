/**
 * Input Schemas
 *
 * Zod validation schemas for the HTTP query and the MCP tool input.
 */

import { z } from "zod";

// ============================================================================
// Shared Fields
// ============================================================================

/** Empty query parameters count as absent */
const optionalParam = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" || value === null ? undefined : value), schema.optional());

const BlockchainSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]+$/, "must contain only letters, digits, '-' or '_'")
  .describe("Blockchain name, e.g. 'ethereum' or 'polygon'");

const ContractAddressSchema = z
  .string()
  .regex(/^[A-Za-z0-9]+$/, "must be an alphanumeric contract address")
  .describe("Deployed contract address");

// ============================================================================
// HTTP Query Schema
// ============================================================================

export const AnalyzeQuerySchema = z.object({
  blockchain: optionalParam(BlockchainSchema),
  contract: optionalParam(ContractAddressSchema),
  code: optionalParam(
    z
      .string()
      .regex(/^[A-Za-z0-9+/_\- ]+=*$/, "must be base64")
      .describe("Base64-encoded Solidity source")
  ),
});

// ============================================================================
// MCP Tool Input Schema
// ============================================================================

export const AnalyzeToolInputSchema = z.object({
  blockchain: optionalParam(BlockchainSchema),
  contract: optionalParam(ContractAddressSchema),
  source: optionalParam(z.string().describe("Solidity source code")),
});

// ============================================================================
// Type Exports
// ============================================================================

export type AnalyzeQuery = z.infer<typeof AnalyzeQuerySchema>;
export type AnalyzeToolInput = z.infer<typeof AnalyzeToolInputSchema>;
