/**
 * Tool Definitions
 *
 * MCP tool metadata exposed to clients.
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";

// ============================================================================
// Tool Definitions
// ============================================================================

export const TOOLS: Tool[] = [
  {
    name: "analyze_contract",
    description:
      "Runs Slither on a Solidity contract and returns its findings as JSON " +
      "({check, description, impact, confidence}). Pass a blockchain and contract " +
      "address to analyze verified source from the chain's explorer, or pass the " +
      "source text directly.",
    inputSchema: {
      type: "object",
      properties: {
        blockchain: {
          type: "string",
          description: "Blockchain name with configured explorer credentials, e.g. 'ethereum'",
        },
        contract: {
          type: "string",
          description: "Deployed contract address",
        },
        source: {
          type: "string",
          description: "Solidity source code, used when no blockchain and address are given",
        },
      },
    },
  },
];

/**
 * Get tool names.
 */
export function getToolNames(): string[] {
  return TOOLS.map((t) => t.name);
}
