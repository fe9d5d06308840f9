/**
 * CORS Middleware
 *
 * Any origin may call the API; only GET and preflight requests are served.
 */

import type { ServerResponse } from "node:http";

export const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type",
  "Access-Control-Max-Age": "86400",
} as const;

export function setCorsHeaders(res: ServerResponse): void {
  for (const [name, value] of Object.entries(CORS_HEADERS)) {
    res.setHeader(name, value);
  }
}

/**
 * Answer a preflight request with 204.
 *
 * @returns true if the request was a preflight and has been answered
 */
export function handlePreflight(method: string | undefined, res: ServerResponse): boolean {
  if (method !== "OPTIONS") {
    return false;
  }
  res.writeHead(204);
  res.end();
  return true;
}
