/**
 * CORS Middleware Tests
 */

import { describe, it, expect } from "vitest";
import { IncomingMessage, ServerResponse } from "node:http";
import { Socket } from "node:net";
import { handlePreflight, setCorsHeaders } from "../../src/server/middleware/cors.js";

function response(): ServerResponse {
  return new ServerResponse(new IncomingMessage(new Socket()));
}

describe("setCorsHeaders", () => {
  it("should allow any origin for GET and preflight requests", () => {
    const res = response();

    setCorsHeaders(res);

    expect(res.getHeaders()).toEqual({
      "access-control-allow-origin": "*",
      "access-control-allow-methods": "GET, OPTIONS",
      "access-control-allow-headers": "Content-Type",
      "access-control-max-age": "86400",
    });
  });
});

describe("handlePreflight", () => {
  it.each(["GET", "POST", undefined])("should leave %s requests to the router", (method) => {
    const res = response();

    expect(handlePreflight(method, res)).toBe(false);
    expect(res.headersSent).toBe(false);
  });
});
