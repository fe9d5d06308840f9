/**
 * HTTP Request Router
 *
 * Routes:
 *   GET  /             - welcome text
 *   GET  /analyze      - run the analysis pipeline
 *   GET  /health       - quick health check
 *   GET  /health/full  - health with tool availability
 *   OPTIONS *          - CORS preflight
 */

import type { IncomingMessage, ServerResponse } from "node:http";

import type { AnalysisRunner } from "../pipeline/AnalysisPipeline.js";
import { errorMessage } from "../types/errors.js";
import { logger } from "../utils/logger.js";
import {
  WELCOME_MESSAGE,
  handleAnalyze,
  sendError,
  sendJson,
  sendText,
} from "./handlers/httpHandlers.js";
import { getCachedHealthStatus, getQuickHealthStatus } from "./health/healthCheck.js";
import { handlePreflight, setCorsHeaders } from "./middleware/cors.js";

export type RequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export function createRequestHandler(pipeline: AnalysisRunner): RequestHandler {
  return async (req, res) => {
    setCorsHeaders(res);

    if (handlePreflight(req.method, res)) {
      return;
    }

    const url = new URL(req.url ?? "/", "http://localhost");
    const { pathname } = url;

    if (req.method !== "GET") {
      sendError(res, 404, "Not found");
      return;
    }

    switch (pathname) {
      case "/":
        sendText(res, 200, WELCOME_MESSAGE);
        return;

      case "/analyze": {
        const response = await handleAnalyze(url.searchParams, pipeline);
        sendJson(res, response.statusCode, response.body);
        return;
      }

      case "/health":
        sendJson(res, 200, getQuickHealthStatus());
        return;

      case "/health/full": {
        const health = await getCachedHealthStatus();
        sendJson(res, health.status === "healthy" ? 200 : 503, health);
        return;
      }

      default:
        sendError(res, 404, "Not found");
    }
  };
}

/**
 * Wrap a handler so an unexpected throw still answers 500.
 */
export function withErrorBoundary(handler: RequestHandler) {
  return (req: IncomingMessage, res: ServerResponse): void => {
    handler(req, res).catch((error: unknown) => {
      logger.error("Request handler error", { error: errorMessage(error) });
      if (!res.headersSent) {
        sendError(res, 500, "Internal server error");
      } else {
        res.end();
      }
    });
  };
}
