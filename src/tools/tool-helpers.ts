/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ZodError } from "zod";
import { ApiError, RateLimitError, NetworkError } from "../api/index.js";
import { ConfigError } from "../utils/errors.js";
import { log } from "../utils/logger.js";

/**
 * Wrap data as MCP-compatible tool result
 */
export function toolResponse(data: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(data, null, 2),
      },
    ],
  };
}

/**
 * Wrap error message as MCP-compatible tool result
 */
export function errorResponse(message: string): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: message,
      },
    ],
    isError: true,
  };
}

/**
 * Map a tool failure to a user-facing error result.
 *
 * SECURITY: never include stack traces, raw API responses, or token values
 */
export function sanitizeError(error: unknown): CallToolResult {
  log("ERROR", "Tool error", error);

  if (error instanceof ConfigError) {
    return errorResponse(error.message);
  }

  // Before ApiError: throttling also arrives as a 403
  if (error instanceof RateLimitError) {
    return errorResponse(
      "Rate limited by Canvas. Please wait a moment and try again."
    );
  }

  if (error instanceof ApiError) {
    switch (error.status) {
      case 401:
        return errorResponse(
          "Canvas rejected the access token. Check CANVAS_API_TOKEN and try again."
        );
      case 403:
        return errorResponse(
          "Access denied. You may not have permission to access this resource."
        );
      case 404:
        return errorResponse(
          "Resource not found. The course or item may not exist, or you may not have access."
        );
      default:
        return errorResponse(
          `Canvas returned HTTP ${error.status}. Please try again later.`
        );
    }
  }

  if (error instanceof NetworkError) {
    return errorResponse(
      "Could not connect to Canvas. Check CANVAS_API_URL and your internet connection."
    );
  }

  if (error instanceof ZodError) {
    const issues = error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    return errorResponse(`Invalid input: ${issues.join(", ")}`);
  }

  return errorResponse("An unexpected error occurred. Please try again.");
}
