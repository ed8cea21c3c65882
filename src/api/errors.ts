/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { CanvasMcpError } from "../utils/errors.js";

// Non-2xx response from the Canvas REST API
export class ApiError extends CanvasMcpError {
  constructor(
    public readonly status: number,
    public readonly endpoint: string,
    message: string,
    public readonly responseBody?: string,
    cause?: Error,
  ) {
    super(`[CMCP-2001] API error (${status}) at ${endpoint}: ${message}`, cause);
    this.name = "ApiError";
  }
}

// Canvas throttling: 429, or 403 with "Rate Limit Exceeded"
export class RateLimitError extends ApiError {
  constructor(
    status: number,
    endpoint: string,
    public readonly retryAfter?: number, // seconds
  ) {
    const message = retryAfter
      ? `Rate limited, retry after ${retryAfter}s`
      : "Rate limited";
    super(status, endpoint, message);
    this.name = "RateLimitError";
  }
}

// Fetch failures, timeouts, DNS errors, unparseable bodies
export class NetworkError extends CanvasMcpError {
  constructor(message: string, cause?: Error) {
    super(`[CMCP-2002] Network error: ${message}`, cause);
    this.name = "NetworkError";
  }
}
