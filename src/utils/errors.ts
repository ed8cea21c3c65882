/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

export class CanvasMcpError extends Error {
  constructor(message: string, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = "CanvasMcpError";
  }
}

export class ConfigError extends CanvasMcpError {
  constructor(
    message: string,
    public readonly missing: readonly string[] = [],
  ) {
    super(`[CMCP-1001] ${message}`);
    this.name = "ConfigError";
  }
}
