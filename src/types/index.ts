/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Log levels
export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

// Application configuration, read once from the environment at startup
export interface AppConfig {
  apiUrl?: string; // CANVAS_API_URL
  apiToken?: string; // CANVAS_API_TOKEN
  timeoutMs: number;
  perPage: number; // per_page on list requests, 1-100
  logLevel: LogLevel;
}
