/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { LogLevel } from "../types/index.js";

let currentLevel: LogLevel = "INFO";

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Mask access tokens in a log message, keeping the first 8 characters.
 * URL paths stay readable: `/` never counts toward a token run.
 */
export function redact(value: string): string {
  // Authorization header values
  value = value.replace(
    /Bearer\s+([A-Za-z0-9._~+/=-]{8})[A-Za-z0-9._~+/=-]*/g,
    "Bearer $1...REDACTED"
  );
  // Tokens passed as a query parameter
  value = value.replace(
    /access_token=([^&\s]{8})[^&\s]*/g,
    "access_token=$1...REDACTED"
  );
  // Canvas personal access tokens: `<account id>~<random>`
  value = value.replace(
    /\b\d+~[A-Za-z0-9]{20,}/g,
    (match) => match.substring(0, 8) + "...REDACTED"
  );
  // Any other long base64-like run
  value = value.replace(
    /[A-Za-z0-9._~+=-]{40,}/g,
    (match) => match.substring(0, 8) + "...REDACTED"
  );
  return value;
}

export function log(
  level: LogLevel,
  message: string,
  ...args: unknown[]
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  const timestamp = new Date().toISOString();
  console.error(`[${timestamp}] [${level}] ${redact(message)}`, ...args);
}

// stdout belongs to the stdio transport; reroute stray console.log calls
export function enableStdoutGuard(): void {
  console.log = (...args: unknown[]) => {
    console.error(
      "[WARN] console.log intercepted (would corrupt stdio):",
      ...args,
    );
  };
}
