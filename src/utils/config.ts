/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { AppConfig, LogLevel } from "../types/index.js";
import { isLogLevel } from "./logger.js";

export const ENV_API_URL = "CANVAS_API_URL";
export const ENV_API_TOKEN = "CANVAS_API_TOKEN";

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_PER_PAGE = 100;
const MAX_PER_PAGE = 100;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    apiUrl: nonEmpty(env[ENV_API_URL]),
    apiToken: nonEmpty(env[ENV_API_TOKEN]),
    timeoutMs: parsePositiveInt(env.CANVAS_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    perPage: clamp(parseInteger(env.CANVAS_PER_PAGE, DEFAULT_PER_PAGE), 1, MAX_PER_PAGE),
    logLevel: parseLogLevel(env.CANVAS_LOG_LEVEL),
  };
}

/**
 * Names of the required variables that are not set, in declaration order.
 */
export function missingEnv(config: AppConfig): string[] {
  const missing: string[] = [];
  if (!config.apiUrl) missing.push(ENV_API_URL);
  if (!config.apiToken) missing.push(ENV_API_TOKEN);
  return missing;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInteger(value, fallback);
  return parsed < 1 ? fallback : parsed;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function parseLogLevel(value: string | undefined): LogLevel {
  const upper = value?.trim().toUpperCase() ?? "";
  return isLogLevel(upper) ? upper : "INFO";
}

export type { AppConfig };
