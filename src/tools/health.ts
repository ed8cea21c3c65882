/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { toolResponse } from "./tool-helpers.js";
import { log } from "../utils/logger.js";
import { ENV_API_TOKEN, ENV_API_URL } from "../utils/config.js";
import type { AppConfig } from "../types/index.js";

export interface HealthReport {
  ok: boolean;
  env: Record<typeof ENV_API_URL | typeof ENV_API_TOKEN, boolean>;
}

export function checkHealth(config: AppConfig): HealthReport {
  const env = {
    [ENV_API_URL]: Boolean(config.apiUrl),
    [ENV_API_TOKEN]: Boolean(config.apiToken),
  };
  return { ok: env[ENV_API_URL] && env[ENV_API_TOKEN], env };
}

/**
 * Register health tool. Never calls Canvas, so it works without credentials.
 */
export function registerHealth(server: McpServer, config: AppConfig): void {
  server.registerTool(
    "health",
    {
      title: "Health Check",
      description:
        "Report whether the server is configured. Returns ok=true when both CANVAS_API_URL and CANVAS_API_TOKEN are set, and which of them are present. " +
        "Use this when other tools fail with configuration errors or the user asks whether Canvas is set up.",
    },
    async () => {
      log("DEBUG", "health tool called");
      const report = checkHealth(config);
      log("INFO", `health: ok=${report.ok}`);
      return toolResponse(report);
    }
  );
}
