/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CanvasSession } from "../api/index.js";
import { toolResponse, sanitizeError } from "./tool-helpers.js";
import { log } from "../utils/logger.js";

export async function getCurrentUser(session: CanvasSession) {
  const user = await session.currentUser();
  return {
    id: user.id,
    name: user.name ?? null,
    sortable_name: user.sortable_name ?? null,
    short_name: user.short_name ?? null,
    login_id: user.login_id ?? null,
    primary_email: user.primary_email ?? null,
    time_zone: user.time_zone ?? null,
    locale: user.locale ?? null,
  };
}

/**
 * Register get_current_user tool
 */
export function registerGetCurrentUser(
  server: McpServer,
  session: CanvasSession
): void {
  server.registerTool(
    "get_current_user",
    {
      title: "Get Current User",
      description:
        "Fetch the Canvas profile of the account the access token belongs to (id, name, login, email, time zone). " +
        "Use this when the user asks who they are logged in as, or to confirm the token works.",
    },
    async () => {
      try {
        log("DEBUG", "get_current_user tool called");
        const user = await getCurrentUser(session);
        log("INFO", `get_current_user: Retrieved user ${user.id}`);
        return toolResponse(user);
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );
}
