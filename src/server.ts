/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CanvasSession } from "./api/index.js";
import type { AppConfig } from "./types/index.js";
import { log } from "./utils/logger.js";
import {
  registerHealth,
  registerGetCurrentUser,
  registerListMyCourses,
  registerListCourseAssignments,
  registerGetAssignmentDetails,
  registerGetMySubmission,
  registerListUpcomingAssignments,
  registerGetMyCourseGrade,
  registerListCourseAnnouncements,
} from "./tools/index.js";

export const SERVER_NAME = "canvas-student";
export const SERVER_VERSION = "0.1.0";

/**
 * Build the MCP server with every tool registered. Credentials are not
 * checked here; tools that need them fail individually until they are set.
 */
export function createServer(
  config: AppConfig,
  session: CanvasSession = new CanvasSession(config)
): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerHealth(server, config);
  registerGetCurrentUser(server, session);
  registerListMyCourses(server, session);
  registerListCourseAssignments(server, session);
  registerGetAssignmentDetails(server, session);
  registerGetMySubmission(server, session);
  registerListUpcomingAssignments(server, session);
  registerGetMyCourseGrade(server, session);
  registerListCourseAnnouncements(server, session);
  log("DEBUG", "MCP tools registered (9 tools)");

  return server;
}
