/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CanvasAssignment, CanvasSession } from "../api/index.js";
import {
  GetAssignmentDetailsSchema,
  type GetAssignmentDetailsInput,
} from "./schemas.js";
import { toolResponse, sanitizeError } from "./tool-helpers.js";
import { htmlToMarkdown } from "../utils/html-converter.js";
import { log } from "../utils/logger.js";

export async function getAssignmentDetails(
  session: CanvasSession,
  input: GetAssignmentDetailsInput
) {
  const a = await session.client.get<CanvasAssignment>(
    `/courses/${input.course_id}/assignments/${input.assignment_id}`
  );

  return {
    id: a.id,
    name: a.name ?? null,
    description: a.description ?? null,
    description_markdown: htmlToMarkdown(a.description),
    due_at: a.due_at ?? null,
    points_possible: a.points_possible ?? null,
    submission_types: a.submission_types ?? null,
    allowed_extensions: a.allowed_extensions ?? null,
    grading_type: a.grading_type ?? null,
    lock_at: a.lock_at ?? null,
    unlock_at: a.unlock_at ?? null,
    muted: a.muted ?? null,
    has_overrides: a.has_overrides ?? null,
    published: a.published ?? null,
    html_url: a.html_url ?? null,
  };
}

/**
 * Register get_assignment_details tool
 */
export function registerGetAssignmentDetails(
  server: McpServer,
  session: CanvasSession
): void {
  server.registerTool(
    "get_assignment_details",
    {
      title: "Get Assignment Details",
      description:
        "Fetch one assignment's full details: instructions (as HTML and Markdown), due/lock dates, points, grading type and allowed file types. " +
        "Use this when the user asks what an assignment requires or how it is graded.",
      inputSchema: GetAssignmentDetailsSchema,
    },
    async (args) => {
      try {
        log("DEBUG", "get_assignment_details tool called", { args });
        const input = GetAssignmentDetailsSchema.parse(args);
        const assignment = await getAssignmentDetails(session, input);
        log(
          "INFO",
          `get_assignment_details: Retrieved assignment ${assignment.id} in course ${input.course_id}`
        );
        return toolResponse(assignment);
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );
}
