/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CanvasAssignment, CanvasSession } from "../api/index.js";
import {
  ListCourseAssignmentsSchema,
  type ListCourseAssignmentsInput,
} from "./schemas.js";
import { toolResponse, sanitizeError } from "./tool-helpers.js";
import { log } from "../utils/logger.js";

export async function listCourseAssignments(
  session: CanvasSession,
  input: ListCourseAssignmentsInput
) {
  const assignments = await session.client.getPaginated<CanvasAssignment>(
    `/courses/${input.course_id}/assignments`,
    { bucket: input.bucket, search_term: input.search_term || undefined }
  );

  return assignments.map((a) => ({
    id: a.id,
    name: a.name ?? null,
    due_at: a.due_at ?? null,
    points_possible: a.points_possible ?? null,
    submission_types: a.submission_types ?? null,
    allowed_extensions: a.allowed_extensions ?? null,
    lock_at: a.lock_at ?? null,
    unlock_at: a.unlock_at ?? null,
    has_overrides: a.has_overrides ?? null,
    published: a.published ?? null,
  }));
}

/**
 * Register list_course_assignments tool
 */
export function registerListCourseAssignments(
  server: McpServer,
  session: CanvasSession
): void {
  server.registerTool(
    "list_course_assignments",
    {
      title: "List Course Assignments",
      description:
        "List the assignments in one course with due dates, points and submission types. " +
        "Filter by bucket (past, overdue, undated, ungraded, unsubmitted, upcoming, future) or by a name search term. " +
        "Use this when the user asks what assignments a class has or what is overdue in it.",
      inputSchema: ListCourseAssignmentsSchema,
    },
    async (args) => {
      try {
        log("DEBUG", "list_course_assignments tool called", { args });
        const input = ListCourseAssignmentsSchema.parse(args);
        const assignments = await listCourseAssignments(session, input);
        log(
          "INFO",
          `list_course_assignments: Retrieved ${assignments.length} assignments for course ${input.course_id}`
        );
        return toolResponse(assignments);
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );
}
