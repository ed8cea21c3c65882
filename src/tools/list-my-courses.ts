/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CanvasCourse, CanvasSession } from "../api/index.js";
import { ListMyCoursesSchema, type ListMyCoursesInput } from "./schemas.js";
import { toolResponse, sanitizeError } from "./tool-helpers.js";
import { log } from "../utils/logger.js";

// A course returned without enrollment data always matches
function matchesEnrollmentState(course: CanvasCourse, state: string): boolean {
  if (!state) return true;
  const enrollments = course.enrollments ?? [];
  if (enrollments.length === 0) return true;
  return enrollments.some(
    (e) => (e.enrollment_state || e.workflow_state) === state
  );
}

export async function listMyCourses(
  session: CanvasSession,
  input: ListMyCoursesInput
) {
  const courses = await session.client.getPaginated<CanvasCourse>(
    "/users/self/favorites/courses"
  );

  return courses
    .filter((c) => matchesEnrollmentState(c, input.enrollment_state))
    .filter((c) => input.include_concluded || c.workflow_state !== "completed")
    .map((c) => ({
      id: c.id,
      name: c.name ?? null,
      course_code: c.course_code ?? null,
      workflow_state: c.workflow_state ?? null,
      start_at: c.start_at ?? null,
      end_at: c.end_at ?? null,
      enrollment_term_id: c.enrollment_term_id ?? null,
    }));
}

/**
 * Register list_my_courses tool
 */
export function registerListMyCourses(
  server: McpServer,
  session: CanvasSession
): void {
  server.registerTool(
    "list_my_courses",
    {
      title: "List My Courses",
      description:
        "List the courses you have favorited (starred) in Canvas, with IDs, names, codes and term dates. " +
        "Concluded courses are left out unless include_concluded is true. " +
        "Use this first to find the course_id other tools need.",
      inputSchema: ListMyCoursesSchema,
    },
    async (args) => {
      try {
        log("DEBUG", "list_my_courses tool called", { args });
        const input = ListMyCoursesSchema.parse(args);
        const courses = await listMyCourses(session, input);
        log("INFO", `list_my_courses: Retrieved ${courses.length} courses`);
        return toolResponse(courses);
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );
}
