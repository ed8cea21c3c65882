/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type {
  CanvasAssignment,
  CanvasCourse,
  CanvasSession,
  CanvasSubmission,
} from "../api/index.js";
import {
  ListUpcomingAssignmentsSchema,
  type ListUpcomingAssignmentsInput,
} from "./schemas.js";
import { toolResponse, sanitizeError } from "./tool-helpers.js";
import { addDays, parseIso8601 } from "../utils/dates.js";
import { log } from "../utils/logger.js";

export interface UpcomingAssignment {
  course_id: number;
  course_name: string | null;
  id: number;
  name: string | null;
  due_at: string;
  points_possible: number | null;
  submission_types: string[] | null;
  html_url: string | null;
}

const DONE_STATES = new Set(["submitted", "graded"]);

function isSubmitted(submission: CanvasSubmission | undefined): boolean {
  if (!submission) return false;
  return (
    DONE_STATES.has(submission.workflow_state ?? "") &&
    Boolean(submission.submitted_at)
  );
}

/**
 * Assignments due between now and `days` days from now across all active
 * courses, soonest first. Courses are walked one at a time; a course whose
 * assignments cannot be listed is skipped.
 */
export async function listUpcomingAssignments(
  session: CanvasSession,
  input: ListUpcomingAssignmentsInput,
  now: Date = new Date()
): Promise<UpcomingAssignment[]> {
  const cutoff = addDays(now, Math.max(1, input.days));
  const courses = await session.client.getPaginated<CanvasCourse>(
    "/users/self/courses",
    { enrollment_state: "active" }
  );

  const results: Array<UpcomingAssignment & { dueTime: number }> = [];

  for (const course of courses) {
    let assignments: CanvasAssignment[];
    try {
      assignments = await session.client.getPaginated<CanvasAssignment>(
        `/courses/${course.id}/assignments`,
        { include: input.only_unsubmitted ? ["submission"] : undefined }
      );
    } catch (error) {
      log(
        "WARN",
        `list_upcoming_assignments: Skipping course ${course.id} (${course.name ?? "unnamed"})`,
        error
      );
      continue;
    }

    for (const a of assignments) {
      const due = parseIso8601(a.due_at);
      if (!due || !a.due_at) continue;
      if (due < now || due > cutoff) continue;
      if (input.only_unsubmitted && isSubmitted(a.submission)) continue;

      results.push({
        course_id: course.id,
        course_name: course.name ?? null,
        id: a.id,
        name: a.name ?? null,
        due_at: a.due_at,
        points_possible: a.points_possible ?? null,
        submission_types: a.submission_types ?? null,
        html_url: a.html_url ?? null,
        dueTime: due.getTime(),
      });
    }
  }

  return results
    .sort((a, b) => a.dueTime - b.dueTime)
    .map(({ dueTime: _dueTime, ...assignment }) => assignment);
}

/**
 * Register list_upcoming_assignments tool
 */
export function registerListUpcomingAssignments(
  server: McpServer,
  session: CanvasSession
): void {
  server.registerTool(
    "list_upcoming_assignments",
    {
      title: "List Upcoming Assignments",
      description:
        "List assignments due in the next N days (default 7) across all your active courses, soonest first. " +
        "By default leaves out work you have already submitted. " +
        "Use this when the user asks about deadlines, what's due, or what they need to do this week.",
      inputSchema: ListUpcomingAssignmentsSchema,
    },
    async (args) => {
      try {
        log("DEBUG", "list_upcoming_assignments tool called", { args });
        const input = ListUpcomingAssignmentsSchema.parse(args);
        const assignments = await listUpcomingAssignments(session, input);
        log(
          "INFO",
          `list_upcoming_assignments: Retrieved ${assignments.length} assignments due within ${Math.max(1, input.days)} days`
        );
        return toolResponse(assignments);
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );
}
