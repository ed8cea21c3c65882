/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CanvasEnrollment, CanvasGrades, CanvasSession } from "../api/index.js";
import { GetMyCourseGradeSchema, type GetMyCourseGradeInput } from "./schemas.js";
import { toolResponse, sanitizeError } from "./tool-helpers.js";
import { log } from "../utils/logger.js";

export const NO_ENROLLMENT_MESSAGE = "No enrollment with grades found for this course.";

export async function getMyCourseGrade(
  session: CanvasSession,
  input: GetMyCourseGradeInput
) {
  const user = await session.currentUser();
  // A student has at most one StudentEnrollment per course; one page is enough
  const enrollments = await session.client.get<CanvasEnrollment[]>(
    `/courses/${input.course_id}/enrollments`,
    {
      user_id: user.id,
      type: ["StudentEnrollment"],
      state: ["active", "completed"],
      include: ["grades"],
    }
  );

  const enrollment = enrollments[0];
  if (!enrollment) {
    return { message: NO_ENROLLMENT_MESSAGE };
  }

  const grades: CanvasGrades = enrollment.grades ?? {};
  return {
    enrollment_id: enrollment.id,
    course_id: enrollment.course_id ?? null,
    user_id: enrollment.user_id ?? null,
    grades: {
      html_url: grades.html_url ?? null,
      current_score: grades.current_score ?? null,
      final_score: grades.final_score ?? null,
      current_grade: grades.current_grade ?? null,
      final_grade: grades.final_grade ?? null,
      unposted_current_score: grades.unposted_current_score ?? null,
      unposted_final_score: grades.unposted_final_score ?? null,
    },
  };
}

/**
 * Register get_my_course_grade tool
 */
export function registerGetMyCourseGrade(
  server: McpServer,
  session: CanvasSession
): void {
  server.registerTool(
    "get_my_course_grade",
    {
      title: "Get My Course Grade",
      description:
        "Fetch your overall grade in a course: current and final score and letter grade, plus unposted scores that include grades not yet released. " +
        "Use this when the user asks how they're doing in a class or what their grade is.",
      inputSchema: GetMyCourseGradeSchema,
    },
    async (args) => {
      try {
        log("DEBUG", "get_my_course_grade tool called", { args });
        const input = GetMyCourseGradeSchema.parse(args);
        const grade = await getMyCourseGrade(session, input);
        log("INFO", `get_my_course_grade: Retrieved grade summary for course ${input.course_id}`);
        return toolResponse(grade);
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );
}
