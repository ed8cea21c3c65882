/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CanvasSession, CanvasSubmission } from "../api/index.js";
import { GetMySubmissionSchema, type GetMySubmissionInput } from "./schemas.js";
import { toolResponse, sanitizeError } from "./tool-helpers.js";
import { log } from "../utils/logger.js";

export async function getMySubmission(
  session: CanvasSession,
  input: GetMySubmissionInput
) {
  const user = await session.currentUser();
  const s = await session.client.get<CanvasSubmission>(
    `/courses/${input.course_id}/assignments/${input.assignment_id}/submissions/${user.id}`
  );

  return {
    id: s.id,
    user_id: s.user_id ?? null,
    workflow_state: s.workflow_state ?? null,
    submitted_at: s.submitted_at ?? null,
    graded_at: s.graded_at ?? null,
    posted_at: s.posted_at ?? null,
    score: s.score ?? null,
    grade: s.grade ?? null,
    attempt: s.attempt ?? null,
    late: s.late ?? null,
    missing: s.missing ?? null,
    excused: s.excused ?? null,
    submission_type: s.submission_type ?? null,
    preview_url: s.preview_url ?? null,
    attachments: s.attachments ?? null,
  };
}

/**
 * Register get_my_submission tool
 */
export function registerGetMySubmission(
  server: McpServer,
  session: CanvasSession
): void {
  server.registerTool(
    "get_my_submission",
    {
      title: "Get My Submission",
      description:
        "Fetch your own submission for an assignment: status, score and grade, attempt number, late/missing flags, timestamps and attached files. " +
        "Use this when the user asks whether they turned something in or what they got on it.",
      inputSchema: GetMySubmissionSchema,
    },
    async (args) => {
      try {
        log("DEBUG", "get_my_submission tool called", { args });
        const input = GetMySubmissionSchema.parse(args);
        const submission = await getMySubmission(session, input);
        log(
          "INFO",
          `get_my_submission: Retrieved submission for assignment ${input.assignment_id} (${submission.workflow_state})`
        );
        return toolResponse(submission);
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );
}
