/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CanvasDiscussionTopic, CanvasSession } from "../api/index.js";
import {
  ListCourseAnnouncementsSchema,
  type ListCourseAnnouncementsInput,
} from "./schemas.js";
import { toolResponse, sanitizeError } from "./tool-helpers.js";
import { htmlToMarkdown } from "../utils/html-converter.js";
import { log } from "../utils/logger.js";

// Canvas announcements are discussion topics flagged as announcements
export async function listCourseAnnouncements(
  session: CanvasSession,
  input: ListCourseAnnouncementsInput
) {
  const topics = await session.client.getPaginated<CanvasDiscussionTopic>(
    `/courses/${input.course_id}/discussion_topics`,
    { only_announcements: true }
  );

  return topics
    .filter((t) => !input.only_published || t.workflow_state === "active")
    .map((t) => ({
      id: t.id,
      title: t.title ?? null,
      message: t.message ?? null,
      message_markdown: htmlToMarkdown(t.message),
      published: t.published ?? null,
      posted_at: t.posted_at ?? null,
      last_reply_at: t.last_reply_at ?? null,
      html_url: t.html_url ?? null,
    }));
}

/**
 * Register list_course_announcements tool
 */
export function registerListCourseAnnouncements(
  server: McpServer,
  session: CanvasSession
): void {
  server.registerTool(
    "list_course_announcements",
    {
      title: "List Course Announcements",
      description:
        "List the announcements posted in a course, with the message as HTML and Markdown. " +
        "Use this when the user asks about announcements, news or updates from their instructors.",
      inputSchema: ListCourseAnnouncementsSchema,
    },
    async (args) => {
      try {
        log("DEBUG", "list_course_announcements tool called", { args });
        const input = ListCourseAnnouncementsSchema.parse(args);
        const announcements = await listCourseAnnouncements(session, input);
        log(
          "INFO",
          `list_course_announcements: Retrieved ${announcements.length} announcements for course ${input.course_id}`
        );
        return toolResponse(announcements);
      } catch (error) {
        return sanitizeError(error);
      }
    }
  );
}
