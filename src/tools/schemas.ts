/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { z } from "zod";

/**
 * Zod schemas for MCP tool input validation.
 * Passed to the SDK as inputSchema and parsed again inside each handler.
 */

const courseId = z.number().int().positive().describe("Canvas course ID.");
const assignmentId = z.number().int().positive().describe("Canvas assignment ID.");

export const ASSIGNMENT_BUCKETS = [
  "past",
  "overdue",
  "undated",
  "ungraded",
  "unsubmitted",
  "upcoming",
  "future",
] as const;

export const ListMyCoursesSchema = z.object({
  enrollment_state: z.string().default("active")
    .describe("Keep only courses where one of your enrollments is in this state (e.g. 'active', 'invited', 'completed'). Empty string disables the check."),
  include_concluded: z.boolean().default(false)
    .describe("Include concluded (completed) courses."),
});

export const ListCourseAssignmentsSchema = z.object({
  course_id: courseId,
  bucket: z.enum(ASSIGNMENT_BUCKETS).optional()
    .describe("Only return assignments in this Canvas bucket."),
  search_term: z.string().optional()
    .describe("Only return assignments whose name contains this text. Empty means no filter."),
});

export const GetAssignmentDetailsSchema = z.object({
  course_id: courseId,
  assignment_id: assignmentId,
});

export const GetMySubmissionSchema = z.object({
  course_id: courseId,
  assignment_id: assignmentId,
});

export const ListUpcomingAssignmentsSchema = z.object({
  days: z.number().int().default(7)
    .describe("Look this many days ahead. Values below 1 are treated as 1."),
  only_unsubmitted: z.boolean().default(true)
    .describe("Leave out assignments you have already submitted."),
});

export const GetMyCourseGradeSchema = z.object({
  course_id: courseId,
});

export const ListCourseAnnouncementsSchema = z.object({
  course_id: courseId,
  only_published: z.boolean().default(true)
    .describe("Leave out announcements that are not published (delayed, unpublished or locked)."),
});

export type ListMyCoursesInput = z.infer<typeof ListMyCoursesSchema>;
export type ListCourseAssignmentsInput = z.infer<typeof ListCourseAssignmentsSchema>;
export type GetAssignmentDetailsInput = z.infer<typeof GetAssignmentDetailsSchema>;
export type GetMySubmissionInput = z.infer<typeof GetMySubmissionSchema>;
export type ListUpcomingAssignmentsInput = z.infer<typeof ListUpcomingAssignmentsSchema>;
export type GetMyCourseGradeInput = z.infer<typeof GetMyCourseGradeSchema>;
export type ListCourseAnnouncementsInput = z.infer<typeof ListCourseAnnouncementsSchema>;
