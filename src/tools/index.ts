/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Tool registration functions - barrel export
export { registerHealth } from "./health.js";
export { registerGetCurrentUser } from "./get-current-user.js";
export { registerListMyCourses } from "./list-my-courses.js";
export { registerListCourseAssignments } from "./list-course-assignments.js";
export { registerGetAssignmentDetails } from "./get-assignment-details.js";
export { registerGetMySubmission } from "./get-my-submission.js";
export { registerListUpcomingAssignments } from "./list-upcoming-assignments.js";
export { registerGetMyCourseGrade } from "./get-my-course-grade.js";
export { registerListCourseAnnouncements } from "./list-course-announcements.js";

// Re-export shared helpers and schemas for convenience
export { toolResponse, errorResponse, sanitizeError } from "./tool-helpers.js";
export * from "./schemas.js";
