/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

export { CanvasApiClient } from "./client.js";
export { CanvasSession } from "./session.js";
export { parseLinkHeader, nextPageUrl } from "./pagination.js";
export { ApiError, RateLimitError, NetworkError } from "./errors.js";

export type {
  CanvasApiClientOptions,
  CanvasAssignment,
  CanvasAttachment,
  CanvasCourse,
  CanvasCourseEnrollment,
  CanvasDiscussionTopic,
  CanvasEnrollment,
  CanvasGrades,
  CanvasSubmission,
  CanvasUser,
  QueryParams,
  QueryValue,
} from "./types.js";
