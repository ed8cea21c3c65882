/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Raw Canvas REST API objects. Only the fields the tools read are declared;
// Canvas omits many of them depending on permissions and `include[]`.

export interface CanvasUser {
  id: number;
  name?: string;
  sortable_name?: string;
  short_name?: string;
  login_id?: string;
  primary_email?: string;
  time_zone?: string;
  locale?: string | null;
}

export interface CanvasCourseEnrollment {
  type?: string;
  role?: string;
  enrollment_state?: string;
  workflow_state?: string;
}

export interface CanvasCourse {
  id: number;
  name?: string;
  course_code?: string;
  workflow_state?: string; // unpublished | available | completed | deleted
  start_at?: string | null;
  end_at?: string | null;
  enrollment_term_id?: number;
  enrollments?: CanvasCourseEnrollment[] | null;
}

export interface CanvasAttachment {
  id: number;
  display_name?: string;
  filename?: string;
  "content-type"?: string;
  size?: number;
  url?: string;
}

export interface CanvasSubmission {
  id: number;
  user_id?: number;
  assignment_id?: number;
  workflow_state?: string; // unsubmitted | submitted | graded | pending_review
  submitted_at?: string | null;
  graded_at?: string | null;
  posted_at?: string | null;
  score?: number | null;
  grade?: string | null;
  attempt?: number | null;
  late?: boolean;
  missing?: boolean;
  excused?: boolean | null;
  submission_type?: string | null;
  preview_url?: string;
  attachments?: CanvasAttachment[];
}

export interface CanvasAssignment {
  id: number;
  course_id?: number;
  name?: string;
  description?: string | null;
  due_at?: string | null;
  lock_at?: string | null;
  unlock_at?: string | null;
  points_possible?: number | null;
  submission_types?: string[];
  allowed_extensions?: string[];
  grading_type?: string;
  muted?: boolean;
  has_overrides?: boolean;
  published?: boolean;
  html_url?: string;
  // Present when requested with include[]=submission
  submission?: CanvasSubmission;
}

export interface CanvasGrades {
  html_url?: string;
  current_score?: number | null;
  final_score?: number | null;
  current_grade?: string | null;
  final_grade?: string | null;
  unposted_current_score?: number | null;
  unposted_final_score?: number | null;
}

export interface CanvasEnrollment {
  id: number;
  course_id?: number;
  user_id?: number;
  type?: string;
  enrollment_state?: string;
  grades?: CanvasGrades | null;
}

export interface CanvasDiscussionTopic {
  id: number;
  title?: string;
  message?: string | null;
  published?: boolean;
  workflow_state?: string; // active | unpublished | locked | post_delayed
  posted_at?: string | null;
  last_reply_at?: string | null;
  html_url?: string;
}

// Query string values; arrays are sent as repeated key[]=value
export type QueryValue = string | number | boolean | readonly string[] | undefined;
export type QueryParams = Record<string, QueryValue>;

// Canvas API client constructor options
export interface CanvasApiClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs?: number; // default 30_000
  perPage?: number; // default 100
  fetch?: typeof fetch;
}
