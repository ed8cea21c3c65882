import { describe, it, expect } from "vitest";
import { listUpcomingAssignments } from "../../src/tools/list-upcoming-assignments.js";
import { ListUpcomingAssignmentsSchema } from "../../src/tools/schemas.js";
import { findRequest, json, sessionWith } from "../helpers/fake-canvas.js";

const now = new Date("2026-10-19T12:00:00Z");

function setup() {
  return sessionWith({
    "/api/v1/users/self/courses": json([
      { id: 10, name: "Biology" },
      { id: 11, name: "History" },
      { id: 12, name: "Archived Seminar" },
    ]),
    "/api/v1/courses/10/assignments": json([
      {
        id: 101,
        name: "Lab Report",
        due_at: "2026-10-22T23:59:00Z",
        points_possible: 20,
        submission_types: ["online_upload"],
        html_url: "https://canvas.test/courses/10/assignments/101",
        submission: { id: 1, workflow_state: "unsubmitted", submitted_at: null },
      },
      {
        id: 102,
        name: "Pre-lab Quiz",
        due_at: "2026-10-20T23:59:00Z",
        points_possible: 5,
        submission_types: ["online_quiz"],
        html_url: "https://canvas.test/courses/10/assignments/102",
        submission: { id: 2, workflow_state: "submitted", submitted_at: "2026-10-18T10:00:00Z" },
      },
      { id: 103, name: "Participation", due_at: null },
      { id: 104, name: "Final Project", due_at: "2026-11-30T23:59:00Z" },
      { id: 105, name: "Reading Check", due_at: "2026-10-18T23:59:00Z" },
    ]),
    "/api/v1/courses/11/assignments": json([
      {
        id: 201,
        name: "Source Analysis",
        due_at: "2026-10-20T09:00:00Z",
        points_possible: 10,
        submission_types: ["online_text_entry"],
        html_url: "https://canvas.test/courses/11/assignments/201",
        submission: { id: 3, workflow_state: "graded", submitted_at: null },
      },
      {
        id: 202,
        name: "Essay Outline",
        due_at: "2026-10-26T12:00:00Z",
        points_possible: 15,
        submission_types: ["online_upload"],
        html_url: "https://canvas.test/courses/11/assignments/202",
      },
    ]),
    "/api/v1/courses/12/assignments": json({ status: "unauthorized" }, { status: 403 }),
  });
}

describe("listUpcomingAssignments", () => {
  it("should list unsubmitted work due in the window, soonest first", async () => {
    const { session } = setup();

    const upcoming = await listUpcomingAssignments(
      session,
      ListUpcomingAssignmentsSchema.parse({}),
      now
    );

    expect(upcoming).toEqual([
      {
        course_id: 11,
        course_name: "History",
        id: 201,
        name: "Source Analysis",
        due_at: "2026-10-20T09:00:00Z",
        points_possible: 10,
        submission_types: ["online_text_entry"],
        html_url: "https://canvas.test/courses/11/assignments/201",
      },
      {
        course_id: 10,
        course_name: "Biology",
        id: 101,
        name: "Lab Report",
        due_at: "2026-10-22T23:59:00Z",
        points_possible: 20,
        submission_types: ["online_upload"],
        html_url: "https://canvas.test/courses/10/assignments/101",
      },
      {
        course_id: 11,
        course_name: "History",
        id: 202,
        name: "Essay Outline",
        due_at: "2026-10-26T12:00:00Z",
        points_possible: 15,
        submission_types: ["online_upload"],
        html_url: "https://canvas.test/courses/11/assignments/202",
      },
    ]);
  });

  it("should ask Canvas for active courses and embedded submissions", async () => {
    const { session, requests } = setup();

    await listUpcomingAssignments(session, ListUpcomingAssignmentsSchema.parse({}), now);

    expect(findRequest(requests, "/api/v1/users/self/courses").searchParams.get("enrollment_state")).toBe("active");
    expect(findRequest(requests, "/api/v1/courses/10/assignments").searchParams.getAll("include[]")).toEqual([
      "submission",
    ]);
  });

  it("should keep submitted work when only_unsubmitted is false", async () => {
    const { session, requests } = setup();

    const upcoming = await listUpcomingAssignments(
      session,
      ListUpcomingAssignmentsSchema.parse({ only_unsubmitted: false }),
      now
    );

    expect(upcoming.map((a) => a.id)).toEqual([201, 102, 101, 202]);
    expect(findRequest(requests, "/api/v1/courses/10/assignments").searchParams.has("include[]")).toBe(false);
  });

  it("should treat days below 1 as one day", async () => {
    const { session } = setup();

    const upcoming = await listUpcomingAssignments(
      session,
      ListUpcomingAssignmentsSchema.parse({ days: 0 }),
      now
    );

    expect(upcoming.map((a) => a.id)).toEqual([201]);
  });

  it("should skip courses whose assignments cannot be listed", async () => {
    const { session, requests } = setup();

    const upcoming = await listUpcomingAssignments(
      session,
      ListUpcomingAssignmentsSchema.parse({ days: 30 }),
      now
    );

    expect(upcoming.map((a) => a.id)).toEqual([201, 101, 202]);
    expect(requests.map((r) => r.pathname)).toContain("/api/v1/courses/12/assignments");
  });

  it("should fail when the course list itself cannot be fetched", async () => {
    const { session } = sessionWith({});

    await expect(
      listUpcomingAssignments(session, ListUpcomingAssignmentsSchema.parse({}), now)
    ).rejects.toMatchObject({ status: 404 });
  });
});
