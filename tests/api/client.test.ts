import { describe, it, expect } from "vitest";
import { CanvasApiClient } from "../../src/api/client.js";
import { ApiError, NetworkError, RateLimitError } from "../../src/api/errors.js";
import { ConfigError } from "../../src/utils/errors.js";
import { fakeCanvas, json, jsonResponse } from "../helpers/fake-canvas.js";

function clientFor(canvas: ReturnType<typeof fakeCanvas>, baseUrl = "https://canvas.test") {
  return new CanvasApiClient({
    baseUrl,
    token: "test-token",
    timeoutMs: 1000,
    perPage: 50,
    fetch: canvas.fetch,
  });
}

describe("CanvasApiClient", () => {
  describe("constructor", () => {
    it("should reject plain HTTP base URLs", () => {
      const canvas = fakeCanvas({});
      expect(() => clientFor(canvas, "http://canvas.test")).toThrow(ConfigError);
    });

    it("should reject unparseable base URLs", () => {
      const canvas = fakeCanvas({});
      expect(() => clientFor(canvas, "canvas.test")).toThrow(
        "[CMCP-1001] CANVAS_API_URL is not a valid URL: canvas.test"
      );
    });

    it("should strip a trailing /api/v1 and slash from the base URL", async () => {
      const canvas = fakeCanvas({ "/api/v1/users/self": json({ id: 1 }) });
      const client = clientFor(canvas, "https://canvas.test/api/v1/");

      await client.get("/users/self");

      expect(canvas.requests[0].href).toBe("https://canvas.test/api/v1/users/self");
    });
  });

  describe("get", () => {
    it("should send the bearer token and return the parsed body", async () => {
      const canvas = fakeCanvas({ "/api/v1/users/self": json({ id: 42, name: "Test Student" }) });
      const client = clientFor(canvas);

      const user = await client.get<{ id: number; name: string }>("/users/self");

      expect(user).toEqual({ id: 42, name: "Test Student" });
      const init = canvas.fetch.mock.calls[0][1];
      expect(init?.method).toBe("GET");
      expect(init?.headers).toEqual({
        Authorization: "Bearer test-token",
        Accept: "application/json",
      });
    });

    it("should encode arrays as repeated key[] params and drop undefined", async () => {
      const canvas = fakeCanvas({ "/api/v1/courses/10/enrollments": json([]) });
      const client = clientFor(canvas);

      await client.get("/courses/10/enrollments", {
        user_id: 42,
        state: ["active", "completed"],
        search_term: undefined,
        only_announcements: true,
      });

      const url = canvas.requests[0];
      expect(url.searchParams.get("user_id")).toBe("42");
      expect(url.searchParams.getAll("state[]")).toEqual(["active", "completed"]);
      expect(url.searchParams.get("only_announcements")).toBe("true");
      expect(url.searchParams.has("search_term")).toBe(false);
      expect(url.searchParams.has("per_page")).toBe(false);
    });

    it("should throw ApiError with the status for 404", async () => {
      const canvas = fakeCanvas({});
      const client = clientFor(canvas);

      const error = await client.get("/courses/999").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).not.toBeInstanceOf(RateLimitError);
      expect(error).toMatchObject({ status: 404, endpoint: "/courses/999" });
    });

    it("should treat 403 Rate Limit Exceeded as throttling", async () => {
      const canvas = fakeCanvas({
        "/api/v1/users/self": () =>
          new Response("403 Forbidden (Rate Limit Exceeded)", { status: 403 }),
      });
      const client = clientFor(canvas);

      await expect(client.get("/users/self")).rejects.toBeInstanceOf(RateLimitError);
    });

    it("should treat 403 with an exhausted quota header as throttling", async () => {
      const canvas = fakeCanvas({
        "/api/v1/users/self": json({}, { status: 403, headers: { "X-Rate-Limit-Remaining": "0" } }),
      });
      const client = clientFor(canvas);

      await expect(client.get("/users/self")).rejects.toBeInstanceOf(RateLimitError);
    });

    it("should read Retry-After on 429", async () => {
      const canvas = fakeCanvas({
        "/api/v1/users/self": json({}, { status: 429, headers: { "Retry-After": "30" } }),
      });
      const client = clientFor(canvas);

      await expect(client.get("/users/self")).rejects.toMatchObject({
        status: 429,
        retryAfter: 30,
      });
    });

    it("should keep a plain 403 as ApiError", async () => {
      const canvas = fakeCanvas({
        "/api/v1/courses/5": json({ status: "unauthorized" }, { status: 403 }),
      });
      const client = clientFor(canvas);

      const error = await client.get("/courses/5").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).not.toBeInstanceOf(RateLimitError);
      expect(error).toMatchObject({ status: 403, responseBody: '{"status":"unauthorized"}' });
    });

    it("should wrap fetch failures in NetworkError", async () => {
      const canvas = fakeCanvas({
        "/api/v1/users/self": () => {
          throw new TypeError("fetch failed");
        },
      });
      const client = clientFor(canvas);

      await expect(client.get("/users/self")).rejects.toThrow(
        "[CMCP-2002] Network error: Request to /users/self failed: fetch failed"
      );
    });

    it("should wrap invalid JSON bodies in NetworkError", async () => {
      const canvas = fakeCanvas({
        "/api/v1/users/self": () => new Response("<html>maintenance</html>", { status: 200 }),
      });
      const client = clientFor(canvas);

      await expect(client.get("/users/self")).rejects.toBeInstanceOf(NetworkError);
    });
  });

  describe("getPaginated", () => {
    it("should follow Link rel=next until the last page", async () => {
      const canvas = fakeCanvas({
        "/api/v1/users/self/courses": (url) => {
          const page = url.searchParams.get("page") ?? "1";
          if (page === "1") {
            return jsonResponse([{ id: 1 }, { id: 2 }], {
              headers: {
                Link: '<https://canvas.test/api/v1/users/self/courses?page=2&per_page=50>; rel="next"',
              },
            });
          }
          return jsonResponse([{ id: 3 }]);
        },
      });
      const client = clientFor(canvas);

      const courses = await client.getPaginated<{ id: number }>("/users/self/courses", {
        enrollment_state: "active",
      });

      expect(courses.map((c) => c.id)).toEqual([1, 2, 3]);
      expect(canvas.requests).toHaveLength(2);
      expect(canvas.requests[0].searchParams.get("per_page")).toBe("50");
      expect(canvas.requests[0].searchParams.get("enrollment_state")).toBe("active");
      expect(canvas.requests[1].searchParams.get("page")).toBe("2");
    });

    it("should not follow a next link to another host", async () => {
      const canvas = fakeCanvas({
        "/api/v1/users/self/courses": json([{ id: 1 }], {
          headers: { Link: '<https://elsewhere.test/api/v1/users/self/courses?page=2>; rel="next"' },
        }),
      });
      const client = clientFor(canvas);

      const courses = await client.getPaginated<{ id: number }>("/users/self/courses");

      expect(courses).toEqual([{ id: 1 }]);
      expect(canvas.fetch).toHaveBeenCalledTimes(1);
    });

    it("should let the caller override per_page", async () => {
      const canvas = fakeCanvas({ "/api/v1/courses/1/assignments": json([]) });
      const client = clientFor(canvas);

      await client.getPaginated("/courses/1/assignments", { per_page: 10 });

      expect(canvas.requests[0].searchParams.get("per_page")).toBe("10");
    });

    it("should reject a non-array page", async () => {
      const canvas = fakeCanvas({ "/api/v1/courses/1/assignments": json({ id: 1 }) });
      const client = clientFor(canvas);

      await expect(client.getPaginated("/courses/1/assignments")).rejects.toThrow(
        "[CMCP-2002] Network error: Expected a JSON array from /courses/1/assignments"
      );
    });
  });
});
