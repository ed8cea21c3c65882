import { describe, it, expect } from "vitest";
import { loadConfig, missingEnv } from "../../src/utils/config.js";

describe("loadConfig", () => {
  it("should apply defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      apiUrl: undefined,
      apiToken: undefined,
      timeoutMs: 30_000,
      perPage: 100,
      logLevel: "INFO",
    });
  });

  it("should read and trim Canvas settings", () => {
    const config = loadConfig({
      CANVAS_API_URL: " https://canvas.test ",
      CANVAS_API_TOKEN: "test-token",
      CANVAS_TIMEOUT_MS: "5000",
      CANVAS_PER_PAGE: "25",
      CANVAS_LOG_LEVEL: "debug",
    });

    expect(config).toEqual({
      apiUrl: "https://canvas.test",
      apiToken: "test-token",
      timeoutMs: 5000,
      perPage: 25,
      logLevel: "DEBUG",
    });
  });

  it("should treat blank credentials as missing", () => {
    const config = loadConfig({ CANVAS_API_URL: "   ", CANVAS_API_TOKEN: "" });
    expect(config.apiUrl).toBeUndefined();
    expect(config.apiToken).toBeUndefined();
  });

  it("should fall back on invalid numbers and clamp per_page", () => {
    const config = loadConfig({
      CANVAS_TIMEOUT_MS: "soon",
      CANVAS_PER_PAGE: "500",
      CANVAS_LOG_LEVEL: "verbose",
    });

    expect(config.timeoutMs).toBe(30_000);
    expect(config.perPage).toBe(100);
    expect(config.logLevel).toBe("INFO");
  });

  it("should clamp per_page below 1 up to 1", () => {
    expect(loadConfig({ CANVAS_PER_PAGE: "0" }).perPage).toBe(1);
    expect(loadConfig({ CANVAS_PER_PAGE: "-5" }).perPage).toBe(1);
  });

  it("should fall back on a non-positive timeout", () => {
    expect(loadConfig({ CANVAS_TIMEOUT_MS: "-1" }).timeoutMs).toBe(30_000);
  });
});

describe("missingEnv", () => {
  it("should list missing variables in order", () => {
    expect(missingEnv(loadConfig({}))).toEqual(["CANVAS_API_URL", "CANVAS_API_TOKEN"]);
    expect(missingEnv(loadConfig({ CANVAS_API_TOKEN: "test-token" }))).toEqual(["CANVAS_API_URL"]);
    expect(
      missingEnv(loadConfig({ CANVAS_API_URL: "https://canvas.test", CANVAS_API_TOKEN: "test-token" }))
    ).toEqual([]);
  });
});
