/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { CanvasApiClientOptions, QueryParams } from "./types.js";
import { ApiError, RateLimitError, NetworkError } from "./errors.js";
import { nextPageUrl } from "./pagination.js";
import { ConfigError } from "../utils/errors.js";
import { log } from "../utils/logger.js";

const API_PREFIX = "/api/v1";

/**
 * Read-only client for the Canvas LMS REST API (`/api/v1`).
 *
 * - Bearer token auth from a personal access token
 * - HTTPS-only base URL; a trailing `/api/v1` is tolerated and stripped
 * - Link-header pagination for list endpoints, restricted to the base origin
 * - Raw response passthrough (no transformation, no caching, no retries)
 */
export class CanvasApiClient {
  private readonly baseUrl: string;
  private readonly origin: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly perPage: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: CanvasApiClientOptions) {
    let parsed: URL;
    try {
      parsed = new URL(options.baseUrl);
    } catch {
      throw new ConfigError(`CANVAS_API_URL is not a valid URL: ${options.baseUrl}`);
    }
    if (parsed.protocol !== "https:") {
      throw new ConfigError(
        "CANVAS_API_URL must use HTTPS. The access token is never sent over plain HTTP.",
      );
    }

    this.baseUrl = options.baseUrl
      .trim()
      .replace(/\/+$/, "")
      .replace(/\/api\/v1$/, "");
    this.origin = parsed.origin;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.perPage = options.perPage ?? 100;
    this.fetchImpl = options.fetch ?? fetch;

    log("DEBUG", `CanvasApiClient initialized for ${this.baseUrl}`);
  }

  /**
   * GET a single Canvas resource.
   *
   * @param path - path below /api/v1, e.g. "/users/self"
   * @throws ApiError on HTTP errors, RateLimitError when throttled
   * @throws NetworkError on fetch failures and unparseable bodies
   */
  async get<T>(path: string, params?: QueryParams): Promise<T> {
    const { data } = await this.request<T>(this.buildUrl(path, params), path);
    return data;
  }

  /**
   * GET every page of a Canvas list endpoint and concatenate them.
   * `per_page` is added unless the caller sets it.
   */
  async getPaginated<T>(path: string, params?: QueryParams): Promise<T[]> {
    const items: T[] = [];
    let url: string | null = this.buildUrl(path, { per_page: this.perPage, ...params });
    let page = 0;

    while (url) {
      page++;
      const { data, link } = await this.request<T[]>(url, path);
      if (!Array.isArray(data)) {
        throw new NetworkError(`Expected a JSON array from ${path}`);
      }
      items.push(...data);

      const next = nextPageUrl(link);
      if (next && !this.isSameOrigin(next)) {
        log("WARN", `Not following pagination link to another host from ${path}`);
        break;
      }
      url = next;
    }

    log("DEBUG", `Fetched ${items.length} items from ${path} in ${page} page(s)`);
    return items;
  }

  private async request<T>(
    url: string,
    endpoint: string,
  ): Promise<{ data: T; link: string | null }> {
    let response: Response;
    try {
      log("DEBUG", `Requesting GET ${url}`);
      response = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          Authorization: `Bearer ${this.token}`,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(
        `Request to ${endpoint} failed: ${message}`,
        error instanceof Error ? error : undefined,
      );
    }

    if (!response.ok) {
      const body = await response.text();
      throw this.toHttpError(response, endpoint, body);
    }

    const text = await response.text();
    try {
      const data: T = JSON.parse(text);
      return { data, link: response.headers.get("Link") };
    } catch (error) {
      throw new NetworkError(
        `Invalid JSON from ${endpoint}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private toHttpError(response: Response, endpoint: string, body: string): ApiError {
    const { status } = response;
    const throttled =
      status === 429 ||
      (status === 403 &&
        (body.includes("Rate Limit Exceeded") ||
          response.headers.get("X-Rate-Limit-Remaining") === "0"));

    if (throttled) {
      const retryAfter = parseInt(response.headers.get("Retry-After") ?? "", 10);
      return new RateLimitError(
        status,
        endpoint,
        Number.isNaN(retryAfter) ? undefined : retryAfter,
      );
    }

    switch (status) {
      case 401:
        return new ApiError(401, endpoint, "Invalid or expired access token", body);
      case 403:
        return new ApiError(403, endpoint, "Forbidden", body);
      case 404:
        return new ApiError(404, endpoint, "Not found", body);
      default:
        return new ApiError(status, endpoint, response.statusText || "Request failed", body);
    }
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${API_PREFIX}${path}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      if (value === undefined) continue;
      if (typeof value === "object") {
        for (const item of value) url.searchParams.append(`${key}[]`, item);
      } else {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private isSameOrigin(url: string): boolean {
    try {
      return new URL(url).origin === this.origin;
    } catch {
      return false;
    }
  }
}
