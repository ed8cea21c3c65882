/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { CanvasApiClient } from "./client.js";
import type { CanvasUser } from "./types.js";
import type { AppConfig } from "../types/index.js";
import { missingEnv } from "../utils/config.js";
import { ConfigError } from "../utils/errors.js";
import { log } from "../utils/logger.js";

/**
 * Per-process Canvas state shared by all tools: the API client, built on
 * first use so the server can start without credentials, and the profile of
 * the token owner, fetched once.
 */
export class CanvasSession {
  private apiClient: CanvasApiClient | null = null;
  private userPromise: Promise<CanvasUser> | null = null;

  constructor(
    private readonly config: AppConfig,
    private readonly fetchImpl?: typeof fetch,
  ) {}

  /**
   * @throws ConfigError if CANVAS_API_URL or CANVAS_API_TOKEN is missing
   */
  get client(): CanvasApiClient {
    if (this.apiClient) return this.apiClient;

    const { apiUrl, apiToken } = this.config;
    if (!apiUrl || !apiToken) {
      const missing = missingEnv(this.config);
      throw new ConfigError(
        `Missing required environment variable(s): ${missing.join(", ")}`,
        missing,
      );
    }

    this.apiClient = new CanvasApiClient({
      baseUrl: apiUrl,
      token: apiToken,
      timeoutMs: this.config.timeoutMs,
      perPage: this.config.perPage,
      fetch: this.fetchImpl,
    });
    return this.apiClient;
  }

  async currentUser(): Promise<CanvasUser> {
    if (!this.userPromise) {
      this.userPromise = this.client.get<CanvasUser>("/users/self").then(
        (user) => {
          log("DEBUG", `Resolved current Canvas user ${user.id}`);
          return user;
        },
        (error: unknown) => {
          // Let the next call try again
          this.userPromise = null;
          throw error;
        },
      );
    }
    return this.userPromise;
  }
}
