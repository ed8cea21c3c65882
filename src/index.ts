#!/usr/bin/env node
/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import dotenv from "dotenv";
import { enableStdoutGuard, log, setLogLevel } from "./utils/logger.js";
import { loadConfig, missingEnv } from "./utils/config.js";
import { createServer } from "./server.js";

// Must run before anything can write to stdout
enableStdoutGuard();

process.on("unhandledRejection", (reason) => {
  log("ERROR", "Unhandled promise rejection", reason);
});

async function main(): Promise<void> {
  try {
    dotenv.config({ quiet: true });

    const config = loadConfig();
    setLogLevel(config.logLevel);
    log("DEBUG", "Configuration loaded", {
      timeoutMs: config.timeoutMs,
      perPage: config.perPage,
    });

    const missing = missingEnv(config);
    if (missing.length > 0) {
      log(
        "WARN",
        `Missing ${missing.join(", ")}. Only the health tool will work until they are set.`
      );
    }

    const server = createServer(config);
    const transport = new StdioServerTransport();
    await server.connect(transport);

    log("INFO", "Canvas student MCP server running on stdio (9 tools registered)");
  } catch (error) {
    log("ERROR", "MCP server failed to start", error);
    process.exit(1);
  }
}

process.on("SIGINT", () => {
  log("INFO", "Shutting down MCP server");
  process.exit(0);
});
process.on("SIGTERM", () => {
  log("INFO", "Shutting down MCP server");
  process.exit(0);
});

void main();
