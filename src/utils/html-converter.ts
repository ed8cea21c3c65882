/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import TurndownService from "turndown";
import { log } from "./logger.js";

const turndownService = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
});

/**
 * Convert Canvas rich-content HTML (assignment descriptions, announcement
 * bodies) to Markdown. Empty input yields "". If turndown throws, the raw
 * HTML is returned unchanged.
 */
export function htmlToMarkdown(html: string | null | undefined): string {
  if (!html || html.trim().length === 0) {
    return "";
  }

  try {
    return turndownService.turndown(html);
  } catch (error) {
    log("WARN", "HTML to markdown conversion failed, returning raw HTML", error);
    return html;
  }
}
