/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

/**
 * Parse an RFC 8288 Link header into a rel -> URL map.
 *
 * Canvas paginates list endpoints this way:
 *   <https://x/api/v1/courses?page=2&per_page=10>; rel="next",
 *   <https://x/api/v1/courses?page=1&per_page=10>; rel="first"
 */
export function parseLinkHeader(header: string | null): Map<string, string> {
  const links = new Map<string, string>();
  if (!header) return links;

  for (const part of header.split(",")) {
    const match = /<([^>]+)>\s*;(.*)/.exec(part.trim());
    if (!match) continue;
    const [, url, params] = match;
    const rel = /rel="?([^";]+)"?/.exec(params);
    if (!rel) continue;
    // A single link may carry several space-separated rels
    for (const name of rel[1].trim().split(/\s+/)) {
      links.set(name, url);
    }
  }

  return links;
}

export function nextPageUrl(header: string | null): string | null {
  return parseLinkHeader(header).get("next") ?? null;
}
