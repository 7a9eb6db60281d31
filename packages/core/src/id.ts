// Content-addressable identifiers

import { createHash } from "node:crypto";

/**
 * SHA-256 of the UTF-8 bytes of `text`, as URL-safe base64 (padded, 44 chars).
 * Used for tool deduplication keys and plan ids.
 */
export function generateId(text: string): string {
  return createHash("sha256")
    .update(text, "utf8")
    .digest("base64")
    .replace(/\+/g, "-")
    .replace(/\//g, "_");
}
