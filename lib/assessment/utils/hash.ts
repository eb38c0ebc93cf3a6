/**
 * Hashing Utilities
 */

import { createHash } from "crypto";

/**
 * Compute SHA256 hash of a string.
 */
export function sha256(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

/**
 * Fingerprint of a page used to tell whether an interaction changed it.
 * Combines the URL with a hash of the markup.
 */
export function pageFingerprint(url: string, html: string): string {
  return `${url}#${sha256(html)}`;
}
