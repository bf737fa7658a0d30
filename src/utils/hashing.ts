// CHANGE: SHA-256 helper for written archives.
// WHY: Digests let a saved archive be compared against a later download.

import { createHash } from "crypto";

/**
 * Compute SHA-256 digest of an archive, logged next to each saved file.
 *
 * @returns Hexadecimal digest.
 */
export function sha256(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}
