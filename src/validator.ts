// CHANGE: Check extension identifiers against per-platform syntax.
// WHY: No network call is made for an identifier that fails these patterns.

import type { ExtensionIdentifier, Platform } from "./types.js";

const CHROME_ID = /^[a-z0-9]{32}$/;
const FIREFOX_GUID = /^\{[a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12}\}$/;
const FIREFOX_SLUG = /^[a-zA-Z0-9]$|^[a-zA-Z0-9][a-zA-Z0-9_.@-]*[a-zA-Z0-9]$/;

/**
 * Check an identifier against the platform's accepted syntax. No side effects.
 *
 * @param id - Raw identifier as typed by the user.
 * @param platform - Platform whose syntax applies.
 * @returns True when the whole string matches.
 */
export function validateExtensionId(id: string, platform: Platform): boolean {
  if (platform === "chrome") {
    return CHROME_ID.test(id);
  }
  return FIREFOX_GUID.test(id) || FIREFOX_SLUG.test(id);
}

/**
 * Hint appended to validation failures.
 */
export function describeIdFormat(platform: Platform): string {
  return platform === "chrome"
    ? "Must be 32 lowercase alphanumeric characters."
    : "Must be a GUID (e.g. {xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx}) or slug (alphanumeric with hyphens, underscores, dots or @).";
}

/**
 * Tag a validated identifier with its platform.
 *
 * @returns The tagged identifier, or undefined when the syntax check fails.
 */
export function toExtensionIdentifier(id: string, platform: Platform): ExtensionIdentifier | undefined {
  return validateExtensionId(id, platform) ? { value: id, platform } : undefined;
}
