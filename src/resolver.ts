// CHANGE: Resolve Chrome client versions and Firefox download URLs.
// WHY: The Chrome version is advisory and may fall back; Firefox URLs are mandatory and fail hard.

import { AMO, CHROME, ENDPOINTS, NET, RETRY, USER_AGENTS } from "./config.js";
import {
  HttpStatusError,
  MalformedResponseError,
  NotFoundError,
  VersionNotFoundError,
  describeError
} from "./errors.js";
import { debug, warn } from "./logger.js";
import type { FirefoxVersion, JsonRecord, JsonValue } from "./types.js";
import { getJson } from "./utils/http.js";
import { type RetryPolicy, retryTransportAndRateLimit } from "./utils/retry.js";
import { amoAddonUrl, amoVersionsUrl } from "./utils/url.js";

function isRecord(value: JsonValue): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function amoRetryPolicy(label: string): RetryPolicy {
  return {
    attempts: RETRY.ATTEMPTS,
    baseDelayMs: RETRY.API_BASE_DELAY_MS,
    label,
    classify: retryTransportAndRateLimit(RETRY.RATE_LIMIT_DELAY_MS)
  };
}

const singleAttempt: RetryPolicy = {
  attempts: 1,
  baseDelayMs: 0,
  label: "Chrome version feed",
  classify: () => ({ retry: false })
};

async function getAmoJson(url: string, addonId: string, label: string): Promise<JsonValue> {
  try {
    const response = await getJson(url, {
      headers: { "User-Agent": USER_AGENTS.firefox },
      timeout: NET.TIMEOUT,
      retry: amoRetryPolicy(label)
    });
    return response.data;
  } catch (error) {
    if (error instanceof HttpStatusError && error.status === 404) {
      throw new NotFoundError(`Firefox addon not found or invalid ID: ${addonId}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Find the first stable win64 version in the Chrome version feed.
 *
 * @returns The version string, or undefined when the feed has no such entry.
 */
export function pickStableVersion(feed: JsonValue): string | undefined {
  if (!Array.isArray(feed)) {
    return undefined;
  }
  for (const entry of feed) {
    if (!isRecord(entry) || entry.os !== CHROME.FEED_OS || entry.channel !== CHROME.FEED_CHANNEL) {
      continue;
    }
    const versions = entry.versions;
    if (!Array.isArray(versions) || versions.length === 0) {
      continue;
    }
    const [first] = versions;
    if (isRecord(first) && typeof first.version === "string") {
      return first.version;
    }
  }
  return undefined;
}

/**
 * Chrome client version to claim in the CRX request.
 *
 * Lookup is best-effort: any failure yields `CHROME.DEFAULT_VERSION` with a warning.
 *
 * @param explicit - Version given on the command line; skips the lookup.
 */
export async function resolveChromeVersion(explicit?: string): Promise<string> {
  if (explicit) {
    return explicit;
  }
  try {
    const response = await getJson(ENDPOINTS.CHROME_VERSION_FEED, {
      headers: { "User-Agent": USER_AGENTS.chrome },
      timeout: NET.FEED_TIMEOUT,
      retry: singleAttempt
    });
    const version = pickStableVersion(response.data);
    if (version) {
      debug(`Latest stable Chrome version: ${version}`);
      return version;
    }
    warn(`Chrome version feed has no stable ${CHROME.FEED_OS} entry; using ${CHROME.DEFAULT_VERSION}.`);
  } catch (error) {
    warn(`Chrome version feed unavailable (${describeError(error)}); using ${CHROME.DEFAULT_VERSION}.`);
  }
  return CHROME.DEFAULT_VERSION;
}

/**
 * Extract `current_version.file.url` from an AMO addon record.
 *
 * @throws MalformedResponseError naming the first missing field.
 */
export function currentVersionUrl(addon: JsonValue): string {
  if (!isRecord(addon) || !isRecord(addon.current_version)) {
    throw new MalformedResponseError("No current version found for addon.");
  }
  const file = addon.current_version.file;
  if (!isRecord(file)) {
    throw new MalformedResponseError("No file found for addon.");
  }
  if (typeof file.url !== "string" || file.url.length === 0) {
    throw new MalformedResponseError("No download URL found.");
  }
  return file.url;
}

function toFirefoxVersion(entry: JsonValue): FirefoxVersion | undefined {
  if (!isRecord(entry) || typeof entry.version !== "string") {
    return undefined;
  }
  const url = isRecord(entry.file) && typeof entry.file.url === "string" ? entry.file.url : undefined;
  return { version: entry.version, url };
}

/**
 * Parse one page of the AMO versions listing.
 *
 * @returns Entries in API order and the next page URL, if any.
 */
export function parseVersionPage(page: JsonValue, url: string): { readonly versions: FirefoxVersion[]; readonly next?: string } {
  if (!isRecord(page) || !Array.isArray(page.results)) {
    throw new MalformedResponseError(`Malformed versions listing: ${url}`);
  }
  const versions = page.results
    .map(toFirefoxVersion)
    .filter((entry): entry is FirefoxVersion => entry !== undefined);
  return {
    versions,
    next: typeof page.next === "string" && page.next.length > 0 ? page.next : undefined
  };
}

async function scanVersions(
  addonId: string,
  stop: (entry: FirefoxVersion) => boolean
): Promise<{ readonly seen: FirefoxVersion[]; readonly match?: FirefoxVersion }> {
  const seen: FirefoxVersion[] = [];
  let url: string | undefined = amoVersionsUrl(addonId);
  for (let page = 1; url && page <= AMO.MAX_VERSION_PAGES; page += 1) {
    const parsed = parseVersionPage(await getAmoJson(url, addonId, "Firefox versions lookup"), url);
    for (const entry of parsed.versions) {
      seen.push(entry);
      if (stop(entry)) {
        return { seen, match: entry };
      }
    }
    url = parsed.next;
  }
  if (url) {
    debug(`Versions listing for ${addonId} truncated after ${AMO.MAX_VERSION_PAGES} pages.`);
  }
  return { seen };
}

/**
 * List published versions of a Firefox addon, newest first as the API returns them.
 */
export async function listFirefoxVersions(addonId: string): Promise<FirefoxVersion[]> {
  const { seen } = await scanVersions(addonId, () => false);
  return seen;
}

/**
 * Resolve the XPI download URL for a Firefox addon.
 *
 * @param addonId - GUID or slug.
 * @param version - Exact version string; latest when omitted.
 * @throws NotFoundError, MalformedResponseError or VersionNotFoundError.
 */
export async function resolveFirefoxDownloadUrl(addonId: string, version?: string): Promise<string> {
  if (!version) {
    const addon = await getAmoJson(amoAddonUrl(addonId), addonId, "Firefox addon lookup");
    return currentVersionUrl(addon);
  }
  const { match } = await scanVersions(addonId, entry => entry.version === version);
  if (!match?.url) {
    throw new VersionNotFoundError(addonId, version);
  }
  return match.url;
}
