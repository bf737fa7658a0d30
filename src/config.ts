// CHANGE: Centralise endpoints, timeouts and retry constants with environment overrides.
// WHY: Every network call site reads its limits from one place.

import * as dotenv from "dotenv";

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const parsed = Number.parseInt(process.env[name] ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Upstream endpoints consumed by the resolver and fetcher.
 *
 * `CRX` placeholders: `{version}` (spoofed client version) and `{id}`.
 */
export const ENDPOINTS = {
  CRX:
    "https://clients2.google.com/service/update2/crx?response=redirect&prodversion={version}" +
    "&acceptformat=crx2,crx3&x=id%3D{id}%26installsource%3Dondemand%26uc",
  CHROME_VERSION_FEED: process.env.EXTFETCH_CHROME_VERSION_FEED ?? "https://omahaproxy.appspot.com/all.json",
  AMO_API: process.env.EXTFETCH_AMO_API ?? "https://addons.mozilla.org/api/v5/addons"
} as const;

export const USER_AGENTS = {
  chrome:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36",
  firefox: "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:109.0) Gecko/20100101 Firefox/115.0"
} as const;

export const CHROME = {
  DEFAULT_VERSION: "119.0.6045.0",
  FEED_OS: "win64",
  FEED_CHANNEL: "stable"
} as const;

export const AMO = {
  MAX_VERSION_PAGES: intFromEnv("EXTFETCH_AMO_MAX_PAGES", 20)
} as const;

/**
 * Network-level configuration, all values in milliseconds.
 */
export const NET = {
  TIMEOUT: intFromEnv("EXTFETCH_HTTP_TIMEOUT", 30000),
  DOWNLOAD_TIMEOUT: intFromEnv("EXTFETCH_DOWNLOAD_TIMEOUT", 60000),
  FEED_TIMEOUT: 10000
} as const;

/**
 * Retry settings shared by the CRX, AMO and XPI call sites.
 *
 * Invariant: `ATTEMPTS` counts the first try.
 */
export const RETRY = {
  ATTEMPTS: 3,
  DOWNLOAD_BASE_DELAY_MS: 1000,
  API_BASE_DELAY_MS: 2000,
  RATE_LIMIT_DELAY_MS: 5000
} as const;

export const OUTPUT = {
  EXTENSION: ".zip",
  PARTIAL_SUFFIX: ".part"
} as const;
