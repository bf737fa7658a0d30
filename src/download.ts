// CHANGE: Per-identifier pipeline: resolve, fetch, normalize.
// WHY: Chrome bytes pass through the CRX normalizer; Firefox bytes are written as served.

import { NET, RETRY, USER_AGENTS } from "./config.js";
import { crxToZip } from "./crx.js";
import { HttpStatusError, NotFoundError } from "./errors.js";
import { debug, info } from "./logger.js";
import { resolveChromeVersion, resolveFirefoxDownloadUrl } from "./resolver.js";
import type { DownloadRequest, NormalizedArchive, ProgressListener, RawPackage } from "./types.js";
import { fetchBytes } from "./utils/http.js";
import { type RetryPolicy, retryTransportErrors } from "./utils/retry.js";
import { buildCrxUrl } from "./utils/url.js";

function downloadRetryPolicy(label: string): RetryPolicy {
  return {
    attempts: RETRY.ATTEMPTS,
    baseDelayMs: RETRY.DOWNLOAD_BASE_DELAY_MS,
    label,
    classify: retryTransportErrors
  };
}

async function fetchChromePackage(
  extensionId: string,
  chromeVersion: string,
  onProgress?: ProgressListener
): Promise<RawPackage & { readonly url: string }> {
  const url = buildCrxUrl(extensionId, chromeVersion);
  try {
    const response = await fetchBytes(url, {
      headers: { "User-Agent": USER_AGENTS.chrome },
      timeout: NET.TIMEOUT,
      retry: downloadRetryPolicy(`CRX download for ${extensionId}`),
      onProgress
    });
    return { platform: "chrome", bytes: response.data, url };
  } catch (error) {
    // The update service answers 204 for unknown ids.
    if (error instanceof HttpStatusError && (error.status === 404 || error.status === 204)) {
      throw new NotFoundError(`Extension not found or invalid ID: ${extensionId}`, { cause: error });
    }
    throw error;
  }
}

async function fetchFirefoxPackage(url: string, onProgress?: ProgressListener): Promise<RawPackage> {
  const response = await fetchBytes(url, {
    headers: { "User-Agent": USER_AGENTS.firefox },
    timeout: NET.DOWNLOAD_TIMEOUT,
    retry: downloadRetryPolicy("XPI download"),
    onProgress
  });
  return { platform: "firefox", bytes: response.data };
}

/**
 * Download one extension and return it as a plain archive.
 *
 * @param request - Validated identifier, platform and optional version.
 * @param onProgress - Observes byte progress of the package download only.
 */
export async function downloadExtension(
  request: DownloadRequest,
  onProgress?: ProgressListener
): Promise<NormalizedArchive> {
  if (request.platform === "chrome") {
    const chromeVersion = await resolveChromeVersion(request.version);
    info(`Downloading CRX3 for ${request.identifier} (version ${chromeVersion})...`);
    const raw = await fetchChromePackage(request.identifier, chromeVersion, onProgress);
    return { platform: "chrome", bytes: crxToZip(raw.bytes), sourceUrl: raw.url };
  }

  info(
    `Fetching Firefox addon info for ${request.identifier}${request.version ? ` (version ${request.version})` : " (latest)"}...`
  );
  const url = await resolveFirefoxDownloadUrl(request.identifier, request.version);
  debug(`Resolved XPI URL: ${url}`);
  info("Downloading XPI...");
  const raw = await fetchFirefoxPackage(url, onProgress);
  return { platform: "firefox", bytes: raw.bytes, sourceUrl: url };
}
