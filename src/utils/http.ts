// CHANGE: Provide retrying HTTP helpers for binary packages and JSON metadata.
// WHY: Only transport failures (and 429 where the caller allows it) are retried; statuses surface as typed errors.

import axios, { type AxiosInstance, type AxiosProgressEvent, type AxiosResponse } from "axios";
import { NET } from "../config.js";
import { HttpStatusError, RateLimitedError, TransportError } from "../errors.js";
import { debug } from "../logger.js";
import type { JsonValue, ProgressListener } from "../types.js";
import { type RetryPolicy, withRetry } from "./retry.js";

const httpClient: AxiosInstance = axios.create({
  timeout: NET.TIMEOUT,
  maxRedirects: 5,
  validateStatus: () => true
});

/**
 * @property headers - Request headers; callers always send a browser user agent.
 * @property timeout - Per-request socket timeout in milliseconds.
 * @property retry - Attempt ceiling, backoff and classification for this call site.
 */
export interface RequestOptions {
  readonly headers: Readonly<Record<string, string>>;
  readonly timeout?: number;
  readonly retry: RetryPolicy;
}

export interface BinaryRequestOptions extends RequestOptions {
  readonly onProgress?: ProgressListener;
}

export interface HttpResult<T> {
  readonly data: T;
  readonly headers: Record<string, string>;
  readonly status: number;
}

const noProgress: ProgressListener = () => undefined;

function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    } else if (typeof value === "number") {
      out[key.toLowerCase()] = String(value);
    }
  }
  return out;
}

async function send<T>(url: string, request: () => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
  let response: AxiosResponse<T>;
  try {
    response = await request();
  } catch (error) {
    if (axios.isAxiosError(error) && error.response === undefined) {
      throw new TransportError(url, `${error.code ?? "network error"}: ${error.message}`, { cause: error });
    }
    throw error;
  }
  debug(`GET ${url} -> ${response.status}`);
  if (response.status === 429) {
    throw new RateLimitedError(url);
  }
  if (response.status !== 200) {
    throw new HttpStatusError(response.status, url);
  }
  return response;
}

/**
 * Download a binary payload into a single buffer.
 *
 * @param url - Target URL; redirects are followed.
 * @param options - Headers, timeout, retry policy and optional progress listener.
 * @returns Buffer with the full body and normalised response headers.
 */
export async function fetchBytes(url: string, options: BinaryRequestOptions): Promise<HttpResult<Buffer>> {
  const onProgress = options.onProgress ?? noProgress;
  const response = await withRetry(
    () =>
      send(url, () =>
        httpClient.get<ArrayBuffer>(url, {
          responseType: "arraybuffer",
          headers: { ...options.headers },
          timeout: options.timeout,
          onDownloadProgress: (event: AxiosProgressEvent) => onProgress(event.loaded, event.total)
        })
      ),
    options.retry
  );
  const data = Buffer.from(response.data);
  debug(`Received ${data.byteLength} bytes from ${url}`);
  return {
    data,
    headers: normaliseHeaders(response.headers),
    status: response.status
  };
}

/**
 * Perform GET request expecting JSON payload.
 *
 * @param url - Target URL.
 * @param options - Headers, timeout and retry policy.
 * @returns Parsed body; callers validate its shape.
 */
export async function getJson(url: string, options: RequestOptions): Promise<HttpResult<JsonValue>> {
  const response = await withRetry(
    () =>
      send(url, () =>
        httpClient.get<JsonValue>(url, {
          responseType: "json",
          headers: { Accept: "application/json", ...options.headers },
          timeout: options.timeout
        })
      ),
    options.retry
  );
  return {
    data: response.data,
    headers: normaliseHeaders(response.headers),
    status: response.status
  };
}

export { httpClient };
