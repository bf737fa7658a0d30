// CHANGE: Verify attempt ceiling, backoff schedule and rate-limit delay.
// WHY: Every network call site shares this policy.

import { afterEach, describe, expect, it, vi } from "vitest";
import { RateLimitedError, RetryExhaustedError, TransportError } from "../src/errors.js";
import {
  type RetryPolicy,
  backoffDelay,
  retryTransportAndRateLimit,
  retryTransportErrors,
  withRetry
} from "../src/utils/retry.js";

function policy(overrides: Partial<RetryPolicy> = {}) {
  const sleep = vi.fn<(delayMs: number) => Promise<void>>().mockResolvedValue(undefined);
  const retry: RetryPolicy = {
    attempts: 3,
    baseDelayMs: 1000,
    label: "test download",
    classify: retryTransportErrors,
    ...overrides,
    sleep
  };
  return { retry, sleep };
}

const transport = (message: string) => new TransportError("https://example.com/pkg", message);

describe("withRetry", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the result after two failures without surfacing an error", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(transport("ECONNRESET"))
      .mockRejectedValueOnce(transport("ETIMEDOUT"))
      .mockResolvedValueOnce("payload");
    const { retry, sleep } = policy();

    await expect(withRetry(operation, retry)).resolves.toBe("payload");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(operation.mock.calls.map(call => call[0])).toEqual([1, 2, 3]);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it("fails after exactly three attempts and names the underlying cause", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(transport("ECONNREFUSED"));
    const { retry, sleep } = policy();

    const outcome = withRetry(operation, retry);
    await expect(outcome).rejects.toBeInstanceOf(RetryExhaustedError);
    await expect(outcome).rejects.toThrow(
      "test download failed after 3 attempts: ECONNREFUSED (https://example.com/pkg)"
    );
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("keeps the last error as cause", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const last = transport("third");
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(transport("first"))
      .mockRejectedValueOnce(transport("second"))
      .mockRejectedValueOnce(last);

    const failure = await withRetry(operation, policy().retry).catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(RetryExhaustedError);
    expect(failure instanceof RetryExhaustedError ? failure.cause : undefined).toBe(last);
  });

  it("propagates non-retryable errors immediately", async () => {
    const fatal = new Error("HTTP 500");
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(fatal);
    const { retry, sleep } = policy();

    await expect(withRetry(operation, retry)).rejects.toBe(fatal);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("uses the classifier's fixed delay for rate limits", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new RateLimitedError("https://example.com/api"))
      .mockRejectedValueOnce(transport("ECONNRESET"))
      .mockResolvedValueOnce("ok");
    const { retry, sleep } = policy({ baseDelayMs: 2000, classify: retryTransportAndRateLimit(5000) });

    await expect(withRetry(operation, retry)).resolves.toBe("ok");
    expect(sleep.mock.calls).toEqual([[5000], [4000]]);
  });
});

describe("retry classifiers", () => {
  it("does not retry rate limits unless asked to", () => {
    expect(retryTransportErrors(new RateLimitedError("https://example.com"))).toEqual({ retry: false });
    expect(retryTransportAndRateLimit(5000)(new RateLimitedError("https://example.com"))).toEqual({
      retry: true,
      delayMs: 5000
    });
  });

  it("doubles the delay per failed attempt", () => {
    expect([1, 2, 3].map(attempt => backoffDelay(1000, attempt))).toEqual([1000, 2000, 4000]);
  });
});
