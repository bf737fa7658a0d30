// CHANGE: Bounded retry with exponential backoff shared by every network call site.
// WHY: CRX, AMO and XPI requests follow the same attempt ceiling and schedule.

import { RateLimitedError, RetryExhaustedError, TransportError, describeError } from "../errors.js";
import { warn } from "../logger.js";

export type RetryDecision = { readonly retry: false } | { readonly retry: true; readonly delayMs?: number };

/**
 * @property attempts - Total tries including the first one.
 * @property baseDelayMs - Delay after the first failure; doubles after each further failure.
 * @property label - Operation name used in warnings and the final error.
 * @property classify - Decides whether an error is retryable; a `delayMs` overrides the backoff.
 * @property sleep - Delay implementation, replaced in tests.
 */
export interface RetryPolicy {
  readonly attempts: number;
  readonly baseDelayMs: number;
  readonly label: string;
  readonly classify: (error: unknown) => RetryDecision;
  readonly sleep?: (delayMs: number) => Promise<void>;
}

export function sleep(delayMs: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, delayMs);
  });
}

/**
 * Retry only when no HTTP response arrived.
 */
export function retryTransportErrors(error: unknown): RetryDecision {
  return error instanceof TransportError ? { retry: true } : { retry: false };
}

/**
 * Retry transport errors with backoff, and HTTP 429 after a flat delay.
 *
 * @param rateLimitDelayMs - Wait applied after a 429 instead of the backoff.
 */
export function retryTransportAndRateLimit(rateLimitDelayMs: number): (error: unknown) => RetryDecision {
  return error => {
    if (error instanceof RateLimitedError) {
      return { retry: true, delayMs: rateLimitDelayMs };
    }
    return retryTransportErrors(error);
  };
}

/**
 * Backoff before the attempt following failed attempt `attempt` (1-indexed).
 */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Run `operation` until it succeeds, a non-retryable error occurs, or attempts run out.
 *
 * @param operation - Receives the 1-indexed attempt number.
 * @param policy - Attempt ceiling, backoff and classification.
 * @throws The non-retryable error as is, or RetryExhaustedError wrapping the last error.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, policy: RetryPolicy): Promise<T> {
  const wait = policy.sleep ?? sleep;
  let lastError: unknown;
  for (let attempt = 1; attempt <= policy.attempts; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      const decision = policy.classify(error);
      if (!decision.retry) {
        throw error;
      }
      lastError = error;
      if (attempt === policy.attempts) {
        break;
      }
      const delay = decision.delayMs ?? backoffDelay(policy.baseDelayMs, attempt);
      warn(
        `${policy.label}: attempt ${attempt}/${policy.attempts} failed (${describeError(error)}), retrying in ${delay}ms`
      );
      await wait(delay);
    }
  }
  throw new RetryExhaustedError(policy.label, policy.attempts, lastError);
}
