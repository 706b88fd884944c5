/**
 * Retry policy: exponential backoff with jitter, owned by the orchestrator.
 * Adapters never retry on their own.
 */

import { isTransportError } from "@procurement-scout/llm-client";

export interface BackoffConfig {
  /** First retry delay in milliseconds. Default: 1000 */
  initialDelayMs: number;
  /** Multiplier for subsequent delays. Default: 2.0 */
  backoffFactor: number;
  /** Cap on delay in milliseconds. Default: 30000 */
  maxDelayMs: number;
  /** Add random jitter to prevent thundering herd. Default: true */
  jitter: boolean;
}

export interface RetryPolicy {
  /** Upper bound on attempts per stage, first try included. Minimum 1. */
  maxRetries: number;
  backoff: BackoffConfig;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  initialDelayMs: 1000,
  backoffFactor: 2.0,
  maxDelayMs: 30_000,
  jitter: true,
};

/**
 * Calculate the delay for a given retry attempt.
 *
 * @param attempt - 1-indexed (first retry is attempt=1)
 * @param rng - Random number generator for testing (defaults to Math.random)
 */
export function delayForAttempt(
  attempt: number,
  config: BackoffConfig,
  rng: () => number = Math.random,
): number {
  let delay =
    config.initialDelayMs * Math.pow(config.backoffFactor, attempt - 1);
  delay = Math.min(delay, config.maxDelayMs);
  if (config.jitter) {
    // jitter range: 0.5 to 1.5
    delay = delay * (0.5 + rng());
  }
  return Math.min(Math.floor(delay), config.maxDelayMs);
}

/**
 * Delay before retrying after `error`. A backend's Retry-After wins over
 * the computed backoff when it is longer, still capped at `maxDelayMs`.
 */
export function retryDelay(
  error: unknown,
  attempt: number,
  config: BackoffConfig,
  rng: () => number = Math.random,
): number {
  const computed = delayForAttempt(attempt, config, rng);
  if (isTransportError(error) && error.retryAfter !== undefined) {
    return Math.min(Math.max(computed, error.retryAfter * 1000), config.maxDelayMs);
  }
  return computed;
}

/** Only transport errors flagged retryable are worth another attempt. */
export function shouldRetry(error: unknown): boolean {
  return isTransportError(error) && error.retryable;
}

/**
 * Sleep for the given number of milliseconds. Rejects with the signal's
 * reason as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
