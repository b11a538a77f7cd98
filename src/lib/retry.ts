/**
 * src/lib/retry.ts
 * WHAT: Retry utilities for handling transient failures
 * WHY: Handler hiccups (Discord 5xx, socket resets, a busy database) usually clear up
 *      on their own; the scheduler loop also backs off when the store is unreachable.
 * FLOWS:
 *  - withRetry(fn, options) → retries fn with exponential backoff
 *  - backoffDelayMs(attempt, options) → the un-jittered delay before retry #attempt
 * USAGE:
 *  import { withRetry } from "./retry.js";
 *  const result = await withRetry(() => deliver(), { maxAttempts: 3, label: "reminder" });
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { classifyError, isRecoverable } from "./errors.js";

/**
 * The defaults (3 attempts, 100ms initial, 2x backoff) give:
 * - Attempt 1: immediate
 * - Attempt 2: after ~100ms
 * - Attempt 3: after ~200ms
 *
 * Background work like timer dispatch should use longer delays
 * (initialDelayMs: 1000) since nobody is waiting on a reply.
 */
export interface RetryOptions {
  /** Maximum number of attempts, including the first (default: 3) */
  maxAttempts?: number;
  /** Delay before the first retry (default: 100) */
  initialDelayMs?: number;
  /** Upper bound on any single delay (default: 5000) */
  maxDelayMs?: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number;
  /** Decides whether a failure is worth another attempt */
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  /** Label for logging */
  label?: string;
}

/**
 * Delay before retry number `attempt` (1 = first retry), without jitter.
 *
 * @example
 * backoffDelayMs(1, { initialDelayMs: 1000 }) // 1000
 * backoffDelayMs(3, { initialDelayMs: 1000 }) // 4000
 */
export function backoffDelayMs(
  attempt: number,
  options: Pick<RetryOptions, "initialDelayMs" | "maxDelayMs" | "backoffMultiplier"> = {}
): number {
  const { initialDelayMs = 100, maxDelayMs = 5000, backoffMultiplier = 2 } = options;
  const exponent = Math.max(0, attempt - 1);
  return Math.min(initialDelayMs * backoffMultiplier ** exponent, maxDelayMs);
}

/**
 * Retry an async operation with exponential backoff
 *
 * @returns The result of fn() if successful
 * @throws The last error if all attempts fail or shouldRetry declines
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = 3,
    shouldRetry = (err: unknown) => isRecoverable(classifyError(err)),
    label = "operation",
  } = options;

  // Someone will eventually pass 0. Fail loudly instead of returning undefined.
  if (maxAttempts < 1) {
    throw new Error(`withRetry: maxAttempts must be >= 1, got ${maxAttempts}`);
  }

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      const classified = classifyError(err);

      if (attempt === maxAttempts || !shouldRetry(err, attempt)) {
        logger.warn(
          {
            evt: "retry_exhausted",
            label,
            attempt,
            maxAttempts,
            errorKind: classified.kind,
            errorMessage: classified.message,
          },
          `[retry] ${label} failed after ${attempt} attempts`
        );
        throw err;
      }

      // Jitter 0.5x..1.5x so a burst of failures doesn't retry in lockstep
      const jitteredDelayMs = Math.floor(backoffDelayMs(attempt, options) * (0.5 + Math.random()));

      logger.debug(
        {
          evt: "retry_attempt",
          label,
          attempt,
          maxAttempts,
          delayMs: jitteredDelayMs,
          errorKind: classified.kind,
        },
        `[retry] ${label} attempt ${attempt} failed, retrying in ${jitteredDelayMs}ms`
      );

      await sleep(jitteredDelayMs);
    }
  }

  // Unreachable; keeps control-flow analysis happy
  throw lastError;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
