/**
 * src/features/timers/dispatch.ts
 * WHAT: Fires one due timer: resolve handler → invoke with retries → complete or dead-letter.
 * WHY: Kept apart from the loop so the firing rules are testable without any clock.
 * FLOWS:
 *  - no handler            → dead-letter (no_handler), handler never invoked
 *  - success               → store.complete(); row stays only if the handler re-armed it
 *  - transient failure     → retry with backoff up to maxAttempts, then dead-letter (retries_exhausted)
 *  - permanent failure     → dead-letter at once (permanent_failure)
 *  - failure after re-arm  → rearmed; the new instant stands and nothing is dead-lettered
 *  - failure after cancel  → dropped
 *  - store write fails     → store_failed; the row is still pending and fires again (at-least-once)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { withRetry } from "../../lib/retry.js";
import { HandlerTransientError, describeError, isTransientHandlerFailure } from "../../lib/errors.js";
import type { TimerStore, DeadLetterInfo } from "../../store/timerStore.js";
import type { HandlerRegistry } from "./registry.js";
import type { DispatchOutcome, Timer, TimerHandler } from "./types.js";

export interface DispatchOptions {
  /** Total handler invocations per firing, including the first */
  maxAttempts: number;
  retryInitialDelayMs: number;
  retryMaxDelayMs: number;
  /**
   * A handler still running after this long counts as a transient failure. 0 disables.
   * Dispatch is sequential: a timer that keeps timing out holds up the rest of the pass
   * for up to maxAttempts times this, plus backoff.
   */
  handlerTimeoutMs: number;
}

export interface DispatchDeps extends DispatchOptions {
  store: TimerStore;
  registry: HandlerRegistry;
}

export async function dispatchTimer(timer: Timer, deps: DispatchDeps): Promise<DispatchOutcome> {
  const handler = deps.registry.resolve(timer.eventKind);
  if (!handler) {
    logger.error(
      { timerId: timer.id, guildId: timer.guildId, eventKind: timer.eventKind },
      "[timers] no handler registered for event kind"
    );
    return settleDeadLetter(timer, deps, {
      reason: "no_handler",
      attempts: 0,
      lastError: `ConfigurationError: no handler registered for "${timer.eventKind}"`,
    });
  }

  let attempts = 0;
  try {
    await withRetry(
      async () => {
        attempts++;
        await invokeWithTimeout(handler, timer, deps.handlerTimeoutMs);
      },
      {
        maxAttempts: deps.maxAttempts,
        initialDelayMs: deps.retryInitialDelayMs,
        maxDelayMs: deps.retryMaxDelayMs,
        shouldRetry: (err) => isTransientHandlerFailure(err),
        label: `timer:${timer.eventKind}`,
      }
    );
  } catch (err) {
    const reason = isTransientHandlerFailure(err) ? "retries_exhausted" : "permanent_failure";
    logger.error(
      { err, timerId: timer.id, guildId: timer.guildId, eventKind: timer.eventKind, attempts, reason },
      "[timers] handler failed, dead-lettering timer"
    );
    return settleDeadLetter(timer, deps, { reason, attempts, lastError: describeError(err) });
  }

  try {
    if (deps.store.complete(timer)) {
      logger.debug({ timerId: timer.id, eventKind: timer.eventKind, attempts }, "[timers] timer fired");
      return { status: "fired", attempts };
    }
    // Revision moved on: the handler (or someone) rescheduled it. Or it was cancelled mid-flight.
    if (deps.store.get(timer.id)) {
      logger.debug({ timerId: timer.id, eventKind: timer.eventKind }, "[timers] timer re-armed by handler");
      return { status: "rearmed", attempts };
    }
    return { status: "fired", attempts };
  } catch (err) {
    logger.warn(
      { err, timerId: timer.id, eventKind: timer.eventKind },
      "[timers] completion not persisted; timer will fire again"
    );
    return { status: "store_failed", attempts };
  }
}

function settleDeadLetter(timer: Timer, deps: DispatchDeps, info: DeadLetterInfo): DispatchOutcome {
  try {
    if (deps.store.deadLetter(timer, info)) {
      return { status: "dead_lettered", reason: info.reason, attempts: info.attempts };
    }
    if (deps.store.get(timer.id)) {
      logger.info(
        { timerId: timer.id, eventKind: timer.eventKind, reason: info.reason },
        "[timers] failed timer was re-armed meanwhile, keeping the new instant"
      );
      return { status: "rearmed", attempts: info.attempts };
    }
    logger.info(
      { timerId: timer.id, eventKind: timer.eventKind, reason: info.reason },
      "[timers] failed timer was removed meanwhile, nothing to dead-letter"
    );
    return { status: "dropped", attempts: info.attempts };
  } catch (err) {
    logger.warn(
      { err, timerId: timer.id, eventKind: timer.eventKind, reason: info.reason },
      "[timers] dead-letter not persisted; timer will fire again"
    );
    return { status: "store_failed", attempts: info.attempts };
  }
}

async function invokeWithTimeout(handler: TimerHandler, timer: Timer, timeoutMs: number): Promise<void> {
  // then() turns a synchronous throw into a rejection
  const run = Promise.resolve().then(() => handler(timer));
  if (timeoutMs <= 0) {
    await run;
    return;
  }

  let timeout: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timeout = setTimeout(() => {
      reject(new HandlerTransientError(`handler timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    await Promise.race([run, expired]);
  } finally {
    clearTimeout(timeout);
  }
}
