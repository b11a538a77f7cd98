/**
 * src/scheduler/timerScheduler.ts
 * WHAT: Durable deferred-event scheduler. Public API for scheduling plus the single
 *       background loop that fires due timers.
 * WHY: Reminders, temp punishments and the like must survive restarts. The store is
 *      authoritative; the loop only ever waits on the earliest pending row.
 * FLOWS:
 *  - start() → freeze registry → loop: drain due → find earliest → sleep until it (or a wake) → repeat
 *  - schedule()/cancel()/reschedule() → write store → wake the loop if the earliest timer changed
 *  - store failure in the loop → recordSchedulerRun(false) → exponential backoff → retry
 *  - stop() → wake the loop → finish the in-flight timer → state "stopped"
 * DOCS:
 *  - setTimeout limits: https://nodejs.org/api/timers.html#settimeoutcallback-delay-args
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { backoffDelayMs } from "../lib/retry.js";
import { describeError } from "../lib/errors.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";
import { validateEpochSeconds, validateNonEmpty, validateSnowflake, ValidationError } from "../lib/validation.js";
import type { TimerStore } from "../store/timerStore.js";
import { HandlerRegistry } from "../features/timers/registry.js";
import { dispatchTimer, type DispatchOptions } from "../features/timers/dispatch.js";
import { WakeSignal } from "./wakeSignal.js";
import type {
  DeadLetter,
  DrainSummary,
  NewTimer,
  SchedulerState,
  Timer,
  TimerHandler,
} from "../features/timers/types.js";

export const SCHEDULER_NAME = "timers";

export interface TimerSchedulerOptions extends Partial<DispatchOptions> {
  /** Longest single sleep. Far-future timers are re-checked at least this often. */
  maxSleepMs?: number;
  /** Backoff bounds when the store is unreachable */
  storeBackoffInitialMs?: number;
  storeBackoffMaxMs?: number;
  /** Wall clock in milliseconds. Read on every pass. */
  clock?: () => number;
}

const DEFAULTS = {
  maxAttempts: 3,
  retryInitialDelayMs: 1000,
  retryMaxDelayMs: 30_000,
  handlerTimeoutMs: 10_000,
  maxSleepMs: 3_600_000,
  storeBackoffInitialMs: 1000,
  storeBackoffMaxMs: 60_000,
};

export class TimerScheduler {
  readonly registry: HandlerRegistry;

  private readonly dispatchOptions: DispatchOptions;
  private readonly maxSleepMs: number;
  private readonly storeBackoffInitialMs: number;
  private readonly storeBackoffMaxMs: number;
  private readonly clock: () => number;

  private readonly wake = new WakeSignal();
  private state: SchedulerState = "idle";
  private stopping = false;
  private loopDone: Promise<void> | null = null;
  private pass: Promise<DrainSummary> | null = null;
  /** The timer the loop is currently sleeping towards, if any */
  private awaited: Timer | null = null;

  constructor(
    private readonly store: TimerStore,
    options: TimerSchedulerOptions = {},
    registry: HandlerRegistry = new HandlerRegistry()
  ) {
    this.registry = registry;
    this.dispatchOptions = {
      maxAttempts: options.maxAttempts ?? DEFAULTS.maxAttempts,
      retryInitialDelayMs: options.retryInitialDelayMs ?? DEFAULTS.retryInitialDelayMs,
      retryMaxDelayMs: options.retryMaxDelayMs ?? DEFAULTS.retryMaxDelayMs,
      handlerTimeoutMs: options.handlerTimeoutMs ?? DEFAULTS.handlerTimeoutMs,
    };
    this.maxSleepMs = options.maxSleepMs ?? DEFAULTS.maxSleepMs;
    this.storeBackoffInitialMs = options.storeBackoffInitialMs ?? DEFAULTS.storeBackoffInitialMs;
    this.storeBackoffMaxMs = options.storeBackoffMaxMs ?? DEFAULTS.storeBackoffMaxMs;
    this.clock = options.clock ?? (() => Date.now());
  }

  // ===== Handler registration =====

  /**
   * @throws ConfigurationError on duplicates or after start()
   */
  register(eventKind: string, handler: TimerHandler): void {
    this.registry.register(eventKind, handler);
    logger.debug({ eventKind }, "[timers] handler registered");
  }

  // ===== Mutations =====

  /**
   * Persist a deferred event. A past instant is accepted and fires on the next pass.
   *
   * @throws ValidationError on malformed input, PersistenceError if the store rejects it
   */
  schedule(input: NewTimer): Timer {
    validateSnowflake(input.guildId, "guildId");
    validateSnowflake(input.userId, "userId");
    if (input.channelId != null) validateSnowflake(input.channelId, "channelId");
    validateNonEmpty(input.eventKind, "eventKind");
    validateEpochSeconds(input.expiresAt, "expiresAt");

    const timer = this.store.create(input);
    logger.info(
      { timerId: timer.id, guildId: timer.guildId, eventKind: timer.eventKind, expiresAt: timer.expiresAt },
      "[timers] timer scheduled"
    );
    if (this.precedesAwaited(timer)) this.wake.notify();
    return timer;
  }

  /**
   * Idempotent. Returns false for unknown, fired, or already-cancelled ids.
   */
  cancel(id: number, guildId?: string): boolean {
    const removed = this.store.cancel(id, guildId);
    if (removed && this.awaited?.id === id) this.wake.notify();
    return removed;
  }

  /**
   * Move a pending timer to a new instant, keeping its id.
   *
   * @returns The updated timer, or null if it is no longer pending
   */
  reschedule(id: number, expiresAt: number, guildId?: string): Timer | null {
    validateEpochSeconds(expiresAt, "expiresAt");
    const timer = this.store.reschedule(id, expiresAt, guildId);
    if (!timer) return null;

    logger.info({ timerId: id, expiresAt, revision: timer.revision }, "[timers] timer rescheduled");
    if (this.awaited?.id === id || this.precedesAwaited(timer)) this.wake.notify();
    return timer;
  }

  /**
   * Push a pending timer `seconds` past now.
   */
  snooze(id: number, seconds: number, guildId?: string): Timer | null {
    if (!Number.isSafeInteger(seconds) || seconds <= 0) {
      throw new ValidationError("snooze duration must be a positive whole number of seconds", "seconds");
    }
    return this.reschedule(id, this.nowSeconds() + seconds, guildId);
  }

  updatePayload(id: number, payload: string | null, guildId?: string): Timer | null {
    return this.store.updatePayload(id, payload, guildId);
  }

  // ===== Queries =====

  get(id: number, guildId?: string): Timer | null {
    return this.store.get(id, guildId);
  }

  listForUser(guildId: string, userId: string, eventKind?: string): Timer[] {
    return this.store.listForUser(guildId, userId, eventKind);
  }

  countPending(guildId?: string): number {
    return this.store.countPending(guildId);
  }

  listDeadLetters(options: { guildId?: string; limit?: number } = {}): DeadLetter[] {
    return this.store.listDeadLetters(options);
  }

  /**
   * Give a dead letter another chance as a fresh pending timer.
   * Without an explicit instant it is due immediately.
   */
  requeueDeadLetter(deadLetterId: number, expiresAt?: number): Timer | null {
    const when = expiresAt ?? this.nowSeconds();
    validateEpochSeconds(when, "expiresAt");
    const timer = this.store.requeueDeadLetter(deadLetterId, when);
    if (timer) {
      logger.info({ deadLetterId, timerId: timer.id }, "[timers] dead letter requeued");
      if (this.precedesAwaited(timer)) this.wake.notify();
    }
    return timer;
  }

  getState(): SchedulerState {
    return this.state;
  }

  getAwaitedTimer(): Timer | null {
    return this.awaited;
  }

  // ===== Lifecycle =====

  /**
   * Idempotent. Freezes the handler registry; timers already past due fire on the first pass.
   */
  start(): void {
    if (this.loopDone) return;
    this.registry.freeze();
    this.stopping = false;
    logger.info(
      { kinds: this.registry.kinds(), pending: this.store.countPending() },
      "[timers] scheduler started"
    );
    this.loopDone = this.loop();
  }

  /**
   * Wakes the loop and waits for the in-flight timer (if any) to settle.
   * Timers still pending stay in the store for the next process.
   */
  async stop(): Promise<void> {
    if (!this.loopDone) {
      this.state = "stopped";
      return;
    }
    this.stopping = true;
    this.wake.notify();
    await this.loopDone;
    this.loopDone = null;
    this.stopping = false;
    logger.info("[timers] scheduler stopped");
  }

  /**
   * Fire everything due right now, in (expires_at, id) order.
   * Overlapping calls share one pass.
   *
   * @throws PersistenceError when the due scan itself fails
   */
  runDuePass(): Promise<DrainSummary> {
    if (!this.pass) {
      this.pass = this.drain().finally(() => {
        this.pass = null;
      });
    }
    return this.pass;
  }

  private async drain(): Promise<DrainSummary> {
    const due = this.store.dueBefore(this.nowSeconds());
    const summary: DrainSummary = {
      due: due.length,
      fired: 0,
      rearmed: 0,
      deadLettered: 0,
      dropped: 0,
      storeFailed: 0,
    };

    for (const timer of due) {
      if (this.stopping) break;
      const outcome = await dispatchTimer(timer, {
        ...this.dispatchOptions,
        store: this.store,
        registry: this.registry,
      });
      switch (outcome.status) {
        case "fired":
          summary.fired++;
          break;
        case "rearmed":
          summary.rearmed++;
          break;
        case "dead_lettered":
          summary.deadLettered++;
          break;
        case "dropped":
          summary.dropped++;
          break;
        case "store_failed":
          summary.storeFailed++;
          break;
      }
    }

    if (summary.due > 0) {
      logger.debug({ ...summary }, "[timers] due pass complete");
    }
    return summary;
  }

  private async loop(): Promise<void> {
    let consecutiveFailures = 0;

    while (!this.stopping) {
      try {
        this.state = "dispatching";
        const summary = await this.runDuePass();
        if (this.stopping) break;

        // Completion writes failing means the store is in trouble; don't spin on the same rows
        if (summary.storeFailed > 0) {
          consecutiveFailures++;
          recordSchedulerRun(SCHEDULER_NAME, false);
          await this.backoff(consecutiveFailures, "completion writes failed");
          continue;
        }

        consecutiveFailures = 0;
        recordSchedulerRun(SCHEDULER_NAME, true);

        const next = this.store.earliestPending();
        this.awaited = next;
        const delayMs = next ? next.expiresAt * 1000 - this.clock() : this.maxSleepMs;
        if (delayMs <= 0) continue;

        // Nothing pending: idle until a submission wakes us (or the periodic re-check)
        this.state = next ? "waiting" : "idle";
        await this.wake.wait(Math.min(delayMs, this.maxSleepMs));
        this.awaited = null;
      } catch (err) {
        consecutiveFailures++;
        recordSchedulerRun(SCHEDULER_NAME, false);
        this.awaited = null;
        await this.backoff(consecutiveFailures, describeError(err));
      }
    }

    this.awaited = null;
    this.state = "stopped";
  }

  private async backoff(consecutiveFailures: number, cause: string): Promise<void> {
    const delayMs = backoffDelayMs(consecutiveFailures, {
      initialDelayMs: this.storeBackoffInitialMs,
      maxDelayMs: this.storeBackoffMaxMs,
    });
    logger.warn({ consecutiveFailures, delayMs, cause }, "[timers] store unavailable, backing off");
    this.state = "backoff";
    await this.wake.wait(delayMs);
  }

  /*
   * Only a timer that would fire before the one being awaited needs a wake.
   * While dispatching or backing off the loop re-reads the store anyway.
   */
  private precedesAwaited(timer: Timer): boolean {
    if (!this.loopDone) return false;
    if (this.state === "idle") return true;
    if (this.state !== "waiting" || !this.awaited) return false;
    if (timer.expiresAt !== this.awaited.expiresAt) return timer.expiresAt < this.awaited.expiresAt;
    return timer.id < this.awaited.id;
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }
}
