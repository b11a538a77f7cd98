/**
 * tests/features/timers/dispatch.test.ts
 * WHAT: Firing rules for a single due timer.
 * WHY: Success, retry, dead-letter and re-arm all meet here; the loop only counts outcomes.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../../src/lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { dispatchTimer, type DispatchDeps } from "../../../src/features/timers/dispatch.js";
import { HandlerRegistry } from "../../../src/features/timers/registry.js";
import { TimerStore } from "../../../src/store/timerStore.js";
import {
  HandlerPermanentError,
  HandlerTransientError,
  PersistenceError,
} from "../../../src/lib/errors.js";
import type { Timer, TimerHandler } from "../../../src/features/timers/types.js";
import { deregisterGuild } from "../../../src/store/guildStore.js";
import type { Db } from "../../../src/db/db.js";
import { GUILD_A, T0, USER_1, createTestDb } from "../../utils/testDb.js";

describe("dispatchTimer", () => {
  let db: Db;
  let store: TimerStore;
  let registry: HandlerRegistry;
  let timer: Timer;

  function deps(overrides: Partial<DispatchDeps> = {}): DispatchDeps {
    return {
      store,
      registry,
      maxAttempts: 3,
      retryInitialDelayMs: 1,
      retryMaxDelayMs: 2,
      handlerTimeoutMs: 0,
      ...overrides,
    };
  }

  function handle(handler: TimerHandler): void {
    registry.register("reminder", handler);
  }

  beforeEach(() => {
    db = createTestDb();
    store = new TimerStore(db, () => T0);
    registry = new HandlerRegistry();
    timer = store.create({ guildId: GUILD_A, userId: USER_1, eventKind: "reminder", expiresAt: T0 });
  });

  it("invokes the handler once and deletes the timer", async () => {
    const handler = vi.fn();
    handle(handler);

    const outcome = await dispatchTimer(timer, deps());

    expect(outcome).toEqual({ status: "fired", attempts: 1 });
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(timer);
    expect(store.get(timer.id)).toBeNull();
  });

  it("dead-letters a timer with no handler without invoking anything", async () => {
    const outcome = await dispatchTimer(timer, deps());

    expect(outcome).toEqual({ status: "dead_lettered", reason: "no_handler", attempts: 0 });
    expect(store.get(timer.id)).toBeNull();
    expect(store.listDeadLetters()[0]).toMatchObject({
      timerId: timer.id,
      reason: "no_handler",
      attempts: 0,
      lastError: 'ConfigurationError: no handler registered for "reminder"',
    });
  });

  it("retries transient failures and fires on a later attempt", async () => {
    const handler = vi
      .fn<TimerHandler>()
      .mockRejectedValueOnce(new HandlerTransientError("503"))
      .mockRejectedValueOnce(new HandlerTransientError("503"))
      .mockResolvedValueOnce(undefined);
    handle(handler);

    const outcome = await dispatchTimer(timer, deps());

    expect(outcome).toEqual({ status: "fired", attempts: 3 });
    expect(store.get(timer.id)).toBeNull();
  });

  it("dead-letters after the attempt ceiling", async () => {
    const handler = vi.fn<TimerHandler>().mockRejectedValue(new HandlerTransientError("503"));
    handle(handler);

    const outcome = await dispatchTimer(timer, deps());

    expect(outcome).toEqual({ status: "dead_lettered", reason: "retries_exhausted", attempts: 3 });
    expect(handler).toHaveBeenCalledTimes(3);
    expect(store.listDeadLetters()[0]).toMatchObject({
      reason: "retries_exhausted",
      attempts: 3,
      lastError: "HandlerTransientError: 503",
    });
  });

  it("dead-letters a permanent failure on the first attempt", async () => {
    const handler = vi.fn<TimerHandler>().mockRejectedValue(new HandlerPermanentError("user left"));
    handle(handler);

    const outcome = await dispatchTimer(timer, deps());

    expect(outcome).toEqual({ status: "dead_lettered", reason: "permanent_failure", attempts: 1 });
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("treats a synchronous programming error as permanent", async () => {
    handle(() => {
      throw new TypeError("cannot read properties of undefined");
    });

    const outcome = await dispatchTimer(timer, deps());

    expect(outcome).toEqual({ status: "dead_lettered", reason: "permanent_failure", attempts: 1 });
  });

  it("keeps a timer the handler re-armed", async () => {
    handle((fired) => {
      store.reschedule(fired.id, T0 + 3600);
    });

    const outcome = await dispatchTimer(timer, deps());

    expect(outcome).toEqual({ status: "rearmed", attempts: 1 });
    expect(store.get(timer.id)).toMatchObject({ expiresAt: T0 + 3600, revision: 1 });
  });

  it("counts a handler that cancels its own timer as fired", async () => {
    handle((fired) => {
      store.cancel(fired.id);
    });

    const outcome = await dispatchTimer(timer, deps());

    expect(outcome).toEqual({ status: "fired", attempts: 1 });
  });

  it("keeps the new instant when a handler re-arms its timer and then fails", async () => {
    handle((fired) => {
      store.reschedule(fired.id, T0 + 600);
      throw new HandlerPermanentError("send failed after snooze");
    });

    const outcome = await dispatchTimer(timer, deps());

    expect(outcome).toEqual({ status: "rearmed", attempts: 1 });
    expect(store.get(timer.id)).toMatchObject({ expiresAt: T0 + 600, revision: 1 });
    expect(store.listDeadLetters()).toEqual([]);
  });

  it("drops a failed timer whose guild was removed while the handler ran", async () => {
    handle(() => {
      deregisterGuild(db, GUILD_A);
      throw new HandlerPermanentError("guild gone");
    });

    const outcome = await dispatchTimer(timer, deps());

    expect(outcome).toEqual({ status: "dropped", attempts: 1 });
    expect(store.listDeadLetters()).toEqual([]);
  });

  it("drops a failed timer that was cancelled while the handler ran", async () => {
    handle((fired) => {
      store.cancel(fired.id);
      throw new HandlerPermanentError("too late");
    });

    const outcome = await dispatchTimer(timer, deps());

    expect(outcome).toEqual({ status: "dropped", attempts: 1 });
    expect(store.listDeadLetters()).toEqual([]);
  });

  it("times out a handler that never settles and retries it", async () => {
    const handler = vi.fn<TimerHandler>(() => new Promise<void>(() => {}));
    handle(handler);

    const outcome = await dispatchTimer(timer, deps({ maxAttempts: 2, handlerTimeoutMs: 10 }));

    expect(outcome).toEqual({ status: "dead_lettered", reason: "retries_exhausted", attempts: 2 });
    expect(store.listDeadLetters()[0]?.lastError).toBe("HandlerTransientError: handler timed out after 10ms");
  });

  it("leaves the timer pending when completion cannot be written", async () => {
    handle(() => {});
    vi.spyOn(store, "complete").mockImplementation(() => {
      throw new PersistenceError("complete failed: disk I/O error");
    });

    const outcome = await dispatchTimer(timer, deps());

    expect(outcome).toEqual({ status: "store_failed", attempts: 1 });
    expect(store.get(timer.id)).not.toBeNull();
  });

  it("leaves the timer pending when the dead letter cannot be written", async () => {
    handle(() => {
      throw new HandlerPermanentError("nope");
    });
    vi.spyOn(store, "deadLetter").mockImplementation(() => {
      throw new PersistenceError("deadLetter failed: disk I/O error");
    });

    const outcome = await dispatchTimer(timer, deps());

    expect(outcome).toEqual({ status: "store_failed", attempts: 1 });
    expect(store.get(timer.id)).not.toBeNull();
  });
});
