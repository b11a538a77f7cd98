/**
 * src/features/timers/types.ts
 * WHAT: Shared types for the deferred-event (timer) subsystem.
 * WHY: Store, registry, dispatch and scheduler all speak these shapes.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * A pending deferred event. `expiresAt` is absolute Unix seconds.
 * `revision` starts at 0 and is bumped by every reschedule; dispatch uses it to
 * tell "the row I fired" from "the row the handler re-armed".
 */
export interface Timer {
  id: number;
  guildId: string;
  userId: string;
  channelId: string | null;
  eventKind: string;
  expiresAt: number;
  /** Opaque payload handed to the handler verbatim (reminder JSON, punishment metadata) */
  payload: string | null;
  createdAt: number;
  revision: number;
}

/*
 * Mirrors the timers table. If you change the table, change this.
 */
export interface TimerRow {
  id: number;
  guild_id: string;
  user_id: string;
  channel_id: string | null;
  event_kind: string;
  expires_at: number;
  payload: string | null;
  created_at: number;
  revision: number;
}

export interface NewTimer {
  guildId: string;
  userId: string;
  channelId?: string | null;
  eventKind: string;
  expiresAt: number;
  payload?: string | null;
}

/**
 * Success is settling normally. Failure is throwing: HandlerTransientError to be
 * retried, HandlerPermanentError to be dead-lettered at once.
 * Handlers must be idempotent; delivery is at-least-once.
 */
export type TimerHandler = (timer: Timer) => Promise<void> | void;

export type DeadLetterReason = "no_handler" | "permanent_failure" | "retries_exhausted";

export interface DeadLetter {
  id: number;
  timerId: number;
  guildId: string;
  userId: string;
  channelId: string | null;
  eventKind: string;
  expiresAt: number;
  payload: string | null;
  reason: DeadLetterReason;
  attempts: number;
  lastError: string | null;
  deadAt: number;
}

export interface DeadLetterRow {
  id: number;
  timer_id: number;
  guild_id: string;
  user_id: string;
  channel_id: string | null;
  event_kind: string;
  expires_at: number;
  payload: string | null;
  reason: DeadLetterReason;
  attempts: number;
  last_error: string | null;
  dead_at: number;
}

export type DispatchOutcome =
  | { status: "fired"; attempts: number }
  /** Handler succeeded and rescheduled its own timer; the row stays pending */
  | { status: "rearmed"; attempts: number }
  | { status: "dead_lettered"; reason: DeadLetterReason; attempts: number }
  /** Handler failed but the row was cancelled or its guild removed meanwhile; nothing left to record */
  | { status: "dropped"; attempts: number }
  /** Completion or dead-lettering could not be written; the row fires again later */
  | { status: "store_failed"; attempts: number };

export interface DrainSummary {
  due: number;
  fired: number;
  rearmed: number;
  deadLettered: number;
  dropped: number;
  storeFailed: number;
}

export type SchedulerState = "idle" | "waiting" | "dispatching" | "backoff" | "stopped";
