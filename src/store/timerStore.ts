/**
 * src/store/timerStore.ts
 * WHAT: Storage layer for pending timers and their dead letters.
 * WHY: The store is the single source of truth for the scheduler; nothing in memory is authoritative.
 * FLOWS:
 *  - create(input) → Timer (store-assigned id)
 *  - earliestPending() / dueBefore(instant) → what the scheduler waits on and drains
 *  - complete(timer) → delete after a successful firing (revision-guarded)
 *  - reschedule(id, expiresAt) → atomic single-row UPDATE, same id, revision + 1
 *  - deadLetter(timer, info) → move to timer_dead_letter in one transaction (same revision guard as complete)
 *  - listDeadLetters() / requeueDeadLetter() → operator diagnosis
 * DOCS:
 *  - better-sqlite3 transactions: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md#transactionfunction---function
 *  - SQLite RETURNING: https://sqlite.org/lang_returning.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Db } from "../db/db.js";
import { logger } from "../lib/logger.js";
import { PersistenceError, classifyError, isConstraintViolation } from "../lib/errors.js";
import { nowUtc } from "../lib/time.js";
import type {
  DeadLetter,
  DeadLetterReason,
  DeadLetterRow,
  NewTimer,
  Timer,
  TimerRow,
} from "../features/timers/types.js";

export function timerFromRow(row: TimerRow): Timer {
  return {
    id: row.id,
    guildId: row.guild_id,
    userId: row.user_id,
    channelId: row.channel_id,
    eventKind: row.event_kind,
    expiresAt: row.expires_at,
    payload: row.payload,
    createdAt: row.created_at,
    revision: row.revision,
  };
}

function deadLetterFromRow(row: DeadLetterRow): DeadLetter {
  return {
    id: row.id,
    timerId: row.timer_id,
    guildId: row.guild_id,
    userId: row.user_id,
    channelId: row.channel_id,
    eventKind: row.event_kind,
    expiresAt: row.expires_at,
    payload: row.payload,
    reason: row.reason,
    attempts: row.attempts,
    lastError: row.last_error,
    deadAt: row.dead_at,
  };
}

export interface DeadLetterInfo {
  reason: DeadLetterReason;
  attempts: number;
  lastError?: string | null;
}

/*
 * Optional guild scoping uses `(? IS NULL OR guild_id = ?)` so each operation
 * needs one statement instead of two. The guild id is bound twice.
 */
type GuildScope = [string | null, string | null];

function scope(guildId: string | undefined): GuildScope {
  const value = guildId ?? null;
  return [value, value];
}

export class TimerStore {
  private readonly insertStmt;
  private readonly getStmt;
  private readonly deleteStmt;
  private readonly dueStmt;
  private readonly earliestStmt;
  private readonly completeStmt;
  private readonly rescheduleStmt;
  private readonly updatePayloadStmt;
  private readonly listForUserStmt;
  private readonly countStmt;
  private readonly insertDeadLetterStmt;
  private readonly listDeadLettersStmt;
  private readonly getDeadLetterStmt;
  private readonly deleteDeadLetterStmt;
  private readonly moveToDeadLetter;
  private readonly moveFromDeadLetter;

  constructor(
    private readonly db: Db,
    private readonly now: () => number = nowUtc
  ) {
    this.insertStmt = db.prepare<
      [string, string, string | null, string, number, string | null, number],
      TimerRow
    >(
      `INSERT INTO timers (guild_id, user_id, channel_id, event_kind, expires_at, payload, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       RETURNING *`
    );

    this.getStmt = db.prepare<[number, ...GuildScope], TimerRow>(
      `SELECT * FROM timers WHERE id = ? AND (? IS NULL OR guild_id = ?)`
    );

    this.deleteStmt = db.prepare<[number, ...GuildScope]>(
      `DELETE FROM timers WHERE id = ? AND (? IS NULL OR guild_id = ?)`
    );

    // Tie-break on id: equal instants fire in insertion order
    this.dueStmt = db.prepare<[number], TimerRow>(
      `SELECT * FROM timers WHERE expires_at <= ? ORDER BY expires_at ASC, id ASC`
    );

    this.earliestStmt = db.prepare<[], TimerRow>(
      `SELECT * FROM timers ORDER BY expires_at ASC, id ASC LIMIT 1`
    );

    // Only deletes the instance that was fired. If the handler rescheduled
    // (revision bumped) the row survives as the re-armed timer.
    this.completeStmt = db.prepare<[number, number]>(
      `DELETE FROM timers WHERE id = ? AND revision = ?`
    );

    this.rescheduleStmt = db.prepare<[number, number, ...GuildScope], TimerRow>(
      `UPDATE timers SET expires_at = ?, revision = revision + 1
       WHERE id = ? AND (? IS NULL OR guild_id = ?)
       RETURNING *`
    );

    this.updatePayloadStmt = db.prepare<[string | null, number, ...GuildScope], TimerRow>(
      `UPDATE timers SET payload = ?
       WHERE id = ? AND (? IS NULL OR guild_id = ?)
       RETURNING *`
    );

    this.listForUserStmt = db.prepare<[string, string, string | null, string | null], TimerRow>(
      `SELECT * FROM timers
       WHERE guild_id = ? AND user_id = ? AND (? IS NULL OR event_kind = ?)
       ORDER BY expires_at ASC, id ASC`
    );

    this.countStmt = db.prepare<GuildScope, { count: number }>(
      `SELECT COUNT(*) AS count FROM timers WHERE (? IS NULL OR guild_id = ?)`
    );

    this.insertDeadLetterStmt = db.prepare<
      [
        number,
        string,
        string,
        string | null,
        string,
        number,
        string | null,
        DeadLetterReason,
        number,
        string | null,
        number,
      ],
      DeadLetterRow
    >(
      `INSERT INTO timer_dead_letter
         (timer_id, guild_id, user_id, channel_id, event_kind, expires_at, payload, reason, attempts, last_error, dead_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       RETURNING *`
    );

    this.listDeadLettersStmt = db.prepare<[...GuildScope, number], DeadLetterRow>(
      `SELECT * FROM timer_dead_letter
       WHERE (? IS NULL OR guild_id = ?)
       ORDER BY dead_at DESC, id DESC
       LIMIT ?`
    );

    this.getDeadLetterStmt = db.prepare<[number], DeadLetterRow>(
      `SELECT * FROM timer_dead_letter WHERE id = ?`
    );

    this.deleteDeadLetterStmt = db.prepare<[number]>(`DELETE FROM timer_dead_letter WHERE id = ?`);

    /*
     * Pending row first: a timer re-armed, cancelled or cascaded away while its
     * handler ran is not this firing's to dead-letter, and no row is written.
     */
    this.moveToDeadLetter = db.transaction((timer: Timer, info: DeadLetterInfo): DeadLetter | null => {
      if (this.completeStmt.run(timer.id, timer.revision).changes === 0) return null;
      const row = this.insertDeadLetterStmt.get(
        timer.id,
        timer.guildId,
        timer.userId,
        timer.channelId,
        timer.eventKind,
        timer.expiresAt,
        timer.payload,
        info.reason,
        info.attempts,
        info.lastError ?? null,
        this.now()
      );
      if (!row) throw new PersistenceError("dead-letter insert returned no row");
      return deadLetterFromRow(row);
    });

    this.moveFromDeadLetter = db.transaction((deadLetterId: number, expiresAt: number): Timer | null => {
      const dead = this.getDeadLetterStmt.get(deadLetterId);
      if (!dead) return null;
      const row = this.insertStmt.get(
        dead.guild_id,
        dead.user_id,
        dead.channel_id,
        dead.event_kind,
        expiresAt,
        dead.payload,
        this.now()
      );
      if (!row) throw new PersistenceError("timer insert returned no row");
      this.deleteDeadLetterStmt.run(deadLetterId);
      return timerFromRow(row);
    });
  }

  /**
   * Persist a new pending timer.
   *
   * @throws PersistenceError when the guild is not registered or the store fails
   */
  create(input: NewTimer): Timer {
    return this.guard("create", { guildId: input.guildId, eventKind: input.eventKind }, () => {
      const row = this.insertStmt.get(
        input.guildId,
        input.userId,
        input.channelId ?? null,
        input.eventKind,
        input.expiresAt,
        input.payload ?? null,
        this.now()
      );
      if (!row) throw new PersistenceError("timer insert returned no row");
      return timerFromRow(row);
    });
  }

  get(id: number, guildId?: string): Timer | null {
    return this.guard("get", { timerId: id, guildId }, () => {
      const row = this.getStmt.get(id, ...scope(guildId));
      return row ? timerFromRow(row) : null;
    });
  }

  /**
   * Idempotent: an unknown, already-fired or already-cancelled id returns false.
   */
  cancel(id: number, guildId?: string): boolean {
    const removed = this.delete(id, guildId);
    if (removed) {
      logger.debug({ timerId: id, guildId }, "[timerStore] timer cancelled");
    }
    return removed;
  }

  /** Unconditional removal by identity. */
  delete(id: number, guildId?: string): boolean {
    return this.guard("delete", { timerId: id, guildId }, () => {
      return this.deleteStmt.run(id, ...scope(guildId)).changes > 0;
    });
  }

  /**
   * Every timer with expires_at <= instant, ascending by (expires_at, id).
   * One SELECT, so the result is a consistent snapshot.
   */
  dueBefore(instant: number): Timer[] {
    return this.guard("dueBefore", { instant }, () => this.dueStmt.all(instant).map(timerFromRow));
  }

  earliestPending(): Timer | null {
    return this.guard("earliestPending", {}, () => {
      const row = this.earliestStmt.get();
      return row ? timerFromRow(row) : null;
    });
  }

  /**
   * Remove a timer after its handler succeeded.
   *
   * @returns false when the row was rescheduled (or cancelled) after it was claimed
   */
  complete(timer: Timer): boolean {
    return this.guard("complete", { timerId: timer.id }, () => {
      return this.completeStmt.run(timer.id, timer.revision).changes > 0;
    });
  }

  /**
   * Atomically move a pending timer to a new instant. The id is kept; revision is bumped.
   *
   * @returns The updated timer, or null if it no longer exists
   */
  reschedule(id: number, expiresAt: number, guildId?: string): Timer | null {
    return this.guard("reschedule", { timerId: id, guildId, expiresAt }, () => {
      const row = this.rescheduleStmt.get(expiresAt, id, ...scope(guildId));
      return row ? timerFromRow(row) : null;
    });
  }

  /**
   * Replace the payload without touching the due time (e.g. reminder sign-ups).
   */
  updatePayload(id: number, payload: string | null, guildId?: string): Timer | null {
    return this.guard("updatePayload", { timerId: id, guildId }, () => {
      const row = this.updatePayloadStmt.get(payload, id, ...scope(guildId));
      return row ? timerFromRow(row) : null;
    });
  }

  listForUser(guildId: string, userId: string, eventKind?: string): Timer[] {
    return this.guard("listForUser", { guildId, userId }, () => {
      const kind = eventKind ?? null;
      return this.listForUserStmt.all(guildId, userId, kind, kind).map(timerFromRow);
    });
  }

  countPending(guildId?: string): number {
    return this.guard("countPending", { guildId }, () => this.countStmt.get(...scope(guildId))?.count ?? 0);
  }

  /**
   * A timer is never both pending and dead-lettered.
   *
   * @returns null when the row at this revision is already gone (re-armed, cancelled or its guild removed)
   */
  deadLetter(timer: Timer, info: DeadLetterInfo): DeadLetter | null {
    return this.guard("deadLetter", { timerId: timer.id, reason: info.reason }, () =>
      this.moveToDeadLetter(timer, info)
    );
  }

  /**
   * Newest first. Dead letters are never fired again unless requeued.
   */
  listDeadLetters(options: { guildId?: string; limit?: number } = {}): DeadLetter[] {
    const limit = options.limit ?? 50;
    return this.guard("listDeadLetters", { guildId: options.guildId }, () =>
      this.listDeadLettersStmt.all(...scope(options.guildId), limit).map(deadLetterFromRow)
    );
  }

  /**
   * Operator retry: the dead letter becomes a brand-new pending timer (new id).
   *
   * @returns The new timer, or null if the dead letter does not exist
   */
  requeueDeadLetter(deadLetterId: number, expiresAt: number): Timer | null {
    return this.guard("requeueDeadLetter", { deadLetterId, expiresAt }, () =>
      this.moveFromDeadLetter(deadLetterId, expiresAt)
    );
  }

  /*
   * Every store failure leaves here as a PersistenceError carrying the SQLite code.
   * Constraint violations are caller mistakes (unknown guild) and log at warn.
   */
  private guard<T>(op: string, context: Record<string, unknown>, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof PersistenceError) throw err;

      const classified = classifyError(err);
      const code = classified.kind === "db_error" ? classified.code : undefined;

      if (isConstraintViolation(classified)) {
        logger.warn({ err, op, ...context }, `[timerStore] ${op} rejected by constraint`);
        const message =
          code === "SQLITE_CONSTRAINT_FOREIGNKEY"
            ? `${op} failed: guild is not registered`
            : `${op} failed: ${classified.message}`;
        throw new PersistenceError(message, { code, cause: err });
      }

      logger.error({ err, op, ...context }, `[timerStore] ${op} failed`);
      throw new PersistenceError(`${op} failed: ${classified.message}`, { code, cause: err });
    }
  }
}
