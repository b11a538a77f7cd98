/**
 * src/db/ensure.ts
 * WHAT: On-start schema self-heal for guild_config, timers and timer_dead_letter.
 * WHY: The bot runs on existing data files without migration tooling; every statement is idempotent.
 * FLOWS:
 *  - CREATE TABLE IF NOT EXISTS → ensure indexes, all inside one transaction
 * DOCS:
 *  - SQLite foreign keys: https://sqlite.org/foreignkeys.html
 *
 * NOTE: Small, synchronous queries only. No awaits; better-sqlite3 is sync.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { Db } from "./db.js";
import { logger } from "../lib/logger.js";

/**
 * guild_config is the tenant root. Every guild-scoped table references it with
 * ON DELETE CASCADE so deregistering a guild leaves nothing behind.
 */
export function ensureGuildSchema(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS guild_config (
      guild_id TEXT PRIMARY KEY,
      registered_at INTEGER NOT NULL DEFAULT (strftime('%s','now'))
    )
  `);
}

/**
 * timers holds pending rows only; fired and cancelled rows are deleted.
 * AUTOINCREMENT (not plain rowid) so ids are never reused after a delete.
 */
export function ensureTimerSchema(db: Db): void {
  ensureGuildSchema(db);

  const apply = db.transaction(() => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS timers (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        guild_id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        channel_id TEXT,
        event_kind TEXT NOT NULL,
        expires_at INTEGER NOT NULL,
        payload TEXT,
        created_at INTEGER NOT NULL DEFAULT (strftime('%s','now')),
        revision INTEGER NOT NULL DEFAULT 0,
        FOREIGN KEY (guild_id) REFERENCES guild_config(guild_id) ON DELETE CASCADE
      )
    `);

    // (expires_at, id) serves both earliest-pending (LIMIT 1) and the due scan with its tie-break
    db.exec(`CREATE INDEX IF NOT EXISTS idx_timers_expires ON timers(expires_at, id)`);
    db.exec(`CREATE INDEX IF NOT EXISTS idx_timers_guild_user ON timers(guild_id, user_id)`);

    db.exec(`
      CREATE TABLE IF NOT EXISTS timer_dead_letter (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timer_id INTEGER NOT NULL,
        guild_id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        channel_id TEXT,
        event_kind TEXT NOT NULL,
        expires_at INTEGER NOT NULL,
        payload TEXT,
        reason TEXT NOT NULL,
        attempts INTEGER NOT NULL DEFAULT 0,
        last_error TEXT,
        dead_at INTEGER NOT NULL,
        FOREIGN KEY (guild_id) REFERENCES guild_config(guild_id) ON DELETE CASCADE
      )
    `);
    db.exec(
      `CREATE INDEX IF NOT EXISTS idx_timer_dead_letter_guild ON timer_dead_letter(guild_id, dead_at DESC)`
    );
  });

  try {
    apply();
    logger.info("[ensure] timer schema ready");
  } catch (err) {
    logger.error({ err }, "[ensure] failed to ensure timer schema");
    throw err;
  }
}
