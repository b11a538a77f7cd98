/**
 * src/store/guildStore.ts
 * WHAT: Tenant bookkeeping. A guild row must exist before timers can reference it.
 * WHY: Removing the bot from a guild deletes its timers and dead letters via ON DELETE CASCADE.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Db } from "../db/db.js";
import { logger } from "../lib/logger.js";
import { nowUtc } from "../lib/time.js";

/** Idempotent. Returns true when the guild was newly registered. */
export function registerGuild(db: Db, guildId: string, now: number = nowUtc()): boolean {
  const result = db
    .prepare<[string, number]>(`INSERT OR IGNORE INTO guild_config (guild_id, registered_at) VALUES (?, ?)`)
    .run(guildId, now);
  if (result.changes > 0) {
    logger.info({ guildId }, "[guildStore] guild registered");
  }
  return result.changes > 0;
}

/**
 * Cascades to timers and timer_dead_letter.
 */
export function deregisterGuild(db: Db, guildId: string): boolean {
  const result = db.prepare<[string]>(`DELETE FROM guild_config WHERE guild_id = ?`).run(guildId);
  if (result.changes > 0) {
    logger.info({ guildId }, "[guildStore] guild deregistered, pending timers removed");
  }
  return result.changes > 0;
}

export function guildExists(db: Db, guildId: string): boolean {
  const row = db
    .prepare<[string], { present: number }>(`SELECT 1 AS present FROM guild_config WHERE guild_id = ?`)
    .get(guildId);
  return row !== undefined;
}
