/**
 * src/db/db.ts
 * WHAT: SQLite connection bootstrap for the timer store and guild registry.
 * WHY: Centralizes better-sqlite3 setup and PRAGMAs so stores just receive a handle.
 * FLOWS:
 *  - openDatabase(path) → mkdir → open → PRAGMAs → optional statement tracing
 *  - closeDatabase(db) → close, logging instead of throwing
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better-sqlite3 is synchronous; every timer operation is a single small statement.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { logger } from "../lib/logger.js";

export type Db = Database.Database;

const DB_BUSY_TIMEOUT_MS = 5000;

export interface OpenDatabaseOptions {
  /** Log every statement at debug level (DB_TRACE=1) */
  trace?: boolean;
}

export function openDatabase(dbPath: string, options: OpenDatabaseOptions = {}): Db {
  const inMemory = dbPath === ":memory:";
  if (!inMemory) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const trace = options.trace ?? process.env.DB_TRACE === "1";
  const db = new Database(dbPath, {
    fileMustExist: false,
    verbose: trace ? (sql) => logger.debug({ evt: "db_call", sql }, "db call") : undefined,
  });

  // WAL lets the command handlers read while the scheduler writes
  if (!inMemory) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("synchronous = NORMAL");
  // SQLite ships with foreign keys OFF; the guild cascade depends on them
  db.pragma("foreign_keys = ON");
  db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);

  logger.info({ dbPath, dbTraceEnabled: trace }, "SQLite opened");
  return db;
}

/**
 * Never crash on shutdown; prefer logs over throws here.
 */
export function closeDatabase(db: Db): void {
  logger.info("Closing database connection...");
  try {
    db.close();
    logger.info("Database closed successfully");
  } catch (err) {
    logger.error({ err }, "Error closing database");
  }
}
