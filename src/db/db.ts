/**
 * WHAT: SQLite connection bootstrap and schema creation for the spam guard.
 * WHY: Centralizes better-sqlite3 setup and PRAGMAs so consumers can just import `db`.
 * FLOWS:
 *  - Open DB → set PRAGMAs → optional statement tracing → apply schema
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better-sqlite3 is synchronous. Every statement here is a single-row
 * lookup or write; keep it that way, the ingest tick shares the thread.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { applySpamGuardSchema } from "./schema.js";

const DB_BUSY_TIMEOUT_MS = 5000;

const dbPath = env.DB_PATH;
const inMemory = dbPath === ":memory:";
if (!inMemory) {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
}

const dbTraceEnabled = process.env.DB_TRACE === "1";

export const db = new Database(dbPath, {
  fileMustExist: false,
  verbose: dbTraceEnabled
    ? (sql?: unknown) => logger.debug({ evt: "db_call", sql }, "db call")
    : undefined,
});

// WAL: readers don't block the writer; review buttons and the reconcile loop read concurrently
db.pragma("journal_mode = WAL");
db.pragma("synchronous = NORMAL");
// Fail-soft during brief contention instead of throwing SQLITE_BUSY immediately
db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);

applySpamGuardSchema(db);
logger.info({ dbPath, dbTraceEnabled }, "SQLite opened");

/**
 * Close on shutdown so the WAL is checkpointed.
 */
export function closeDb(): void {
  if (db.open) {
    db.close();
    logger.info("SQLite closed");
  }
}
