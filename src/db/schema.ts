/**
 * WHAT: DDL for the spam guard tables.
 * WHY: Idempotent (IF NOT EXISTS) so it can run on every boot and against
 *      in-memory databases in tests.
 * DOCS:
 *  - SQLite RETURNING (claimReview relies on it): https://sqlite.org/lang_returning.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";

const SPAM_GUARD_SCHEMA = `
  -- Per-guild settings; NULL columns fall back to env defaults
  CREATE TABLE IF NOT EXISTS spam_guard_config (
    guild_id TEXT PRIMARY KEY,
    enabled INTEGER NOT NULL DEFAULT 1,
    mute_role_id TEXT,
    review_channel_id TEXT,
    alert_channel_id TEXT,
    log_channel_id TEXT,
    exempt_role_id TEXT,
    exempt_category_id TEXT,
    updated_at_s INTEGER NOT NULL
  );

  -- One row per open review card; deleted on resolution
  CREATE TABLE IF NOT EXISTS spam_review (
    review_id TEXT PRIMARY KEY,
    guild_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    expires_at INTEGER NOT NULL,
    pattern_kind TEXT NOT NULL,
    pattern_summary TEXT NOT NULL
  );
  CREATE UNIQUE INDEX IF NOT EXISTS idx_spam_review_actor ON spam_review(guild_id, user_id);
  CREATE INDEX IF NOT EXISTS idx_spam_review_expires ON spam_review(expires_at);

  -- unmute_at NULL = held until a reviewer (or the deadline) decides
  CREATE TABLE IF NOT EXISTS spam_mute (
    guild_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    unmute_at INTEGER,
    reason TEXT NOT NULL,
    updated_at INTEGER NOT NULL,
    PRIMARY KEY (guild_id, user_id)
  );
  CREATE INDEX IF NOT EXISTS idx_spam_mute_due ON spam_mute(unmute_at);

  CREATE TABLE IF NOT EXISTS spam_mod_action (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    guild_id TEXT NOT NULL,
    action TEXT NOT NULL,
    subject_id TEXT NOT NULL,
    actor_id TEXT NOT NULL,
    reason TEXT NOT NULL,
    duration TEXT,
    created_at_s INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_spam_mod_action_subject ON spam_mod_action(guild_id, subject_id, created_at_s DESC);
`;

export function applySpamGuardSchema(database: Database.Database): void {
  database.exec(SPAM_GUARD_SCHEMA);
}
