/**
 * WHAT: Durable storage for open spam reviews.
 * WHY: A review outlives the process; after a restart the reconciliation loop
 *      and the review buttons both need the record back.
 * FLOWS:
 *  - insertReview(record) → row per open card
 *  - claimReview(reviewId) → atomic take; exactly one caller gets the record
 *  - restoreReview(record) → put a claimed record back after a failed platform action
 *  - listExpiredReviews(nowS) → reconciliation input
 * DOCS:
 *  - better-sqlite3 prepared statements: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite RETURNING: https://sqlite.org/lang_returning.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import { logger } from "../lib/logger.js";
import type { PatternKind, ReviewRecord, ReviewRepository } from "../features/spamGuard/types.js";

interface ReviewRow {
  review_id: string;
  guild_id: string;
  user_id: string;
  created_at: number;
  expires_at: number;
  pattern_kind: string;
  pattern_summary: string;
}

// ============================================================================
// Prepared Statements
// ============================================================================

const REVIEW_COLUMNS =
  "review_id, guild_id, user_id, created_at, expires_at, pattern_kind, pattern_summary";

const insertReviewStmt = db.prepare<[string, string, string, number, number, string, string]>(
  `INSERT INTO spam_review (${REVIEW_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)`
);

// OR IGNORE: if the actor somehow got a fresh review in between, the newer one wins
const restoreReviewStmt = db.prepare<[string, string, string, number, number, string, string]>(
  `INSERT OR IGNORE INTO spam_review (${REVIEW_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)`
);

const getReviewStmt = db.prepare<[string], ReviewRow>(
  `SELECT ${REVIEW_COLUMNS} FROM spam_review WHERE review_id = ?`
);

const getReviewForActorStmt = db.prepare<[string, string], ReviewRow>(
  `SELECT ${REVIEW_COLUMNS} FROM spam_review WHERE guild_id = ? AND user_id = ?`
);

// The claim. Whoever's DELETE removes the row gets it back; everyone else gets undefined.
const claimReviewStmt = db.prepare<[string], ReviewRow>(
  `DELETE FROM spam_review WHERE review_id = ? RETURNING ${REVIEW_COLUMNS}`
);

const listExpiredStmt = db.prepare<[number], ReviewRow>(
  `SELECT ${REVIEW_COLUMNS} FROM spam_review WHERE expires_at <= ? ORDER BY expires_at ASC`
);

const listPendingForGuildStmt = db.prepare<[string], ReviewRow>(
  `SELECT ${REVIEW_COLUMNS} FROM spam_review WHERE guild_id = ? ORDER BY created_at ASC`
);

const listAllPendingStmt = db.prepare<[], ReviewRow>(
  `SELECT ${REVIEW_COLUMNS} FROM spam_review ORDER BY created_at ASC`
);

// ============================================================================
// Mapping
// ============================================================================

function toPatternKind(value: string): PatternKind {
  return value === "multi_channel" ? "multi_channel" : "same_channel";
}

function toRecord(row: ReviewRow): ReviewRecord {
  return {
    reviewId: row.review_id,
    guildId: row.guild_id,
    userId: row.user_id,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
    patternKind: toPatternKind(row.pattern_kind),
    patternSummary: row.pattern_summary,
  };
}

function toParams(
  record: ReviewRecord
): [string, string, string, number, number, string, string] {
  return [
    record.reviewId,
    record.guildId,
    record.userId,
    record.createdAt,
    record.expiresAt,
    record.patternKind,
    record.patternSummary,
  ];
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Persist a new review. Throws on a duplicate review id or a second open
 * review for the same actor (unique index); the escalation engine treats
 * either as a failed escalation and rolls containment back.
 */
export function insertReview(record: ReviewRecord): void {
  insertReviewStmt.run(...toParams(record));
  logger.debug(
    { evt: "spam_review_insert", reviewId: record.reviewId, guildId: record.guildId, userId: record.userId },
    "[spamReviewStore] review stored"
  );
}

export function getReview(reviewId: string): ReviewRecord | null {
  const row = getReviewStmt.get(reviewId);
  return row ? toRecord(row) : null;
}

export function getPendingReviewForActor(guildId: string, userId: string): ReviewRecord | null {
  const row = getReviewForActorStmt.get(guildId, userId);
  return row ? toRecord(row) : null;
}

/**
 * Atomically remove and return a review. Two concurrent resolutions (button
 * vs button, or button vs reconciliation) race here and only one wins.
 *
 * @returns the record if this caller claimed it, null if it was already gone
 */
export function claimReview(reviewId: string): ReviewRecord | null {
  const row = claimReviewStmt.get(reviewId);
  return row ? toRecord(row) : null;
}

/**
 * Undo a claim after the platform action failed, so the case stays open and
 * can be retried or picked up by reconciliation.
 */
export function restoreReview(record: ReviewRecord): void {
  const result = restoreReviewStmt.run(...toParams(record));
  if (result.changes === 0) {
    logger.warn(
      { evt: "spam_review_restore_skipped", reviewId: record.reviewId, guildId: record.guildId },
      "[spamReviewStore] review not restored, actor already has an open review"
    );
  }
}

/** Reviews whose deadline is at or before nowS (Unix seconds), oldest first */
export function listExpiredReviews(nowS: number): ReviewRecord[] {
  return listExpiredStmt.all(nowS).map(toRecord);
}

/** Open reviews, oldest first; all guilds when guildId is omitted */
export function listPendingReviews(guildId?: string): ReviewRecord[] {
  const rows = guildId ? listPendingForGuildStmt.all(guildId) : listAllPendingStmt.all();
  return rows.map(toRecord);
}

export const reviewRepository: ReviewRepository = {
  insert: insertReview,
  get: getReview,
  claim: claimReview,
  restore: restoreReview,
  listExpired: listExpiredReviews,
  listPending: listPendingReviews,
};
