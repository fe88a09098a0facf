/**
 * WHAT: Audit trail for spam guard moderation actions.
 * WHY: Every mute, unmute and ban the bot performs (or performs on a
 *      moderator's behalf) needs a durable record of who and why.
 * FLOWS:
 *  - recordModAction(entry) → spam_mod_action row + structured log line
 *  - listModActions(guildId, subjectId) → newest first, for /spamguard and tests
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import { logger, redact } from "../lib/logger.js";
import { nowUtc } from "../lib/time.js";
import type { ModActionKind, ModerationAuditEntry } from "../features/spamGuard/types.js";

const REASON_MAX_LENGTH = 512;

const insertStmt = db.prepare<[string, string, string, string, string, string | null, number]>(
  `INSERT INTO spam_mod_action (guild_id, action, subject_id, actor_id, reason, duration, created_at_s)
   VALUES (?, ?, ?, ?, ?, ?, ?)`
);

interface ModActionRow {
  id: number;
  guild_id: string;
  action: string;
  subject_id: string;
  actor_id: string;
  reason: string;
  duration: string | null;
  created_at_s: number;
}

const listStmt = db.prepare<[string, string, number], ModActionRow>(
  `SELECT id, guild_id, action, subject_id, actor_id, reason, duration, created_at_s
   FROM spam_mod_action
   WHERE guild_id = ? AND subject_id = ?
   ORDER BY created_at_s DESC, id DESC
   LIMIT ?`
);

export interface ModActionRecord extends ModerationAuditEntry {
  id: number;
  createdAt: number;
}

function toActionKind(value: string): ModActionKind {
  switch (value) {
    case "unmute":
      return "unmute";
    case "ban":
      return "ban";
    default:
      return "mute";
  }
}

/**
 * @returns the row id
 */
export function recordModAction(entry: ModerationAuditEntry): number {
  const reason = entry.reason.trim().slice(0, REASON_MAX_LENGTH);
  const result = insertStmt.run(
    entry.guildId,
    entry.action,
    entry.subjectId,
    entry.performedBy,
    reason,
    entry.duration ?? null,
    nowUtc()
  );

  logger.info(
    {
      evt: "mod_action",
      action: entry.action,
      guildId: entry.guildId,
      subjectId: entry.subjectId,
      performedBy: entry.performedBy,
      duration: entry.duration,
      reason: redact(reason),
    },
    `[modActions] ${entry.action} recorded`
  );

  return Number(result.lastInsertRowid);
}

export function listModActions(guildId: string, subjectId: string, limit = 20): ModActionRecord[] {
  return listStmt.all(guildId, subjectId, limit).map((row) => ({
    id: row.id,
    guildId: row.guild_id,
    action: toActionKind(row.action),
    subjectId: row.subject_id,
    performedBy: row.actor_id,
    reason: row.reason,
    duration: row.duration ?? undefined,
    createdAt: row.created_at_s,
  }));
}
