/**
 * WHAT: Mute bookkeeping for spam containment.
 * WHY: The mute role is the platform-side state; this table remembers why it was
 *      applied and when it should come off, so a restart doesn't strand anyone.
 * FLOWS:
 *  - holdMute() → unmute_at NULL while a review is open
 *  - scheduleUnmute() → unmute_at set by "keep" or the expiry default
 *  - listDueMutes(nowS) → input for the mute expiry sweep
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import { nowUtc } from "../lib/time.js";
import type { MuteRecord, MuteRepository } from "../features/spamGuard/types.js";

interface MuteRow {
  guild_id: string;
  user_id: string;
  unmute_at: number | null;
  reason: string;
}

const upsertMuteStmt = db.prepare<[string, string, number | null, string, number]>(
  `INSERT INTO spam_mute (guild_id, user_id, unmute_at, reason, updated_at)
   VALUES (?, ?, ?, ?, ?)
   ON CONFLICT(guild_id, user_id) DO UPDATE SET
     unmute_at = excluded.unmute_at,
     reason = excluded.reason,
     updated_at = excluded.updated_at`
);

const getMuteStmt = db.prepare<[string, string], MuteRow>(
  `SELECT guild_id, user_id, unmute_at, reason FROM spam_mute WHERE guild_id = ? AND user_id = ?`
);

const deleteMuteStmt = db.prepare<[string, string]>(
  `DELETE FROM spam_mute WHERE guild_id = ? AND user_id = ?`
);

// Held mutes (NULL) are never due; only a review decision or reconciliation sets a time
const listDueStmt = db.prepare<[number], MuteRow>(
  `SELECT guild_id, user_id, unmute_at, reason FROM spam_mute
   WHERE unmute_at IS NOT NULL AND unmute_at <= ?
   ORDER BY unmute_at ASC`
);

function toRecord(row: MuteRow): MuteRecord {
  return {
    guildId: row.guild_id,
    userId: row.user_id,
    unmuteAt: row.unmute_at,
    reason: row.reason,
  };
}

/** Mute with no end time, held until the review is resolved */
export function holdMute(guildId: string, userId: string, reason: string): void {
  upsertMuteStmt.run(guildId, userId, null, reason, nowUtc());
}

/** Set (or move) the time a mute comes off. unmuteAtS is Unix seconds. */
export function scheduleUnmute(guildId: string, userId: string, unmuteAtS: number, reason: string): void {
  upsertMuteStmt.run(guildId, userId, unmuteAtS, reason, nowUtc());
}

export function getMute(guildId: string, userId: string): MuteRecord | null {
  const row = getMuteStmt.get(guildId, userId);
  return row ? toRecord(row) : null;
}

/** @returns true when a record was removed */
export function deleteMute(guildId: string, userId: string): boolean {
  return deleteMuteStmt.run(guildId, userId).changes > 0;
}

export function listDueMutes(nowS: number): MuteRecord[] {
  return listDueStmt.all(nowS).map(toRecord);
}

export const muteRepository: MuteRepository = {
  hold: holdMute,
  schedule: scheduleUnmute,
  get: getMute,
  delete: deleteMute,
  listDue: listDueMutes,
};
