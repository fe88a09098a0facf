/**
 * WHAT: In-memory per-actor activity log for spam detection.
 * WHY: Detection only ever looks back a few seconds; SQLite would be a write
 *      per message for data that is worthless a minute later.
 * FLOWS:
 *  - record(actor, channelId, content) → append stamped with processing time, trim to history limit
 *  - recent(actor, windowMs) → entries inside the window, oldest first
 *  - sweep(maxAgeMs) → periodic eviction of idle actors
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { createHash } from "node:crypto";
import { CONTENT_PREVIEW_CHARS } from "../../lib/constants.js";
import { actorKey, type ActivityRecord, type ActorRef, type TrackingStore } from "./types.js";

export const DEFAULT_HISTORY_LIMIT = 50;

/**
 * Identical messages hash the same regardless of case, surrounding whitespace
 * or Unicode compatibility forms (fullwidth letters, ligatures).
 */
export function fingerprintContent(content: string): string {
  const normalized = content.normalize("NFKC").trim().toLowerCase();
  return createHash("sha256").update(normalized).digest("hex");
}

export class ActivityTracker implements TrackingStore {
  private readonly logs = new Map<string, ActivityRecord[]>();

  constructor(
    private readonly historyLimit: number = DEFAULT_HISTORY_LIMIT,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Stamped with this tracker's clock, not the platform's: recent() cuts off
   * against the same clock, so a queue backlog can't age a burst out of the window.
   */
  record(actor: ActorRef, channelId: string, content: string): void {
    const key = actorKey(actor);
    let log = this.logs.get(key);
    if (!log) {
      log = [];
      this.logs.set(key, log);
    }

    // Clocks can step backwards (NTP); keep the log sorted so window scans stay valid
    const last = log.length > 0 ? log[log.length - 1].timestamp : 0;
    const timestamp = Math.max(this.now(), last);

    log.push({
      timestamp,
      channelId,
      contentFingerprint: fingerprintContent(content),
      contentPreview: content.slice(0, CONTENT_PREVIEW_CHARS),
    });

    if (log.length > this.historyLimit) {
      log.splice(0, log.length - this.historyLimit);
    }
  }

  recent(actor: ActorRef, windowMs: number): ActivityRecord[] {
    const log = this.logs.get(actorKey(actor));
    if (!log) return [];
    const cutoff = this.now() - windowMs;
    return log.filter((entry) => entry.timestamp >= cutoff);
  }

  /**
   * Drop entries older than maxAgeMs and forget actors left with nothing.
   * @returns number of actor logs removed
   */
  sweep(maxAgeMs: number): number {
    const cutoff = this.now() - maxAgeMs;
    let removed = 0;
    for (const [key, log] of this.logs) {
      const firstFresh = log.findIndex((entry) => entry.timestamp >= cutoff);
      if (firstFresh === -1) {
        this.logs.delete(key);
        removed++;
      } else if (firstFresh > 0) {
        log.splice(0, firstFresh);
      }
    }
    return removed;
  }

  has(actor: ActorRef): boolean {
    return this.logs.has(actorKey(actor));
  }

  size(): number {
    return this.logs.size;
  }
}
