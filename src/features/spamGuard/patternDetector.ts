/**
 * WHAT: Decides whether an actor's recent activity is a spam burst.
 * WHY: Two shapes matter: hammering one channel, and spraying many channels.
 *      Same-channel is checked first and wins when both hold.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ActorRef, DetectionResult, DetectionThresholds, TrackingStore } from "./types.js";

export const DEFAULT_THRESHOLDS: DetectionThresholds = {
  windowMs: 5000,
  burstCount: 10,
  channelSpread: 10,
};

export function evaluate(
  tracker: TrackingStore,
  actor: ActorRef,
  thresholds: DetectionThresholds = DEFAULT_THRESHOLDS
): DetectionResult | null {
  const entries = tracker.recent(actor, thresholds.windowMs);
  if (entries.length < 2) return null;

  // Map preserves insertion order, so channel order is first-seen order
  const perChannel = new Map<string, number>();
  for (const entry of entries) {
    perChannel.set(entry.channelId, (perChannel.get(entry.channelId) ?? 0) + 1);
  }

  for (const [channelId, count] of perChannel) {
    if (count >= thresholds.burstCount) {
      return {
        kind: "same_channel",
        channelId,
        count,
        samples: entries.filter((entry) => entry.channelId === channelId),
      };
    }
  }

  if (perChannel.size >= thresholds.channelSpread) {
    return {
      kind: "multi_channel",
      distinctChannelCount: perChannel.size,
      totalCount: entries.length,
      channelIds: [...perChannel.keys()],
      samples: entries,
    };
  }

  return null;
}
