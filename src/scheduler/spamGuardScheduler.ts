/**
 * WHAT: Background loops for the spam guard: activity sweep, review reconciliation, mute expiry.
 * WHY: Deadlines are persisted and polled, so a restart picks up exactly where it left off.
 * FLOWS:
 *  - every sweepMs → tracker.sweep(window) + confirmations.prune()
 *  - every reconcileMs → reconcileExpiredReviews()
 *  - every muteExpiryMs → releaseDueMutes()
 * DOCS:
 *  - setInterval: https://nodejs.org/api/timers.html#setinterval
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";
import type { SpamGuard } from "../features/spamGuard/index.js";
import { reconcileExpiredReviews, releaseDueMutes } from "../features/spamGuard/reconciliation.js";

let _activeIntervals: NodeJS.Timeout[] = [];
// Passes that await platform calls must not overlap themselves
const _running = new Set<string>();

/**
 * Run one named pass, recording health. Never throws.
 */
export async function runScheduledPass(name: string, pass: () => Promise<void> | void): Promise<void> {
  if (_running.has(name)) {
    logger.debug({ scheduler: name }, "[spamGuard:scheduler] previous pass still running, skipping");
    return;
  }
  _running.add(name);
  try {
    await pass();
    recordSchedulerRun(name, true);
  } catch (err) {
    recordSchedulerRun(name, false);
    logger.error({ err, scheduler: name }, "[spamGuard:scheduler] pass failed");
  } finally {
    _running.delete(name);
  }
}

export function sweepActivity(guard: SpamGuard): void {
  const removed = guard.tracker.sweep(guard.settings.thresholds.windowMs);
  const pruned = guard.confirmations.prune();
  if (removed > 0 || pruned > 0) {
    logger.debug(
      { evt: "spam_sweep", removedLogs: removed, prunedConfirmations: pruned, tracked: guard.tracker.size() },
      "[spamGuard:scheduler] activity sweep"
    );
  }
}

export function startSpamGuardSchedulers(guard: SpamGuard): void {
  // Opt-out for tests; intervals would otherwise outlive the test file
  if (process.env.SPAM_SCHEDULERS_DISABLED === "1") {
    logger.debug("[spamGuard:scheduler] schedulers disabled via env flag");
    return;
  }
  if (_activeIntervals.length > 0) return;

  const { sweepMs, reconcileMs, muteExpiryMs } = guard.settings.intervals;
  const every = (name: string, ms: number, pass: () => Promise<unknown> | void) => {
    const interval = setInterval(() => {
      void runScheduledPass(name, async () => {
        await pass();
      });
    }, ms);
    interval.unref();
    _activeIntervals.push(interval);
  };

  every("spamActivitySweep", sweepMs, () => sweepActivity(guard));
  every("spamReconcile", reconcileMs, () => reconcileExpiredReviews(guard.ctx));
  every("spamMuteExpiry", muteExpiryMs, () => releaseDueMutes(guard.ctx));

  // Catch up on anything that expired while we were offline
  void runScheduledPass("spamReconcile", async () => {
    await reconcileExpiredReviews(guard.ctx);
  });

  logger.info({ sweepMs, reconcileMs, muteExpiryMs }, "[spamGuard:scheduler] schedulers started");
}

export function stopSpamGuardSchedulers(): void {
  if (_activeIntervals.length === 0) return;
  for (const interval of _activeIntervals) clearInterval(interval);
  _activeIntervals = [];
  logger.info("[spamGuard:scheduler] schedulers stopped");
}
