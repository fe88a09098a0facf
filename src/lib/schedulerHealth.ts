/**
 * WHAT: Health tracking for scheduled background tasks.
 * WHY: The reconciliation loop is the only thing standing between a muted member
 *      and an unanswered review; if it keeps failing somebody needs to hear about it.
 * FLOWS:
 *  - recordSchedulerRun(name, success) → update health state → alert if threshold exceeded
 *  - getSchedulerHealth() → snapshot for /spamguard view
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

export interface SchedulerHealth {
  /** Scheduler name (e.g., "spamReconcile", "activitySweep") */
  name: string;
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  /** Failures since last success */
  consecutiveFailures: number;
  totalRuns: number;
  totalFailures: number;
}

/** Consecutive failures before an error-level log (and therefore a Sentry event) */
const CONSECUTIVE_FAILURE_ALERT_THRESHOLD = 3;

const schedulerHealth = new Map<string, SchedulerHealth>();

/**
 * Record a scheduler run result.
 *
 * @example
 * try {
 *   await reconcileExpiredReviews(deps);
 *   recordSchedulerRun("spamReconcile", true);
 * } catch (err) {
 *   recordSchedulerRun("spamReconcile", false);
 * }
 */
export function recordSchedulerRun(name: string, success: boolean): void {
  const now = Date.now();
  const health: SchedulerHealth = schedulerHealth.get(name) ?? {
    name,
    lastRunAt: null,
    lastSuccessAt: null,
    lastErrorAt: null,
    consecutiveFailures: 0,
    totalRuns: 0,
    totalFailures: 0,
  };

  health.lastRunAt = now;
  health.totalRuns++;

  if (success) {
    health.lastSuccessAt = now;
    health.consecutiveFailures = 0;
  } else {
    health.lastErrorAt = now;
    health.consecutiveFailures++;
    health.totalFailures++;
  }

  schedulerHealth.set(name, health);

  if (health.consecutiveFailures >= CONSECUTIVE_FAILURE_ALERT_THRESHOLD) {
    logger.error(
      {
        scheduler: name,
        consecutiveFailures: health.consecutiveFailures,
        totalFailures: health.totalFailures,
        totalRuns: health.totalRuns,
      },
      "[scheduler] Multiple consecutive failures - requires attention"
    );
  }
}

/** Copy of every tracked scheduler's state */
export function getSchedulerHealth(): SchedulerHealth[] {
  return [...schedulerHealth.values()].map((h) => ({ ...h }));
}

export function getSchedulerHealthByName(name: string): SchedulerHealth | undefined {
  const health = schedulerHealth.get(name);
  return health ? { ...health } : undefined;
}

/** Test helper */
export function _clearAllSchedulerHealth(): void {
  schedulerHealth.clear();
}
