/**
 * WHAT: Default outcome for reviews nobody answered, and removal of mutes whose time is up.
 * WHY: The review deadline is persisted (expires_at), not an in-memory timer,
 *      so a restart never loses a case; polling picks up whatever is due.
 * FLOWS:
 *  - reconcileExpiredReviews(ctx) → claim each expired review → keep mute for the
 *    default duration → update card + announce → unflag; first failure per review alerts ops
 *  - releaseDueMutes(ctx) → unmute → delete record → audit
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { classifyError, errorContext, isPermissionDenied, isUnknownMember } from "../../lib/errors.js";
import { withRetry } from "../../lib/retry.js";
import { formatDurationShort, msToSec } from "../../lib/time.js";
import { SYSTEM_ACTOR_ID, alertOps, auditAction, bestEffort, type SpamGuardContext } from "./context.js";
import { buildResolutionNotice, expiryAnnouncement } from "./reviewCard.js";
import type { ActorRef, ReviewRecord } from "./types.js";

export const EXPIRY_MUTE_REASON = "Spam protection - automatic mute (no staff response)";
export const MUTE_EXPIRED_REASON = "Spam mute expired";

export interface ReconcileSummary {
  expired: number;
  applied: number;
  /** Claimed by someone else between listing and claiming */
  skipped: number;
  failed: number;
}

export interface ReleaseSummary {
  due: number;
  released: number;
  failed: number;
}

/**
 * One pass of the reconciliation loop. Safe to run concurrently with staff
 * resolution: whoever claims the record first wins; the other no-ops.
 */
export async function reconcileExpiredReviews(ctx: SpamGuardContext): Promise<ReconcileSummary> {
  const nowMs = ctx.now();
  const expired = ctx.reviews.listExpired(msToSec(nowMs));
  const summary: ReconcileSummary = { expired: expired.length, applied: 0, skipped: 0, failed: 0 };

  for (const candidate of expired) {
    const review = ctx.reviews.claim(candidate.reviewId);
    if (!review) {
      summary.skipped++;
      continue;
    }

    if (await applyDefaultOutcome(ctx, review, nowMs)) {
      summary.applied++;
    } else {
      summary.failed++;
    }
  }

  if (summary.expired > 0) {
    logger.info({ evt: "spam_reconcile_pass", ...summary }, "[spamGuard] reconciliation pass complete");
  }
  return summary;
}

async function applyDefaultOutcome(
  ctx: SpamGuardContext,
  review: ReviewRecord,
  nowMs: number
): Promise<boolean> {
  const actor: ActorRef = { guildId: review.guildId, userId: review.userId };
  const durationMs = ctx.timing.defaultMuteMs;

  try {
    // The role may have been removed by hand while the card sat unanswered
    try {
      await withRetry(() => ctx.containment.mute(actor, EXPIRY_MUTE_REASON), {
        ...ctx.retry,
        label: "spam_expiry_mute",
      });
    } catch (err) {
      // Left the guild: keep the record so the mute is still on file if they return
      if (!isUnknownMember(classifyError(err))) throw err;
    }
    ctx.mutes.schedule(actor.guildId, actor.userId, msToSec(nowMs + durationMs), EXPIRY_MUTE_REASON);
  } catch (err) {
    ctx.reviews.restore(review);
    const classified = classifyError(err);
    logger.warn(
      {
        evt: "spam_reconcile_failed",
        ...errorContext(classified, { reviewId: review.reviewId, guildId: review.guildId, userId: review.userId }),
      },
      "[spamGuard] default outcome failed, review restored for next pass"
    );

    // Retried every pass; ops hear about it once per review
    if (!ctx.expiryFailuresAlerted.has(review.reviewId)) {
      ctx.expiryFailuresAlerted.add(review.reviewId);
      await alertOps(
        ctx,
        review.guildId,
        isPermissionDenied(classified)
          ? `Spam report for <@${review.userId}> passed its deadline but I lack permission to mute them. It stays open and will be retried; check the mute role position and my permissions.`
          : `Spam report for <@${review.userId}> passed its deadline but the default mute failed (${classified.message}). It stays open and will be retried.`
      );
    }
    return false;
  }

  ctx.flagged.unflag(actor);
  ctx.expiryFailuresAlerted.delete(review.reviewId);
  await auditAction(ctx, {
    guildId: actor.guildId,
    action: "mute",
    subjectId: actor.userId,
    performedBy: SYSTEM_ACTOR_ID,
    reason: EXPIRY_MUTE_REASON,
    duration: formatDurationShort(durationMs),
  });
  await bestEffort(
    "review_card_update",
    () => ctx.surface.resolve(review.guildId, review.reviewId, buildResolutionNotice("expired", durationMs)),
    { reviewId: review.reviewId }
  );
  await bestEffort(
    "expiry_announce",
    () => ctx.surface.announce(review.guildId, expiryAnnouncement(review.userId, durationMs)),
    { reviewId: review.reviewId }
  );

  logger.info(
    { evt: "spam_review_expired", reviewId: review.reviewId, guildId: review.guildId, userId: review.userId },
    "[spamGuard] review expired, default mute applied"
  );
  return true;
}

/**
 * Lift mutes whose unmute time has passed. Held mutes (no time yet) are never due.
 */
export async function releaseDueMutes(ctx: SpamGuardContext): Promise<ReleaseSummary> {
  const due = ctx.mutes.listDue(msToSec(ctx.now()));
  const summary: ReleaseSummary = { due: due.length, released: 0, failed: 0 };

  for (const mute of due) {
    const actor: ActorRef = { guildId: mute.guildId, userId: mute.userId };
    try {
      await withRetry(() => ctx.containment.unmute(actor, MUTE_EXPIRED_REASON), {
        ...ctx.retry,
        label: "spam_mute_expiry",
      });
    } catch (err) {
      const classified = classifyError(err);
      if (!isUnknownMember(classified)) {
        summary.failed++;
        logger.warn(
          { evt: "spam_unmute_failed", ...errorContext(classified, { guildId: mute.guildId, userId: mute.userId }) },
          "[spamGuard] expired mute not lifted, will retry next pass"
        );
        continue;
      }
    }

    ctx.mutes.delete(mute.guildId, mute.userId);
    summary.released++;
    await auditAction(ctx, {
      guildId: mute.guildId,
      action: "unmute",
      subjectId: mute.userId,
      performedBy: SYSTEM_ACTOR_ID,
      reason: MUTE_EXPIRED_REASON,
    });
  }

  return summary;
}
