/**
 * WHAT: Turns a detection into containment plus a staff review.
 * WHY: Mute first, ask questions later, but never leave someone muted without
 *      a review card and a record that the reconciliation loop can find.
 * FLOWS:
 *  - trigger(actor, detection) → escalate() in the background (ingest tick stays fast)
 *  - escalate(): flag → mute → hold MuteRecord → DM → post card → store ReviewRecord
 *  - any failure after the mute → rollbackContainment() + ops alert
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { classifyError, errorContext, isPermissionDenied, isUnknownMember } from "../../lib/errors.js";
import { withRetry } from "../../lib/retry.js";
import { msToSec } from "../../lib/time.js";
import { SYSTEM_ACTOR_ID, alertOps, auditAction, bestEffort, type SpamGuardContext } from "./context.js";
import {
  ESCALATION_FAILED_NOTICE,
  buildReviewCard,
  summarizeDetection,
} from "./reviewCard.js";
import type { ActorRef, DetectionResult, ReviewRecord } from "./types.js";

export const AUTO_MUTE_REASON = "Automatic spam detection - pending staff review";

const mention = (userId: string) => `<@${userId}>`;

export class EscalationEngine {
  private readonly inFlight = new Set<Promise<ReviewRecord | null>>();

  constructor(private readonly ctx: SpamGuardContext) {}

  /**
   * Fire-and-track. The actor is flagged synchronously inside escalate()
   * before its first await, so a second trigger in the same tick is a no-op.
   */
  trigger(actor: ActorRef, detection: DetectionResult): void {
    const task = this.escalate(actor, detection).catch((err: unknown) => {
      // escalate() handles its own failures; this is the last line
      logger.error(
        { evt: "spam_escalation_crashed", guildId: actor.guildId, userId: actor.userId, err },
        "[spamGuard] escalation crashed"
      );
      this.ctx.flagged.unflag(actor);
      return null;
    });
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
  }

  /** Resolves once every triggered escalation has settled */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  get pendingCount(): number {
    return this.inFlight.size;
  }

  /**
   * @returns the stored review, or null when the actor was already flagged or
   *          escalation aborted (in which case containment has been undone)
   */
  async escalate(actor: ActorRef, detection: DetectionResult): Promise<ReviewRecord | null> {
    const { ctx } = this;
    const logCtx = { guildId: actor.guildId, userId: actor.userId, pattern: detection.kind };

    // Test-and-set before any await
    if (!ctx.flagged.tryFlag(actor)) {
      logger.debug({ evt: "spam_escalation_skipped", ...logCtx }, "[spamGuard] actor already flagged");
      return null;
    }

    // 1. Containment
    try {
      await withRetry(() => ctx.containment.mute(actor, AUTO_MUTE_REASON), {
        ...ctx.retry,
        label: "spam_mute",
      });
    } catch (err) {
      ctx.flagged.unflag(actor);
      const classified = classifyError(err);
      const denied = isPermissionDenied(classified);
      logger.warn(
        {
          evt: denied ? "spam_mute_denied" : "spam_mute_failed",
          ...errorContext(classified, logCtx),
        },
        `[spamGuard] could not mute member, escalation aborted`
      );
      await alertOps(
        ctx,
        actor.guildId,
        denied
          ? `Spam detected from ${mention(actor.userId)} but I lack permission to mute them. Check the mute role position and my permissions.`
          : `Spam detected from ${mention(actor.userId)} but muting failed (${classified.message}).`
      );
      return null;
    }

    // 2. Durable mute, held until the review decides
    try {
      ctx.mutes.hold(actor.guildId, actor.userId, AUTO_MUTE_REASON);
    } catch (err) {
      return this.abort(actor, "mute record could not be stored", err);
    }
    await auditAction(ctx, {
      guildId: actor.guildId,
      action: "mute",
      subjectId: actor.userId,
      performedBy: SYSTEM_ACTOR_ID,
      reason: AUTO_MUTE_REASON,
      duration: "pending",
    });

    // 3. Tell the member; closed DMs are expected and not actionable
    try {
      await ctx.notifier.notify(actor, { kind: "muted" });
    } catch (err) {
      logger.debug(
        { evt: "spam_dm_failed", ...logCtx, errorMessage: classifyError(err).message },
        "[spamGuard] could not DM muted member"
      );
    }

    // 4. Review card
    const card = buildReviewCard(actor.userId, detection, ctx.timing);
    let reviewId: string;
    try {
      reviewId = await withRetry(() => ctx.surface.post(actor.guildId, card), {
        ...ctx.retry,
        label: "spam_review_post",
      });
    } catch (err) {
      return this.abort(actor, "review card could not be posted", err);
    }

    // 5. Review record; the reconciliation loop depends on it existing
    const nowMs = ctx.now();
    const record: ReviewRecord = {
      reviewId,
      guildId: actor.guildId,
      userId: actor.userId,
      createdAt: msToSec(nowMs),
      expiresAt: msToSec(nowMs + ctx.timing.reviewDeadlineMs),
      patternKind: detection.kind,
      patternSummary: summarizeDetection(detection, ctx.timing.windowMs),
    };
    try {
      await withRetry(async () => ctx.reviews.insert(record), {
        ...ctx.retry,
        label: "spam_review_insert",
      });
    } catch (err) {
      await bestEffort(
        "review_card_failed_notice",
        () => ctx.surface.resolve(actor.guildId, reviewId, ESCALATION_FAILED_NOTICE),
        { reviewId }
      );
      return this.abort(actor, "review record could not be stored", err);
    }

    logger.info(
      { evt: "spam_escalated", ...logCtx, reviewId, expiresAt: record.expiresAt },
      "[spamGuard] member muted and sent to review"
    );
    return record;
  }

  /**
   * Undo containment after a failure past the mute. Leaves the actor unflagged.
   */
  private async abort(actor: ActorRef, stage: string, err: unknown): Promise<null> {
    const { ctx } = this;
    const classified = classifyError(err);
    logger.error(
      {
        evt: "spam_escalation_aborted",
        stage,
        ...errorContext(classified, { guildId: actor.guildId, userId: actor.userId }),
        err,
      },
      `[spamGuard] escalation aborted: ${stage}`
    );

    const released = await this.rollbackContainment(actor, `Spam escalation rolled back: ${stage}`);
    ctx.flagged.unflag(actor);

    await alertOps(
      ctx,
      actor.guildId,
      released
        ? `Spam escalation for ${mention(actor.userId)} failed (${stage}); the mute was rolled back.`
        : `Spam escalation for ${mention(actor.userId)} failed (${stage}) and the mute could not be removed yet. It will be retried; unmute them manually if it persists.`
    );
    return null;
  }

  /** @returns true when the member is no longer muted */
  private async rollbackContainment(actor: ActorRef, reason: string): Promise<boolean> {
    const { ctx } = this;
    try {
      await withRetry(() => ctx.containment.unmute(actor, reason), {
        ...ctx.retry,
        label: "spam_unmute_rollback",
      });
    } catch (err) {
      const classified = classifyError(err);
      if (!isUnknownMember(classified)) {
        logger.error(
          {
            evt: "spam_rollback_failed",
            ...errorContext(classified, { guildId: actor.guildId, userId: actor.userId }),
            err,
          },
          "[spamGuard] rollback unmute failed, handing it to the mute expiry sweep"
        );
        // Due now: the expiry sweep keeps retrying the unmute until it lands
        try {
          ctx.mutes.schedule(actor.guildId, actor.userId, msToSec(ctx.now()), reason);
        } catch (scheduleErr) {
          logger.error(
            { evt: "spam_rollback_schedule_failed", guildId: actor.guildId, userId: actor.userId, err: scheduleErr },
            "[spamGuard] could not schedule rollback unmute"
          );
        }
        return false;
      }
    }

    try {
      ctx.mutes.delete(actor.guildId, actor.userId);
    } catch (err) {
      logger.warn(
        { evt: "spam_rollback_record_failed", guildId: actor.guildId, userId: actor.userId, err },
        "[spamGuard] mute record left behind after rollback"
      );
    }
    await auditAction(ctx, {
      guildId: actor.guildId,
      action: "unmute",
      subjectId: actor.userId,
      performedBy: SYSTEM_ACTOR_ID,
      reason,
    });
    return true;
  }
}
