/**
 * WHAT: Staff resolution of spam reviews.
 * WHY: Each case ends exactly once. Two moderators clicking at the same time,
 *      or a click racing the reconciliation loop, must not double-apply.
 * FLOWS:
 *  - request(reviewId, action, reviewer) → permission check → confirmation token
 *  - confirm(token, callerId) → resolve()
 *  - cancel(token, callerId) → no state change
 *  - resolve(): claim (atomic delete) → platform action → unflag → update card
 *               platform failure → restore the claimed record
 *
 * State machine:
 *   pending → lifted | confirmed | banned   (staff)
 *   pending → expired                       (reconciliation.ts)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import {
  classifyError,
  errorContext,
  isUnknownMember,
  userFriendlyMessage,
} from "../../lib/errors.js";
import { withRetry } from "../../lib/retry.js";
import { formatDurationShort, msToSec } from "../../lib/time.js";
import { auditAction, bestEffort, type SpamGuardContext } from "./context.js";
import type { CancelResult, ConfirmationRegistry } from "./confirmations.js";
import { buildResolutionNotice } from "./reviewCard.js";
import type {
  ActorRef,
  ResolutionOutcome,
  ReviewAction,
  ReviewRecord,
  ReviewerContext,
  TerminalReviewState,
} from "./types.js";

export type RequestResult =
  | { ok: true; token: string; review: ReviewRecord }
  | { ok: false; reason: "forbidden" | "not_active" };

export type ConfirmOutcome = ResolutionOutcome | { status: "expired" } | { status: "not_owner" };

const TERMINAL_STATE: Record<ReviewAction, TerminalReviewState> = {
  lift: "lifted",
  keep: "confirmed",
  ban: "banned",
};

export const LIFT_REASON = "Spam report - determined to be false positive";
export const KEEP_REASON = "Spam confirmed - mute extended";

/** Lift and keep need moderation rights; ban needs ban rights */
export function canPerform(action: ReviewAction, reviewer: ReviewerContext): boolean {
  return action === "ban" ? reviewer.canBan : reviewer.canModerate;
}

export class ReviewFlow {
  constructor(
    private readonly ctx: SpamGuardContext,
    private readonly confirmations: ConfirmationRegistry
  ) {}

  /**
   * First step of the two-step commit. Nothing changes until confirm().
   */
  request(reviewId: string, action: ReviewAction, reviewer: ReviewerContext): RequestResult {
    if (!canPerform(action, reviewer)) return { ok: false, reason: "forbidden" };

    const review = this.ctx.reviews.get(reviewId);
    if (!review) return { ok: false, reason: "not_active" };

    const { token } = this.confirmations.issue(reviewId, action, reviewer);
    return { ok: true, token, review };
  }

  async confirm(token: string, callerId: string): Promise<ConfirmOutcome> {
    const taken = this.confirmations.take(token, callerId);
    if (taken.status !== "ok") return taken;
    const { reviewId, action, reviewer } = taken.confirmation;
    return this.resolve(reviewId, action, reviewer);
  }

  cancel(token: string, callerId: string): CancelResult {
    return this.confirmations.cancel(token, callerId);
  }

  /**
   * Apply a staff decision. Permission is re-checked here so a caller that
   * skips request() can't bypass it.
   */
  async resolve(
    reviewId: string,
    action: ReviewAction,
    reviewer: ReviewerContext
  ): Promise<ResolutionOutcome> {
    const { ctx } = this;
    if (!canPerform(action, reviewer)) return { status: "forbidden", action };

    const review = ctx.reviews.claim(reviewId);
    if (!review) {
      logger.info(
        { evt: "spam_review_already_resolved", reviewId, action, reviewerId: reviewer.userId },
        "[spamGuard] review no longer active"
      );
      return { status: "already_resolved", reviewId };
    }

    const actor: ActorRef = { guildId: review.guildId, userId: review.userId };
    try {
      await this.apply(action, actor, reviewer);
    } catch (err) {
      const classified = classifyError(err);
      ctx.reviews.restore(review);
      logger.error(
        {
          evt: "spam_review_action_failed",
          action,
          reviewerId: reviewer.userId,
          ...errorContext(classified, { reviewId, guildId: review.guildId, userId: review.userId }),
          err,
        },
        `[spamGuard] ${action} failed, review restored`
      );
      return { status: "failed", reviewId, message: userFriendlyMessage(classified) };
    }

    const state = TERMINAL_STATE[action];
    ctx.flagged.unflag(actor);
    ctx.expiryFailuresAlerted.delete(reviewId);
    await bestEffort(
      "review_card_update",
      () =>
        ctx.surface.resolve(
          review.guildId,
          reviewId,
          buildResolutionNotice(state, ctx.timing.defaultMuteMs, reviewer.userId)
        ),
      { reviewId }
    );

    logger.info(
      {
        evt: "spam_review_resolved",
        reviewId,
        guildId: review.guildId,
        userId: review.userId,
        state,
        reviewerId: reviewer.userId,
      },
      `[spamGuard] review resolved: ${state}`
    );
    return { status: "resolved", state, review };
  }

  private async apply(action: ReviewAction, actor: ActorRef, reviewer: ReviewerContext): Promise<void> {
    const { ctx } = this;
    const retry = ctx.retry ?? {};

    switch (action) {
      case "lift": {
        try {
          await withRetry(
            () => ctx.containment.unmute(actor, `Spam mute removed by ${reviewer.userId}`),
            { ...retry, label: "spam_lift" }
          );
        } catch (err) {
          // Member already gone: nothing left to unmute
          if (!isUnknownMember(classifyError(err))) throw err;
        }
        // Unmute has landed; the case closes even if the record lingers
        try {
          ctx.mutes.delete(actor.guildId, actor.userId);
        } catch (err) {
          logger.warn(
            { evt: "spam_lift_record_failed", guildId: actor.guildId, userId: actor.userId, err },
            "[spamGuard] mute record left behind after lift"
          );
        }
        await auditAction(ctx, {
          guildId: actor.guildId,
          action: "unmute",
          subjectId: actor.userId,
          performedBy: reviewer.userId,
          reason: LIFT_REASON,
        });
        return;
      }

      case "keep": {
        const durationMs = ctx.timing.defaultMuteMs;
        ctx.mutes.schedule(
          actor.guildId,
          actor.userId,
          msToSec(ctx.now() + durationMs),
          `${KEEP_REASON} (${formatDurationShort(durationMs)})`
        );
        await auditAction(ctx, {
          guildId: actor.guildId,
          action: "mute",
          subjectId: actor.userId,
          performedBy: reviewer.userId,
          reason: KEEP_REASON,
          duration: formatDurationShort(durationMs),
        });
        return;
      }

      case "ban": {
        const reason = `Spam (detected by automatic system, banned by ${reviewer.userId})`;
        // DM before the ban; afterwards there is no shared guild to DM through
        try {
          await ctx.notifier.notify(actor, { kind: "banned", reason });
        } catch (err) {
          logger.debug(
            { evt: "spam_dm_failed", guildId: actor.guildId, userId: actor.userId, errorMessage: classifyError(err).message },
            "[spamGuard] could not DM member before ban"
          );
        }
        await withRetry(() => ctx.containment.ban(actor, reason), { ...retry, label: "spam_ban" });
        ctx.mutes.delete(actor.guildId, actor.userId);
        await auditAction(ctx, {
          guildId: actor.guildId,
          action: "ban",
          subjectId: actor.userId,
          performedBy: reviewer.userId,
          reason,
        });
        return;
      }

      default: {
        const unreachable: never = action;
        throw new Error(`Unhandled review action: ${String(unreachable)}`);
      }
    }
  }
}
