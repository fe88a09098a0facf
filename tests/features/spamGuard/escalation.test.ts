/**
 * WHAT: Tests for the escalation engine.
 * WHY: Every path past the mute must end in either a stored review or a
 *      rolled-back mute; nobody stays muted with nothing to review.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}));

vi.mock("../../../src/lib/logger.js", () => ({
  logger: mockLogger,
  redact: (value: string) => value,
}));

import { AUTO_MUTE_REASON, EscalationEngine } from "../../../src/features/spamGuard/escalation.js";
import type { SpamGuardContext } from "../../../src/features/spamGuard/context.js";
import { ESCALATION_FAILED_NOTICE } from "../../../src/features/spamGuard/reviewCard.js";
import { muteRepository } from "../../../src/store/muteStore.js";
import { reviewRepository } from "../../../src/store/spamReviewStore.js";
import { createDiscordAPIError, createNetworkError, createSqliteError } from "../../utils/discordMocks.js";
import {
  SPAMMER,
  createClock,
  createFakeCollaborators,
  createTestContext,
  resetSpamTables,
  sameChannelDetection,
  type FakeCollaborators,
} from "../../utils/spamGuardFakes.js";

const START_S = Date.UTC(2024, 0, 1, 12, 0, 0) / 1000;

describe("EscalationEngine", () => {
  let fakes: FakeCollaborators;
  let ctx: SpamGuardContext;
  let engine: EscalationEngine;

  beforeEach(() => {
    resetSpamTables();
    fakes = createFakeCollaborators();
    ctx = createTestContext(fakes, createClock());
    engine = new EscalationEngine(ctx);
  });

  describe("happy path", () => {
    it("mutes, holds the mute, posts a card and stores the review", async () => {
      const record = await engine.escalate(SPAMMER, sameChannelDetection());

      expect(record).toEqual({
        reviewId: "1000",
        guildId: "guild-1",
        userId: "user-1",
        createdAt: START_S,
        expiresAt: START_S + 12 * 60 * 60,
        patternKind: "same_channel",
        patternSummary: "10 messages in <#chan-1> within 5 seconds",
      });
      expect(reviewRepository.get("1000")).toEqual(record);
      expect(muteRepository.get("guild-1", "user-1")).toMatchObject({ unmuteAt: null, reason: AUTO_MUTE_REASON });
      expect(fakes.containment.mute).toHaveBeenCalledWith(SPAMMER, AUTO_MUTE_REASON);
      expect(fakes.muted.has("guild-1:user-1")).toBe(true);
      expect(ctx.flagged.has(SPAMMER)).toBe(true);
    });

    it("notifies the member and audits a pending mute", async () => {
      await engine.escalate(SPAMMER, sameChannelDetection());

      expect(fakes.notifier.notify).toHaveBeenCalledWith(SPAMMER, { kind: "muted" });
      expect(fakes.audit.logModerationAction).toHaveBeenCalledWith({
        guildId: "guild-1",
        action: "mute",
        subjectId: "user-1",
        performedBy: "system",
        reason: AUTO_MUTE_REASON,
        duration: "pending",
      });
    });

    it("posts the card to the actor's guild", async () => {
      await engine.escalate(SPAMMER, sameChannelDetection());

      expect(fakes.surface.post).toHaveBeenCalledTimes(1);
      const [guildId, card] = fakes.surface.post.mock.calls[0];
      expect(guildId).toBe("guild-1");
      expect(card.title).toBe("Spam Detected - User Auto-Muted");
      expect(card.userId).toBe("user-1");
    });

    it("carries on when the DM is refused", async () => {
      fakes.notifier.notify.mockRejectedValueOnce(createDiscordAPIError(50007, "Cannot send messages to this user", 403));

      expect(await engine.escalate(SPAMMER, sameChannelDetection())).not.toBeNull();
      expect(reviewRepository.get("1000")).not.toBeNull();
    });

    it("treats the same user in another guild as a separate case", async () => {
      await engine.escalate(SPAMMER, sameChannelDetection());
      const other = await engine.escalate({ guildId: "guild-2", userId: "user-1" }, sameChannelDetection());

      expect(other?.reviewId).toBe("1001");
    });
  });

  describe("at most one escalation per actor", () => {
    it("concurrent escalations for the same actor mute once", async () => {
      const [first, second] = await Promise.all([
        engine.escalate(SPAMMER, sameChannelDetection()),
        engine.escalate(SPAMMER, sameChannelDetection()),
      ]);

      expect(first?.reviewId).toBe("1000");
      expect(second).toBeNull();
      expect(fakes.containment.mute).toHaveBeenCalledTimes(1);
      expect(fakes.surface.post).toHaveBeenCalledTimes(1);
    });

    it("an actor already under review is skipped", async () => {
      await engine.escalate(SPAMMER, sameChannelDetection());
      expect(await engine.escalate(SPAMMER, sameChannelDetection())).toBeNull();
      expect(fakes.containment.mute).toHaveBeenCalledTimes(1);
    });
  });

  describe("mute failures", () => {
    it("aborts without retrying when the bot lacks permission", async () => {
      fakes.containment.mute.mockRejectedValue(createDiscordAPIError(50013, "Missing Permissions", 403));

      expect(await engine.escalate(SPAMMER, sameChannelDetection())).toBeNull();

      expect(fakes.containment.mute).toHaveBeenCalledTimes(1);
      expect(fakes.surface.post).not.toHaveBeenCalled();
      expect(muteRepository.get("guild-1", "user-1")).toBeNull();
      expect(ctx.flagged.has(SPAMMER)).toBe(false);
      expect(fakes.alerter.alert).toHaveBeenCalledWith(
        "guild-1",
        "Spam detected from <@user-1> but I lack permission to mute them. Check the mute role position and my permissions."
      );
      expect(mockLogger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ evt: "spam_mute_denied" }),
        "[spamGuard] could not mute member, escalation aborted"
      );
    });

    it("retries transient failures, then alerts", async () => {
      fakes.containment.mute.mockRejectedValue(createNetworkError("ECONNRESET"));

      expect(await engine.escalate(SPAMMER, sameChannelDetection())).toBeNull();

      expect(fakes.containment.mute).toHaveBeenCalledTimes(2);
      expect(fakes.alerter.alert).toHaveBeenCalledWith(
        "guild-1",
        "Spam detected from <@user-1> but muting failed (Network error: ECONNRESET)."
      );
      expect(ctx.flagged.has(SPAMMER)).toBe(false);
    });

    it("a failed alert does not throw", async () => {
      fakes.containment.mute.mockRejectedValue(createDiscordAPIError(50013, "Missing Permissions", 403));
      fakes.alerter.alert.mockRejectedValue(new Error("alert channel gone"));

      await expect(engine.escalate(SPAMMER, sameChannelDetection())).resolves.toBeNull();
    });
  });

  describe("rollback after the mute", () => {
    it("undoes the mute when the card cannot be posted", async () => {
      fakes.surface.post.mockRejectedValue(new Error("review channel missing"));

      expect(await engine.escalate(SPAMMER, sameChannelDetection())).toBeNull();

      const reason = "Spam escalation rolled back: review card could not be posted";
      expect(fakes.containment.unmute).toHaveBeenCalledWith(SPAMMER, reason);
      expect(fakes.muted.size).toBe(0);
      expect(muteRepository.get("guild-1", "user-1")).toBeNull();
      expect(ctx.flagged.has(SPAMMER)).toBe(false);
      expect(fakes.audit.logModerationAction).toHaveBeenLastCalledWith({
        guildId: "guild-1",
        action: "unmute",
        subjectId: "user-1",
        performedBy: "system",
        reason,
      });
      expect(fakes.alerter.alert).toHaveBeenCalledWith(
        "guild-1",
        "Spam escalation for <@user-1> failed (review card could not be posted); the mute was rolled back."
      );
    });

    it("marks the card failed and rolls back when the review cannot be stored", async () => {
      ctx.reviews = {
        ...reviewRepository,
        insert: () => {
          throw createSqliteError("SQLITE_CONSTRAINT_UNIQUE", "UNIQUE constraint failed: spam_review.review_id");
        },
      };

      expect(await engine.escalate(SPAMMER, sameChannelDetection())).toBeNull();

      expect(fakes.surface.resolve).toHaveBeenCalledWith("guild-1", "1000", ESCALATION_FAILED_NOTICE);
      expect(fakes.containment.unmute).toHaveBeenCalledWith(
        SPAMMER,
        "Spam escalation rolled back: review record could not be stored"
      );
      expect(reviewRepository.get("1000")).toBeNull();
      expect(ctx.flagged.has(SPAMMER)).toBe(false);
    });

    it("a member who already left counts as rolled back", async () => {
      fakes.surface.post.mockRejectedValue(new Error("review channel missing"));
      fakes.containment.unmute.mockRejectedValue(createDiscordAPIError(10007, "Unknown Member", 404));

      await engine.escalate(SPAMMER, sameChannelDetection());

      expect(muteRepository.get("guild-1", "user-1")).toBeNull();
      expect(fakes.alerter.alert).toHaveBeenCalledWith(
        "guild-1",
        "Spam escalation for <@user-1> failed (review card could not be posted); the mute was rolled back."
      );
    });

    it("hands a failed rollback to the expiry sweep", async () => {
      fakes.surface.post.mockRejectedValue(new Error("review channel missing"));
      fakes.containment.unmute.mockRejectedValue(createDiscordAPIError(50013, "Missing Permissions", 403));

      await engine.escalate(SPAMMER, sameChannelDetection());

      expect(muteRepository.listDue(START_S)).toEqual([
        {
          guildId: "guild-1",
          userId: "user-1",
          unmuteAt: START_S,
          reason: "Spam escalation rolled back: review card could not be posted",
        },
      ]);
      expect(ctx.flagged.has(SPAMMER)).toBe(false);
      expect(fakes.alerter.alert).toHaveBeenCalledWith(
        "guild-1",
        "Spam escalation for <@user-1> failed (review card could not be posted) and the mute could not be removed yet. It will be retried; unmute them manually if it persists."
      );
    });
  });

  describe("trigger / idle", () => {
    it("runs escalation in the background and idle() waits for it", async () => {
      engine.trigger(SPAMMER, sameChannelDetection());
      // flagged before the first await
      expect(ctx.flagged.has(SPAMMER)).toBe(true);
      expect(engine.pendingCount).toBe(1);

      await engine.idle();

      expect(engine.pendingCount).toBe(0);
      expect(reviewRepository.get("1000")).not.toBeNull();
    });

    it("rolls back when the mute record cannot be stored", async () => {
      ctx.mutes = {
        ...muteRepository,
        hold: () => {
          throw createSqliteError("SQLITE_FULL", "database or disk is full");
        },
      };

      engine.trigger(SPAMMER, sameChannelDetection());
      await engine.idle();

      expect(ctx.flagged.has(SPAMMER)).toBe(false);
      expect(fakes.containment.unmute).toHaveBeenCalledWith(
        SPAMMER,
        "Spam escalation rolled back: mute record could not be stored"
      );
      expect(fakes.surface.post).not.toHaveBeenCalled();
    });
  });
});
