/**
 * WHAT: Tests for /spamguard view, set and pending.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
  redact: (value: string) => value,
}));

import { Colors, MessageFlags } from "discord.js";
import { data, describeConfig, describePending, execute } from "../../src/commands/spamguard.js";
import { clearSpamGuardConfigCache, getSpamGuardConfig } from "../../src/config/spamGuardStore.js";
import { DEFAULT_SETTINGS, createSpamGuard, type SpamGuard } from "../../src/features/spamGuard/index.js";
import type { ReviewRecord } from "../../src/features/spamGuard/types.js";
import { SAFE_ALLOWED_MENTIONS } from "../../src/lib/constants.js";
import { _clearAllSchedulerHealth, recordSchedulerRun } from "../../src/lib/schedulerHealth.js";
import { muteRepository } from "../../src/store/muteStore.js";
import { reviewRepository } from "../../src/store/spamReviewStore.js";
import { createTestCommandContext } from "../utils/contextFactory.js";
import { createMockCommandInteraction } from "../utils/discordMocks.js";
import { createFakeCollaborators, resetSpamTables } from "../utils/spamGuardFakes.js";

function review(n: number, guildId = "guild-1"): ReviewRecord {
  return {
    reviewId: String(1000 + n),
    guildId,
    userId: `user-${n}`,
    createdAt: 1_704_110_400 + n,
    expiresAt: 1_704_153_600 + n,
    patternKind: "same_channel",
    patternSummary: "10 messages in <#chan-1> within 5 seconds",
  };
}

const DEFAULT_CONFIG_TEXT = [
  "**Enabled:** yes",
  "**Mute role:** not set",
  "**Review channel:** not set",
  "**Alert channel:** review channel",
  "**Log channel:** not set",
  "**Exempt role:** not set",
  "**Exempt category:** not set",
].join("\n");

describe("/spamguard", () => {
  let guard: SpamGuard;

  beforeEach(() => {
    resetSpamTables();
    clearSpamGuardConfigCache("guild-1");
    _clearAllSchedulerHealth();
    guard = createSpamGuard({
      collaborators: createFakeCollaborators(),
      reviews: reviewRepository,
      mutes: muteRepository,
      settings: DEFAULT_SETTINGS,
    });
  });

  describe("data", () => {
    it("is restricted to Manage Server and has three subcommands", () => {
      const json = data.toJSON();
      expect(json.name).toBe("spamguard");
      expect(json.default_member_permissions).toBe("32");
      expect(json.options?.map((o) => o.name)).toEqual(["view", "set", "pending"]);
    });
  });

  describe("describeConfig", () => {
    it("renders mentions for configured ids", () => {
      const text = describeConfig({
        enabled: false,
        muteRoleId: "role-muted",
        reviewChannelId: "chan-review",
        alertChannelId: "chan-alerts",
        logChannelId: null,
        exemptRoleId: null,
        exemptCategoryId: "cat-staff",
      });

      expect(text.split("\n")).toEqual([
        "**Enabled:** no",
        "**Mute role:** <@&role-muted>",
        "**Review channel:** <#chan-review>",
        "**Alert channel:** <#chan-alerts>",
        "**Log channel:** not set",
        "**Exempt role:** not set",
        "**Exempt category:** <#cat-staff>",
      ]);
    });
  });

  describe("describePending", () => {
    it("says so when nothing is open", () => {
      expect(describePending([])).toBe("No open spam reviews.");
    });

    it("lists each review with its deadline", () => {
      expect(describePending([review(1)])).toBe(
        "• <@user-1>: 10 messages in <#chan-1> within 5 seconds (auto-resolves <t:1704153601:R>)"
      );
    });

    it("caps the list at 15 entries", () => {
      const lines = describePending(Array.from({ length: 17 }, (_, i) => review(i + 1))).split("\n");

      expect(lines).toHaveLength(16);
      expect(lines[15]).toBe("…and 2 more");
    });
  });

  describe("execute", () => {
    it("refuses to run outside a server", async () => {
      const interaction = createMockCommandInteraction({ subcommand: "view", guildId: null });
      const ctx = createTestCommandContext(interaction);

      await execute(ctx, guard);

      expect(interaction.reply).toHaveBeenCalledWith({
        content: "This command can only be used in a server.",
        flags: MessageFlags.Ephemeral,
      });
      expect(ctx.phases).toEqual([]);
    });

    it("set stores the given fields and echoes the result", async () => {
      const interaction = createMockCommandInteraction({
        subcommand: "set",
        booleans: { enabled: false },
        roles: { mute_role: "role-muted" },
        channels: { review_channel: "chan-review" },
      });
      const ctx = createTestCommandContext(interaction);

      await execute(ctx, guard);

      expect(ctx.phases).toEqual(["set"]);
      expect(interaction.reply).toHaveBeenCalledWith({
        content: [
          "Spam guard settings updated.",
          "**Enabled:** no",
          "**Mute role:** <@&role-muted>",
          "**Review channel:** <#chan-review>",
          "**Alert channel:** review channel",
          "**Log channel:** not set",
          "**Exempt role:** not set",
          "**Exempt category:** not set",
        ].join("\n"),
        allowedMentions: SAFE_ALLOWED_MENTIONS,
        flags: MessageFlags.Ephemeral,
      });
      expect(getSpamGuardConfig("guild-1")).toMatchObject({
        enabled: false,
        muteRoleId: "role-muted",
        reviewChannelId: "chan-review",
      });
    });

    it("set without options changes nothing", async () => {
      const interaction = createMockCommandInteraction({ subcommand: "set" });

      await execute(createTestCommandContext(interaction), guard);

      expect(interaction.reply).toHaveBeenCalledWith({
        content: "Nothing to change. Pass at least one option.",
        flags: MessageFlags.Ephemeral,
      });
      expect(getSpamGuardConfig("guild-1").muteRoleId).toBeNull();
    });

    it("pending lists this guild's open reviews only", async () => {
      reviewRepository.insert(review(1));
      reviewRepository.insert(review(2));
      reviewRepository.insert(review(3, "guild-2"));
      const interaction = createMockCommandInteraction({ subcommand: "pending" });

      await execute(createTestCommandContext(interaction), guard);

      expect(interaction.reply).toHaveBeenCalledWith(
        expect.objectContaining({
          embeds: [
            expect.objectContaining({
              data: expect.objectContaining({
                title: "Open spam reviews (2)",
                color: Colors.Orange,
                description: describePending([review(1), review(2)]),
              }),
            }),
          ],
          flags: MessageFlags.Ephemeral,
        })
      );
    });

    it("view shows config, thresholds and runtime state", async () => {
      reviewRepository.insert(review(1));
      recordSchedulerRun("spamReconcile", true);
      recordSchedulerRun("spamMuteExpiry", false);
      const interaction = createMockCommandInteraction({ subcommand: "view" });

      await execute(createTestCommandContext(interaction), guard);

      expect(interaction.reply).toHaveBeenCalledWith(
        expect.objectContaining({
          embeds: [
            expect.objectContaining({
              data: expect.objectContaining({
                title: "Spam guard",
                color: Colors.Blurple,
                description: DEFAULT_CONFIG_TEXT,
                fields: [
                  { name: "Detection", value: "10 messages in one channel, or 10 channels, within 5s" },
                  { name: "Review", value: "1 open; default after 12h" },
                  { name: "Ingest queue", value: "depth 0, dropped 0" },
                  { name: "Schedulers", value: "spamReconcile: ok\nspamMuteExpiry: 1 failures" },
                ],
              }),
            }),
          ],
        })
      );
    });

    it("view reports schedulers that have not run yet", async () => {
      const interaction = createMockCommandInteraction({ subcommand: "view" });

      await execute(createTestCommandContext(interaction), guard);

      expect(interaction.reply).toHaveBeenCalledWith(
        expect.objectContaining({
          embeds: [
            expect.objectContaining({
              data: expect.objectContaining({
                fields: expect.arrayContaining([{ name: "Schedulers", value: "not started" }]),
              }),
            }),
          ],
        })
      );
    });
  });
});
