/**
 * WHAT: /spamguard: per-guild spam guard settings and the open review list.
 * WHY: Mute role and staff channels differ per guild; staff also need to see
 *      which cases are waiting without scrolling the review channel.
 * FLOWS:
 *  - view → effective config + thresholds + pending count + scheduler health
 *  - set → upsert the given fields
 *  - pending → open reviews with deadlines
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ChannelType,
  Colors,
  EmbedBuilder,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
} from "discord.js";
import {
  getSpamGuardConfig,
  setSpamGuardConfig,
  type SpamGuardConfig,
  type SpamGuardConfigPatch,
} from "../config/spamGuardStore.js";
import { replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { SAFE_ALLOWED_MENTIONS } from "../lib/constants.js";
import { getSchedulerHealth } from "../lib/schedulerHealth.js";
import type { SpamGuard } from "../features/spamGuard/index.js";
import type { ReviewRecord } from "../features/spamGuard/types.js";

/** Discord caps embed descriptions at 4096; pending lists stop well short */
const PENDING_LIST_MAX = 15;

export const data = new SlashCommandBuilder()
  .setName("spamguard")
  .setDescription("Spam guard settings and open spam reviews")
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .addSubcommand((sub) => sub.setName("view").setDescription("Show the current spam guard settings"))
  .addSubcommand((sub) =>
    sub
      .setName("set")
      .setDescription("Change spam guard settings for this server")
      .addBooleanOption((o) => o.setName("enabled").setDescription("Turn spam detection on or off"))
      .addRoleOption((o) => o.setName("mute_role").setDescription("Role applied to contain spammers"))
      .addChannelOption((o) =>
        o.setName("review_channel").setDescription("Where review cards are posted").addChannelTypes(ChannelType.GuildText)
      )
      .addChannelOption((o) =>
        o.setName("alert_channel").setDescription("Where operational alerts go").addChannelTypes(ChannelType.GuildText)
      )
      .addChannelOption((o) =>
        o.setName("log_channel").setDescription("Where moderation actions are logged").addChannelTypes(ChannelType.GuildText)
      )
      .addRoleOption((o) => o.setName("exempt_role").setDescription("Members with this role are never checked"))
      .addChannelOption((o) =>
        o
          .setName("exempt_category")
          .setDescription("Channels in this category are never checked")
          .addChannelTypes(ChannelType.GuildCategory)
      )
  )
  .addSubcommand((sub) => sub.setName("pending").setDescription("List open spam reviews"));

const roleText = (id: string | null) => (id ? `<@&${id}>` : "not set");
const channelText = (id: string | null) => (id ? `<#${id}>` : "not set");

export function describeConfig(config: SpamGuardConfig): string {
  return [
    `**Enabled:** ${config.enabled ? "yes" : "no"}`,
    `**Mute role:** ${roleText(config.muteRoleId)}`,
    `**Review channel:** ${channelText(config.reviewChannelId)}`,
    `**Alert channel:** ${config.alertChannelId ? channelText(config.alertChannelId) : "review channel"}`,
    `**Log channel:** ${channelText(config.logChannelId)}`,
    `**Exempt role:** ${roleText(config.exemptRoleId)}`,
    `**Exempt category:** ${channelText(config.exemptCategoryId)}`,
  ].join("\n");
}

export function describePending(reviews: ReviewRecord[]): string {
  if (reviews.length === 0) return "No open spam reviews.";
  const lines = reviews
    .slice(0, PENDING_LIST_MAX)
    .map((r) => `• <@${r.userId}>: ${r.patternSummary} (auto-resolves <t:${r.expiresAt}:R>)`);
  const hidden = reviews.length - PENDING_LIST_MAX;
  if (hidden > 0) lines.push(`…and ${hidden} more`);
  return lines.join("\n");
}

function patchFrom(interaction: ChatInputCommandInteraction): SpamGuardConfigPatch {
  const patch: SpamGuardConfigPatch = {};
  const enabled = interaction.options.getBoolean("enabled");
  if (enabled !== null) patch.enabled = enabled;
  const muteRole = interaction.options.getRole("mute_role");
  if (muteRole) patch.muteRoleId = muteRole.id;
  const review = interaction.options.getChannel("review_channel");
  if (review) patch.reviewChannelId = review.id;
  const alert = interaction.options.getChannel("alert_channel");
  if (alert) patch.alertChannelId = alert.id;
  const log = interaction.options.getChannel("log_channel");
  if (log) patch.logChannelId = log.id;
  const exemptRole = interaction.options.getRole("exempt_role");
  if (exemptRole) patch.exemptRoleId = exemptRole.id;
  const exemptCategory = interaction.options.getChannel("exempt_category");
  if (exemptCategory) patch.exemptCategoryId = exemptCategory.id;
  return patch;
}

export async function execute(
  ctx: CommandContext<ChatInputCommandInteraction>,
  guard: SpamGuard
): Promise<void> {
  const { interaction } = ctx;
  const guildId = interaction.guildId;
  if (!guildId) {
    await replyOrEdit(interaction, { content: "This command can only be used in a server." });
    return;
  }

  const sub = interaction.options.getSubcommand();
  ctx.step(sub);

  if (sub === "set") {
    const patch = patchFrom(interaction);
    if (Object.keys(patch).length === 0) {
      await replyOrEdit(interaction, { content: "Nothing to change. Pass at least one option." });
      return;
    }
    const updated = setSpamGuardConfig(guildId, patch);
    await replyOrEdit(interaction, {
      content: `Spam guard settings updated.\n${describeConfig(updated)}`,
      allowedMentions: SAFE_ALLOWED_MENTIONS,
    });
    return;
  }

  if (sub === "pending") {
    const pending = guard.ctx.reviews.listPending(guildId);
    const embed = new EmbedBuilder()
      .setTitle(`Open spam reviews (${pending.length})`)
      .setColor(Colors.Orange)
      .setDescription(describePending(pending));
    await replyOrEdit(interaction, { embeds: [embed], allowedMentions: SAFE_ALLOWED_MENTIONS });
    return;
  }

  // view
  const { thresholds, timing } = guard.settings;
  const queue = guard.queue.getStats();
  const schedulers = getSchedulerHealth()
    .map((h) => `${h.name}: ${h.consecutiveFailures === 0 ? "ok" : `${h.consecutiveFailures} failures`}`)
    .join("\n");

  const embed = new EmbedBuilder()
    .setTitle("Spam guard")
    .setColor(Colors.Blurple)
    .setDescription(describeConfig(getSpamGuardConfig(guildId)))
    .addFields(
      {
        name: "Detection",
        value:
          `${thresholds.burstCount} messages in one channel, or ${thresholds.channelSpread} channels, ` +
          `within ${Math.round(thresholds.windowMs / 1000)}s`,
      },
      {
        name: "Review",
        value: `${guard.ctx.reviews.listPending(guildId).length} open; default after ${Math.round(timing.reviewDeadlineMs / 3_600_000)}h`,
      },
      { name: "Ingest queue", value: `depth ${queue.depth}, dropped ${queue.dropped}` },
      { name: "Schedulers", value: schedulers || "not started" }
    );
  await replyOrEdit(interaction, { embeds: [embed], allowedMentions: SAFE_ALLOWED_MENTIONS });
}
