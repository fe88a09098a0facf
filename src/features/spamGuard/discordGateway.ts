/**
 * WHAT: discord.js implementations of the spam guard collaborators: mute-role
 *       containment, member DMs, the staff review card, ops alerts and the audit log.
 * WHY: Everything platform specific lives here; the engine only sees the interfaces.
 * FLOWS:
 *  - mute/unmute → add/remove the guild's mute role
 *  - post(card) → embed in the review channel, then buttons keyed by the message id
 *  - resolve(reviewId, notice) → recolor, append resolution, strip buttons
 * DOCS:
 *  - EmbedBuilder: https://discord.js.org/#/docs/builders/main/class/EmbedBuilder
 *  - ButtonBuilder: https://discord.js.org/#/docs/builders/main/class/ButtonBuilder
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  Colors,
  EmbedBuilder,
  type Client,
  type Guild,
  type Role,
  type GuildTextBasedChannel,
} from "discord.js";
import { getSpamGuardConfig, type SpamGuardConfig } from "../../config/spamGuardStore.js";
import { SAFE_ALLOWED_MENTIONS } from "../../lib/constants.js";
import { MissingPermissionError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { confirmButtonId, reviewButtonId } from "../../lib/componentIds.js";
import { recordModAction } from "../../logging/modActions.js";
import { SYSTEM_ACTOR_ID } from "./context.js";
import { bannedNotice, mutedNotice } from "./reviewCard.js";
import type {
  ActorNotice,
  ActorNotifier,
  ActorRef,
  AuditLog,
  CardTone,
  ContainmentGateway,
  ModActionKind,
  ModerationAuditEntry,
  OpsAlerter,
  ResolutionNotice,
  ReviewAction,
  ReviewCard,
  ReviewSurface,
} from "./types.js";

// ===== Rendering =====

const TONE_COLORS: Record<CardTone, number> = {
  alert: Colors.Red,
  lifted: Colors.Green,
  confirmed: Colors.Orange,
  banned: Colors.DarkRed,
  expired: Colors.Yellow,
  failed: Colors.Grey,
};

const BUTTONS: Record<ReviewAction, { label: string; style: ButtonStyle }> = {
  lift: { label: "Remove Mute", style: ButtonStyle.Success },
  keep: { label: "Keep Mute", style: ButtonStyle.Secondary },
  ban: { label: "Ban User", style: ButtonStyle.Danger },
};

const AUDIT_COLORS: Record<ModActionKind, number> = {
  mute: Colors.Orange,
  unmute: Colors.Green,
  ban: Colors.DarkRed,
};

export function renderReviewEmbed(card: ReviewCard): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(card.title)
    .setColor(TONE_COLORS[card.tone])
    .addFields(card.fields.map((field) => ({ name: field.name, value: field.value, inline: false })))
    .setFooter({ text: card.footer })
    .setTimestamp();
}

export function renderReviewButtons(
  reviewId: string,
  actions: ReviewAction[]
): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    actions.map((action) =>
      new ButtonBuilder()
        .setCustomId(reviewButtonId(action, reviewId))
        .setLabel(BUTTONS[action].label)
        .setStyle(BUTTONS[action].style)
    )
  );
}

export function renderConfirmButtons(token: string): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder().setCustomId(confirmButtonId("yes", token)).setLabel("Confirm").setStyle(ButtonStyle.Success),
    new ButtonBuilder().setCustomId(confirmButtonId("no", token)).setLabel("Cancel").setStyle(ButtonStyle.Secondary)
  );
}

// ===== Gateway =====

/**
 * One object implements every collaborator; they all need the client and the
 * guild's config, and index.ts wires it in once.
 */
export class DiscordSpamGateway
  implements ContainmentGateway, ActorNotifier, ReviewSurface, OpsAlerter, AuditLog
{
  constructor(
    private readonly client: Client,
    private readonly getConfig: (guildId: string) => SpamGuardConfig = getSpamGuardConfig
  ) {}

  // ----- containment -----

  async mute(actor: ActorRef, reason: string): Promise<void> {
    const guild = await this.client.guilds.fetch(actor.guildId);
    const role = await this.muteRole(guild);
    const member = await guild.members.fetch(actor.userId);
    if (member.roles.cache.has(role.id)) return;
    await member.roles.add(role, reason);
  }

  async unmute(actor: ActorRef, reason: string): Promise<void> {
    const guild = await this.client.guilds.fetch(actor.guildId);
    const role = await this.muteRole(guild);
    const member = await guild.members.fetch(actor.userId);
    if (!member.roles.cache.has(role.id)) return;
    await member.roles.remove(role, reason);
  }

  async ban(actor: ActorRef, reason: string): Promise<void> {
    const guild = await this.client.guilds.fetch(actor.guildId);
    // By id, so it works for members who already left
    await guild.members.ban(actor.userId, { reason });
  }

  /**
   * Pre-checks that turn into "permission" errors, so escalation aborts
   * instead of retrying something that can't work.
   */
  private async muteRole(guild: Guild): Promise<Role> {
    const { muteRoleId } = this.getConfig(guild.id);
    if (!muteRoleId) {
      throw new MissingPermissionError("No mute role configured", ["MuteRole"], guild.id);
    }
    const role = guild.roles.cache.get(muteRoleId) ?? (await guild.roles.fetch(muteRoleId));
    if (!role) {
      throw new MissingPermissionError(`Mute role ${muteRoleId} not found`, ["MuteRole"], guild.id);
    }
    if (!role.editable) {
      throw new MissingPermissionError("Mute role is above my highest role", ["ManageRoles"], guild.id);
    }
    return role;
  }

  // ----- notifier -----

  async notify(actor: ActorRef, notice: ActorNotice): Promise<void> {
    const guild = await this.client.guilds.fetch(actor.guildId);
    const user = await this.client.users.fetch(actor.userId);
    const content =
      notice.kind === "muted" ? mutedNotice(guild.name) : bannedNotice(guild.name, notice.reason);
    await user.send({ content, allowedMentions: SAFE_ALLOWED_MENTIONS });
  }

  // ----- review surface -----

  async post(guildId: string, card: ReviewCard): Promise<string> {
    const channel = await this.channel(guildId, this.getConfig(guildId).reviewChannelId, "review");
    const message = await channel.send({
      embeds: [renderReviewEmbed(card)],
      allowedMentions: SAFE_ALLOWED_MENTIONS,
    });

    // Button ids carry the message id, which only exists after sending
    try {
      await message.edit({ components: [renderReviewButtons(message.id, card.actions)] });
    } catch (err) {
      // A card without buttons is useless; remove it so a retry starts clean
      await message.delete().catch((deleteErr: unknown) => {
        logger.warn({ err: deleteErr, messageId: message.id }, "[spamGuard] orphan review card not deleted");
      });
      throw err;
    }
    return message.id;
  }

  async resolve(guildId: string, reviewId: string, notice: ResolutionNotice): Promise<void> {
    const channel = await this.channel(guildId, this.getConfig(guildId).reviewChannelId, "review");
    const message = await channel.messages.fetch(reviewId);
    const original = message.embeds[0];
    const embed = original ? EmbedBuilder.from(original) : new EmbedBuilder();
    embed
      .setColor(TONE_COLORS[notice.tone])
      .addFields({ name: notice.heading, value: notice.detail, inline: false });
    await message.edit({ embeds: [embed], components: [] });
  }

  async announce(guildId: string, text: string): Promise<void> {
    const channel = await this.channel(guildId, this.getConfig(guildId).reviewChannelId, "review");
    await channel.send({ content: text, allowedMentions: SAFE_ALLOWED_MENTIONS });
  }

  // ----- ops alerts -----

  async alert(guildId: string, text: string): Promise<void> {
    const config = this.getConfig(guildId);
    const channel = await this.channel(guildId, config.alertChannelId ?? config.reviewChannelId, "alert");
    await channel.send({ content: `⚠️ ${text}`, allowedMentions: SAFE_ALLOWED_MENTIONS });
  }

  // ----- audit -----

  async logModerationAction(entry: ModerationAuditEntry): Promise<void> {
    recordModAction(entry);

    const { logChannelId } = this.getConfig(entry.guildId);
    if (!logChannelId) return;

    const performer =
      entry.performedBy === SYSTEM_ACTOR_ID
        ? this.client.user
          ? `<@${this.client.user.id}>`
          : "system"
        : `<@${entry.performedBy}>`;

    const embed = new EmbedBuilder()
      .setTitle(`Member ${entry.action}`)
      .setColor(AUDIT_COLORS[entry.action])
      .addFields(
        { name: "Member", value: `<@${entry.subjectId}> (${entry.subjectId})`, inline: true },
        { name: "By", value: performer, inline: true },
        { name: "Reason", value: entry.reason, inline: false }
      )
      .setTimestamp();
    if (entry.duration) {
      embed.addFields({ name: "Duration", value: entry.duration, inline: true });
    }

    const channel = await this.channel(entry.guildId, logChannelId, "log");
    await channel.send({ embeds: [embed], allowedMentions: SAFE_ALLOWED_MENTIONS });
  }

  // ----- helpers -----

  private async channel(
    guildId: string,
    channelId: string | null,
    purpose: string
  ): Promise<GuildTextBasedChannel> {
    if (!channelId) {
      throw new MissingPermissionError(`No ${purpose} channel configured`, ["ViewChannel"], guildId);
    }
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isTextBased() || channel.isDMBased() || channel.guildId !== guildId) {
      throw new MissingPermissionError(`Cannot use ${purpose} channel ${channelId}`, ["SendMessages"], guildId);
    }
    return channel;
  }
}
