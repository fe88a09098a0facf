/**
 * WHAT: Discord entry points for the spam guard: message intake and review buttons.
 * WHY: Keeps discord.js types out of the engine; these translate events into
 *      ActivityEvents and button clicks into ReviewFlow calls.
 * FLOWS:
 *  - messageCreate → shouldTrack() → guard.submit()
 *  - v1:spam:<action>:<reviewId> → permission check → ephemeral confirm prompt
 *  - v1:spam:yes|no:<token> → flow.confirm() / flow.cancel() → prompt edited with outcome
 * DOCS:
 *  - ButtonInteraction: https://discord.js.org/#/docs/discord.js/main/class/ButtonInteraction
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { MessageFlags, PermissionFlagsBits, type ButtonInteraction, type Message } from "discord.js";
import { getSpamGuardConfig, type SpamGuardConfig } from "../../config/spamGuardStore.js";
import { replyOrEdit } from "../../lib/cmdWrap.js";
import { identifySpamComponent } from "../../lib/componentIds.js";
import { SAFE_ALLOWED_MENTIONS } from "../../lib/constants.js";
import { logger } from "../../lib/logger.js";
import { renderConfirmButtons } from "./discordGateway.js";
import type { SpamGuard } from "./index.js";
import type { ConfirmOutcome } from "./reviewFlow.js";
import { durationPhrase } from "./reviewCard.js";
import type { ActivityEvent, ReviewAction, ReviewerContext } from "./types.js";

// ===== Message intake =====

export interface IntakeCandidate {
  isBot: boolean;
  guildId: string | null;
  /** null when the member object wasn't available */
  roleIds: string[] | null;
  /** Category the channel sits under (for threads, the parent's category) */
  categoryId: string | null;
}

/**
 * Cheap filters applied before anything is queued. Members who already carry
 * the mute role are skipped; they are someone else's case.
 */
export function shouldTrack(candidate: IntakeCandidate, config: SpamGuardConfig): boolean {
  if (candidate.isBot || !candidate.guildId) return false;
  if (!config.enabled || !config.muteRoleId) return false;

  const roles = candidate.roleIds ?? [];
  if (config.exemptRoleId && roles.includes(config.exemptRoleId)) return false;
  if (roles.includes(config.muteRoleId)) return false;
  if (config.exemptCategoryId && candidate.categoryId === config.exemptCategoryId) return false;

  return true;
}

function candidateFrom(message: Message): IntakeCandidate {
  if (!message.inGuild()) {
    return { isBot: message.author.bot, guildId: null, roleIds: null, categoryId: null };
  }
  const channel = message.channel;
  const categoryId = channel.isThread() ? (channel.parent?.parentId ?? null) : channel.parentId;
  return {
    isBot: message.author.bot,
    guildId: message.guildId,
    roleIds: message.member ? [...message.member.roles.cache.keys()] : null,
    categoryId,
  };
}

/**
 * messageCreate listener. Synchronous: it only filters and enqueues.
 */
export function createMessageHandler(
  guard: SpamGuard,
  getConfig: (guildId: string) => SpamGuardConfig = getSpamGuardConfig
): (message: Message) => void {
  return (message: Message) => {
    const candidate = candidateFrom(message);
    if (!candidate.guildId) return;
    if (!shouldTrack(candidate, getConfig(candidate.guildId))) return;
    if (guard.isFlagged({ guildId: candidate.guildId, userId: message.author.id })) return;

    const event: ActivityEvent = {
      actorId: message.author.id,
      realmId: candidate.guildId,
      channelId: message.channelId,
      content: message.content,
      timestamp: message.createdTimestamp,
    };
    guard.submit(event);
  };
}

// ===== Staff text =====

const mention = (userId: string) => `<@${userId}>`;

export function confirmPrompt(action: ReviewAction, userId: string, defaultMuteMs: number): string {
  switch (action) {
    case "lift":
      return `Are you sure you want to **remove the mute** from ${mention(userId)}?`;
    case "keep":
      return `Are you sure you want to **keep the mute** on ${mention(userId)}? This will extend the mute for ${durationPhrase(defaultMuteMs)}.`;
    case "ban":
      return `Are you sure you want to **ban** ${mention(userId)} for spam?`;
    default: {
      const unreachable: never = action;
      throw new Error(`Unhandled review action: ${String(unreachable)}`);
    }
  }
}

export function forbiddenText(action: ReviewAction): string {
  return action === "ban"
    ? "❌ You don't have permission to ban members."
    : "❌ You don't have permission to take this action.";
}

export const NOT_ACTIVE_TEXT = "This spam report is no longer active.";
export const NOT_OWNER_TEXT = "❌ Only the moderator who initiated this action can confirm.";

export function outcomeText(outcome: ConfirmOutcome, defaultMuteMs: number): string {
  switch (outcome.status) {
    case "resolved": {
      const who = mention(outcome.review.userId);
      switch (outcome.state) {
        case "lifted":
          return `✅ Mute removed from ${who}`;
        case "confirmed":
          return `✅ Mute kept on ${who} for ${durationPhrase(defaultMuteMs)}`;
        case "banned":
          return `✅ ${who} has been banned.`;
        case "expired":
          return `Mute on ${who} extended automatically.`;
        default: {
          const unreachable: never = outcome.state;
          throw new Error(`Unhandled state: ${String(unreachable)}`);
        }
      }
    }
    case "already_resolved":
      return "This spam report has already been resolved.";
    case "forbidden":
      return forbiddenText(outcome.action);
    case "failed":
      return `❌ Action failed: ${outcome.message} The report is still open.`;
    case "expired":
      return "This confirmation has expired. Click the button on the report again.";
    case "not_owner":
      return NOT_OWNER_TEXT;
    default: {
      const unreachable: never = outcome;
      throw new Error(`Unhandled outcome: ${JSON.stringify(unreachable)}`);
    }
  }
}

// ===== Buttons =====

export function reviewerFrom(interaction: ButtonInteraction): ReviewerContext {
  const perms = interaction.memberPermissions;
  return {
    userId: interaction.user.id,
    canModerate: perms?.has(PermissionFlagsBits.ModerateMembers) ?? false,
    canBan: perms?.has(PermissionFlagsBits.BanMembers) ?? false,
  };
}

/**
 * Routes spam guard buttons. Returns false when the custom id belongs to
 * another feature so the caller can keep dispatching.
 */
export async function handleSpamButton(
  interaction: ButtonInteraction,
  guard: SpamGuard
): Promise<boolean> {
  const route = identifySpamComponent(interaction.customId);
  if (!route) return false;

  const defaultMuteMs = guard.settings.timing.defaultMuteMs;

  if (route.type === "review_action") {
    const result = guard.flow.request(route.reviewId, route.action, reviewerFrom(interaction));
    if (!result.ok) {
      await replyOrEdit(interaction, {
        content: result.reason === "forbidden" ? forbiddenText(route.action) : NOT_ACTIVE_TEXT,
      });
      return true;
    }
    await replyOrEdit(interaction, {
      content: confirmPrompt(route.action, result.review.userId, defaultMuteMs),
      components: [renderConfirmButtons(result.token)],
      allowedMentions: SAFE_ALLOWED_MENTIONS,
    });
    return true;
  }

  if (route.answer === "no") {
    const cancelled = guard.flow.cancel(route.token, interaction.user.id);
    if (cancelled === "not_owner") {
      await replyOrEdit(interaction, { content: NOT_OWNER_TEXT });
      return true;
    }
    await interaction.update({
      content: cancelled === "cancelled" ? "Cancelled." : outcomeText({ status: "expired" }, defaultMuteMs),
      components: [],
    });
    return true;
  }

  // Platform calls may take a while; ack within 3s and edit the prompt afterwards
  await interaction.deferUpdate();
  const outcome = await guard.flow.confirm(route.token, interaction.user.id);
  logger.debug(
    { evt: "spam_confirm_outcome", status: outcome.status, userId: interaction.user.id },
    "[spamGuard] confirmation handled"
  );

  if (outcome.status === "not_owner") {
    await interaction.followUp({ content: NOT_OWNER_TEXT, flags: MessageFlags.Ephemeral });
    return true;
  }
  await interaction.editReply({
    content: outcomeText(outcome, defaultMuteMs),
    components: [],
    allowedMentions: SAFE_ALLOWED_MENTIONS,
  });
  return true;
}
