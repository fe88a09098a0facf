/**
 * WHAT: Platform-neutral review card and resolution notice builders.
 * WHY: The escalation engine decides WHAT the card says; discordGateway.ts
 *      turns it into an embed. Keeping text here makes it testable without discord.js.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  REVIEW_CHANNEL_LIST_MAX,
  REVIEW_SAMPLE_LINES,
  SAMPLE_PREVIEW_MULTI_CHANNEL,
  SAMPLE_PREVIEW_SAME_CHANNEL,
} from "../../lib/constants.js";
import { formatClockUtc, formatDurationShort } from "../../lib/time.js";
import type {
  ActivityRecord,
  DetectionResult,
  ResolutionNotice,
  ReviewCard,
  ReviewCardField,
  TerminalReviewState,
} from "./types.js";

export interface CardTiming {
  windowMs: number;
  reviewDeadlineMs: number;
  defaultMuteMs: number;
}

const userMention = (userId: string) => `<@${userId}>`;
const channelMention = (channelId: string) => `<#${channelId}>`;

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function windowLabel(windowMs: number): string {
  const seconds = Math.round(windowMs / 1000);
  return seconds === 1 ? "1 second" : `${seconds} seconds`;
}

/** "1 day", "12 hours", "30 minutes" */
export function durationPhrase(ms: number): string {
  const short = formatDurationShort(ms);
  const value = Number(short.slice(0, -1));
  const unit = { d: "day", h: "hour", m: "minute" }[short.slice(-1)] ?? "minute";
  return `${value} ${unit}${value === 1 ? "" : "s"}`;
}

function sampleLines(samples: ActivityRecord[], withChannel: boolean): string[] {
  const previewMax = withChannel ? SAMPLE_PREVIEW_MULTI_CHANNEL : SAMPLE_PREVIEW_SAME_CHANNEL;
  return samples.slice(0, REVIEW_SAMPLE_LINES).map((entry) => {
    const stamp = `\`[${formatClockUtc(entry.timestamp)}]\``;
    const preview = truncate(entry.contentPreview, previewMax);
    return withChannel
      ? `${stamp} ${channelMention(entry.channelId)}: ${preview}`
      : `${stamp} ${preview}`;
  });
}

/** First REVIEW_CHANNEL_LIST_MAX channel mentions, then "and N more..." */
export function channelListText(channelIds: string[]): string {
  const shown = channelIds.slice(0, REVIEW_CHANNEL_LIST_MAX).map(channelMention).join(", ");
  const hidden = channelIds.length - REVIEW_CHANNEL_LIST_MAX;
  return hidden > 0 ? `${shown} and ${hidden} more...` : shown;
}

/**
 * One-line description stored on the review record (and shown by /spamguard pending).
 */
export function summarizeDetection(detection: DetectionResult, windowMs: number): string {
  const within = `within ${windowLabel(windowMs)}`;
  switch (detection.kind) {
    case "same_channel":
      return `${detection.count} messages in ${channelMention(detection.channelId)} ${within}`;
    case "multi_channel":
      return `${detection.totalCount} messages across ${detection.distinctChannelCount} channels ${within}`;
    default: {
      const unreachable: never = detection;
      throw new Error(`Unhandled detection: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function buildReviewCard(
  userId: string,
  detection: DetectionResult,
  timing: CardTiming
): ReviewCard {
  const fields: ReviewCardField[] = [
    { name: "User", value: `${userMention(userId)}\nID: ${userId}` },
  ];
  const within = `within ${windowLabel(timing.windowMs)}`;

  let lines: string[];
  let total: number;
  switch (detection.kind) {
    case "same_channel":
      fields.push({
        name: "Spam Pattern",
        value: `**${detection.count} messages** in ${channelMention(detection.channelId)} ${within}`,
      });
      lines = sampleLines(detection.samples, false);
      total = detection.count;
      break;
    case "multi_channel":
      fields.push({
        name: "Spam Pattern",
        value: `**${detection.totalCount} messages** across **${detection.distinctChannelCount} channels** ${within}`,
      });
      fields.push({ name: "Channels", value: channelListText(detection.channelIds) });
      lines = sampleLines(detection.samples, true);
      total = detection.totalCount;
      break;
    default: {
      const unreachable: never = detection;
      throw new Error(`Unhandled detection: ${JSON.stringify(unreachable)}`);
    }
  }

  if (lines.length > 0) {
    fields.push({
      name: `Sample Messages (showing ${lines.length} of ${total})`,
      value: lines.join("\n"),
    });
  }

  fields.push({
    name: "Action Taken",
    value:
      `User has been automatically muted\n` +
      `If no action is taken in ${durationPhrase(timing.reviewDeadlineMs)}, ` +
      `mute will be extended to ${durationPhrase(timing.defaultMuteMs)}`,
  });

  return {
    title: "Spam Detected - User Auto-Muted",
    tone: "alert",
    userId,
    fields,
    footer: "Use buttons below to take action",
    actions: ["lift", "keep", "ban"],
  };
}

/**
 * Resolution appended to the card. reviewerId is absent for the automatic default.
 */
export function buildResolutionNotice(
  state: TerminalReviewState,
  defaultMuteMs: number,
  reviewerId?: string
): ResolutionNotice {
  const by = reviewerId ? userMention(reviewerId) : "the system";
  const duration = durationPhrase(defaultMuteMs);
  switch (state) {
    case "lifted":
      return { tone: "lifted", heading: "Resolution", detail: `Mute removed by ${by}` };
    case "confirmed":
      return { tone: "confirmed", heading: "Resolution", detail: `Mute kept for ${duration} by ${by}` };
    case "banned":
      return { tone: "banned", heading: "Resolution", detail: `User banned by ${by}` };
    case "expired":
      return {
        tone: "expired",
        heading: "Resolution",
        detail: `No staff action taken; mute extended to ${duration} automatically`,
      };
    default: {
      const unreachable: never = state;
      throw new Error(`Unhandled review state: ${String(unreachable)}`);
    }
  }
}

/** Shown on a card whose review record could not be stored */
export const ESCALATION_FAILED_NOTICE: ResolutionNotice = {
  tone: "failed",
  heading: "Action failed",
  detail: "This case could not be recorded and the mute was rolled back. Review the member manually.",
};

export function expiryAnnouncement(userId: string, defaultMuteMs: number): string {
  return (
    `No action was taken on spam report for ${userMention(userId)}. ` +
    `Automatically muted for ${durationPhrase(defaultMuteMs)}.`
  );
}

export function mutedNotice(guildName: string): string {
  return (
    `You have been automatically muted in **${guildName}** for spam detection. ` +
    `A staff member will review your case shortly.`
  );
}

export function bannedNotice(guildName: string, reason: string): string {
  return `You have been **banned** from **${guildName}** for spam.\nReason: ${reason}`;
}
