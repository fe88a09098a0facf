/**
 * WHAT: Centralized constants for limits and Discord message options.
 * WHY: Single source of truth for magic numbers.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MessageMentionOptions } from "discord.js";

// ===== Discord Message Options =====

/**
 * Suppresses all @mentions. Review cards quote spam content, and spam loves @everyone.
 */
export const SAFE_ALLOWED_MENTIONS: MessageMentionOptions = { parse: [] };

// ===== Activity tracking =====

/** Characters of message content kept per activity record */
export const CONTENT_PREVIEW_CHARS = 100;

// ===== Review card rendering =====

/** Sample lines shown on a review card */
export const REVIEW_SAMPLE_LINES = 5;

/** Channel mentions listed on a multi-channel card before "and N more" */
export const REVIEW_CHANNEL_LIST_MAX = 10;

/** Preview length per sample line (same-channel / multi-channel cards) */
export const SAMPLE_PREVIEW_SAME_CHANNEL = 50;
export const SAMPLE_PREVIEW_MULTI_CHANNEL = 30;

// ===== Shutdown =====

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;
