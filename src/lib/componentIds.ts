/**
 * WHAT: Custom ID formats and parsers for spam review buttons.
 * WHY: Discord has no routing for components; IDs must be self-describing and
 *      parseable by regex. Convention: v1:<area>:<action>:<params>.
 *
 * ID format examples:
 *  - v1:spam:lift:1187654321098765432 → review card button, param is the review id
 *  - v1:spam:yes:9f3a1c2b → confirmation prompt button, param is the confirmation token
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ReviewAction } from "../features/spamGuard/types.js";

// Review card buttons. Review ids are Discord message snowflakes.
// These buttons live in the staff channel for up to 12 hours, so the format is frozen under v1.
export const BTN_SPAM_REVIEW_RE = /^v1:spam:(lift|keep|ban):(\d+)$/;

// Two-step confirmation buttons. Token is an 8-char hex nonce.
export const BTN_SPAM_CONFIRM_RE = /^v1:spam:(yes|no):([a-f0-9]{8})$/;

export const reviewButtonId = (action: ReviewAction, reviewId: string): string =>
  `v1:spam:${action}:${reviewId}`;

export const confirmButtonId = (answer: "yes" | "no", token: string): string =>
  `v1:spam:${answer}:${token}`;

/**
 * Discriminated union for routed spam guard components.
 */
export type SpamComponentRoute =
  | { type: "review_action"; action: ReviewAction; reviewId: string }
  | { type: "confirm_answer"; answer: "yes" | "no"; token: string };

function isReviewAction(value: string): value is ReviewAction {
  return value === "lift" || value === "keep" || value === "ban";
}

/**
 * Returns null when the ID belongs to some other feature.
 */
export function identifySpamComponent(id: string): SpamComponentRoute | null {
  const review = id.match(BTN_SPAM_REVIEW_RE);
  if (review && isReviewAction(review[1])) {
    return { type: "review_action", action: review[1], reviewId: review[2] };
  }

  const confirm = id.match(BTN_SPAM_CONFIRM_RE);
  if (confirm) {
    return {
      type: "confirm_answer",
      answer: confirm[1] === "yes" ? "yes" : "no",
      token: confirm[2],
    };
  }

  return null;
}
