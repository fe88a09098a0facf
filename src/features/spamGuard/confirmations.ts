/**
 * WHAT: Pending two-step confirmations for review actions.
 * WHY: A misclick on "Ban" is not undoable. Every action is requested, then
 *      confirmed by the same reviewer within a short window.
 * FLOWS:
 *  - issue(reviewId, action, reviewer) → token for the yes/no buttons
 *  - take(token, callerId) → the pending action, once
 *  - cancel(token, callerId) → drop it, nothing changes
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { randomBytes } from "node:crypto";
import type { ReviewAction, ReviewerContext } from "./types.js";

export const DEFAULT_CONFIRM_TIMEOUT_MS = 30_000;

export interface PendingConfirmation {
  token: string;
  reviewId: string;
  action: ReviewAction;
  reviewer: ReviewerContext;
  /** Epoch milliseconds */
  expiresAt: number;
}

export type TakeResult =
  | { status: "ok"; confirmation: PendingConfirmation }
  | { status: "expired" }
  | { status: "not_owner" };

export type CancelResult = "cancelled" | "expired" | "not_owner";

export class ConfirmationRegistry {
  private readonly pending = new Map<string, PendingConfirmation>();

  constructor(
    private readonly timeoutMs: number = DEFAULT_CONFIRM_TIMEOUT_MS,
    private readonly now: () => number = Date.now
  ) {}

  issue(reviewId: string, action: ReviewAction, reviewer: ReviewerContext): PendingConfirmation {
    let token = randomBytes(4).toString("hex");
    while (this.pending.has(token)) {
      token = randomBytes(4).toString("hex");
    }
    const confirmation: PendingConfirmation = {
      token,
      reviewId,
      action,
      reviewer,
      expiresAt: this.now() + this.timeoutMs,
    };
    this.pending.set(token, confirmation);
    return confirmation;
  }

  /** Returns the live entry or null, deleting it if it has timed out */
  private live(token: string): PendingConfirmation | null {
    const confirmation = this.pending.get(token);
    if (!confirmation) return null;
    if (this.now() > confirmation.expiresAt) {
      this.pending.delete(token);
      return null;
    }
    return confirmation;
  }

  /**
   * Consume a confirmation. Someone else clicking the prompt leaves it pending
   * for the reviewer who asked.
   */
  take(token: string, callerId: string): TakeResult {
    const confirmation = this.live(token);
    if (!confirmation) return { status: "expired" };
    if (confirmation.reviewer.userId !== callerId) return { status: "not_owner" };
    this.pending.delete(token);
    return { status: "ok", confirmation };
  }

  cancel(token: string, callerId: string): CancelResult {
    const confirmation = this.live(token);
    if (!confirmation) return "expired";
    if (confirmation.reviewer.userId !== callerId) return "not_owner";
    this.pending.delete(token);
    return "cancelled";
  }

  /** @returns number of timed-out entries removed */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [token, confirmation] of this.pending) {
      if (now > confirmation.expiresAt) {
        this.pending.delete(token);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.pending.size;
  }
}
