/**
 * WHAT: The dependency bundle shared by escalation, review resolution and the
 *       background loops, plus the best-effort helpers they all use.
 * WHY: Passed by reference so tests can swap any collaborator for a fake.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { classifyError, errorContext } from "../../lib/errors.js";
import type { RetryOptions } from "../../lib/retry.js";
import type { FlaggedActorSet } from "./flaggedActors.js";
import type { CardTiming } from "./reviewCard.js";
import type {
  ActorNotifier,
  AuditLog,
  ContainmentGateway,
  ModerationAuditEntry,
  MuteRepository,
  OpsAlerter,
  ReviewRepository,
  ReviewSurface,
} from "./types.js";

/** performedBy for actions nobody clicked; the audit embed renders it as the bot */
export const SYSTEM_ACTOR_ID = "system";

export interface SpamGuardContext {
  flagged: FlaggedActorSet;
  containment: ContainmentGateway;
  notifier: ActorNotifier;
  surface: ReviewSurface;
  alerter: OpsAlerter;
  audit: AuditLog;
  reviews: ReviewRepository;
  mutes: MuteRepository;
  timing: CardTiming;
  /** Review ids whose default outcome failed and was already reported to ops */
  expiryFailuresAlerted: Set<string>;
  /** Overrides for platform-call retries (tests shrink the delays) */
  retry?: RetryOptions;
  /** Epoch milliseconds */
  now: () => number;
}

/**
 * Run a side effect whose failure must not change the outcome (card edits,
 * audit rows, alerts). Failures are logged at warn with the given label.
 */
export async function bestEffort(
  label: string,
  fn: () => Promise<void>,
  context: Record<string, unknown> = {}
): Promise<boolean> {
  try {
    await fn();
    return true;
  } catch (err) {
    const classified = classifyError(err);
    logger.warn(
      { evt: "spam_best_effort_failed", label, ...errorContext(classified, context) },
      `[spamGuard] ${label} failed: ${classified.message}`
    );
    return false;
  }
}

export function auditAction(ctx: SpamGuardContext, entry: ModerationAuditEntry): Promise<boolean> {
  return bestEffort("audit", () => ctx.audit.logModerationAction(entry), {
    guildId: entry.guildId,
    subjectId: entry.subjectId,
    action: entry.action,
  });
}

export function alertOps(ctx: SpamGuardContext, guildId: string, text: string): Promise<boolean> {
  return bestEffort("ops_alert", () => ctx.alerter.alert(guildId, text), { guildId });
}
