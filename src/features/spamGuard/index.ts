/**
 * WHAT: Assembles the spam guard: tracker, detector, queue, escalation and review flow.
 * WHY: One object owns the in-memory state so index.ts, handlers and schedulers
 *      share the same FlaggedActorSet and tracker instead of module singletons.
 * FLOWS:
 *  - submit(raw) → zod validation → IngestQueue
 *  - queue tick → record → evaluate → EscalationEngine.trigger
 *  - hydrate() → flag every actor with a pending review (startup)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import type { Env } from "../../lib/env.js";
import { logger } from "../../lib/logger.js";
import type { RetryOptions } from "../../lib/retry.js";
import { HOUR_MS, MINUTE_MS, SECOND_MS } from "../../lib/time.js";
import { ActivityTracker, DEFAULT_HISTORY_LIMIT } from "./activityTracker.js";
import { ConfirmationRegistry, DEFAULT_CONFIRM_TIMEOUT_MS } from "./confirmations.js";
import type { SpamGuardContext } from "./context.js";
import { EscalationEngine } from "./escalation.js";
import { FlaggedActorSet } from "./flaggedActors.js";
import { DEFAULT_INGEST_OPTIONS, IngestQueue, type IngestQueueOptions } from "./ingestQueue.js";
import { DEFAULT_THRESHOLDS, evaluate } from "./patternDetector.js";
import type { CardTiming } from "./reviewCard.js";
import { ReviewFlow } from "./reviewFlow.js";
import type {
  ActivityEvent,
  ActorNotifier,
  ActorRef,
  AuditLog,
  ContainmentGateway,
  DetectionThresholds,
  MuteRepository,
  OpsAlerter,
  ReviewRepository,
  ReviewSurface,
} from "./types.js";

export const activityEventSchema = z.object({
  actorId: z.string().min(1),
  realmId: z.string().min(1),
  channelId: z.string().min(1),
  // Attachment-only messages have empty content and still count
  content: z.string(),
  timestamp: z.number().int().nonnegative(),
});

export interface SpamGuardSettings {
  thresholds: DetectionThresholds;
  historyLimit: number;
  queue: IngestQueueOptions;
  timing: CardTiming;
  confirmTimeoutMs: number;
  /** Activity sweep, reconciliation and mute expiry periods */
  intervals: SpamGuardIntervals;
}

export interface SpamGuardIntervals {
  sweepMs: number;
  reconcileMs: number;
  muteExpiryMs: number;
}

export const DEFAULT_SETTINGS: SpamGuardSettings = {
  thresholds: DEFAULT_THRESHOLDS,
  historyLimit: DEFAULT_HISTORY_LIMIT,
  queue: DEFAULT_INGEST_OPTIONS,
  timing: {
    windowMs: DEFAULT_THRESHOLDS.windowMs,
    reviewDeadlineMs: 12 * HOUR_MS,
    defaultMuteMs: 24 * HOUR_MS,
  },
  confirmTimeoutMs: DEFAULT_CONFIRM_TIMEOUT_MS,
  intervals: {
    sweepMs: 5 * MINUTE_MS,
    reconcileMs: 60 * SECOND_MS,
    muteExpiryMs: 60 * SECOND_MS,
  },
};

export function settingsFromEnv(env: Env): SpamGuardSettings {
  const windowMs = env.SPAM_WINDOW_SECONDS * SECOND_MS;
  return {
    thresholds: {
      windowMs,
      burstCount: env.SPAM_BURST_COUNT,
      channelSpread: env.SPAM_CHANNEL_SPREAD,
    },
    historyLimit: env.SPAM_HISTORY_LIMIT,
    queue: {
      capacity: env.SPAM_QUEUE_CAPACITY,
      batchSize: env.SPAM_QUEUE_BATCH,
      tickMs: env.SPAM_QUEUE_TICK_MS,
      name: "spam_ingest",
    },
    timing: {
      windowMs,
      reviewDeadlineMs: env.SPAM_REVIEW_HOURS * HOUR_MS,
      defaultMuteMs: env.SPAM_DEFAULT_MUTE_HOURS * HOUR_MS,
    },
    confirmTimeoutMs: env.SPAM_CONFIRM_TIMEOUT_SECONDS * SECOND_MS,
    intervals: {
      sweepMs: env.SPAM_SWEEP_MINUTES * MINUTE_MS,
      reconcileMs: env.SPAM_RECONCILE_SECONDS * SECOND_MS,
      muteExpiryMs: env.SPAM_RECONCILE_SECONDS * SECOND_MS,
    },
  };
}

export interface SpamGuardCollaborators {
  containment: ContainmentGateway;
  notifier: ActorNotifier;
  surface: ReviewSurface;
  alerter: OpsAlerter;
  audit: AuditLog;
}

export interface SpamGuardOptions {
  collaborators: SpamGuardCollaborators;
  reviews: ReviewRepository;
  mutes: MuteRepository;
  settings?: SpamGuardSettings;
  retry?: RetryOptions;
  /** Epoch milliseconds; tests pass a fake clock */
  now?: () => number;
}

export class SpamGuard {
  readonly settings: SpamGuardSettings;
  readonly tracker: ActivityTracker;
  readonly flagged = new FlaggedActorSet();
  readonly confirmations: ConfirmationRegistry;
  readonly queue: IngestQueue<ActivityEvent>;
  readonly ctx: SpamGuardContext;
  readonly engine: EscalationEngine;
  readonly flow: ReviewFlow;

  constructor(options: SpamGuardOptions) {
    const now = options.now ?? Date.now;
    this.settings = options.settings ?? DEFAULT_SETTINGS;
    this.tracker = new ActivityTracker(this.settings.historyLimit, now);
    this.confirmations = new ConfirmationRegistry(this.settings.confirmTimeoutMs, now);
    this.ctx = {
      ...options.collaborators,
      flagged: this.flagged,
      reviews: options.reviews,
      mutes: options.mutes,
      timing: this.settings.timing,
      expiryFailuresAlerted: new Set(),
      retry: options.retry,
      now,
    };
    this.engine = new EscalationEngine(this.ctx);
    this.flow = new ReviewFlow(this.ctx, this.confirmations);
    this.queue = new IngestQueue((event) => this.process(event), this.settings.queue);
  }

  /**
   * Validate and enqueue an inbound event. Never throws.
   * @returns false when the event was malformed or the queue was full
   */
  submit(raw: unknown): boolean {
    const parsed = activityEventSchema.safeParse(raw);
    if (!parsed.success) {
      logger.debug(
        { evt: "spam_event_invalid", issues: parsed.error.issues.map((i) => i.path.join(".")) },
        "[spamGuard] malformed activity event dropped"
      );
      return false;
    }
    return this.queue.submit(parsed.data);
  }

  /** Queue consumer: runs synchronously per event, escalation is spawned */
  private process(event: ActivityEvent): void {
    const actor: ActorRef = { guildId: event.realmId, userId: event.actorId };
    this.tracker.record(actor, event.channelId, event.content);

    // Already contained; more messages don't change anything
    if (this.flagged.has(actor)) return;

    const detection = evaluate(this.tracker, actor, this.settings.thresholds);
    if (detection) {
      logger.info(
        {
          evt: "spam_detected",
          guildId: actor.guildId,
          userId: actor.userId,
          pattern: detection.kind,
          queueLagMs: this.ctx.now() - event.timestamp,
        },
        "[spamGuard] spam pattern detected"
      );
      this.engine.trigger(actor, detection);
    }
  }

  /**
   * Rebuild containment state from durable reviews after a restart.
   * @returns number of actors flagged
   */
  hydrate(): number {
    const pending = this.ctx.reviews.listPending();
    const added = this.flagged.hydrate(
      pending.map((review) => ({ guildId: review.guildId, userId: review.userId }))
    );
    logger.info({ evt: "spam_hydrated", pending: pending.length, flagged: added }, "[spamGuard] flagged set restored");
    return added;
  }

  isFlagged(actor: ActorRef): boolean {
    return this.flagged.has(actor);
  }

  start(): void {
    this.queue.start();
  }

  /** Stop the consumer, flush what's queued, and wait for in-flight escalations. */
  async stop(): Promise<void> {
    this.queue.stop();
    while (this.queue.depth > 0) {
      this.queue.drain();
    }
    await this.engine.idle();
  }
}

export function createSpamGuard(options: SpamGuardOptions): SpamGuard {
  return new SpamGuard(options);
}
