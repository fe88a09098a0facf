/**
 * WHAT: Shared types for the spam guard: activity records, detection results,
 *       review/mute records, and the collaborator seams the engine talks through.
 * WHY: The detection/escalation core never touches discord.js directly; the
 *      interfaces here are what discordGateway.ts implements and tests fake.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Identity =====

/**
 * Actor identity is realm scoped: the same user spamming two guilds is two
 * independent cases, each with its own mute and review.
 */
export interface ActorRef {
  guildId: string;
  userId: string;
}

export const actorKey = (actor: ActorRef): string => `${actor.guildId}:${actor.userId}`;

// ===== Activity =====

export interface ActivityRecord {
  /** Epoch milliseconds */
  timestamp: number;
  channelId: string;
  /** sha256 of normalized content; equal fingerprints mean identical messages */
  contentFingerprint: string;
  /** First 100 chars, shown on review cards */
  contentPreview: string;
}

/** Inbound event as the ingest queue sees it */
export interface ActivityEvent {
  actorId: string;
  realmId: string;
  channelId: string;
  content: string;
  /** Epoch milliseconds the platform stamped on the message; logged as queue lag, never used for windows */
  timestamp: number;
}

/**
 * Per-actor activity log. ActivityTracker is the production implementation;
 * consumers receive it by reference rather than reaching for module state.
 */
export interface TrackingStore {
  record(actor: ActorRef, channelId: string, content: string): void;
  recent(actor: ActorRef, windowMs: number): ActivityRecord[];
  sweep(maxAgeMs: number): number;
  has(actor: ActorRef): boolean;
  size(): number;
}

// ===== Detection =====

export interface DetectionThresholds {
  windowMs: number;
  /** Messages in one channel within the window */
  burstCount: number;
  /** Distinct channels within the window */
  channelSpread: number;
}

export interface SameChannelBurst {
  kind: "same_channel";
  channelId: string;
  count: number;
  samples: ActivityRecord[];
}

export interface MultiChannelBurst {
  kind: "multi_channel";
  distinctChannelCount: number;
  totalCount: number;
  /** In first-seen order */
  channelIds: string[];
  samples: ActivityRecord[];
}

export type DetectionResult = SameChannelBurst | MultiChannelBurst;
export type PatternKind = DetectionResult["kind"];

// ===== Durable records =====

export interface ReviewRecord {
  /** Id of the review card message; one card, one review */
  reviewId: string;
  guildId: string;
  userId: string;
  /** Unix seconds */
  createdAt: number;
  /** Unix seconds */
  expiresAt: number;
  patternKind: PatternKind;
  patternSummary: string;
}

export interface MuteRecord {
  guildId: string;
  userId: string;
  /** Unix seconds; null while the mute is held pending review */
  unmuteAt: number | null;
  reason: string;
}

// ===== Review lifecycle =====

export type ReviewAction = "lift" | "keep" | "ban";

export type ReviewState = "pending" | "lifted" | "confirmed" | "banned" | "expired";

export type TerminalReviewState = Exclude<ReviewState, "pending">;

/** What the platform told us about the clicking staff member */
export interface ReviewerContext {
  userId: string;
  canModerate: boolean;
  canBan: boolean;
}

export type ResolutionOutcome =
  | { status: "resolved"; state: TerminalReviewState; review: ReviewRecord }
  | { status: "already_resolved"; reviewId: string }
  | { status: "forbidden"; action: ReviewAction }
  | { status: "failed"; reviewId: string; message: string };

// ===== Review surface payloads (platform neutral) =====

export interface ReviewCardField {
  name: string;
  value: string;
}

export type CardTone = "alert" | "lifted" | "confirmed" | "banned" | "expired" | "failed";

export interface ReviewCard {
  title: string;
  tone: CardTone;
  userId: string;
  fields: ReviewCardField[];
  footer: string;
  /** Empty once the case is closed */
  actions: ReviewAction[];
}

export interface ResolutionNotice {
  tone: CardTone;
  heading: string;
  detail: string;
}

// ===== Collaborators =====

/**
 * Mute/ban on the platform. Implementations throw on failure; the engine
 * classifies the error (permission vs transient) and decides.
 */
export interface ContainmentGateway {
  mute(actor: ActorRef, reason: string): Promise<void>;
  unmute(actor: ActorRef, reason: string): Promise<void>;
  ban(actor: ActorRef, reason: string): Promise<void>;
}

export type ActorNotice = { kind: "muted" } | { kind: "banned"; reason: string };

/** Best-effort DMs; callers swallow failures (closed DMs are not actionable). */
export interface ActorNotifier {
  notify(actor: ActorRef, notice: ActorNotice): Promise<void>;
}

export interface ReviewSurface {
  /** Post a card; resolves to the durable handle that becomes the review id. */
  post(guildId: string, card: ReviewCard): Promise<string>;
  /** Append a resolution to an existing card and strip its buttons. */
  resolve(guildId: string, reviewId: string, notice: ResolutionNotice): Promise<void>;
  /** Free-standing message in the review channel. */
  announce(guildId: string, text: string): Promise<void>;
}

/** Operational alerts, kept out of the review channel. */
export interface OpsAlerter {
  alert(guildId: string, text: string): Promise<void>;
}

export type ModActionKind = "mute" | "unmute" | "ban";

export interface ModerationAuditEntry {
  guildId: string;
  action: ModActionKind;
  subjectId: string;
  performedBy: string;
  reason: string;
  /** "pending", "1d", ... */
  duration?: string;
}

export interface AuditLog {
  logModerationAction(entry: ModerationAuditEntry): Promise<void>;
}

// ===== Repositories =====
// Implemented over SQLite in src/store; tests wrap them to inject failures.

export interface ReviewRepository {
  insert(record: ReviewRecord): void;
  get(reviewId: string): ReviewRecord | null;
  /** Atomic take; null when someone else already took it */
  claim(reviewId: string): ReviewRecord | null;
  restore(record: ReviewRecord): void;
  listExpired(nowS: number): ReviewRecord[];
  listPending(guildId?: string): ReviewRecord[];
}

export interface MuteRepository {
  hold(guildId: string, userId: string, reason: string): void;
  schedule(guildId: string, userId: string, unmuteAtS: number, reason: string): void;
  get(guildId: string, userId: string): MuteRecord | null;
  delete(guildId: string, userId: string): boolean;
  listDue(nowS: number): MuteRecord[];
}
