/**
 * WHAT: Discriminated union error types for precise error handling
 * WHY: Enables specific recovery strategies and better observability
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - isRecoverable(err) → boolean (worth retrying)
 *  - isPermissionDenied(err) → boolean (containment rejected by role hierarchy / bot perms)
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  const classified = classifyError(err);
 *  if (isPermissionDenied(classified)) { ...abort escalation... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Error Type Definitions =====

/**
 * The `kind` field is the discriminator. Works across module boundaries,
 * unlike instanceof against discord.js error classes.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * SQLite errors. SQLITE_BUSY/SQLITE_LOCKED are transient; constraint
 * violations are logic errors; CORRUPT/NOTADB are fatal.
 */
export interface DbError extends AppError {
  kind: "db_error";
  code: string;
  sql?: string;
}

/**
 * Discord API errors. Numeric codes identify the failure:
 * - 10007: Unknown Member (left the guild)
 * - 10062: Unknown Interaction (3s window expired)
 * - 50001: Missing Access
 * - 50007: Cannot send messages to this user (DMs closed)
 * - 50013: Missing Permissions (role hierarchy, bot perms)
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

/** Permission errors raised by our own pre-checks (missing role, hierarchy) */
export interface PermissionError extends AppError {
  kind: "permission";
  needed: string[];
  guildId?: string;
}

/** Node network errors. Almost always worth retrying. */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | DbError
  | DiscordApiError
  | PermissionError
  | NetworkError
  | UnknownError;

/**
 * Thrown by gateways when a pre-check already knows the action can't succeed
 * (no mute role configured, bot role below the target). Classifies as "permission".
 */
export class MissingPermissionError extends Error {
  readonly needed: string[];
  readonly guildId?: string;

  constructor(message: string, needed: string[], guildId?: string) {
    super(message);
    this.name = "MissingPermissionError";
    this.needed = needed;
    this.guildId = guildId;
  }
}

// ===== Error Classification =====

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

function prop(obj: unknown, key: string): unknown {
  if (obj && typeof obj === "object" && key in obj) {
    return Reflect.get(obj, key);
  }
  return undefined;
}

function optString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

/**
 * Classify any caught error into a discriminated union.
 * Ordered from most specific to least: our own permission errors, SQLite,
 * Discord, network, unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const cause = err instanceof Error ? err : undefined;
  const message = optString(prop(err, "message")) ?? String(err);
  const code = prop(err, "code");
  const name = optString(prop(err, "name"));

  if (err instanceof MissingPermissionError) {
    return { kind: "permission", needed: err.needed, guildId: err.guildId, message, cause };
  }

  if (name === "SqliteError" || (typeof code === "string" && code.startsWith("SQLITE_"))) {
    return {
      kind: "db_error",
      code: typeof code === "string" ? code : "UNKNOWN",
      sql: optString(prop(err, "sql")),
      message,
      cause,
    };
  }

  if (typeof code === "number" && (name === "DiscordAPIError" || name?.includes("Discord"))) {
    return {
      kind: "discord_api",
      code,
      httpStatus: optNumber(prop(err, "status")) ?? optNumber(prop(err, "httpStatus")),
      method: optString(prop(err, "method")),
      path: optString(prop(err, "url")) ?? optString(prop(err, "path")),
      message,
      cause,
    };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return {
      kind: "network",
      code,
      host: optString(prop(err, "hostname")) ?? optString(prop(err, "host")),
      message,
      cause,
    };
  }

  // Discord-shaped error without the Discord name (e.g. a plain object from REST)
  if (code === 50013) {
    return { kind: "permission", needed: ["Unknown"], message, cause };
  }
  if (code === 50001) {
    return { kind: "permission", needed: ["ViewChannel"], message, cause };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/**
 * Check if error is recoverable (worth retrying).
 * Discord 429s are handled inside discord.js, so only 5xx count here.
 */
export function isRecoverable(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "network":
      return true;
    case "db_error":
      return err.code === "SQLITE_BUSY" || err.code === "SQLITE_LOCKED";
    case "discord_api": {
      const status = err.httpStatus ?? 0;
      return status >= 500 && status < 600;
    }
    default:
      return false;
  }
}

/**
 * Containment was rejected because the bot can't act on this member.
 * Neither retrying nor a human reviewer can fix that.
 */
export function isPermissionDenied(err: ClassifiedError): boolean {
  if (err.kind === "permission") return true;
  return err.kind === "discord_api" && (err.code === 50013 || err.code === 50001);
}

/** Member left the guild (or never existed) */
export function isUnknownMember(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 10007;
}

/**
 * Sentry should mean "something is broken", not "a user closed their DMs".
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10007, // Unknown member
        10008, // Unknown message (review card deleted)
        10062, // Unknown interaction
        40060, // Interaction already acknowledged
        50007, // Cannot DM user
        50013, // Missing permissions
      ];
      return !ignoredCodes.includes(err.code);
    }
    case "network":
    case "permission":
      return false;
    default:
      return true;
  }
}

// ===== Error Context Helpers =====

/**
 * Extract structured context from a classified error for logging
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = { errorKind: err.kind, errorMessage: err.message, ...extra };

  switch (err.kind) {
    case "db_error":
      return { ...base, sqlCode: err.code, sql: err.sql?.slice(0, 100) };
    case "discord_api":
      return {
        ...base,
        discordCode: err.code,
        httpStatus: err.httpStatus,
        method: err.method,
        path: err.path,
      };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "permission":
      return { ...base, neededPerms: err.needed, guildId: err.guildId };
    default:
      return base;
  }
}

/**
 * Short, staff-facing description of a failure for ephemeral replies and alerts.
 */
export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "db_error":
      return err.code === "SQLITE_BUSY"
        ? "Database is temporarily busy. Please try again."
        : "A database error occurred.";
    case "discord_api":
      if (err.code === 50013) return "I don't have permission to do that.";
      if (err.code === 10007) return "That member is no longer in the server.";
      return "Discord API error occurred.";
    case "network":
      return "Network error. Please try again.";
    case "permission":
      return `Missing permissions: ${err.needed.join(", ")}`;
    default:
      return "An unexpected error occurred.";
  }
}
