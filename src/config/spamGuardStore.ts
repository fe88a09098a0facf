/**
 * WHAT: Per-guild spam guard configuration with env fallback.
 * WHY: One bot, several guilds, each with its own mute role and staff channels.
 * FLOWS:
 *  - getSpamGuardConfig(guildId) → cached merge of DB row over env defaults
 *  - setSpamGuardConfig(guildId, patch) → upsert + cache invalidation
 * DOCS:
 *  - better-sqlite3 prepared statements: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { LRUCache } from "../lib/lruCache.js";
import { nowUtc } from "../lib/time.js";

// ============================================================================
// Prepared Statements
// ============================================================================

interface ConfigRow {
  enabled: number;
  mute_role_id: string | null;
  review_channel_id: string | null;
  alert_channel_id: string | null;
  log_channel_id: string | null;
  exempt_role_id: string | null;
  exempt_category_id: string | null;
}

const getConfigStmt = db.prepare<[string], ConfigRow>(
  `SELECT enabled, mute_role_id, review_channel_id, alert_channel_id, log_channel_id,
          exempt_role_id, exempt_category_id
   FROM spam_guard_config WHERE guild_id = ?`
);

// Named parameters; better-sqlite3 binds them from the object's keys
interface ConfigUpsertParams {
  guildId: string;
  enabled: number | null;
  muteRoleId: string | null;
  reviewChannelId: string | null;
  alertChannelId: string | null;
  logChannelId: string | null;
  exemptRoleId: string | null;
  exemptCategoryId: string | null;
  updatedAt: number;
}

// COALESCE keeps columns the patch doesn't mention, so a field can be changed but not cleared
const upsertConfigStmt = db.prepare<ConfigUpsertParams>(
  `INSERT INTO spam_guard_config
     (guild_id, enabled, mute_role_id, review_channel_id, alert_channel_id, log_channel_id,
      exempt_role_id, exempt_category_id, updated_at_s)
   VALUES (@guildId, COALESCE(@enabled, 1), @muteRoleId, @reviewChannelId, @alertChannelId,
           @logChannelId, @exemptRoleId, @exemptCategoryId, @updatedAt)
   ON CONFLICT(guild_id) DO UPDATE SET
     enabled = COALESCE(@enabled, spam_guard_config.enabled),
     mute_role_id = COALESCE(@muteRoleId, spam_guard_config.mute_role_id),
     review_channel_id = COALESCE(@reviewChannelId, spam_guard_config.review_channel_id),
     alert_channel_id = COALESCE(@alertChannelId, spam_guard_config.alert_channel_id),
     log_channel_id = COALESCE(@logChannelId, spam_guard_config.log_channel_id),
     exempt_role_id = COALESCE(@exemptRoleId, spam_guard_config.exempt_role_id),
     exempt_category_id = COALESCE(@exemptCategoryId, spam_guard_config.exempt_category_id),
     updated_at_s = @updatedAt`
);

export interface SpamGuardConfig {
  enabled: boolean;
  muteRoleId: string | null;
  reviewChannelId: string | null;
  /** Ops alerts; falls back to the review channel when unset */
  alertChannelId: string | null;
  /** Audit log embeds; no embed is posted when unset */
  logChannelId: string | null;
  /** Members holding this role are never tracked */
  exemptRoleId: string | null;
  /** Messages in channels under this category are never tracked */
  exemptCategoryId: string | null;
}

export type SpamGuardConfigPatch = Partial<SpamGuardConfig>;

// ============================================================================
// Cache Layer
// ============================================================================
// Read on every message, so it's cached. Writes invalidate.

const CACHE_TTL_MS = 60 * 1000;
const CACHE_MAX_SIZE = 1000;
const configCache = new LRUCache<string, SpamGuardConfig>(CACHE_MAX_SIZE, CACHE_TTL_MS);

/**
 * Resolution priority per field: guild row, then SPAM_* env var, then null.
 */
export function getSpamGuardConfig(guildId: string): SpamGuardConfig {
  const cached = configCache.get(guildId);
  if (cached) return cached;

  const row = getConfigStmt.get(guildId);
  const config: SpamGuardConfig = {
    enabled: row ? row.enabled !== 0 : true,
    muteRoleId: row?.mute_role_id ?? env.SPAM_MUTE_ROLE_ID ?? null,
    reviewChannelId: row?.review_channel_id ?? env.SPAM_REVIEW_CHANNEL_ID ?? null,
    alertChannelId: row?.alert_channel_id ?? env.SPAM_ALERT_CHANNEL_ID ?? null,
    logChannelId: row?.log_channel_id ?? env.SPAM_LOG_CHANNEL_ID ?? null,
    exemptRoleId: row?.exempt_role_id ?? env.SPAM_EXEMPT_ROLE_ID ?? null,
    exemptCategoryId: row?.exempt_category_id ?? env.SPAM_EXEMPT_CATEGORY_ID ?? null,
  };

  configCache.set(guildId, config);
  return config;
}

/**
 * Upsert the fields present in the patch; absent fields keep their stored value.
 */
export function setSpamGuardConfig(guildId: string, patch: SpamGuardConfigPatch): SpamGuardConfig {
  const enabled = patch.enabled === undefined ? null : patch.enabled ? 1 : 0;
  upsertConfigStmt.run({
    guildId,
    enabled,
    muteRoleId: patch.muteRoleId ?? null,
    reviewChannelId: patch.reviewChannelId ?? null,
    alertChannelId: patch.alertChannelId ?? null,
    logChannelId: patch.logChannelId ?? null,
    exemptRoleId: patch.exemptRoleId ?? null,
    exemptCategoryId: patch.exemptCategoryId ?? null,
    updatedAt: nowUtc(),
  });
  configCache.delete(guildId);

  logger.info(
    { evt: "spam_config_updated", guildId, fields: Object.keys(patch) },
    "[spamGuardConfig] guild config updated"
  );
  return getSpamGuardConfig(guildId);
}

/** Drop the cached entry when the bot leaves a guild. The row is kept. */
export function clearSpamGuardConfigCache(guildId: string): void {
  configCache.delete(guildId);
}
