/**
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on missing secrets; keep process.env access centralized.
 * FLOWS: load .env → parse/validate → export typed env object + spam guard tuning
 * DOCS:
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// override: true in production so .env wins over a stale shell environment;
// false in tests so values set before import survive.
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Raw extraction. Everything is trimmed because stray whitespace in .env files
 * is the most common misconfiguration we see.
 */
const raw = {
  DISCORD_TOKEN: process.env.DISCORD_TOKEN?.trim(),
  CLIENT_ID: process.env.CLIENT_ID?.trim(),
  GUILD_ID: process.env.GUILD_ID?.trim(),
  NODE_ENV: process.env.NODE_ENV?.trim(),
  DB_PATH: process.env.DB_PATH?.trim(),
  LOG_LEVEL: process.env.LOG_LEVEL?.trim(),
  SENTRY_DSN: process.env.SENTRY_DSN?.trim(),
  SENTRY_ENVIRONMENT: process.env.SENTRY_ENVIRONMENT?.trim(),

  // Guild defaults, overridable per guild through /spamguard set
  SPAM_MUTE_ROLE_ID: process.env.SPAM_MUTE_ROLE_ID?.trim(),
  SPAM_REVIEW_CHANNEL_ID: process.env.SPAM_REVIEW_CHANNEL_ID?.trim(),
  SPAM_ALERT_CHANNEL_ID: process.env.SPAM_ALERT_CHANNEL_ID?.trim(),
  SPAM_LOG_CHANNEL_ID: process.env.SPAM_LOG_CHANNEL_ID?.trim(),
  SPAM_EXEMPT_ROLE_ID: process.env.SPAM_EXEMPT_ROLE_ID?.trim(),
  SPAM_EXEMPT_CATEGORY_ID: process.env.SPAM_EXEMPT_CATEGORY_ID?.trim(),

  // Detection + queue + review tuning
  SPAM_WINDOW_SECONDS: process.env.SPAM_WINDOW_SECONDS?.trim(),
  SPAM_BURST_COUNT: process.env.SPAM_BURST_COUNT?.trim(),
  SPAM_CHANNEL_SPREAD: process.env.SPAM_CHANNEL_SPREAD?.trim(),
  SPAM_HISTORY_LIMIT: process.env.SPAM_HISTORY_LIMIT?.trim(),
  SPAM_QUEUE_CAPACITY: process.env.SPAM_QUEUE_CAPACITY?.trim(),
  SPAM_QUEUE_BATCH: process.env.SPAM_QUEUE_BATCH?.trim(),
  SPAM_QUEUE_TICK_MS: process.env.SPAM_QUEUE_TICK_MS?.trim(),
  SPAM_REVIEW_HOURS: process.env.SPAM_REVIEW_HOURS?.trim(),
  SPAM_DEFAULT_MUTE_HOURS: process.env.SPAM_DEFAULT_MUTE_HOURS?.trim(),
  SPAM_CONFIRM_TIMEOUT_SECONDS: process.env.SPAM_CONFIRM_TIMEOUT_SECONDS?.trim(),
  SPAM_SWEEP_MINUTES: process.env.SPAM_SWEEP_MINUTES?.trim(),
  SPAM_RECONCILE_SECONDS: process.env.SPAM_RECONCILE_SECONDS?.trim(),
};

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const schema = z.object({
  // Core Discord credentials - bot won't start without these
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  CLIENT_ID: z.string().min(1, "Missing CLIENT_ID"),
  GUILD_ID: z.string().optional(), // Only needed for guild-scoped command deployment
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DB_PATH: z.string().default("data/spamguard.db"),
  LOG_LEVEL: z.string().optional(),

  // Sentry is disabled when no DSN is given
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),

  SPAM_MUTE_ROLE_ID: z.string().optional(),
  SPAM_REVIEW_CHANNEL_ID: z.string().optional(),
  SPAM_ALERT_CHANNEL_ID: z.string().optional(),
  SPAM_LOG_CHANNEL_ID: z.string().optional(),
  SPAM_EXEMPT_ROLE_ID: z.string().optional(),
  SPAM_EXEMPT_CATEGORY_ID: z.string().optional(),

  SPAM_WINDOW_SECONDS: positiveInt(5),
  SPAM_BURST_COUNT: z.coerce.number().int().min(2).default(10),
  SPAM_CHANNEL_SPREAD: z.coerce.number().int().min(2).default(10),
  SPAM_HISTORY_LIMIT: positiveInt(50),
  SPAM_QUEUE_CAPACITY: positiveInt(1000),
  SPAM_QUEUE_BATCH: positiveInt(10),
  SPAM_QUEUE_TICK_MS: positiveInt(100),
  SPAM_REVIEW_HOURS: positiveInt(12),
  SPAM_DEFAULT_MUTE_HOURS: positiveInt(24),
  SPAM_CONFIRM_TIMEOUT_SECONDS: positiveInt(30),
  SPAM_SWEEP_MINUTES: positiveInt(5),
  SPAM_RECONCILE_SECONDS: positiveInt(60),
});

/**
 * safeParse collects ALL issues so a broken .env is fixed in one pass,
 * not one variable at a time.
 */
const parsed = schema.safeParse(raw);
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}
export const env = parsed.data;
export type Env = typeof env;
