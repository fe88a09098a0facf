/**
 * WHAT: Epoch helpers shared by stores, schedulers and card rendering.
 * WHY: SQLite columns hold Unix seconds; in-memory activity logs hold milliseconds.
 *      Keeping the conversions in one place stops the two from getting mixed up.
 *
 * NOTE: Every *_at column in the spam guard tables is Unix SECONDS.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export const SECOND_MS = 1000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/**
 * Current Unix timestamp in seconds. Floor, so "X seconds ago" is never negative.
 */
export const nowUtc = (): number => Math.floor(Date.now() / 1000);

/** Milliseconds → Unix seconds */
export const msToSec = (ms: number): number => Math.floor(ms / 1000);

/**
 * "HH:MM:SS UTC" for sample lines on review cards.
 *
 * @example
 * formatClockUtc(Date.UTC(2024, 0, 1, 9, 5, 7)) // "09:05:07 UTC"
 */
export function formatClockUtc(ms: number): string {
  return `${new Date(ms).toISOString().slice(11, 19)} UTC`;
}

/**
 * Compact duration label used in audit rows ("1d", "12h", "30m").
 */
export function formatDurationShort(ms: number): string {
  if (ms % DAY_MS === 0) return `${ms / DAY_MS}d`;
  if (ms % HOUR_MS === 0) return `${ms / HOUR_MS}h`;
  return `${Math.round(ms / MINUTE_MS)}m`;
}
