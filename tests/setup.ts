/**
 * WHAT: Global Vitest setup for deterministic tests.
 * WHY: Disable schedulers, give env validation the values it requires, reset timers.
 *
 * Runs before EVERY test file via setupFiles in vitest.config.ts.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { afterEach, vi } from "vitest";

// env.ts validates at import time, and some modules import it transitively.
// Placeholders only; nothing in the test suite talks to Discord.
process.env.NODE_ENV = "test";
process.env.DISCORD_TOKEN ??= "test-token";
process.env.CLIENT_ID ??= "test-client";
process.env.DB_PATH ??= ":memory:";

// Background intervals would fire unpredictably and keep the worker alive.
process.env.SPAM_SCHEDULERS_DISABLED = "1";

afterEach(() => {
  // A test using vi.useFakeTimers() must not leak into the next one.
  vi.clearAllTimers();
  vi.useRealTimers();
});
