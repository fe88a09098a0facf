/**
 * WHAT: Tests for per-guild spam guard configuration.
 * WHY: Verify env fallback, partial updates and cache invalidation.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach } from "vitest";
import { db } from "../../src/db/db.js";
import {
  clearSpamGuardConfigCache,
  getSpamGuardConfig,
  setSpamGuardConfig,
} from "../../src/config/spamGuardStore.js";
import { resetSpamTables } from "../utils/spamGuardFakes.js";

const GUILD = "guild-config";

describe("spamGuardStore", () => {
  beforeEach(() => {
    resetSpamTables();
    clearSpamGuardConfigCache(GUILD);
  });

  it("defaults to enabled with nothing configured", () => {
    expect(getSpamGuardConfig(GUILD)).toEqual({
      enabled: true,
      muteRoleId: null,
      reviewChannelId: null,
      alertChannelId: null,
      logChannelId: null,
      exemptRoleId: null,
      exemptCategoryId: null,
    });
  });

  it("applies a partial patch and keeps earlier fields", () => {
    setSpamGuardConfig(GUILD, { muteRoleId: "role-muted", reviewChannelId: "chan-review" });
    const updated = setSpamGuardConfig(GUILD, { enabled: false, logChannelId: "chan-log" });

    expect(updated).toEqual({
      enabled: false,
      muteRoleId: "role-muted",
      reviewChannelId: "chan-review",
      alertChannelId: null,
      logChannelId: "chan-log",
      exemptRoleId: null,
      exemptCategoryId: null,
    });
  });

  it("re-enabling flips the stored flag back", () => {
    setSpamGuardConfig(GUILD, { enabled: false });
    expect(setSpamGuardConfig(GUILD, { enabled: true }).enabled).toBe(true);
  });

  it("serves reads from cache until the entry is cleared", () => {
    setSpamGuardConfig(GUILD, { muteRoleId: "role-a" });
    expect(getSpamGuardConfig(GUILD).muteRoleId).toBe("role-a");

    // Direct write bypasses invalidation
    db.prepare("UPDATE spam_guard_config SET mute_role_id = 'role-b' WHERE guild_id = ?").run(GUILD);
    expect(getSpamGuardConfig(GUILD).muteRoleId).toBe("role-a");

    clearSpamGuardConfigCache(GUILD);
    expect(getSpamGuardConfig(GUILD).muteRoleId).toBe("role-b");
  });
});
