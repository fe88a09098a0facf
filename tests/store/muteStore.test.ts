/**
 * WHAT: Tests for durable mute records.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach } from "vitest";
import { deleteMute, getMute, holdMute, listDueMutes, scheduleUnmute } from "../../src/store/muteStore.js";
import { resetSpamTables } from "../utils/spamGuardFakes.js";

describe("muteStore", () => {
  beforeEach(() => {
    resetSpamTables();
  });

  it("holds a mute with no unmute time", () => {
    holdMute("guild-1", "user-1", "pending review");
    expect(getMute("guild-1", "user-1")).toEqual({
      guildId: "guild-1",
      userId: "user-1",
      unmuteAt: null,
      reason: "pending review",
    });
  });

  it("scheduling replaces the held record", () => {
    holdMute("guild-1", "user-1", "pending review");
    scheduleUnmute("guild-1", "user-1", 5_000, "kept");

    expect(getMute("guild-1", "user-1")).toMatchObject({ unmuteAt: 5_000, reason: "kept" });
  });

  it("held mutes are never due", () => {
    holdMute("guild-1", "held", "pending review");
    scheduleUnmute("guild-1", "later", 2_000, "kept");
    scheduleUnmute("guild-1", "now", 1_000, "kept");
    scheduleUnmute("guild-2", "earlier", 500, "kept");

    expect(listDueMutes(1_000).map((m) => m.userId)).toEqual(["earlier", "now"]);
  });

  it("delete reports whether a record existed", () => {
    holdMute("guild-1", "user-1", "pending review");
    expect(deleteMute("guild-1", "user-1")).toBe(true);
    expect(deleteMute("guild-1", "user-1")).toBe(false);
    expect(getMute("guild-1", "user-1")).toBeNull();
  });
});
