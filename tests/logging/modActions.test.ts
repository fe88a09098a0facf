/**
 * WHAT: Tests for the moderation audit trail.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach } from "vitest";
import { listModActions, recordModAction } from "../../src/logging/modActions.js";
import { resetSpamTables } from "../utils/spamGuardFakes.js";

describe("modActions", () => {
  beforeEach(() => {
    resetSpamTables();
  });

  it("records an action and lists it back", () => {
    const id = recordModAction({
      guildId: "guild-1",
      action: "mute",
      subjectId: "user-1",
      performedBy: "system",
      reason: "  Automatic spam detection - pending staff review ",
      duration: "pending",
    });

    const [row] = listModActions("guild-1", "user-1");
    expect(row).toMatchObject({
      id,
      guildId: "guild-1",
      action: "mute",
      subjectId: "user-1",
      performedBy: "system",
      reason: "Automatic spam detection - pending staff review",
      duration: "pending",
    });
  });

  it("lists newest first and omits missing durations", () => {
    recordModAction({ guildId: "guild-1", action: "mute", subjectId: "user-1", performedBy: "system", reason: "a" });
    recordModAction({ guildId: "guild-1", action: "unmute", subjectId: "user-1", performedBy: "mod-1", reason: "b" });
    recordModAction({ guildId: "guild-1", action: "ban", subjectId: "user-2", performedBy: "mod-1", reason: "c" });

    const rows = listModActions("guild-1", "user-1");
    expect(rows.map((r) => r.action)).toEqual(["unmute", "mute"]);
    expect(rows[0].duration).toBeUndefined();
  });

  it("caps reasons at 512 characters", () => {
    recordModAction({ guildId: "g", action: "ban", subjectId: "u", performedBy: "m", reason: "r".repeat(600) });
    expect(listModActions("g", "u")[0].reason).toHaveLength(512);
  });

  it("respects the limit", () => {
    for (let i = 0; i < 3; i++) {
      recordModAction({ guildId: "g", action: "mute", subjectId: "u", performedBy: "system", reason: `r${i}` });
    }
    expect(listModActions("g", "u", 2)).toHaveLength(2);
  });
});
