/**
 * WHAT: Tests for spam button custom IDs.
 * WHY: Cards stay clickable for hours; a parser change that stops matching old
 *      IDs strands every open review.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { confirmButtonId, identifySpamComponent, reviewButtonId } from "../../src/lib/componentIds.js";

describe("spam component ids", () => {
  it("builds review and confirm ids in the v1 format", () => {
    expect(reviewButtonId("ban", "1187654321098765432")).toBe("v1:spam:ban:1187654321098765432");
    expect(confirmButtonId("yes", "9f3a1c2b")).toBe("v1:spam:yes:9f3a1c2b");
  });

  it("routes review buttons", () => {
    expect(identifySpamComponent("v1:spam:keep:1187654321098765432")).toEqual({
      type: "review_action",
      action: "keep",
      reviewId: "1187654321098765432",
    });
  });

  it("routes confirmation answers", () => {
    expect(identifySpamComponent("v1:spam:no:0a1b2c3d")).toEqual({
      type: "confirm_answer",
      answer: "no",
      token: "0a1b2c3d",
    });
  });

  it("ignores ids from other features and malformed params", () => {
    expect(identifySpamComponent("v1:modmail:open:123")).toBeNull();
    expect(identifySpamComponent("v1:spam:mute:123")).toBeNull();
    expect(identifySpamComponent("v1:spam:lift:not-a-snowflake")).toBeNull();
    expect(identifySpamComponent("v1:spam:yes:XYZ")).toBeNull();
  });
});
