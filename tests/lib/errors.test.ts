/**
 * WHAT: Tests for error classification.
 * WHY: Escalation decides between "abort and alert" and "retry" purely on
 *      these predicates; a misclassified 50013 means retry storms against a
 *      role we can never edit.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import {
  MissingPermissionError,
  classifyError,
  errorContext,
  isPermissionDenied,
  isRecoverable,
  isUnknownMember,
  shouldReportToSentry,
  userFriendlyMessage,
} from "../../src/lib/errors.js";
import { createDiscordAPIError, createNetworkError, createSqliteError } from "../utils/discordMocks.js";

describe("classifyError", () => {
  it("classifies null as unknown", () => {
    expect(classifyError(null)).toEqual({ kind: "unknown", message: "Unknown error (null/undefined)" });
  });

  it("classifies our own pre-check failures as permission errors", () => {
    const err = new MissingPermissionError("No mute role configured", ["MuteRole"], "guild-1");
    expect(classifyError(err)).toMatchObject({
      kind: "permission",
      needed: ["MuteRole"],
      guildId: "guild-1",
      message: "No mute role configured",
    });
  });

  it("classifies SqliteError by name and code", () => {
    const err = createSqliteError("SQLITE_CONSTRAINT_UNIQUE", "UNIQUE constraint failed", "INSERT INTO spam_review");
    expect(classifyError(err)).toMatchObject({
      kind: "db_error",
      code: "SQLITE_CONSTRAINT_UNIQUE",
      sql: "INSERT INTO spam_review",
    });
  });

  it("classifies DiscordAPIError with code and status", () => {
    const err = createDiscordAPIError(10007, "Unknown Member", 404);
    expect(classifyError(err)).toMatchObject({ kind: "discord_api", code: 10007, httpStatus: 404 });
  });

  it("classifies Node network codes", () => {
    expect(classifyError(createNetworkError("EAI_AGAIN")).kind).toBe("network");
  });

  it("treats a bare 50013-coded object as a permission error", () => {
    expect(classifyError({ code: 50013, message: "Missing Permissions" })).toMatchObject({
      kind: "permission",
      needed: ["Unknown"],
    });
  });

  it("falls back to unknown for plain errors", () => {
    expect(classifyError(new Error("boom"))).toMatchObject({ kind: "unknown", message: "boom" });
  });
});

describe("predicates", () => {
  it("isRecoverable: 5xx, network and busy database only", () => {
    expect(isRecoverable(classifyError(createDiscordAPIError(0, "Bad Gateway", 502)))).toBe(true);
    expect(isRecoverable(classifyError(createNetworkError("ECONNRESET")))).toBe(true);
    expect(isRecoverable(classifyError(createSqliteError("SQLITE_BUSY", "locked")))).toBe(true);
    expect(isRecoverable(classifyError(createDiscordAPIError(50013, "Missing Permissions", 403)))).toBe(false);
    expect(isRecoverable(classifyError(new Error("nope")))).toBe(false);
  });

  it("isPermissionDenied covers pre-checks and Discord 50013/50001", () => {
    expect(isPermissionDenied(classifyError(new MissingPermissionError("x", ["ManageRoles"])))).toBe(true);
    expect(isPermissionDenied(classifyError(createDiscordAPIError(50013, "Missing Permissions", 403)))).toBe(true);
    expect(isPermissionDenied(classifyError(createDiscordAPIError(50001, "Missing Access", 403)))).toBe(true);
    expect(isPermissionDenied(classifyError(createDiscordAPIError(10007, "Unknown Member", 404)))).toBe(false);
  });

  it("isUnknownMember only matches 10007", () => {
    expect(isUnknownMember(classifyError(createDiscordAPIError(10007, "Unknown Member", 404)))).toBe(true);
    expect(isUnknownMember(classifyError(createDiscordAPIError(10008, "Unknown Message", 404)))).toBe(false);
  });

  it("shouldReportToSentry skips expected Discord noise", () => {
    expect(shouldReportToSentry(classifyError(createDiscordAPIError(50007, "Cannot send messages to this user")))).toBe(false);
    expect(shouldReportToSentry(classifyError(createDiscordAPIError(10062, "Unknown interaction")))).toBe(false);
    expect(shouldReportToSentry(classifyError(createDiscordAPIError(50035, "Invalid Form Body")))).toBe(true);
    expect(shouldReportToSentry(classifyError(createNetworkError("ECONNRESET")))).toBe(false);
    expect(shouldReportToSentry(classifyError(new Error("boom")))).toBe(true);
  });
});

describe("errorContext", () => {
  it("adds permission details", () => {
    const ctx = errorContext(classifyError(new MissingPermissionError("hierarchy", ["ManageRoles"], "g")), {
      userId: "u",
    });
    expect(ctx).toEqual({
      errorKind: "permission",
      errorMessage: "hierarchy",
      userId: "u",
      neededPerms: ["ManageRoles"],
      guildId: "g",
    });
  });

  it("truncates SQL to 100 characters", () => {
    const sql = `SELECT ${"x, ".repeat(60)}`;
    const ctx = errorContext(classifyError(createSqliteError("SQLITE_ERROR", "syntax", sql)));
    expect(ctx.sql).toBe(sql.slice(0, 100));
  });
});

describe("userFriendlyMessage", () => {
  it("explains the common cases", () => {
    expect(userFriendlyMessage(classifyError(createDiscordAPIError(50013, "Missing Permissions", 403)))).toBe(
      "I don't have permission to do that."
    );
    expect(userFriendlyMessage(classifyError(createDiscordAPIError(10007, "Unknown Member", 404)))).toBe(
      "That member is no longer in the server."
    );
    expect(userFriendlyMessage(classifyError(createSqliteError("SQLITE_BUSY", "locked")))).toBe(
      "Database is temporarily busy. Please try again."
    );
    expect(userFriendlyMessage(classifyError(new MissingPermissionError("x", ["ManageRoles", "MuteRole"])))).toBe(
      "Missing permissions: ManageRoles, MuteRole"
    );
  });
});
