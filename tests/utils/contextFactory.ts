/**
 * WHAT: Factory for CommandContext objects in tests.
 * WHY: Commands receive a structured context; tests need to provide the same shape.
 * USAGE:
 *  const ctx = createTestCommandContext(createMockCommandInteraction({ subcommand: "view" }));
 *  await execute(ctx, guard);
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ChatInputCommandInteraction } from "discord.js";
import type { CommandContext, InstrumentedInteraction } from "../../src/lib/cmdWrap.js";

export type TestCommandContext<I extends InstrumentedInteraction> = CommandContext<I> & {
  /** Phases passed to step(), in order */
  readonly phases: string[];
};

export function createTestCommandContext<I extends InstrumentedInteraction = ChatInputCommandInteraction>(
  interaction: I,
  traceId = "TESTTRACE"
): TestCommandContext<I> {
  const phases: string[] = [];
  return {
    interaction,
    step: (phase: string) => {
      phases.push(phase);
    },
    traceId,
    phases,
  };
}
