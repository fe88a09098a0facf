/**
 * WHAT: Small helpers to standardize interaction lifecycle: step logging, error replies, safe defers/replies.
 * WHY: Discord has a strict 3-second SLA for first responses; wrapping handlers ensures consistency and fewer 10062s.
 * FLOWS:
 *  - wrapCommand(): enter → step(...) → try/catch → ephemeral error reply with trace id
 *  - ensureDeferred(): deferReply if not already replied/deferred (ephemeral by default)
 *  - replyOrEdit(): choose reply/editReply/followUp based on state; ephemeral by default
 * DOCS:
 *  - Interaction response rules (3-second window): https://discord.com/developers/docs/interactions/receiving-and-responding
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  MessageFlags,
  type ButtonInteraction,
  type ChatInputCommandInteraction,
  type InteractionReplyOptions,
} from "discord.js";
import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry, userFriendlyMessage } from "./errors.js";

export type InstrumentedInteraction = ChatInputCommandInteraction | ButtonInteraction;

export type CommandContext<I extends InstrumentedInteraction = ChatInputCommandInteraction> = {
  interaction: I;
  /** Mark the current execution phase (e.g., "validate", "db_write", "reply") */
  step: (phase: string) => void;
  readonly traceId: string;
};

type CommandExecutor<I extends InstrumentedInteraction> = (ctx: CommandContext<I>) => Promise<void>;

function errorCode(err: unknown): unknown {
  return err && typeof err === "object" ? Reflect.get(err, "code") : undefined;
}

/** Short, human-quotable id for correlating a staff report with logs */
export function traceIdFor(interaction: InstrumentedInteraction): string {
  return interaction.id.slice(-8).toUpperCase();
}

/**
 * Decorates a handler with step logging and error handling. The returned
 * handler never rejects; failures end in an ephemeral reply carrying the trace id.
 */
export function wrapCommand<I extends InstrumentedInteraction>(name: string, fn: CommandExecutor<I>) {
  return async (interaction: I): Promise<void> => {
    const traceId = traceIdFor(interaction);
    const startedAt = Date.now();
    let phase = "enter";

    const commandCtx: CommandContext<I> = {
      interaction,
      step: (newPhase: string) => {
        phase = newPhase;
        logger.debug({ evt: "cmd_step", traceId, cmd: name, phase });
      },
      traceId,
    };

    logger.info(
      {
        evt: "cmd_start",
        traceId,
        cmd: name,
        userId: interaction.user.id,
        guildId: interaction.guildId ?? "dm",
      },
      "command start"
    );

    try {
      await fn(commandCtx);
      logger.info({ evt: "cmd_ok", traceId, cmd: name, ms: Date.now() - startedAt }, "command ok");
    } catch (err) {
      const classified = classifyError(err);
      logger.error(
        { evt: "cmd_error", traceId, cmd: name, phase, ...errorContext(classified), err },
        `command error: ${classified.message}`
      );
      if (shouldReportToSentry(classified)) {
        captureException(err, { cmd: name, phase, traceId, errorKind: classified.kind });
      }

      await replyOrEdit(interaction, {
        content: `${userFriendlyMessage(classified)} (trace: ${traceId})`,
      }).catch((replyErr: unknown) => {
        logger.debug({ err: replyErr, traceId, evt: "cmd_error_reply_fail" }, "error reply failed");
      });
    }
  };
}

/**
 * deferReply unless already acknowledged. 10062 (interaction expired) is
 * logged and swallowed; anything else is re-thrown.
 */
export async function ensureDeferred(interaction: InstrumentedInteraction): Promise<void> {
  if (interaction.deferred || interaction.replied) return;
  try {
    await interaction.deferReply({ flags: MessageFlags.Ephemeral });
  } catch (err) {
    const code = errorCode(err);
    if (code === 10062) {
      logger.warn({ evt: "cmd_defer_fail", code, err }, "defer failed (interaction expired)");
      return;
    }
    logger.warn({ evt: "cmd_defer_fail", code, err }, "defer failed");
    throw err;
  }
}

/**
 * Reply with the right API for the interaction's state. Ephemeral unless the
 * payload says otherwise: public responses should be explicit.
 */
export async function replyOrEdit(
  interaction: InstrumentedInteraction,
  payload: InteractionReplyOptions
): Promise<void> {
  const withFlags = { ...payload, flags: payload.flags ?? MessageFlags.Ephemeral };
  try {
    if (interaction.deferred) {
      const { flags: _flags, ...editPayload } = withFlags;
      await interaction.editReply(editPayload);
      return;
    }
    if (interaction.replied) {
      await interaction.followUp(withFlags);
      return;
    }
    await interaction.reply(withFlags);
  } catch (err) {
    const code = errorCode(err);
    if (code === 10062 || code === 40060) {
      logger.warn({ evt: "cmd_reply_fail", code, err }, "reply/edit skipped; interaction expired or acknowledged");
      return;
    }
    logger.error({ evt: "cmd_reply_fail", code, err }, "reply/edit failed");
    throw err;
  }
}
