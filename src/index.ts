/**
 * WHAT: Main process entrypoint. Boots the Discord client, wires the spam guard, routes interactions.
 * WHY: Startup, hot path routing and shutdown order in one place.
 * FLOWS:
 *  - Ready: hydrate flagged set from pending reviews → start ingest queue → start schedulers
 *  - messageCreate: filter → guard.submit() (never awaits platform I/O)
 *  - interactionCreate: spam buttons → review flow; /spamguard → wrapped command
 *  - SIGINT/SIGTERM: stop schedulers → drain queue + in-flight escalations → destroy client → close DB
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { initializeSentry, captureException, flushSentry } from "./lib/sentry.js";
import { UNCAUGHT_EXCEPTION_EXIT_DELAY_MS } from "./lib/constants.js";
initializeSentry();

import {
  Client,
  Events,
  GatewayIntentBits,
  Options,
  Partials,
  type ButtonInteraction,
  type ChatInputCommandInteraction,
} from "discord.js";
import { logger } from "./lib/logger.js";

// ===== Global Error Handlers =====
// DOCS: https://nodejs.org/api/process.html#event-uncaughtexception

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
  // Don't exit - discord.js recovers from most rejections
});

process.on("uncaughtException", (error, origin) => {
  logger.error(
    { evt: "uncaught_exception", err: error, origin },
    "[process] Uncaught exception - bot may be in unstable state"
  );
  captureException(error, { context: "uncaughtException", origin });
  // Give Sentry time to flush, then exit
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

import { env } from "./lib/env.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { wrapCommand } from "./lib/cmdWrap.js";
import { closeDb } from "./db/db.js";
import { clearSpamGuardConfigCache } from "./config/spamGuardStore.js";
import { reviewRepository } from "./store/spamReviewStore.js";
import { muteRepository } from "./store/muteStore.js";
import { DiscordSpamGateway } from "./features/spamGuard/discordGateway.js";
import { createSpamGuard, settingsFromEnv } from "./features/spamGuard/index.js";
import { createMessageHandler, handleSpamButton } from "./features/spamGuard/handlers.js";
import { startSpamGuardSchedulers, stopSpamGuardSchedulers } from "./scheduler/spamGuardScheduler.js";
import * as spamguard from "./commands/spamguard.js";

/** Confirmations can sit behind retried platform calls; the default 10s would cut them off */
const INTERACTION_EVENT_TIMEOUT_MS = 60_000;

export const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMembers, // mute role checks
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent, // fingerprints + review card previews
  ],
  partials: [Partials.Channel],
  // See: https://discordjs.guide/popular-topics/caching.html#limiting-cache-size
  makeCache: Options.cacheWithLimits({
    ...Options.DefaultMakeCacheSettings,
    MessageManager: 50, // review cards are fetched by id when resolved
    GuildMemberManager: 500,
    UserManager: 500,
    PresenceManager: 0,
    VoiceStateManager: 0,
    ReactionManager: 0,
    ReactionUserManager: 0,
    GuildStickerManager: 0,
    GuildScheduledEventManager: 0,
    StageInstanceManager: 0,
    ThreadMemberManager: 0,
  }),
});

const gateway = new DiscordSpamGateway(client);

export const guard = createSpamGuard({
  collaborators: {
    containment: gateway,
    notifier: gateway,
    surface: gateway,
    alerter: gateway,
    audit: gateway,
  },
  reviews: reviewRepository,
  mutes: muteRepository,
  settings: settingsFromEnv(env),
});

const runSpamguardCommand = wrapCommand<ChatInputCommandInteraction>("spamguard", (ctx) =>
  spamguard.execute(ctx, guard)
);

const runSpamButton = wrapCommand<ButtonInteraction>("spam_button", async (ctx) => {
  ctx.step("route");
  const handled = await handleSpamButton(ctx.interaction, guard);
  if (!handled) {
    logger.debug({ customId: ctx.interaction.customId }, "[interaction] unrouted button ignored");
  }
});

client.once(Events.ClientReady, (readyClient) => {
  guard.hydrate();
  guard.start();
  startSpamGuardSchedulers(guard);

  // ===== Coordinated Graceful Shutdown =====
  // ORDER: 1) Stop schedulers, 2) Drain guard, 3) Remove listeners, 4) Destroy client, 5) Close DB
  let isShuttingDown = false;

  const gracefulShutdown = async (signal: string) => {
    if (isShuttingDown) {
      logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
      return;
    }
    isShuttingDown = true;
    logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

    try {
      stopSpamGuardSchedulers();

      // Escalations already past the mute must finish; otherwise a member stays
      // muted with no review card behind it
      await guard.stop();
      logger.debug("[shutdown] Spam guard drained");

      client.removeAllListeners();
      await client.destroy();
      logger.debug("[shutdown] Discord client destroyed");

      try {
        closeDb();
        logger.debug("[shutdown] Database closed");
      } catch (err) {
        logger.warn({ err }, "[shutdown] Database close failed (non-fatal)");
      }

      await flushSentry();
      logger.info("[shutdown] Graceful shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "[shutdown] Error during graceful shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  logger.info(
    { tag: readyClient.user.tag, id: readyClient.user.id, guilds: readyClient.guilds.cache.size },
    "Bot ready"
  );
});

client.on(Events.MessageCreate, wrapEvent("messageCreate", createMessageHandler(guard)));

client.on(
  Events.InteractionCreate,
  wrapEvent(
    "interactionCreate",
    async (interaction) => {
      if (interaction.isButton()) {
        await runSpamButton(interaction);
        return;
      }
      if (interaction.isChatInputCommand() && interaction.commandName === spamguard.data.name) {
        await runSpamguardCommand(interaction);
      }
    },
    INTERACTION_EVENT_TIMEOUT_MS
  )
);

client.on(
  Events.GuildDelete,
  wrapEvent("guildDelete", (guild) => {
    clearSpamGuardConfigCache(guild.id);
    logger.info({ guildId: guild.id }, "[guildDelete] left guild, config cache cleared");
  })
);

async function main() {
  if (!env.GUILD_ID) {
    logger.warn("[startup] GUILD_ID not set - deploy commands globally with `npm run deploy:cmds`");
  }
  await client.login(env.DISCORD_TOKEN);
}

// Only start the bot if not running in test environment
if (!process.env.VITEST_WORKER_ID) {
  main().catch((err: unknown) => {
    logger.error({ err }, "Fatal startup error");
    process.exit(1);
  });
}
