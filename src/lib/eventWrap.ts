/**
 * WHAT: Safe wrapper for Discord.js event handlers
 * WHY: Ensures events never crash the bot, always logged with error classification
 * FLOWS:
 *  - wrapEvent(name, handler) → wrapped handler that catches errors
 *  - Sentry capture only for reportable errors
 * USAGE:
 *  client.on(Events.MessageCreate, wrapEvent("messageCreate", async (message) => { ... }));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

/**
 * Event handlers should finish quickly. The message listener only enqueues,
 * so 10s is generous; it exists to surface handlers that hang on the API.
 */
const DEFAULT_EVENT_TIMEOUT_MS = parseInt(process.env.EVENT_TIMEOUT_MS ?? "10000", 10);

/**
 * Wrap an event handler with error protection. The returned handler never rejects.
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        handler(...args),
        new Promise<void>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error(`Event handler timeout after ${timeoutMs}ms`)),
            timeoutMs
          );
          timer.unref();
        }),
      ]);
    } catch (err) {
      const classified = classifyError(err);
      const contextIds = extractEventContext(args);

      logger.error(
        {
          evt: "event_error",
          event: eventName,
          ...errorContext(classified, contextIds),
          err,
        },
        `[${eventName}] event handler failed: ${classified.message}`
      );

      if (shouldReportToSentry(classified)) {
        captureException(err, { event: eventName, errorKind: classified.kind, ...contextIds });
      }
      // Never re-throw: one bad message must not take the listener down.
    } finally {
      if (timer) clearTimeout(timer);
    }
  };
}

/**
 * Pull guild/user/channel IDs out of polymorphic event payloads for log context.
 * Unknown shapes are skipped, never thrown on.
 */
export function extractEventContext(args: unknown[]): Record<string, string> {
  const context: Record<string, string> = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;

    const guildId = Reflect.get(arg, "guildId");
    if (typeof guildId === "string") context.guildId = guildId;

    const channelId = Reflect.get(arg, "channelId");
    if (typeof channelId === "string") context.channelId = channelId;

    const author: unknown = Reflect.get(arg, "author") ?? Reflect.get(arg, "user");
    if (author && typeof author === "object") {
      const userId = Reflect.get(author, "id");
      if (typeof userId === "string") context.userId = userId;
    }

    const id = Reflect.get(arg, "id");
    if (typeof id === "string" && !context.entityId) context.entityId = id;
  }

  return context;
}
