/**
 * Walletlist — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for Discord.js event handlers
 * WHY: Ensures events never crash the bot, always logged with error classification
 * FLOWS:
 *  - wrapEvent(name, handler) → wrapped handler that catches errors
 *  - Error classification applied to all caught errors
 *  - Sentry capture only for reportable errors
 * USAGE:
 *  import { wrapEvent } from "./eventWrap.js";
 *  client.on("guildMemberRemove", wrapEvent("guildMemberRemove", async (member) => { ... }));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

/**
 * Override via EVENT_TIMEOUT_MS or the per-handler timeout parameter.
 */
const DEFAULT_EVENT_TIMEOUT_MS = parseInt(process.env.EVENT_TIMEOUT_MS ?? "10000", 10);

/**
 * Wrap an event handler with error protection. The returned handler never
 * rejects; failures are logged with whatever guild/user/channel ids the
 * event arguments carry.
 *
 * @example
 * client.on("guildMemberRemove", wrapEvent("guildMemberRemove", async (member) => {
 *   await cleanup.onMemberLeave(member.id);
 * }));
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
        captureException(err instanceof Error ? err : new Error(String(err)), {
          event: eventName,
          errorKind: classified.kind,
          ...contextIds,
        });
      }
      // Never re-throw: one failing handler must not take the process down.
    } finally {
      if (timer) clearTimeout(timer);
    }
  };
}

/**
 * Inspect discord.js event payloads (GuildMember, Interaction, Message...) for
 * the ids worth attaching to an error log. Unknown shapes are skipped.
 */
export function extractEventContext(args: unknown[]): Record<string, unknown> {
  const context: Record<string, unknown> = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;

    const obj = arg as Record<string, unknown>;

    if (typeof obj.guildId === "string") {
      context.guildId = obj.guildId;
    }
    if (obj.guild && typeof obj.guild === "object") {
      const guild = obj.guild as Record<string, unknown>;
      if (typeof guild.id === "string") {
        context.guildId = guild.id;
      }
    }
    if (typeof obj.id === "string" && !context.entityId) {
      context.entityId = obj.id;
    }
    if (obj.user && typeof obj.user === "object") {
      const user = obj.user as Record<string, unknown>;
      if (typeof user.id === "string") {
        context.userId = user.id;
      }
    }
    if (typeof obj.channelId === "string") {
      context.channelId = obj.channelId;
    }
  }

  return context;
}
