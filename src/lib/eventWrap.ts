/**
 * src/lib/eventWrap.ts
 * WHAT: Safe wrapper for discord.js event handlers (ready, guildCreate, guildDelete).
 * WHY: A throwing listener must never take the timer loop down with it.
 * FLOWS:
 *  - wrapEvent(name, handler) → wrapped handler that logs, reports and swallows nothing silently
 * USAGE:
 *  client.on(Events.GuildCreate, wrapEvent("guildCreate", (guild) => registerGuild(db, guild.id)));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, isRecoverable } from "./errors.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

const DEFAULT_EVENT_TIMEOUT_MS = 10_000;

/**
 * The returned function never rejects. Failures are logged at error level and,
 * unless they are transient, reported to Sentry.
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    let timeout: ReturnType<typeof setTimeout> | undefined;
    try {
      await Promise.race([
        Promise.resolve().then(() => handler(...args)),
        new Promise<never>((_, reject) => {
          timeout = setTimeout(
            () => reject(new Error(`Event handler timeout after ${timeoutMs}ms`)),
            timeoutMs
          );
        }),
      ]);
    } catch (err) {
      const classified = classifyError(err);
      const guildId = extractGuildId(args);

      logger.error(
        { evt: "event_error", event: eventName, errorKind: classified.kind, guildId, err },
        `[${eventName}] event handler failed: ${classified.message}`
      );

      if (!isRecoverable(classified)) {
        captureException(err, { event: eventName, errorKind: classified.kind, guildId });
      }
    } finally {
      clearTimeout(timeout);
    }
  };
}

/*
 * Guild events pass the Guild itself (id), most others carry guildId.
 */
function extractGuildId(args: unknown[]): string | undefined {
  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;
    const guildId = "guildId" in arg ? arg.guildId : "id" in arg ? arg.id : undefined;
    if (typeof guildId === "string") return guildId;
  }
  return undefined;
}
