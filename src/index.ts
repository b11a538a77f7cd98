/**
 * src/index.ts
 * WHAT: Main process entrypoint. Opens the store, wires the timer scheduler and its
 *       handlers, and keeps the guild registry in step with the gateway.
 * WHY: Startup and shutdown order in one place.
 * FLOWS:
 *  - Boot: Sentry → env → open DB → ensure schema → scheduler + handlers → login
 *  - Ready: register every cached guild → start the timer loop (past-due timers fire first)
 *  - GuildCreate / GuildDelete: register / deregister (cascade removes pending timers)
 *  - SIGTERM/SIGINT: stop loop → destroy client → close DB → flush Sentry
 * DOCS:
 *  - discord.js Events: https://discord.js.org/docs/packages/discord.js/main/Events:Enum
 *  - Node process signals: https://nodejs.org/api/process.html#signal-events
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { initializeSentry, captureException, flushSentry } from "./lib/sentry.js";
initializeSentry();

import { Client, Events, GatewayIntentBits, type Guild } from "discord.js";
import { logger } from "./lib/logger.js";
import { env, schedulerOptionsFromEnv } from "./lib/env.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { openDatabase, closeDatabase } from "./db/db.js";
import { ensureTimerSchema } from "./db/ensure.js";
import { registerGuild, deregisterGuild } from "./store/guildStore.js";
import { TimerStore } from "./store/timerStore.js";
import { TimerScheduler } from "./scheduler/timerScheduler.js";
import { REMINDER_EVENT, createReminderHandler } from "./features/reminders.js";
import { createDiscordReminderDelivery } from "./features/reminderDelivery.js";

// Give Sentry a moment to send the report before the process goes away
const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

// ===== Global Error Handlers =====

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
});

process.on("uncaughtException", (error, origin) => {
  logger.error(
    { evt: "uncaught_exception", err: error, origin },
    "[process] Uncaught exception - process may be in unstable state"
  );
  captureException(error, { context: "uncaughtException", origin });
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

async function main(): Promise<void> {
  const db = openDatabase(env.DB_PATH);
  ensureTimerSchema(db);

  const store = new TimerStore(db);
  const scheduler = new TimerScheduler(store, schedulerOptionsFromEnv(env));

  const client = new Client({ intents: [GatewayIntentBits.Guilds] });

  scheduler.register(REMINDER_EVENT, createReminderHandler(createDiscordReminderDelivery(client)));

  client.once(
    Events.ClientReady,
    wrapEvent("ready", (ready: Client<true>) => {
      // Guilds joined while offline: register before the first pass so their timers can be created
      for (const guildId of ready.guilds.cache.keys()) {
        registerGuild(db, guildId);
      }

      if (env.TIMER_SCHEDULER_DISABLED) {
        logger.warn("[startup] TIMER_SCHEDULER_DISABLED set - timers will not fire in this process");
      } else {
        scheduler.start();
      }

      logger.info(
        { tag: ready.user.tag, guilds: ready.guilds.cache.size, pending: scheduler.countPending() },
        "Bot ready"
      );
    })
  );

  client.on(
    Events.GuildCreate,
    wrapEvent("guildCreate", (guild: Guild) => {
      registerGuild(db, guild.id);
    })
  );

  client.on(
    Events.GuildDelete,
    wrapEvent("guildDelete", (guild: Guild) => {
      // Outages also emit GuildDelete; only a real removal should drop the guild's timers
      if (!guild.available) {
        logger.warn({ guildId: guild.id }, "[guildDelete] guild unavailable, keeping its timers");
        return;
      }
      deregisterGuild(db, guild.id);
    })
  );

  // ===== Coordinated Graceful Shutdown =====
  // ORDER: 1) stop the loop (in-flight timer finishes), 2) destroy client, 3) close DB, 4) flush Sentry
  let isShuttingDown = false;

  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
      return;
    }
    isShuttingDown = true;
    logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

    try {
      await scheduler.stop();
      client.removeAllListeners();
      await client.destroy();
      logger.debug("[shutdown] Discord client destroyed");
      closeDatabase(db);
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

  await client.login(env.DISCORD_TOKEN);
}

// Only start the bot if not running in test environment
if (!process.env.VITEST_WORKER_ID) {
  main().catch((err) => {
    logger.error({ err }, "Fatal startup error");
    process.exit(1);
  });
}
