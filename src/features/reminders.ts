/**
 * src/features/reminders.ts
 * WHAT: Personal reminders built on the timer scheduler ("remind me in 2h to ...").
 * WHY: The reference consumer of the timer contract: schedule, sign-ups via payload
 *      edits, snooze, cancel, and a handler that survives lost channel access.
 * FLOWS:
 *  - createReminder() → parseReminderTime() → scheduler.schedule("reminder", JSON payload)
 *  - toggleReminderRecipient() → read payload → add/remove user → scheduler.updatePayload()
 *  - handler: parse payload → ping owner + recipients in channel → DM fallback
 * DOCS:
 *  - Allowed mentions: https://discord.com/developers/docs/resources/message#allowed-mentions-object
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { logger, redact } from "../lib/logger.js";
import { formatUtc, nowUtc, parseDurationSeconds } from "../lib/time.js";
import { ValidationError, validateSnowflake } from "../lib/validation.js";
import {
  HandlerPermanentError,
  HandlerTransientError,
  classifyError,
  isRecoverable,
} from "../lib/errors.js";
import type { TimerScheduler } from "../scheduler/timerScheduler.js";
import type { Timer, TimerHandler } from "./timers/types.js";

export const REMINDER_EVENT = "reminder";
export const MAX_REMINDER_MESSAGE_LENGTH = 999;
export const MAX_ADDITIONAL_RECIPIENTS = 50;
export const MAX_REMINDER_HORIZON_SECONDS = 5 * 365 * 24 * 60 * 60;

export const reminderPayloadSchema = z.object({
  message: z.string().min(1).max(MAX_REMINDER_MESSAGE_LENGTH),
  jumpUrl: z.string().url().nullable().default(null),
  additionalRecipients: z.array(z.string()).max(MAX_ADDITIONAL_RECIPIENTS).default([]),
});

export type ReminderPayload = z.infer<typeof reminderPayloadSchema>;

export interface Reminder {
  timer: Timer;
  payload: ReminderPayload;
}

/**
 * @returns null when the payload is absent, not JSON, or not a reminder shape
 */
export function parseReminderPayload(raw: string | null): ReminderPayload | null {
  if (!raw) return null;
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    logger.debug({ err }, "[reminders] payload is not valid JSON");
    return null;
  }
  const parsed = reminderPayloadSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

function serializePayload(payload: ReminderPayload): string {
  return JSON.stringify(payload);
}

// Anything starting with a calendar date is treated as an absolute timestamp
const ABSOLUTE_PATTERN = /^\d{4}-\d{2}-\d{2}/;
const UTC_OFFSET_PATTERN = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/*
 * Date.parse reads a date-time without an offset in the host's zone.
 * Reminder times without one are UTC, whatever TZ the process runs under.
 */
function asUtcTimestamp(text: string): string {
  const iso = text.replace(/^(\d{4}-\d{2}-\d{2}) /, "$1T");
  if (iso.length > 10 && !UTC_OFFSET_PATTERN.test(iso)) return `${iso}Z`;
  return iso;
}

/**
 * Resolve user input to an absolute instant.
 *
 * @example
 * parseReminderTime("1h 30m", 1729454400)               // 1729459800
 * parseReminderTime("2024-10-21T08:00:00Z", 1729454400) // 1729497600
 * parseReminderTime("2024-10-21 08:00", 1729454400)     // 1729497600 (no offset means UTC)
 * @throws ValidationError for unrecognised input or an absolute time not in the future
 */
export function parseReminderTime(when: string, now: number = nowUtc()): number {
  const text = when.trim();

  if (ABSOLUTE_PATTERN.test(text)) {
    const ms = Date.parse(asUtcTimestamp(text));
    if (Number.isNaN(ms)) {
      throw new ValidationError(`could not read "${text}" as a date`, "when");
    }
    const at = Math.floor(ms / 1000);
    if (at <= now) {
      throw new ValidationError("that time is in the past", "when");
    }
    return at;
  }

  const seconds = parseDurationSeconds(text);
  if (seconds <= 0) {
    throw new ValidationError(`could not read "${text}" as a duration (try "1h 30m" or "2 days")`, "when");
  }
  return now + seconds;
}

export interface CreateReminderInput {
  guildId: string;
  userId: string;
  channelId: string;
  message: string;
  when: string;
  now?: number;
}

/**
 * @throws ValidationError for an empty/oversized message, bad time, or one more than five years out
 */
export function createReminder(scheduler: TimerScheduler, input: CreateReminderInput): Timer {
  const message = input.message.trim();
  if (message.length === 0) {
    throw new ValidationError("reminder message cannot be empty", "message");
  }
  if (message.length > MAX_REMINDER_MESSAGE_LENGTH) {
    throw new ValidationError(
      `reminder message must be under ${MAX_REMINDER_MESSAGE_LENGTH + 1} characters`,
      "message"
    );
  }

  const now = input.now ?? nowUtc();
  const expiresAt = parseReminderTime(input.when, now);
  if (expiresAt - now > MAX_REMINDER_HORIZON_SECONDS) {
    throw new ValidationError("that is a bit too far in the future (max 5 years)", "when");
  }

  const timer = scheduler.schedule({
    guildId: input.guildId,
    userId: input.userId,
    channelId: input.channelId,
    eventKind: REMINDER_EVENT,
    expiresAt,
    payload: serializePayload({ message, jumpUrl: null, additionalRecipients: [] }),
  });

  logger.info(
    { timerId: timer.id, guildId: timer.guildId, userId: timer.userId, expiresAt, preview: redact(message) },
    "[reminders] reminder created"
  );
  return timer;
}

function loadReminder(scheduler: TimerScheduler, timerId: number, guildId: string): Reminder | null {
  const timer = scheduler.get(timerId, guildId);
  if (!timer || timer.eventKind !== REMINDER_EVENT) return null;
  const payload = parseReminderPayload(timer.payload);
  return payload ? { timer, payload } : null;
}

export type ToggleRecipientResult = "added" | "removed" | "own_reminder" | "full" | "not_found";

/**
 * Sign a user up for (or off) someone else's reminder.
 */
export function toggleReminderRecipient(
  scheduler: TimerScheduler,
  timerId: number,
  guildId: string,
  userId: string
): ToggleRecipientResult {
  validateSnowflake(userId, "userId");
  const reminder = loadReminder(scheduler, timerId, guildId);
  if (!reminder) return "not_found";
  if (reminder.timer.userId === userId) return "own_reminder";

  const recipients = reminder.payload.additionalRecipients;
  let result: ToggleRecipientResult;
  let next: string[];
  if (recipients.includes(userId)) {
    next = recipients.filter((id) => id !== userId);
    result = "removed";
  } else if (recipients.length >= MAX_ADDITIONAL_RECIPIENTS) {
    return "full";
  } else {
    next = [...recipients, userId];
    result = "added";
  }

  const updated = scheduler.updatePayload(
    timerId,
    serializePayload({ ...reminder.payload, additionalRecipients: next }),
    guildId
  );
  // Fired or cancelled between the read and the write
  if (!updated) return "not_found";

  logger.debug({ timerId, guildId, userId, result }, "[reminders] recipient toggled");
  return result;
}

/**
 * Owner-only. Returns null when the reminder is gone or belongs to someone else.
 *
 * @throws ValidationError when the duration cannot be read
 */
export function snoozeReminder(
  scheduler: TimerScheduler,
  timerId: number,
  guildId: string,
  userId: string,
  duration: string
): Timer | null {
  const seconds = parseDurationSeconds(duration);
  if (seconds <= 0) {
    throw new ValidationError(`could not read "${duration}" as a duration`, "duration");
  }
  const reminder = loadReminder(scheduler, timerId, guildId);
  if (!reminder || reminder.timer.userId !== userId) return null;
  return scheduler.snooze(timerId, seconds, guildId);
}

/**
 * Owner-only.
 */
export function cancelReminder(
  scheduler: TimerScheduler,
  timerId: number,
  guildId: string,
  userId: string
): boolean {
  const timer = scheduler.get(timerId, guildId);
  if (!timer || timer.eventKind !== REMINDER_EVENT || timer.userId !== userId) return false;
  return scheduler.cancel(timerId, guildId);
}

/**
 * Soonest first. Rows whose payload cannot be read are skipped.
 */
export function listReminders(scheduler: TimerScheduler, guildId: string, userId: string): Reminder[] {
  const reminders: Reminder[] = [];
  for (const timer of scheduler.listForUser(guildId, userId, REMINDER_EVENT)) {
    const payload = parseReminderPayload(timer.payload);
    if (payload) reminders.push({ timer, payload });
  }
  return reminders;
}

/**
 * Records the link to the confirmation message once it has been posted.
 */
export function setReminderJumpUrl(
  scheduler: TimerScheduler,
  timerId: number,
  guildId: string,
  url: string
): Timer | null {
  const reminder = loadReminder(scheduler, timerId, guildId);
  if (!reminder) return null;
  const parsed = z.string().url().safeParse(url);
  if (!parsed.success) {
    throw new ValidationError("jump URL must be an absolute URL", "url");
  }
  return scheduler.updatePayload(
    timerId,
    serializePayload({ ...reminder.payload, jumpUrl: parsed.data }),
    guildId
  );
}

// ===== Delivery =====

export interface RenderedReminder {
  title: string;
  description: string;
  /** User ids to ping, owner first */
  mentions: string[];
  footer: string;
}

/**
 * Thrown by a delivery when the reminder's channel is gone or no longer sendable.
 */
export class ReminderChannelUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReminderChannelUnavailableError";
  }
}

/**
 * What the reminder handler needs from Discord. The discord.js implementation lives
 * in reminderDelivery.ts; tests pass a fake.
 */
export interface ReminderDelivery {
  /** null when the user is no longer a member of the guild */
  resolveMember(guildId: string, userId: string): Promise<{ displayName: string } | null>;
  sendToChannel(channelId: string, reminder: RenderedReminder): Promise<void>;
  sendDirect(userId: string, notice: string, reminder: RenderedReminder): Promise<void>;
}

export const DM_FALLBACK_NOTICE = "I lost access to the channel this reminder was sent from, so here it is!";

export function renderReminder(
  displayName: string,
  payload: ReminderPayload,
  mentions: string[],
  createdAt: number
): RenderedReminder {
  const jump = payload.jumpUrl ? `\n\n[Jump to original message!](${payload.jumpUrl})` : "";
  return {
    title: `✉️ ${displayName}, your reminder:`,
    description: `${payload.message}${jump}`,
    mentions,
    // Footers don't render <t:...> tags
    footer: `Reminder set ${formatUtc(createdAt)}`,
  };
}

/*
 * Discord codes that mean the channel route is dead for us:
 * 10003 Unknown Channel, 50001 Missing Access, 50013 Missing Permissions.
 * A 5xx also falls back to DM rather than waiting for a retry.
 */
const CHANNEL_GONE_CODES = new Set([10003, 50001, 50013]);
// 50007: Cannot send messages to this user (DMs closed)
const DM_CLOSED_CODE = 50007;

function isChannelUnavailable(err: unknown): boolean {
  if (err instanceof ReminderChannelUnavailableError) return true;
  const classified = classifyError(err);
  if (classified.kind !== "discord_api") return false;
  const status = classified.httpStatus ?? 0;
  return CHANNEL_GONE_CODES.has(classified.code) || status === 403 || status === 404 || status >= 500;
}

function toHandlerError(err: unknown, context: string): Error {
  if (err instanceof HandlerTransientError || err instanceof HandlerPermanentError) return err;
  if (isRecoverable(classifyError(err))) {
    return new HandlerTransientError(`${context}: transient failure`, { cause: err });
  }
  return new HandlerPermanentError(`${context}: failed`, { cause: err });
}

/**
 * Timer handler for REMINDER_EVENT.
 *
 * - payload unreadable → HandlerPermanentError
 * - owner left the guild → nothing to deliver, completes quietly
 * - channel gone or forbidden → DM fallback
 * - DMs closed → HandlerPermanentError; Discord 5xx / socket errors → HandlerTransientError
 */
export function createReminderHandler(delivery: ReminderDelivery): TimerHandler {
  return async (timer: Timer) => {
    const payload = parseReminderPayload(timer.payload);
    if (!payload) {
      throw new HandlerPermanentError(`reminder ${timer.id} has no readable payload`);
    }

    let owner: { displayName: string } | null;
    try {
      owner = await delivery.resolveMember(timer.guildId, timer.userId);
    } catch (err) {
      throw toHandlerError(err, "resolving reminder owner");
    }
    if (!owner) {
      logger.info({ timerId: timer.id, guildId: timer.guildId }, "[reminders] owner left guild, dropping reminder");
      return;
    }

    const mentions = [timer.userId];
    for (const recipientId of payload.additionalRecipients) {
      try {
        if (await delivery.resolveMember(timer.guildId, recipientId)) mentions.push(recipientId);
      } catch (err) {
        throw toHandlerError(err, "resolving reminder recipients");
      }
    }

    const reminder = renderReminder(owner.displayName, payload, mentions, timer.createdAt);

    if (timer.channelId) {
      try {
        await delivery.sendToChannel(timer.channelId, reminder);
        logger.info(
          { timerId: timer.id, guildId: timer.guildId, recipients: mentions.length },
          "[reminders] reminder delivered"
        );
        return;
      } catch (err) {
        if (!isChannelUnavailable(err)) throw toHandlerError(err, "sending reminder to channel");
        logger.info(
          { err, timerId: timer.id, channelId: timer.channelId },
          "[reminders] channel unavailable, falling back to DM"
        );
      }
    }

    try {
      await delivery.sendDirect(timer.userId, DM_FALLBACK_NOTICE, reminder);
      logger.info({ timerId: timer.id, userId: timer.userId }, "[reminders] reminder delivered by DM");
    } catch (err) {
      const classified = classifyError(err);
      if (classified.kind === "discord_api" && classified.code === DM_CLOSED_CODE) {
        throw new HandlerPermanentError(`could not deliver reminder ${timer.id} to user`, { cause: err });
      }
      throw toHandlerError(err, "sending reminder by DM");
    }
  };
}
