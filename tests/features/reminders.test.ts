/**
 * tests/features/reminders.test.ts
 * WHAT: Reminder commands on top of the scheduler, and the reminder timer handler.
 * WHY: Reminders are the main timer consumer; ownership and delivery fallbacks are user-visible.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  redact: (value: string) => value,
}));

import {
  DM_FALLBACK_NOTICE,
  MAX_ADDITIONAL_RECIPIENTS,
  REMINDER_EVENT,
  ReminderChannelUnavailableError,
  cancelReminder,
  createReminder,
  createReminderHandler,
  listReminders,
  parseReminderPayload,
  parseReminderTime,
  setReminderJumpUrl,
  snoozeReminder,
  toggleReminderRecipient,
  type ReminderDelivery,
} from "../../src/features/reminders.js";
import { TimerScheduler } from "../../src/scheduler/timerScheduler.js";
import { TimerStore } from "../../src/store/timerStore.js";
import { ValidationError } from "../../src/lib/validation.js";
import { HandlerPermanentError, HandlerTransientError } from "../../src/lib/errors.js";
import type { Timer } from "../../src/features/timers/types.js";
import { createDiscordAPIError, createNetworkError } from "../utils/errorFixtures.js";
import { CHANNEL_1, GUILD_A, GUILD_B, T0, USER_1, USER_2, USER_3, createTestDb } from "../utils/testDb.js";

describe("parseReminderTime", () => {
  it("adds a relative duration to now", () => {
    expect(parseReminderTime("1h 30m", T0)).toBe(T0 + 5400);
    expect(parseReminderTime("  2 days ", T0)).toBe(T0 + 2 * 86_400);
  });

  it("accepts an absolute timestamp in the future", () => {
    expect(parseReminderTime("2024-10-21T08:00:00Z", T0)).toBe(1_729_497_600);
  });

  describe("outside UTC", () => {
    const originalTz = process.env.TZ;

    beforeEach(() => {
      process.env.TZ = "America/New_York";
    });

    afterEach(() => {
      if (originalTz === undefined) delete process.env.TZ;
      else process.env.TZ = originalTz;
    });

    it("reads a timestamp without an offset as UTC", () => {
      expect(parseReminderTime("2024-10-21T08:00:00", T0)).toBe(1_729_497_600);
      expect(parseReminderTime("2024-10-21 08:00", T0)).toBe(1_729_497_600);
    });

    it("honours an explicit offset", () => {
      expect(parseReminderTime("2024-10-21T04:00:00-04:00", T0)).toBe(1_729_497_600);
    });

    it("reads a bare date as UTC midnight", () => {
      expect(parseReminderTime("2024-10-21", T0)).toBe(1_729_468_800);
    });
  });

  it("rejects an absolute timestamp in the past", () => {
    expect(() => parseReminderTime("2024-10-20T19:00:00Z", T0)).toThrow("that time is in the past");
  });

  it("rejects input it cannot read", () => {
    expect(() => parseReminderTime("tomorrow", T0)).toThrow(ValidationError);
    expect(() => parseReminderTime("2024-99-99", T0)).toThrow(ValidationError);
  });
});

describe("parseReminderPayload", () => {
  it("fills defaults for optional fields", () => {
    expect(parseReminderPayload(JSON.stringify({ message: "stretch" }))).toEqual({
      message: "stretch",
      jumpUrl: null,
      additionalRecipients: [],
    });
  });

  it("returns null for missing, malformed or foreign payloads", () => {
    expect(parseReminderPayload(null)).toBeNull();
    expect(parseReminderPayload("{not json")).toBeNull();
    expect(parseReminderPayload(JSON.stringify({ reason: "spam" }))).toBeNull();
  });
});

describe("reminder commands", () => {
  let scheduler: TimerScheduler;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(T0 * 1000);
    scheduler = new TimerScheduler(new TimerStore(createTestDb([GUILD_A, GUILD_B])));
  });

  function remind(message = "stretch", when = "2h", userId = USER_1): Timer {
    return createReminder(scheduler, { guildId: GUILD_A, userId, channelId: CHANNEL_1, message, when });
  }

  describe("createReminder", () => {
    it("schedules a reminder timer with a trimmed message", () => {
      const timer = remind("  stretch  ");

      expect(timer).toMatchObject({
        guildId: GUILD_A,
        userId: USER_1,
        channelId: CHANNEL_1,
        eventKind: REMINDER_EVENT,
        expiresAt: T0 + 7200,
      });
      expect(parseReminderPayload(timer.payload)).toEqual({
        message: "stretch",
        jumpUrl: null,
        additionalRecipients: [],
      });
    });

    it("rejects empty and oversized messages", () => {
      expect(() => remind("   ")).toThrow("reminder message cannot be empty");
      expect(() => remind("x".repeat(1000))).toThrow("reminder message must be under 1000 characters");
      expect(remind("x".repeat(999)).payload).toContain("x".repeat(999));
    });

    it("rejects times more than five years out", () => {
      expect(() => remind("stretch", "6y")).toThrow("that is a bit too far in the future (max 5 years)");
      expect(scheduler.countPending()).toBe(0);
    });
  });

  describe("toggleReminderRecipient", () => {
    it("adds then removes another member", () => {
      const timer = remind();

      expect(toggleReminderRecipient(scheduler, timer.id, GUILD_A, USER_2)).toBe("added");
      expect(parseReminderPayload(scheduler.get(timer.id)?.payload ?? null)?.additionalRecipients).toEqual([
        USER_2,
      ]);

      expect(toggleReminderRecipient(scheduler, timer.id, GUILD_A, USER_2)).toBe("removed");
      expect(parseReminderPayload(scheduler.get(timer.id)?.payload ?? null)?.additionalRecipients).toEqual([]);
    });

    it("refuses the owner and unknown reminders", () => {
      const timer = remind();

      expect(toggleReminderRecipient(scheduler, timer.id, GUILD_A, USER_1)).toBe("own_reminder");
      expect(toggleReminderRecipient(scheduler, timer.id + 100, GUILD_A, USER_2)).toBe("not_found");
      expect(toggleReminderRecipient(scheduler, timer.id, GUILD_B, USER_2)).toBe("not_found");
    });

    it("stops at the recipient limit", () => {
      const timer = remind();
      const recipients = Array.from(
        { length: MAX_ADDITIONAL_RECIPIENTS },
        (_, i) => `7000000000000000${String(i).padStart(2, "0")}`
      );
      scheduler.updatePayload(
        timer.id,
        JSON.stringify({ message: "stretch", jumpUrl: null, additionalRecipients: recipients })
      );

      expect(toggleReminderRecipient(scheduler, timer.id, GUILD_A, USER_2)).toBe("full");
      // Leaving still works when full
      expect(toggleReminderRecipient(scheduler, timer.id, GUILD_A, recipients[0] ?? "")).toBe("removed");
    });
  });

  describe("snoozeReminder", () => {
    it("moves the owner's reminder relative to now", () => {
      const timer = remind("stretch", "1m");

      const snoozed = snoozeReminder(scheduler, timer.id, GUILD_A, USER_1, "10m");

      expect(snoozed).toMatchObject({ id: timer.id, expiresAt: T0 + 600, revision: 1 });
    });

    it("ignores everyone but the owner", () => {
      const timer = remind("stretch", "1m");

      expect(snoozeReminder(scheduler, timer.id, GUILD_A, USER_2, "10m")).toBeNull();
      expect(scheduler.get(timer.id)?.expiresAt).toBe(T0 + 60);
    });

    it("rejects a duration it cannot read", () => {
      const timer = remind();
      expect(() => snoozeReminder(scheduler, timer.id, GUILD_A, USER_1, "later")).toThrow(ValidationError);
    });
  });

  describe("cancelReminder", () => {
    it("lets only the owner cancel", () => {
      const timer = remind();

      expect(cancelReminder(scheduler, timer.id, GUILD_A, USER_2)).toBe(false);
      expect(scheduler.get(timer.id)).not.toBeNull();

      expect(cancelReminder(scheduler, timer.id, GUILD_A, USER_1)).toBe(true);
      expect(scheduler.get(timer.id)).toBeNull();
      expect(cancelReminder(scheduler, timer.id, GUILD_A, USER_1)).toBe(false);
    });
  });

  describe("listReminders", () => {
    it("returns the user's readable reminders, soonest first", () => {
      const later = remind("later", "3h");
      const sooner = remind("sooner", "1h");
      remind("someone else", "30m", USER_2);
      scheduler.schedule({ guildId: GUILD_A, userId: USER_1, eventKind: "tempban", expiresAt: T0 + 60 });
      scheduler.schedule({
        guildId: GUILD_A,
        userId: USER_1,
        eventKind: REMINDER_EVENT,
        expiresAt: T0 + 120,
        payload: "{broken",
      });

      const reminders = listReminders(scheduler, GUILD_A, USER_1);

      expect(reminders.map((r) => r.timer.id)).toEqual([sooner.id, later.id]);
      expect(reminders.map((r) => r.payload.message)).toEqual(["sooner", "later"]);
    });
  });

  describe("setReminderJumpUrl", () => {
    it("stores an absolute URL in the payload", () => {
      const timer = remind();
      const url = "https://discord.com/channels/111111111111111111/666666666666666666/777777777777777777";

      const updated = setReminderJumpUrl(scheduler, timer.id, GUILD_A, url);

      expect(parseReminderPayload(updated?.payload ?? null)?.jumpUrl).toBe(url);
    });

    it("rejects anything that is not a URL", () => {
      const timer = remind();
      expect(() => setReminderJumpUrl(scheduler, timer.id, GUILD_A, "not a url")).toThrow(
        "jump URL must be an absolute URL"
      );
    });

    it("returns null for a reminder that is gone", () => {
      expect(setReminderJumpUrl(scheduler, 12_345, GUILD_A, "https://example.com")).toBeNull();
    });
  });
});

describe("createReminderHandler", () => {
  const JUMP_URL = "https://discord.com/channels/111111111111111111/666666666666666666/777777777777777777";

  let delivery: {
    resolveMember: Mock<ReminderDelivery["resolveMember"]>;
    sendToChannel: Mock<ReminderDelivery["sendToChannel"]>;
    sendDirect: Mock<ReminderDelivery["sendDirect"]>;
  };

  beforeEach(() => {
    const names: Record<string, string> = { [USER_1]: "Alice", [USER_2]: "Bob" };
    delivery = {
      resolveMember: vi.fn<ReminderDelivery["resolveMember"]>(async (_guildId, userId) => {
        const displayName = names[userId];
        return displayName ? { displayName } : null;
      }),
      sendToChannel: vi.fn<ReminderDelivery["sendToChannel"]>().mockResolvedValue(undefined),
      sendDirect: vi.fn<ReminderDelivery["sendDirect"]>().mockResolvedValue(undefined),
    };
  });

  function reminderTimer(overrides: Partial<Timer> = {}): Timer {
    return {
      id: 7,
      guildId: GUILD_A,
      userId: USER_1,
      channelId: CHANNEL_1,
      eventKind: REMINDER_EVENT,
      expiresAt: T0,
      payload: JSON.stringify({ message: "stretch", jumpUrl: JUMP_URL, additionalRecipients: [USER_2, USER_3] }),
      createdAt: T0 - 3600,
      revision: 0,
      ...overrides,
    };
  }

  const rendered = {
    title: "✉️ Alice, your reminder:",
    description: `stretch\n\n[Jump to original message!](${JUMP_URL})`,
    mentions: [USER_1, USER_2],
    footer: "Reminder set 2024-10-20 19:00 UTC",
  };

  it("pings the owner and recipients still in the guild", async () => {
    await createReminderHandler(delivery)(reminderTimer());

    expect(delivery.sendToChannel).toHaveBeenCalledWith(CHANNEL_1, rendered);
    expect(delivery.sendDirect).not.toHaveBeenCalled();
  });

  it("falls back to DM when the channel is gone", async () => {
    delivery.sendToChannel.mockRejectedValue(createDiscordAPIError(10003, "Unknown Channel", 404));

    await createReminderHandler(delivery)(reminderTimer());

    expect(delivery.sendDirect).toHaveBeenCalledWith(USER_1, DM_FALLBACK_NOTICE, rendered);
  });

  it("falls back to DM when the channel is not sendable", async () => {
    delivery.sendToChannel.mockRejectedValue(new ReminderChannelUnavailableError("not sendable"));

    await createReminderHandler(delivery)(reminderTimer());

    expect(delivery.sendDirect).toHaveBeenCalledTimes(1);
  });

  it("sends by DM when there is no channel", async () => {
    await createReminderHandler(delivery)(reminderTimer({ channelId: null }));

    expect(delivery.sendToChannel).not.toHaveBeenCalled();
    expect(delivery.sendDirect).toHaveBeenCalledWith(USER_1, DM_FALLBACK_NOTICE, rendered);
  });

  it("completes quietly when the owner has left", async () => {
    await createReminderHandler(delivery)(reminderTimer({ userId: USER_3 }));

    expect(delivery.sendToChannel).not.toHaveBeenCalled();
    expect(delivery.sendDirect).not.toHaveBeenCalled();
  });

  it("fails permanently when DMs are closed", async () => {
    delivery.sendDirect.mockRejectedValue(createDiscordAPIError(50007, "Cannot send messages to this user", 403));

    await expect(createReminderHandler(delivery)(reminderTimer({ channelId: null }))).rejects.toBeInstanceOf(
      HandlerPermanentError
    );
  });

  it("fails transiently on a Discord 5xx while sending a DM", async () => {
    delivery.sendDirect.mockRejectedValue(createDiscordAPIError(0, "Internal Server Error", 500));

    await expect(createReminderHandler(delivery)(reminderTimer({ channelId: null }))).rejects.toBeInstanceOf(
      HandlerTransientError
    );
  });

  it("fails permanently when the channel rejects the message itself", async () => {
    delivery.sendToChannel.mockRejectedValue(createDiscordAPIError(50035, "Invalid Form Body", 400));

    await expect(createReminderHandler(delivery)(reminderTimer())).rejects.toBeInstanceOf(HandlerPermanentError);
    expect(delivery.sendDirect).not.toHaveBeenCalled();
  });

  it("fails transiently when member lookup hits a network error", async () => {
    delivery.resolveMember.mockRejectedValue(createNetworkError("ECONNRESET"));

    await expect(createReminderHandler(delivery)(reminderTimer())).rejects.toBeInstanceOf(HandlerTransientError);
  });

  it("fails permanently on an unreadable payload", async () => {
    await expect(createReminderHandler(delivery)(reminderTimer({ payload: "{broken" }))).rejects.toThrow(
      "reminder 7 has no readable payload"
    );
    expect(delivery.resolveMember).not.toHaveBeenCalled();
  });
});
