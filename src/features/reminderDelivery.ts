/**
 * src/features/reminderDelivery.ts
 * WHAT: discord.js implementation of ReminderDelivery.
 * WHY: Keeps the reminder handler free of gateway types so it can be tested with a fake.
 * DOCS:
 *  - GuildMemberManager.fetch: https://discord.js.org/docs/packages/discord.js/main/GuildMemberManager:Class#fetch
 *  - EmbedBuilder: https://discord.js.org/docs/packages/builders/main/EmbedBuilder:Class
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder, type Client } from "discord.js";
import { classifyError } from "../lib/errors.js";
import {
  ReminderChannelUnavailableError,
  type ReminderDelivery,
  type RenderedReminder,
} from "./reminders.js";

const REMINDER_COLOR = 0x3b82f6;

// 10004 Unknown Guild, 10007 Unknown Member, 10013 Unknown User
const GONE_CODES = new Set([10004, 10007, 10013]);

function isGone(err: unknown): boolean {
  const classified = classifyError(err);
  return classified.kind === "discord_api" && GONE_CODES.has(classified.code);
}

function toEmbed(reminder: RenderedReminder): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(reminder.title)
    .setDescription(reminder.description)
    .setFooter({ text: reminder.footer })
    .setColor(REMINDER_COLOR);
}

function mentionContent(userIds: string[]): string {
  return userIds.map((id) => `<@${id}>`).join(" ");
}

export function createDiscordReminderDelivery(client: Client): ReminderDelivery {
  return {
    async resolveMember(guildId, userId) {
      try {
        const guild = client.guilds.cache.get(guildId) ?? (await client.guilds.fetch(guildId));
        const member = await guild.members.fetch(userId);
        return { displayName: member.displayName };
      } catch (err) {
        if (isGone(err)) return null;
        throw err;
      }
    },

    async sendToChannel(channelId, reminder) {
      const channel = await client.channels.fetch(channelId);
      if (!channel || !channel.isSendable()) {
        throw new ReminderChannelUnavailableError(`channel ${channelId} is missing or not sendable`);
      }
      // Only the owner and signed-up recipients may be pinged, whatever the message text says
      await channel.send({
        content: mentionContent(reminder.mentions),
        embeds: [toEmbed(reminder)],
        allowedMentions: { users: reminder.mentions },
      });
    },

    async sendDirect(userId, notice, reminder) {
      const user = await client.users.fetch(userId);
      await user.send({ content: notice, embeds: [toEmbed(reminder)] });
    },
  };
}
