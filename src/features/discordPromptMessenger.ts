/**
 * Walletlist — src/features/discordPromptMessenger.ts
 * WHAT: PromptMessenger over discord.js: finds an existing prompt, or sends a new one.
 * WHY: Restarts and re-enables must reuse the prompt already in the channel instead of stacking copies.
 * FLOWS:
 *  - hasExistingPrompt(channelId): fetch channel → pinned → 50 most recent → bot-authored + submit button?
 *  - postPrompt(channelId): fetch channel → send(buildPromptPayload())
 * DOCS:
 *  - Guild text channels API: https://discord.js.org/#/docs/discord.js/main/class/GuildTextBasedChannel
 * PITFALLS:
 *  - Requires ViewChannel + ReadMessageHistory to see old prompts; without them a duplicate gets posted.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ComponentType, type Client, type GuildTextBasedChannel, type Message } from "discord.js";
import { logger } from "../lib/logger.js";
import { SUBMIT_BUTTON_ID } from "../lib/componentIds.js";
import { PROMPT_SCAN_LIMIT } from "../lib/constants.js";
import { buildPromptPayload } from "../ui/promptCard.js";
import type { PromptMessenger } from "./prompt.js";

function messageHasSubmitButton(message: Message): boolean {
  return message.components.some((row) => {
    if (row.type !== ComponentType.ActionRow) return false;
    return row.components.some(
      (component) => component.type === ComponentType.Button && component.customId === SUBMIT_BUTTON_ID
    );
  });
}

export function isPromptCandidate(message: Message, botId: string | null): boolean {
  if (botId && message.author.id !== botId) return false;
  return messageHasSubmitButton(message);
}

/**
 * Search order: pinned messages first, then the most recent PROMPT_SCAN_LIMIT.
 * Fetch failures count as "not found"; the caller will post.
 */
export async function findExistingPrompt(
  channel: GuildTextBasedChannel,
  botId: string | null
): Promise<Message | null> {
  const pinned = await channel.messages.fetchPinned().catch((err: unknown) => {
    logger.debug({ evt: "prompt_scan_pinned_fail", channelId: channel.id, err }, "[prompt] pinned fetch failed");
    return null;
  });
  if (pinned) {
    for (const pinnedMessage of pinned.values()) {
      if (isPromptCandidate(pinnedMessage, botId)) return pinnedMessage;
    }
  }

  const recent = await channel.messages.fetch({ limit: PROMPT_SCAN_LIMIT }).catch((err: unknown) => {
    logger.debug({ evt: "prompt_scan_recent_fail", channelId: channel.id, err }, "[prompt] history fetch failed");
    return null;
  });
  if (recent) {
    for (const candidate of recent.values()) {
      if (isPromptCandidate(candidate, botId)) return candidate;
    }
  }

  return null;
}

export class DiscordPromptMessenger implements PromptMessenger {
  constructor(private readonly client: Client) {}

  async hasExistingPrompt(channelId: string): Promise<boolean> {
    const channel = await this.resolveChannel(channelId);
    const existing = await findExistingPrompt(channel, this.client.user?.id ?? null);
    return existing !== null;
  }

  async postPrompt(channelId: string): Promise<void> {
    const channel = await this.resolveChannel(channelId);
    const sent = await channel.send(buildPromptPayload());
    logger.debug({ channelId, messageId: sent.id }, "[prompt] message sent");
  }

  /**
   * THROWS: Error when the id is not a guild text channel the bot can see.
   */
  private async resolveChannel(channelId: string): Promise<GuildTextBasedChannel> {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isTextBased() || channel.isDMBased()) {
      throw new Error(`Channel ${channelId} is not a guild text channel`);
    }
    return channel;
  }
}
