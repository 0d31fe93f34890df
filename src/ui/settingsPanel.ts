/**
 * Walletlist — src/ui/settingsPanel.ts
 * WHAT: The admin settings panel shown by /whitelist: a settings embed plus four select menus.
 * HOW: Re-rendered from a fresh snapshot after every change so the panel never shows stale values.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ActionRowBuilder,
  ChannelSelectMenuBuilder,
  ChannelType,
  EmbedBuilder,
  RoleSelectMenuBuilder,
  StringSelectMenuBuilder,
  StringSelectMenuOptionBuilder,
  type MessageActionRowComponentBuilder,
} from "discord.js";
import {
  PANEL_ACTION_SELECT_ID,
  PANEL_CAP_SELECT_ID,
  PANEL_CHANNEL_SELECT_ID,
  PANEL_CHOICE_VALUES,
  PANEL_ROLE_SELECT_ID,
} from "../lib/componentIds.js";
import { MAX_WALLETS_MENU_LIMIT } from "../lib/constants.js";
import type { Settings } from "../store/settings.js";
import type { PromptOutcome } from "../features/prompt.js";

const COLORS = {
  ok: 0x10b981, // green-500
  muted: 0x94a3b8, // slate-400
};

export type PanelPayload = {
  /** Empty string clears a notice left by an earlier render. */
  content: string;
  embeds: EmbedBuilder[];
  components: ActionRowBuilder<MessageActionRowComponentBuilder>[];
};

function countWallets(settings: Settings): { users: number; wallets: number } {
  const lists = Object.values(settings.submittedWallets);
  return { users: lists.length, wallets: lists.reduce((sum, list) => sum + list.length, 0) };
}

export function buildSettingsEmbed(settings: Settings): EmbedBuilder {
  const { users, wallets } = countWallets(settings);
  return new EmbedBuilder()
    .setTitle("Whitelist Settings")
    .setColor(settings.whitelistStatus ? COLORS.ok : COLORS.muted)
    .addFields(
      {
        name: "Channel",
        value: settings.whitelistChannelId ? `<#${settings.whitelistChannelId}>` : "Not set",
        inline: true,
      },
      {
        name: "Role",
        value: settings.autoRoleId ? `<@&${settings.autoRoleId}>` : "Not set",
        inline: true,
      },
      { name: "Status", value: settings.whitelistStatus ? "Open" : "Closed", inline: true },
      { name: "Max wallets per user", value: String(settings.maxWallets), inline: true },
      { name: "Delete on leave", value: settings.deleteOnLeave ? "On" : "Off", inline: true },
      { name: "Submissions", value: `${wallets} wallet(s) from ${users} user(s)`, inline: true }
    );
}

export function buildSettingsPanel(settings: Settings, notice?: string): PanelPayload {
  const actionMenu = new StringSelectMenuBuilder()
    .setCustomId(PANEL_ACTION_SELECT_ID)
    .setPlaceholder("Choose an action")
    .addOptions(
      new StringSelectMenuOptionBuilder()
        .setLabel(settings.whitelistStatus ? "Close whitelist" : "Open whitelist")
        .setValue(PANEL_CHOICE_VALUES.toggleStatus),
      new StringSelectMenuOptionBuilder()
        .setLabel(settings.deleteOnLeave ? "Keep wallets when members leave" : "Delete wallets when members leave")
        .setValue(PANEL_CHOICE_VALUES.toggleDeleteOnLeave),
      new StringSelectMenuOptionBuilder()
        .setLabel("Reset all settings")
        .setDescription("Clears channel, role and every submitted wallet")
        .setValue(PANEL_CHOICE_VALUES.reset),
      new StringSelectMenuOptionBuilder().setLabel("Download CSV").setValue(PANEL_CHOICE_VALUES.downloadCsv)
    );

  const channelMenu = new ChannelSelectMenuBuilder()
    .setCustomId(PANEL_CHANNEL_SELECT_ID)
    .setPlaceholder("Whitelist channel")
    .setChannelTypes(ChannelType.GuildText)
    .setMinValues(1)
    .setMaxValues(1);
  if (settings.whitelistChannelId) {
    channelMenu.setDefaultChannels(settings.whitelistChannelId);
  }

  const roleMenu = new RoleSelectMenuBuilder()
    .setCustomId(PANEL_ROLE_SELECT_ID)
    .setPlaceholder("Role given on submission")
    .setMinValues(1)
    .setMaxValues(1);
  if (settings.autoRoleId) {
    roleMenu.setDefaultRoles(settings.autoRoleId);
  }

  const capMenu = new StringSelectMenuBuilder()
    .setCustomId(PANEL_CAP_SELECT_ID)
    .setPlaceholder(`Max wallets per user (now ${settings.maxWallets})`)
    .addOptions(
      Array.from({ length: MAX_WALLETS_MENU_LIMIT }, (_, i) => {
        const n = i + 1;
        return new StringSelectMenuOptionBuilder()
          .setLabel(String(n))
          .setValue(String(n))
          .setDefault(n === settings.maxWallets);
      })
    );

  const rows = [actionMenu, channelMenu, roleMenu, capMenu].map((menu) =>
    new ActionRowBuilder<MessageActionRowComponentBuilder>().addComponents(menu)
  );

  return {
    content: notice ?? "",
    embeds: [buildSettingsEmbed(settings)],
    components: rows,
  };
}

/** One-line note shown above the panel after a change that touched the prompt. */
export function describePromptOutcome(outcome: PromptOutcome | null): string | undefined {
  if (!outcome) return undefined;
  switch (outcome.status) {
    case "posted":
      return `Prompt posted in <#${outcome.channelId}>.`;
    case "already_present":
      return `Prompt already present in <#${outcome.channelId}>.`;
    case "skipped":
      return outcome.reason === "no_channel" ? "No whitelist channel set; prompt not posted." : undefined;
    case "failed":
      return `Could not post the prompt in <#${outcome.channelId}>. Check the bot's permissions there.`;
  }
}

/** Note shown when lowering the cap dropped addresses from members over it. */
export function describeTrimmedWallets(count: number): string | undefined {
  if (count <= 0) return undefined;
  return `Removed ${count} wallet(s) above the new limit; each member keeps their earliest submissions.`;
}
