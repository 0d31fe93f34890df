/**
 * Walletlist — src/ui/promptCard.ts
 * WHAT: The public submission prompt (embed + buttons), the wallet modal, and reply text for outcomes.
 * FLOWS:
 *   - buildPromptPayload() - message posted in the whitelist channel
 *   - buildWalletModal() - opened by the Submit Wallet button
 *   - describeSubmission() / describeWallets() - ephemeral reply text
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  EmbedBuilder,
  ModalBuilder,
  TextInputBuilder,
  TextInputStyle,
  type MessageCreateOptions,
} from "discord.js";
import {
  MY_WALLETS_BUTTON_ID,
  SUBMIT_BUTTON_ID,
  WALLET_INPUT_ID,
  WALLET_MODAL_ID,
} from "../lib/componentIds.js";
import { SAFE_ALLOWED_MENTIONS, WALLET_ADDRESS_MAX_LENGTH } from "../lib/constants.js";
import type { SubmissionResult } from "../features/submission.js";

const COLORS = {
  primary: 0x3b82f6, // blue-500
};

export const PROMPT_FOOTER = "Walletlist • submissions are private";

export function buildPromptPayload(): MessageCreateOptions {
  const embed = new EmbedBuilder()
    .setTitle("Wallet Whitelist")
    .setDescription(
      [
        "Press **Submit Wallet** to add your wallet address to the whitelist.",
        "Press **My Wallets** to see what you have submitted.",
      ].join("\n")
    )
    .setColor(COLORS.primary)
    .setFooter({ text: PROMPT_FOOTER });

  const row = new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder().setCustomId(SUBMIT_BUTTON_ID).setLabel("Submit Wallet").setStyle(ButtonStyle.Primary),
    new ButtonBuilder().setCustomId(MY_WALLETS_BUTTON_ID).setLabel("My Wallets").setStyle(ButtonStyle.Secondary)
  );

  return { embeds: [embed], components: [row], allowedMentions: SAFE_ALLOWED_MENTIONS };
}

export function buildWalletModal(): ModalBuilder {
  const input = new TextInputBuilder()
    .setCustomId(WALLET_INPUT_ID)
    .setLabel("Wallet address")
    .setStyle(TextInputStyle.Short)
    .setRequired(true)
    .setMinLength(1)
    .setMaxLength(WALLET_ADDRESS_MAX_LENGTH);

  return new ModalBuilder()
    .setCustomId(WALLET_MODAL_ID)
    .setTitle("Submit Wallet")
    .addComponents(new ActionRowBuilder<TextInputBuilder>().addComponents(input));
}

/** Bulleted list, code-formatted so addresses render verbatim. */
export function formatWalletList(wallets: readonly string[]): string {
  return wallets.map((wallet) => `• \`${wallet.replace(/`/g, "'")}\``).join("\n");
}

export function describeWallets(wallets: readonly string[]): string {
  if (wallets.length === 0) {
    return "You have not submitted any wallets.";
  }
  return `Your submitted wallets:\n${formatWalletList(wallets)}`;
}

export function describeSubmission(result: SubmissionResult): string {
  if (result.ok) {
    const lines = ["Wallet submitted. Your wallets:", formatWalletList(result.wallets)];
    if (result.roleWarning) {
      lines.push(`-# The whitelist role could not be given: ${result.roleWarning}`);
    }
    return lines.join("\n");
  }

  switch (result.reason) {
    case "whitelist_closed":
      return "The whitelist is currently closed.";
    case "limit_reached":
      return `You have reached the limit of ${result.maxWallets} wallet(s).\n${formatWalletList(result.wallets)}`;
  }
}
