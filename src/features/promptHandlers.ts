/**
 * Walletlist — src/features/promptHandlers.ts
 * WHAT: Handlers for the public prompt: Submit Wallet button, the wallet modal, and My Wallets.
 * FLOWS:
 *  - Submit Wallet → showModal (no store read; the modal must open within 3s)
 *  - Modal submit → defer → submitWallet → ephemeral outcome
 *  - My Wallets → snapshot → ephemeral list
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ButtonInteraction, ModalSubmitInteraction } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { SAFE_ALLOWED_MENTIONS } from "../lib/constants.js";
import { WALLET_INPUT_ID } from "../lib/componentIds.js";
import { buildWalletModal, describeSubmission, describeWallets } from "../ui/promptCard.js";
import { DiscordRoleGranter } from "./roleGrant.js";
import { submitWallet, type RoleGranter } from "./submission.js";
import type { AppServices } from "./services.js";

export async function handleSubmitButton(ctx: CommandContext<ButtonInteraction>): Promise<void> {
  ctx.step("show_modal");
  await ctx.interaction.showModal(buildWalletModal());
}

export async function handleMyWalletsButton(
  ctx: CommandContext<ButtonInteraction>,
  services: AppServices
): Promise<void> {
  const wallets = services.store.get().submittedWallets[ctx.interaction.user.id] ?? [];
  ctx.step("reply");
  await replyOrEdit(ctx.interaction, {
    content: describeWallets(wallets),
    allowedMentions: SAFE_ALLOWED_MENTIONS,
  });
}

/** Roles can only be granted inside a guild; DMs get a granter that reports why. */
function roleGranterFor(interaction: ModalSubmitInteraction): RoleGranter {
  const guild = interaction.guild;
  if (guild) return new DiscordRoleGranter(guild);
  return { grantRole: async () => ({ ok: false, reason: "Not in a server" }) };
}

export async function handleWalletModal(
  ctx: CommandContext<ModalSubmitInteraction>,
  services: AppServices
): Promise<void> {
  const { interaction } = ctx;

  await withStep(ctx, "defer", () => ensureDeferred(interaction));

  const rawAddress = interaction.fields.getTextInputValue(WALLET_INPUT_ID);
  const result = await withStep(ctx, "submit", () =>
    submitWallet({ store: services.store, roles: roleGranterFor(interaction) }, interaction.user.id, rawAddress)
  );

  ctx.step("reply");
  await replyOrEdit(interaction, {
    content: describeSubmission(result),
    allowedMentions: SAFE_ALLOWED_MENTIONS,
  });
}
