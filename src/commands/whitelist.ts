/**
 * Walletlist — src/commands/whitelist.ts
 * WHAT: /whitelist opens the admin settings panel.
 * WHY: All configuration happens through the panel's select menus; the command only renders it.
 * FLOWS:
 *  - Check Administrator → snapshot settings → ephemeral panel reply
 * DOCS:
 *  - SlashCommandBuilder: https://discord.js.org/#/docs/builders/main/class/SlashCommandBuilder
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { MessageFlags, PermissionFlagsBits, SlashCommandBuilder, InteractionContextType } from "discord.js";
import { withStep, type CommandContext } from "../lib/cmdWrap.js";
import { requireAdministrator } from "../utils/requireAdmin.js";
import { buildSettingsPanel } from "../ui/settingsPanel.js";
import type { AppServices } from "../features/services.js";

export const data = new SlashCommandBuilder()
  .setName("whitelist")
  .setDescription("Configure wallet whitelist settings.")
  .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
  .setContexts(InteractionContextType.Guild);

export async function execute(ctx: CommandContext, services: AppServices): Promise<void> {
  const { interaction } = ctx;

  const allowed = await withStep(ctx, "check_admin", () => requireAdministrator(interaction));
  if (!allowed) return;

  const panel = await withStep(ctx, "render_panel", () => buildSettingsPanel(services.store.get()));

  ctx.step("reply");
  await interaction.reply({ ...panel, flags: MessageFlags.Ephemeral });
}
