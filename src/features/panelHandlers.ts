/**
 * Walletlist — src/features/panelHandlers.ts
 * WHAT: Handlers for the admin panel's select menus.
 * WHY: Menus carry raw string values; they are parsed into ConfigActions here so the
 *      configuration workflow never compares strings.
 * FLOWS:
 *  - any menu → requireAdministrator → parse → deferUpdate → applyConfigAction → editReply(panel)
 *  - "Download CSV" → deferReply (ephemeral) → exportWalletsCsv → editReply(file)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  AttachmentBuilder,
  MessageFlags,
  type ChannelSelectMenuInteraction,
  type RoleSelectMenuInteraction,
  type StringSelectMenuInteraction,
} from "discord.js";
import { withStep, type CommandContext, type SelectInteraction } from "../lib/cmdWrap.js";
import { ValidationError } from "../lib/errors.js";
import { parseCapChoice, parsePanelChoice } from "../lib/componentIds.js";
import { requireAdministrator } from "../utils/requireAdmin.js";
import { buildSettingsPanel, describePromptOutcome, describeTrimmedWallets } from "../ui/settingsPanel.js";
import { applyConfigAction, type ConfigAction } from "./configuration.js";
import { exportWalletsCsv } from "./walletExport.js";
import type { AppServices } from "./services.js";

function firstValue(interaction: SelectInteraction, field: string): string {
  const [value] = interaction.values;
  if (value === undefined) {
    throw new ValidationError(field, "no option selected");
  }
  return value;
}

async function applyAndRender(
  ctx: CommandContext<SelectInteraction>,
  services: AppServices,
  action: ConfigAction
): Promise<void> {
  const { interaction } = ctx;

  await withStep(ctx, "defer_update", () => interaction.deferUpdate());

  const outcome = await withStep(ctx, "apply", () =>
    applyConfigAction({ store: services.store, prompt: services.prompt }, action, interaction.user.id)
  );

  ctx.step("render_panel");
  const notices = [describeTrimmedWallets(outcome.trimmedWallets), describePromptOutcome(outcome.prompt)].filter(
    (notice): notice is string => notice !== undefined
  );
  await interaction.editReply(buildSettingsPanel(outcome.settings, notices.length > 0 ? notices.join("\n") : undefined));
}

export async function handlePanelAction(
  ctx: CommandContext<StringSelectMenuInteraction>,
  services: AppServices
): Promise<void> {
  const { interaction } = ctx;
  if (!(await requireAdministrator(interaction))) return;

  const value = firstValue(interaction, "action");
  const choice = parsePanelChoice(value);
  if (!choice) {
    throw new ValidationError("action", "unknown panel option", value);
  }

  if (choice.kind === "download_csv") {
    await sendWalletCsv(ctx, services);
    return;
  }
  await applyAndRender(ctx, services, choice.action);
}

export async function handlePanelChannel(
  ctx: CommandContext<ChannelSelectMenuInteraction>,
  services: AppServices
): Promise<void> {
  if (!(await requireAdministrator(ctx.interaction))) return;
  const channelId = firstValue(ctx.interaction, "channel");
  await applyAndRender(ctx, services, { type: "set_channel", channelId });
}

export async function handlePanelRole(
  ctx: CommandContext<RoleSelectMenuInteraction>,
  services: AppServices
): Promise<void> {
  if (!(await requireAdministrator(ctx.interaction))) return;
  const roleId = firstValue(ctx.interaction, "role");
  await applyAndRender(ctx, services, { type: "set_role", roleId });
}

export async function handlePanelCap(
  ctx: CommandContext<StringSelectMenuInteraction>,
  services: AppServices
): Promise<void> {
  if (!(await requireAdministrator(ctx.interaction))) return;
  const value = firstValue(ctx.interaction, "max_wallets");
  const action = parseCapChoice(value);
  if (!action) {
    throw new ValidationError("max_wallets", "must be a positive whole number", value);
  }
  await applyAndRender(ctx, services, action);
}

async function sendWalletCsv(
  ctx: CommandContext<StringSelectMenuInteraction>,
  services: AppServices
): Promise<void> {
  const { interaction } = ctx;

  await withStep(ctx, "defer", () => interaction.deferReply({ flags: MessageFlags.Ephemeral }));

  const { submittedWallets } = services.store.get();
  const csv = await withStep(ctx, "generate_csv", () =>
    exportWalletsCsv(submittedWallets, async (userId) => {
      const cached = interaction.client.users.cache.get(userId);
      if (cached) return cached.username;
      const user = await interaction.client.users.fetch(userId);
      return user.username;
    })
  );

  ctx.step("reply");
  await interaction.editReply({
    content: `${Object.keys(submittedWallets).length} member(s) exported.`,
    files: [new AttachmentBuilder(csv, { name: `walletlist-${Date.now()}.csv` })],
  });
}
