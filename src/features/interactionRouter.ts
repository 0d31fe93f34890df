/**
 * Walletlist — src/features/interactionRouter.ts
 * WHAT: Routes every interaction to its wrapped handler.
 * WHY: customId parsing and interaction-kind checks live in one place; handlers receive
 *      a narrowed interaction and the app services.
 * FLOWS:
 *  - slash → commands collection by name
 *  - button/modal/select → identifyComponentRoute(customId) → handler
 *  - anything else (foreign ids, autocomplete) → debug log, ignored
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type {
  ButtonInteraction,
  ChannelSelectMenuInteraction,
  ChatInputCommandInteraction,
  Interaction,
  ModalSubmitInteraction,
  RoleSelectMenuInteraction,
  StringSelectMenuInteraction,
} from "discord.js";
import { logger } from "../lib/logger.js";
import { wrapCommand } from "../lib/cmdWrap.js";
import { identifyComponentRoute } from "../lib/componentIds.js";
import { runWithCtx, newTraceId, type InteractionKind } from "../lib/reqctx.js";
import * as whitelist from "../commands/whitelist.js";
import { handleMyWalletsButton, handleSubmitButton, handleWalletModal } from "./promptHandlers.js";
import { handlePanelAction, handlePanelCap, handlePanelChannel, handlePanelRole } from "./panelHandlers.js";
import type { AppServices } from "./services.js";

export type InteractionRouter = (interaction: Interaction) => Promise<void>;

export function createInteractionRouter(services: AppServices): InteractionRouter {
  const commands = new Map([
    [
      whitelist.data.name,
      wrapCommand<ChatInputCommandInteraction>("whitelist", (ctx) => whitelist.execute(ctx, services)),
    ],
  ]);

  const submitButton = wrapCommand("submit_button", handleSubmitButton);
  const myWalletsButton = wrapCommand<ButtonInteraction>("my_wallets_button", (ctx) =>
    handleMyWalletsButton(ctx, services)
  );
  const walletModal = wrapCommand<ModalSubmitInteraction>("wallet_modal", (ctx) =>
    handleWalletModal(ctx, services)
  );
  const panelAction = wrapCommand<StringSelectMenuInteraction>("panel_action", (ctx) =>
    handlePanelAction(ctx, services)
  );
  const panelChannel = wrapCommand<ChannelSelectMenuInteraction>("panel_channel", (ctx) =>
    handlePanelChannel(ctx, services)
  );
  const panelRole = wrapCommand<RoleSelectMenuInteraction>("panel_role", (ctx) =>
    handlePanelRole(ctx, services)
  );
  const panelCap = wrapCommand<StringSelectMenuInteraction>("panel_cap", (ctx) =>
    handlePanelCap(ctx, services)
  );

  function withTrace(kind: InteractionKind, cmd: string, interaction: Interaction, fn: () => Promise<void>) {
    return runWithCtx(
      {
        traceId: newTraceId(),
        kind,
        cmd,
        userId: interaction.user.id,
        guildId: interaction.guildId,
        channelId: interaction.channelId,
      },
      fn
    );
  }

  return async (interaction: Interaction): Promise<void> => {
    if (interaction.isChatInputCommand()) {
      const handler = commands.get(interaction.commandName);
      if (!handler) {
        logger.warn({ evt: "unknown_command", name: interaction.commandName }, "[router] unknown command");
        return;
      }
      await withTrace("slash", interaction.commandName, interaction, () => handler(interaction));
      return;
    }

    if (!interaction.isButton() && !interaction.isModalSubmit() && !interaction.isAnySelectMenu()) {
      return;
    }

    const route = identifyComponentRoute(interaction.customId);
    if (!route) {
      logger.debug({ evt: "unrouted_component", customId: interaction.customId }, "[router] not ours");
      return;
    }

    switch (route.type) {
      case "submit_button":
        if (interaction.isButton()) {
          await withTrace("button", route.type, interaction, () => submitButton(interaction));
          return;
        }
        break;
      case "my_wallets_button":
        if (interaction.isButton()) {
          await withTrace("button", route.type, interaction, () => myWalletsButton(interaction));
          return;
        }
        break;
      case "wallet_modal":
        if (interaction.isModalSubmit()) {
          await withTrace("modal", route.type, interaction, () => walletModal(interaction));
          return;
        }
        break;
      case "panel_action":
        if (interaction.isStringSelectMenu()) {
          await withTrace("select", route.type, interaction, () => panelAction(interaction));
          return;
        }
        break;
      case "panel_channel":
        if (interaction.isChannelSelectMenu()) {
          await withTrace("select", route.type, interaction, () => panelChannel(interaction));
          return;
        }
        break;
      case "panel_role":
        if (interaction.isRoleSelectMenu()) {
          await withTrace("select", route.type, interaction, () => panelRole(interaction));
          return;
        }
        break;
      case "panel_cap":
        if (interaction.isStringSelectMenu()) {
          await withTrace("select", route.type, interaction, () => panelCap(interaction));
          return;
        }
        break;
    }

    logger.warn(
      { evt: "component_kind_mismatch", customId: interaction.customId, route: route.type },
      "[router] component id arrived on the wrong interaction kind"
    );
  };
}
