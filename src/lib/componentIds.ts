/**
 * Walletlist — src/lib/componentIds.ts
 * WHAT: Custom ids for our buttons, modal and select menus, plus the router that parses them.
 * WHY: Discord hands back only the customId string; parsing it into a tagged route keeps
 *      string comparison out of the handlers.
 * FLOWS:
 *  - IDs use v1: prefix + "wl" namespace + component name
 *  - identifyComponentRoute(customId) → ComponentRoute | null
 *  - parsePanelChoice(value) / parseCapChoice(value) → typed menu selections
 * DOCS:
 *  - Component custom ids: https://discord.com/developers/docs/interactions/message-components#custom-id
 *
 * ID format examples:
 *  - v1:wl:submit → prompt button that opens the wallet modal
 *  - v1:wl:panel:channel → channel select on the admin panel
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ConfigAction } from "../features/configuration.js";

/*
 * Prompt ids outlive the process: the prompt message can sit in a channel for
 * months and its buttons keep these ids. Changing one orphans existing prompts,
 * and the duplicate-prompt scan looks for SUBMIT_BUTTON_ID specifically.
 */
export const SUBMIT_BUTTON_ID = "v1:wl:submit";
export const MY_WALLETS_BUTTON_ID = "v1:wl:mine";
export const WALLET_MODAL_ID = "v1:wl:modal:wallet";
export const WALLET_INPUT_ID = "wallet_address";

export const PANEL_ACTION_SELECT_ID = "v1:wl:panel:action";
export const PANEL_CHANNEL_SELECT_ID = "v1:wl:panel:channel";
export const PANEL_ROLE_SELECT_ID = "v1:wl:panel:role";
export const PANEL_CAP_SELECT_ID = "v1:wl:panel:cap";

const COMPONENT_ID_RE = /^v1:wl:(submit|mine|modal:wallet|panel:(?:action|channel|role|cap))$/;

/**
 * Discriminated union for routed component types. The interaction router
 * switches on `type`.
 */
export type ComponentRoute =
  | { type: "submit_button" }
  | { type: "my_wallets_button" }
  | { type: "wallet_modal" }
  | { type: "panel_action" }
  | { type: "panel_channel" }
  | { type: "panel_role" }
  | { type: "panel_cap" };

const ROUTES: Record<string, ComponentRoute> = {
  submit: { type: "submit_button" },
  mine: { type: "my_wallets_button" },
  "modal:wallet": { type: "wallet_modal" },
  "panel:action": { type: "panel_action" },
  "panel:channel": { type: "panel_channel" },
  "panel:role": { type: "panel_role" },
  "panel:cap": { type: "panel_cap" },
};

/**
 * Returns null for ids that are not ours (another bot's leftovers, a retired format).
 */
export function identifyComponentRoute(customId: string): ComponentRoute | null {
  const match = customId.match(COMPONENT_ID_RE);
  if (!match) return null;
  return ROUTES[match[1]] ?? null;
}

// ===== Select menu values =====

export const PANEL_CHOICE_VALUES = {
  toggleStatus: "toggle_status",
  toggleDeleteOnLeave: "toggle_delete_on_leave",
  reset: "reset",
  downloadCsv: "download_csv",
} as const;

export type PanelChoice = { kind: "config"; action: ConfigAction } | { kind: "download_csv" };

export function parsePanelChoice(value: string): PanelChoice | null {
  switch (value) {
    case PANEL_CHOICE_VALUES.toggleStatus:
      return { kind: "config", action: { type: "toggle_status" } };
    case PANEL_CHOICE_VALUES.toggleDeleteOnLeave:
      return { kind: "config", action: { type: "toggle_delete_on_leave" } };
    case PANEL_CHOICE_VALUES.reset:
      return { kind: "config", action: { type: "reset" } };
    case PANEL_CHOICE_VALUES.downloadCsv:
      return { kind: "download_csv" };
    default:
      return null;
  }
}

/**
 * Cap menu values are decimal strings. Range checks belong to the configuration
 * workflow, so "0" parses here and is rejected there.
 */
export function parseCapChoice(value: string): ConfigAction | null {
  if (!/^\d{1,6}$/.test(value)) return null;
  return { type: "set_max_wallets", maxWallets: Number(value) };
}
