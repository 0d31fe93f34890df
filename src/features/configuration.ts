/**
 * Walletlist — src/features/configuration.ts
 * WHAT: Admin configuration changes applied to the settings record.
 * WHY: Each change is one read-modify-persist under the store lock; prompt posting runs
 *      after the lock is released because it talks to Discord.
 * FLOWS:
 *  - applyConfigAction(action) → mutate → (maybe) ensurePromptPosted → ConfigOutcome
 *  - set_max_wallets trims lists over the new cap, oldest addresses kept
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { ValidationError } from "../lib/errors.js";
import { defaultSettings, type Settings, type Snowflake } from "../store/settings.js";
import type { SettingsStore } from "../store/settingsStore.js";
import type { PromptOutcome, PromptPoster } from "./prompt.js";

export type ConfigAction =
  | { type: "set_channel"; channelId: Snowflake }
  | { type: "set_role"; roleId: Snowflake }
  | { type: "set_max_wallets"; maxWallets: number }
  | { type: "toggle_status" }
  | { type: "toggle_delete_on_leave" }
  | { type: "reset" };

export type ConfigOutcome = {
  settings: Settings;
  /** Null when the action does not touch the prompt. */
  prompt: PromptOutcome | null;
  /** Addresses dropped because a lowered cap left members over it. */
  trimmedWallets: number;
};

export type ConfigDeps = {
  store: SettingsStore;
  prompt: PromptPoster;
};

/**
 * THROWS: ValidationError unless `n` is a positive integer.
 */
export function validateMaxWallets(n: number): number {
  if (!Number.isInteger(n) || n <= 0) {
    throw new ValidationError("max_wallets", "must be a positive whole number", n);
  }
  return n;
}

type DraftResult = {
  /** Whether the prompt should be (re)checked once the lock is released. */
  ensurePrompt: boolean;
  trimmedWallets: number;
};

/**
 * Cut every member's list down to the cap, keeping the earliest submissions.
 * Returns how many addresses were dropped.
 */
function trimToCap(draft: Settings): number {
  let dropped = 0;
  for (const [userId, wallets] of Object.entries(draft.submittedWallets)) {
    if (wallets.length > draft.maxWallets) {
      dropped += wallets.length - draft.maxWallets;
      draft.submittedWallets[userId] = wallets.slice(0, draft.maxWallets);
    }
  }
  return dropped;
}

/** Apply one change inside the store lock. */
function applyToDraft(draft: Settings, action: ConfigAction): DraftResult {
  switch (action.type) {
    case "set_channel":
      draft.whitelistChannelId = action.channelId;
      return { ensurePrompt: draft.whitelistStatus, trimmedWallets: 0 };
    case "set_role":
      draft.autoRoleId = action.roleId;
      return { ensurePrompt: false, trimmedWallets: 0 };
    case "set_max_wallets":
      draft.maxWallets = validateMaxWallets(action.maxWallets);
      return { ensurePrompt: false, trimmedWallets: trimToCap(draft) };
    case "toggle_status":
      draft.whitelistStatus = !draft.whitelistStatus;
      return { ensurePrompt: draft.whitelistStatus, trimmedWallets: 0 };
    case "toggle_delete_on_leave":
      draft.deleteOnLeave = !draft.deleteOnLeave;
      return { ensurePrompt: false, trimmedWallets: 0 };
    case "reset":
      Object.assign(draft, defaultSettings());
      return { ensurePrompt: true, trimmedWallets: 0 };
  }
}

/**
 * applyConfigAction
 * WHAT: Dispatch a ConfigAction, persist it, then run prompt side effects.
 * RETURNS: the record exactly as this action committed it, even if another change lands later.
 * THROWS: ValidationError (bad cap), PersistError (write failed; nothing changed)
 */
export async function applyConfigAction(
  deps: ConfigDeps,
  action: ConfigAction,
  actorId?: Snowflake
): Promise<ConfigOutcome> {
  const { ensurePrompt, trimmedWallets, settings } = await deps.store.mutate((draft) => ({
    ...applyToDraft(draft, action),
    settings: structuredClone(draft),
  }));

  logger.info(
    {
      evt: "config_changed",
      action: action.type,
      actorId,
      whitelistChannelId: settings.whitelistChannelId,
      autoRoleId: settings.autoRoleId,
      whitelistStatus: settings.whitelistStatus,
      maxWallets: settings.maxWallets,
      deleteOnLeave: settings.deleteOnLeave,
      trimmedWallets,
    },
    `[config] ${action.type}`
  );

  const prompt = ensurePrompt ? await deps.prompt.ensurePromptPosted() : null;
  return { settings, prompt, trimmedWallets };
}

export function setChannel(deps: ConfigDeps, channelId: Snowflake, actorId?: Snowflake) {
  return applyConfigAction(deps, { type: "set_channel", channelId }, actorId);
}

export function setAutoRole(deps: ConfigDeps, roleId: Snowflake, actorId?: Snowflake) {
  return applyConfigAction(deps, { type: "set_role", roleId }, actorId);
}

export function setMaxWallets(deps: ConfigDeps, maxWallets: number, actorId?: Snowflake) {
  return applyConfigAction(deps, { type: "set_max_wallets", maxWallets }, actorId);
}

export function toggleWhitelistStatus(deps: ConfigDeps, actorId?: Snowflake) {
  return applyConfigAction(deps, { type: "toggle_status" }, actorId);
}

export function toggleDeleteOnLeave(deps: ConfigDeps, actorId?: Snowflake) {
  return applyConfigAction(deps, { type: "toggle_delete_on_leave" }, actorId);
}

export function resetAll(deps: ConfigDeps, actorId?: Snowflake) {
  return applyConfigAction(deps, { type: "reset" }, actorId);
}
