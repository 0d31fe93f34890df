/**
 * Walletlist — src/utils/requireAdmin.ts
 * WHAT: Authorization helper for the admin panel and its components.
 * WHY: Default member permissions hide /whitelist from non-admins, but panel components
 *      can be replayed by anyone who sees them, so every admin handler re-checks.
 * DOCS:
 *  - Discord permissions: https://discord.com/developers/docs/topics/permissions
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { MessageFlags, PermissionFlagsBits } from "discord.js";
import { logger } from "../lib/logger.js";
import type { InstrumentedInteraction } from "../lib/cmdWrap.js";

/**
 * `memberPermissions` already folds in channel overwrites and is null outside guilds.
 * Guild owners always resolve with Administrator.
 */
export function isAdministrator(interaction: InstrumentedInteraction): boolean {
  if (!interaction.inGuild()) return false;
  return interaction.memberPermissions?.has(PermissionFlagsBits.Administrator) ?? false;
}

/**
 * Returns true when the caller may proceed. Otherwise replies with an ephemeral
 * refusal and returns false.
 */
export async function requireAdministrator(interaction: InstrumentedInteraction): Promise<boolean> {
  if (isAdministrator(interaction)) {
    return true;
  }

  logger.warn(
    { evt: "admin_denied", userId: interaction.user.id, guildId: interaction.guildId },
    "[auth] non-admin used an admin component"
  );
  await interaction.reply({
    content: "You need the Administrator permission to do that.",
    flags: MessageFlags.Ephemeral,
  });
  return false;
}
