/**
 * Walletlist — src/commands/sync.ts
 * WHAT: Slash-command sync, guild-scoped when GUILD_ID is set, otherwise global.
 * WHY: Keeps registered commands identical to the code on every start.
 * FLOWS:
 *  - syncCommands: serialize commands → REST PUT (bulk overwrite) → log
 * DOCS:
 *  - Bulk overwrite (guild): https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 *  - REST client: https://discord.js.org/#/docs/rest/main/class/REST
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { REST, Routes } from "discord.js";
import { getAllSlashCommands } from "./registry.js";
import { logger } from "../lib/logger.js";

export type SyncTarget = {
  token: string;
  clientId: string;
  /** Omit for global registration. */
  guildId?: string;
};

/**
 * PUT replaces the whole command list in one call, so removed commands
 * disappear too. Errors propagate; callers decide whether a failed sync is fatal.
 */
export async function syncCommands(target: SyncTarget): Promise<number> {
  const body = getAllSlashCommands();
  const rest = new REST({ version: "10" }).setToken(target.token);
  const route = target.guildId
    ? Routes.applicationGuildCommands(target.clientId, target.guildId)
    : Routes.applicationCommands(target.clientId);

  await rest.put(route, { body });

  logger.info(
    { evt: "cmdsync", scope: target.guildId ? "guild" : "global", guildId: target.guildId, count: body.length },
    "[cmdsync] synced commands"
  );
  return body.length;
}
