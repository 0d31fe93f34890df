/**
 * Walletlist — src/commands/registry.ts
 * WHAT: Command registry loader for slash commands.
 * WHY: Single entry point for sync code, so callers don't need to know about buildCommands internals.
 * DOCS:
 *  - Slash command deployment: https://discordjs.guide/interactions/deploying-commands.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { buildCommands } from "./buildCommands.js";

export function getAllSlashCommands() {
  return buildCommands();
}
