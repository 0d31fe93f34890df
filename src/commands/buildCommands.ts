// SPDX-License-Identifier: LicenseRef-ANW-1.0

// This file aggregates all slash command definitions for bulk registration with Discord.
// The buildCommands() function returns JSON payloads that get PUT to Discord's API.
//
// GOTCHA: Discord caches slash commands aggressively. Global commands can take up to
// an hour to propagate; guild commands update instantly. Set GUILD_ID while developing.

import { data as whitelistData } from "./whitelist.js";

export function buildCommands() {
  return [whitelistData.toJSON()];
}
