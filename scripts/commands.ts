// SPDX-License-Identifier: LicenseRef-ANW-1.0
// Manual slash-command sync. The bot also syncs on ready; use this after renaming
// a command or to clear stale global registrations.
//
//   npm run commands:sync                  # guild when GUILD_ID is set, else global
//   npm run commands:sync -- --purge-global
//   npm run commands:sync -- --print       # show the payload, send nothing
import { REST, Routes, type RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import { buildCommands } from "../src/commands/buildCommands.js";
import { syncCommands } from "../src/commands/sync.js";
import { env } from "../src/lib/env.js";

export function formatCommandTree(commands: RESTPostAPIChatInputApplicationCommandsJSONBody[]): string[] {
  return commands.map((command) => {
    const perms = command.default_member_permissions ? ` perms:${command.default_member_permissions}` : "";
    const options = (command.options ?? []).map((opt) => opt.name);
    return `/${command.name} — options:[${options.join(", ")}]${perms}`;
  });
}

/*
 * Global commands take up to an hour to propagate. If they were ever pushed while
 * developing with GUILD_ID, each command shows up twice in that guild until purged.
 */
async function purgeGlobal(appId: string, token: string): Promise<void> {
  const rest = new REST({ version: "10" }).setToken(token);
  console.info("[sync] purging global commands...");
  await rest.put(Routes.applicationCommands(appId), { body: [] });
  console.info("[sync] global commands cleared");
}

// CLI entry point detection for ESM.
const isMainModule = process.argv[1] && import.meta.url.endsWith(process.argv[1].replace(/\\/g, "/"));
if (isMainModule) {
  const commands = buildCommands();
  for (const line of formatCommandTree(commands)) {
    console.info(`  ${line}`);
  }

  if (!process.argv.includes("--print")) {
    if (process.argv.includes("--purge-global")) {
      await purgeGlobal(env.CLIENT_ID, env.DISCORD_TOKEN);
    }
    const count = await syncCommands({
      token: env.DISCORD_TOKEN,
      clientId: env.CLIENT_ID,
      guildId: env.GUILD_ID,
    });
    console.info(`[sync] ${env.GUILD_ID ? `guild ${env.GUILD_ID}` : "global"} ok – commands=${count}`);
  }
}
