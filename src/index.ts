/**
 * Walletlist — src/index.ts
 * WHAT: Main process entrypoint. Loads settings, boots the Discord client, routes interactions.
 * WHY: Central orchestration so startup, event wiring and shutdown read top to bottom in one place.
 * FLOWS:
 *  - main: env → Sentry → open backend → SettingsStore.load → build services → login
 *  - Ready: sync commands → ensurePromptPosted
 *  - Interaction: createInteractionRouter(services) → wrapped handlers
 *  - guildMemberRemove: onMemberLeave
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Gateway intents: https://discord.com/developers/docs/topics/gateway#gateway-intents
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { Client, Events, GatewayIntentBits, Partials } from "discord.js";
import { env } from "./lib/env.js";
import { logger } from "./lib/logger.js";
import { captureException, flushSentry, initializeSentry } from "./lib/sentry.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { UNCAUGHT_EXCEPTION_EXIT_DELAY_MS } from "./lib/constants.js";
import { classifyError, errorContext } from "./lib/errors.js";
import { syncCommands } from "./commands/sync.js";
import { openBackend } from "./store/openBackend.js";
import { SettingsStore } from "./store/settingsStore.js";
import { PromptPoster } from "./features/prompt.js";
import { DiscordPromptMessenger } from "./features/discordPromptMessenger.js";
import { onMemberLeave } from "./features/memberCleanup.js";
import { createInteractionRouter } from "./features/interactionRouter.js";

// ===== Global Error Handlers =====
// DOCS: https://nodejs.org/api/process.html#event-uncaughtexception

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
  // Don't exit - discord.js recovers from most rejections
});

process.on("uncaughtException", (error, origin) => {
  logger.error(
    { evt: "uncaught_exception", err: error, origin },
    "[process] Uncaught exception - bot may be in unstable state"
  );
  captureException(error, { context: "uncaughtException", origin });
  // Give Sentry time to flush, then exit
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

async function main() {
  initializeSentry({
    dsn: env.SENTRY_DSN,
    environment: env.SENTRY_ENVIRONMENT ?? env.NODE_ENV,
    tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,
  });

  // Step 1: settings (StartupError here is fatal; corrupt storage must not be overwritten)
  const backend = openBackend(env);
  const store = await SettingsStore.load(backend);

  // Step 2: client + services
  // GuildMembers is privileged; enable "Server Members Intent" in the developer portal.
  const client = new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMembers],
    partials: [Partials.GuildMember, Partials.User],
  });
  const prompt = new PromptPoster(store, new DiscordPromptMessenger(client));
  const services = { store, prompt };
  const routeInteraction = createInteractionRouter(services);

  client.once(
    Events.ClientReady,
    wrapEvent("ready", async (readyClient) => {
      logger.info({ tag: readyClient.user.tag, id: readyClient.user.id }, "Bot ready");

      if (!env.GUILD_ID) {
        logger.warn("[startup] GUILD_ID not set - commands will register globally");
      }
      try {
        await syncCommands({ token: env.DISCORD_TOKEN, clientId: env.CLIENT_ID, guildId: env.GUILD_ID });
      } catch (err) {
        logger.warn(
          { err, ...errorContext(classifyError(err)) },
          "[cmdsync] command sync failed; continuing with existing commands"
        );
      }

      const outcome = await prompt.ensurePromptPosted();
      logger.info({ evt: "startup_prompt", status: outcome.status }, "[startup] prompt check done");
    })
  );

  client.on(Events.InteractionCreate, wrapEvent("interactionCreate", routeInteraction));

  client.on(
    Events.GuildMemberRemove,
    wrapEvent("guildMemberRemove", async (member) => {
      await onMemberLeave(store, member.id);
    })
  );

  // ===== Coordinated Graceful Shutdown =====
  // ORDER: 1) Log, 2) Remove listeners, 3) Destroy client, 4) Close backend, 5) Flush Sentry
  let isShuttingDown = false;

  const gracefulShutdown = async (signal: string) => {
    if (isShuttingDown) {
      logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
      return;
    }
    isShuttingDown = true;
    logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

    try {
      client.removeAllListeners();
      await client.destroy();
      logger.debug("[shutdown] Discord client destroyed");

      store.close();
      logger.debug("[shutdown] Settings backend closed");

      await flushSentry();
      logger.info("[shutdown] Graceful shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "[shutdown] Error during graceful shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  // Step 3: login
  await client.login(env.DISCORD_TOKEN);
}

// Only start the bot if not running in test environment
if (!process.env.VITEST_WORKER_ID) {
  main().catch(async (err: unknown) => {
    logger.fatal({ err, ...errorContext(classifyError(err)) }, "Fatal startup error");
    await flushSentry();
    process.exit(1);
  });
}
