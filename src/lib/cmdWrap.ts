/**
 * Walletlist — src/lib/cmdWrap.ts
 * WHAT: Small helpers to standardize interaction lifecycle: tracing, step logging, error replies, safe defers/replies.
 * WHY: Discord has a strict 3‑second SLA for first responses; wrapping handlers keeps that consistent.
 * FLOWS:
 *  - wrapCommand(): enter → step(...) → try/catch → ephemeral error reply on failure
 *  - ensureDeferred(): deferReply if not already replied/deferred (ephemeral by default)
 *  - replyOrEdit(): choose reply/editReply/followUp based on state; ephemeral by default
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Interaction response rules (3‑second window): https://discord.com/developers/docs/interactions/receiving-and-responding
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  MessageFlags,
  DiscordAPIError,
  type InteractionReplyOptions,
  type ChatInputCommandInteraction,
  type ModalSubmitInteraction,
  type ButtonInteraction,
  type StringSelectMenuInteraction,
  type ChannelSelectMenuInteraction,
  type RoleSelectMenuInteraction,
} from "discord.js";
import { logger } from "./logger.js";
import { addBreadcrumb, captureException, setTag, setUser } from "./sentry.js";
import { ctx as reqCtx, newTraceId, type InteractionKind } from "./reqctx.js";
import {
  classifyError,
  errorContext,
  shouldReportToSentry,
  userFriendlyMessage,
} from "./errors.js";

/**
 * Label for where we are in a handler: "it crashed in phase 'persist'" beats
 * "it crashed somewhere in the modal handler".
 */
type Phase = string;

export type SelectInteraction =
  | StringSelectMenuInteraction
  | ChannelSelectMenuInteraction
  | RoleSelectMenuInteraction;

export type InstrumentedInteraction =
  | ChatInputCommandInteraction
  | ModalSubmitInteraction
  | ButtonInteraction
  | SelectInteraction;

export type CommandContext<I extends InstrumentedInteraction = ChatInputCommandInteraction> = {
  interaction: I;
  /** Mark the current execution phase (e.g., "validate", "persist", "reply") */
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
  readonly traceId: string;
};

type CommandExecutor<I extends InstrumentedInteraction> = (ctx: CommandContext<I>) => Promise<void>;

function inferKind(interaction: InstrumentedInteraction): InteractionKind {
  if (interaction.isChatInputCommand()) return "slash";
  if (interaction.isModalSubmit()) return "modal";
  if (interaction.isButton()) return "button";
  return "select";
}

/**
 * REST metadata from a DiscordAPIError for logging. Null for anything else so
 * callers can spread safely.
 */
function discordRestMeta(err: unknown) {
  if (!(err instanceof DiscordAPIError)) return null;
  return {
    status: err.status,
    code: err.code,
    method: err.method,
    url: err.url,
  };
}

/**
 * wrapCommand
 * WHAT: Decorates a handler with tracing, step logging, and error replies.
 * WHY: Keeps individual handlers focused on their workflow.
 * THROWS: Never to caller; errors are logged and surfaced as an ephemeral reply.
 */
export function wrapCommand<I extends InstrumentedInteraction>(
  name: string,
  fn: CommandExecutor<I>
) {
  return async (interaction: I): Promise<void> => {
    const store = reqCtx();
    const traceId = store.traceId ?? newTraceId();
    const cmdName = store.cmd ?? name;
    const kind = store.kind ?? inferKind(interaction);
    const startedAt = Date.now();
    let phase: Phase = "enter";

    const commandCtx: CommandContext<I> = {
      interaction,
      step: (newPhase: Phase) => {
        phase = newPhase;
        logger.debug({ evt: "cmd_step", traceId, cmd: cmdName, phase });
        addBreadcrumb({
          category: "cmd",
          message: cmdName,
          data: { phase, traceId },
          level: "info",
        });
      },
      currentPhase: () => phase,
      traceId,
    };

    logger.info(
      {
        evt: "cmd_start",
        traceId,
        cmd: cmdName,
        kind,
        userId: interaction.user.id,
        guildId: interaction.guildId ?? "dm",
      },
      "command start"
    );
    setTag("cmd", cmdName);
    setTag("traceId", traceId);
    setUser({ id: interaction.user.id, username: interaction.user.username });

    try {
      await fn(commandCtx);
      logger.info({ evt: "cmd_ok", traceId, cmd: cmdName, ms: Date.now() - startedAt }, "command ok");
    } catch (error) {
      const classified = classifyError(error);
      const level = classified.kind === "validation" ? "warn" : "error";
      logger[level](
        {
          evt: "cmd_error",
          traceId,
          cmd: cmdName,
          kind,
          phase,
          ...errorContext(classified),
          err: error,
        },
        `command error: ${classified.message}`
      );
      setTag("phase", phase);
      setTag("errorKind", classified.kind);

      if (shouldReportToSentry(classified)) {
        captureException(error, { cmd: cmdName, phase, traceId, errorKind: classified.kind });
      }

      try {
        await replyOrEdit(interaction, {
          content: `${userFriendlyMessage(classified)}\n-# trace \`${traceId}\``,
        });
      } catch (replyErr) {
        logger.error({ err: replyErr, traceId, evt: "cmd_error_reply_fail" }, "Failed to post error reply");
      }
    }
  };
}

/**
 * Mark a phase and run some work under it. Exceptions propagate to wrapCommand.
 */
export async function withStep<T>(
  ctx: { step: (phase: Phase) => void },
  phase: Phase,
  fn: () => Promise<T> | T
): Promise<T> {
  ctx.step(phase);
  return await fn();
}

/**
 * ensureDeferred
 * WHAT: First-time acknowledgement with deferReply if we haven’t replied yet.
 * THROWS: Re-throws non-10062 errors; 10062 (expired) is logged and swallowed.
 */
export async function ensureDeferred(interaction: InstrumentedInteraction): Promise<void> {
  if (interaction.deferred || interaction.replied) {
    return;
  }
  try {
    await interaction.deferReply({ flags: MessageFlags.Ephemeral });
  } catch (err) {
    const code = (err as { code?: unknown })?.code;
    const logPayload = {
      evt: "cmd_defer_fail",
      traceId: reqCtx().traceId,
      code,
      ...(discordRestMeta(err) ?? {}),
      err,
    };
    if (code === 10062) {
      logger.warn(logPayload, "defer failed (interaction expired)");
      return;
    }
    logger.warn(logPayload, "defer failed");
    throw err;
  }
}

/**
 * Reply with the right API for the interaction's state. Replies are ephemeral
 * unless the payload sets flags explicitly.
 */
export async function replyOrEdit(
  interaction: InstrumentedInteraction,
  payload: InteractionReplyOptions
): Promise<void> {
  const withFlags = { ...payload, flags: payload.flags ?? MessageFlags.Ephemeral };
  try {
    if (interaction.deferred) {
      const { flags: _flags, ...editPayload } = withFlags;
      await interaction.editReply(editPayload);
      return;
    }
    if (interaction.replied) {
      await interaction.followUp(withFlags);
      return;
    }
    await interaction.reply(withFlags);
  } catch (err) {
    const code = (err as { code?: unknown })?.code;
    const logPayload = {
      evt: "cmd_reply_fail",
      traceId: reqCtx().traceId,
      code,
      ...(discordRestMeta(err) ?? {}),
      err,
    };
    if (code === 10062) {
      logger.warn(logPayload, "reply/edit skipped; interaction expired");
      return;
    }
    if (code === 40060) {
      logger.warn(logPayload, "reply/edit skipped; already acknowledged");
      return;
    }
    logger.error(logPayload, "reply/edit failed");
    throw err;
  }
}
