/**
 * WHAT: Proves wrapCommand logs its lifecycle and turns thrown errors into ephemeral replies.
 * HOW: Uses hoisted vitest mocks for logger/sentry/reqctx and interaction mocks from discordMocks.
 * DOCS: https://vitest.dev/guide/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi } from "vitest";
import { MessageFlags, type ButtonInteraction, type ChatInputCommandInteraction } from "discord.js";

const loggerMock = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: loggerMock,
}));

const sentryMock = vi.hoisted(() => ({
  addBreadcrumb: vi.fn(),
  captureException: vi.fn(),
  setTag: vi.fn(),
  setUser: vi.fn(),
}));

vi.mock("../../src/lib/sentry.js", () => sentryMock);

// Fixed trace id so reply text is deterministic.
vi.mock("../../src/lib/reqctx.js", () => ({
  ctx: vi.fn(() => ({ traceId: "trace-fixed" })),
  newTraceId: vi.fn(() => "trace-fixed"),
  runWithCtx: vi.fn((_meta: unknown, fn: () => unknown) => fn()),
}));

import { ensureDeferred, replyOrEdit, withStep, wrapCommand } from "../../src/lib/cmdWrap.js";
import { PersistError, ValidationError } from "../../src/lib/errors.js";
import {
  createDiscordAPIError,
  createMockButtonInteraction,
  createMockInteraction,
} from "../utils/discordMocks.js";

describe("wrapCommand", () => {
  it("logs start, step, and completion on success", async () => {
    const interaction = createMockInteraction();
    const handler = wrapCommand<ChatInputCommandInteraction>("whitelist", async (ctx) => {
      await withStep(ctx, "render", async () => undefined);
      expect(ctx.currentPhase()).toBe("render");
    });

    await handler(interaction);

    expect(loggerMock.info).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_start", traceId: "trace-fixed", cmd: "whitelist", kind: "slash" }),
      "command start"
    );
    expect(loggerMock.debug).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_step", phase: "render" })
    );
    expect(loggerMock.info).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_ok", cmd: "whitelist" }),
      "command ok"
    );
    expect(interaction.reply).not.toHaveBeenCalled();
  });

  it("replies with the field message and logs a warning for validation errors", async () => {
    const interaction = createMockButtonInteraction();
    const handler = wrapCommand("submit_button", async () => {
      throw new ValidationError("wallet", "address cannot be empty");
    });

    await handler(interaction);

    expect(interaction.reply).toHaveBeenCalledWith({
      content: "Invalid wallet: address cannot be empty\n-# trace `trace-fixed`",
      flags: MessageFlags.Ephemeral,
    });
    expect(loggerMock.warn).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_error", kind: "button", phase: "enter", field: "wallet" }),
      "command error: address cannot be empty"
    );
    expect(sentryMock.captureException).not.toHaveBeenCalled();
  });

  it("reports unexpected errors to Sentry with the failing phase", async () => {
    const interaction = createMockInteraction();
    const boom = new Error("boom");
    const handler = wrapCommand("whitelist", async (ctx) => {
      ctx.step("persist");
      throw boom;
    });

    await handler(interaction);

    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_error", phase: "persist" }),
      "command error: boom"
    );
    expect(sentryMock.captureException).toHaveBeenCalledWith(
      boom,
      expect.objectContaining({ cmd: "whitelist", phase: "persist", traceId: "trace-fixed" })
    );
  });

  it("edits the deferred reply when the handler already deferred", async () => {
    const interaction = createMockButtonInteraction();
    const handler = wrapCommand<ButtonInteraction>("submit_button", async (ctx) => {
      await ctx.interaction.deferReply();
      throw new PersistError("Settings could not be written", "memory");
    });

    await handler(interaction);

    expect(interaction.editReply).toHaveBeenCalledWith({
      content: "Settings could not be saved. Nothing was changed; please try again.\n-# trace `trace-fixed`",
    });
    expect(interaction.reply).not.toHaveBeenCalled();
  });

  it("logs when the error reply itself fails", async () => {
    const interaction = createMockInteraction();
    vi.mocked(interaction.reply).mockRejectedValueOnce(new Error("network down"));
    const handler = wrapCommand("whitelist", async () => {
      throw new Error("boom");
    });

    await expect(handler(interaction)).resolves.toBeUndefined();
    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_error_reply_fail" }),
      "Failed to post error reply"
    );
  });
});

describe("replyOrEdit", () => {
  it("replies ephemerally by default", async () => {
    const interaction = createMockButtonInteraction();
    await replyOrEdit(interaction, { content: "hi" });
    expect(interaction.reply).toHaveBeenCalledWith({ content: "hi", flags: MessageFlags.Ephemeral });
  });

  it("follows up once a reply was sent", async () => {
    const interaction = createMockButtonInteraction();
    await interaction.reply({ content: "first" });

    await replyOrEdit(interaction, { content: "second" });

    expect(interaction.followUp).toHaveBeenCalledWith({ content: "second", flags: MessageFlags.Ephemeral });
  });

  it("swallows expired and already-acknowledged errors", async () => {
    const interaction = createMockButtonInteraction();
    vi.mocked(interaction.reply)
      .mockRejectedValueOnce(createDiscordAPIError(10062, "Unknown interaction"))
      .mockRejectedValueOnce(createDiscordAPIError(40060, "Interaction has already been acknowledged"));

    await expect(replyOrEdit(interaction, { content: "x" })).resolves.toBeUndefined();
    await expect(replyOrEdit(interaction, { content: "x" })).resolves.toBeUndefined();
  });

  it("rethrows other failures", async () => {
    const interaction = createMockButtonInteraction();
    vi.mocked(interaction.reply).mockRejectedValueOnce(createDiscordAPIError(50035, "Invalid Form Body"));

    await expect(replyOrEdit(interaction, { content: "x" })).rejects.toThrow("Invalid Form Body");
  });
});

describe("ensureDeferred", () => {
  it("defers ephemerally on first acknowledgement", async () => {
    const interaction = createMockButtonInteraction();
    await ensureDeferred(interaction);
    expect(interaction.deferReply).toHaveBeenCalledWith({ flags: MessageFlags.Ephemeral });
  });

  it("does nothing once replied", async () => {
    const interaction = createMockButtonInteraction();
    await interaction.reply({ content: "done" });

    await ensureDeferred(interaction);

    expect(interaction.deferReply).not.toHaveBeenCalled();
  });

  it("swallows an expired interaction and rethrows anything else", async () => {
    const interaction = createMockButtonInteraction();
    vi.mocked(interaction.deferReply)
      .mockRejectedValueOnce(createDiscordAPIError(10062, "Unknown interaction"))
      .mockRejectedValueOnce(new Error("socket closed"));

    await expect(ensureDeferred(interaction)).resolves.toBeUndefined();
    await expect(ensureDeferred(interaction)).rejects.toThrow("socket closed");
  });
});
