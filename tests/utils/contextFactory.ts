/**
 * Walletlist — tests/utils/contextFactory.ts
 * WHAT: Factory for creating CommandContext objects for testing.
 * WHY: Handlers receive a structured context; tests need to provide the same shape
 *      without going through wrapCommand.
 * USAGE:
 *  import { createTestCommandContext } from "../utils/contextFactory.js";
 *  const ctx = createTestCommandContext(createMockButtonInteraction());
 *  await handleSubmitButton(ctx);
 *  expect(ctx.currentPhase()).toBe("show_modal");
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ChatInputCommandInteraction } from "discord.js";
import type { CommandContext, InstrumentedInteraction } from "../../src/lib/cmdWrap.js";

/**
 * step() records the phase so tests can assert where a handler stopped.
 */
export function createTestCommandContext<I extends InstrumentedInteraction = ChatInputCommandInteraction>(
  interaction: I,
  options: { traceId?: string; onStep?: (phase: string) => void } = {}
): CommandContext<I> {
  let currentPhase = "enter";

  return {
    interaction,
    step: (phase: string) => {
      currentPhase = phase;
      options.onStep?.(phase);
    },
    currentPhase: () => currentPhase,
    traceId: options.traceId ?? "test-trace-123",
  };
}
