/**
 * Walletlist — tests/lib/reqctx.test.ts
 * WHAT: Unit tests for request context and async local storage.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { ctx, newTraceId, runWithCtx } from "../../src/lib/reqctx.js";

describe("reqctx", () => {
  describe("newTraceId", () => {
    it("generates 11 base62 characters", () => {
      expect(newTraceId()).toMatch(/^[0-9A-Za-z]{11}$/);
    });

    it("generates unique ids", () => {
      const ids = new Set(Array.from({ length: 100 }, () => newTraceId()));
      expect(ids.size).toBe(100);
    });
  });

  describe("ctx", () => {
    it("returns an empty object outside a context", () => {
      expect(ctx()).toEqual({});
    });
  });

  describe("runWithCtx", () => {
    it("exposes the context across awaits", async () => {
      const seen = await runWithCtx({ traceId: "abc", cmd: "whitelist", kind: "slash" }, async () => {
        await Promise.resolve();
        return ctx();
      });

      expect(seen).toEqual({
        traceId: "abc",
        cmd: "whitelist",
        kind: "slash",
        userId: undefined,
        guildId: null,
        channelId: null,
      });
    });

    it("lets a child override fields and inherit the rest", () => {
      const child = runWithCtx({ traceId: "parent", userId: "111", guildId: "800" }, () =>
        runWithCtx({ cmd: "panel_cap" }, () => ctx())
      );

      expect(child).toMatchObject({ traceId: "parent", cmd: "panel_cap", userId: "111", guildId: "800" });
    });

    it("generates a trace id when none is given", () => {
      const seen = runWithCtx({}, () => ctx());
      expect(seen.traceId).toMatch(/^[0-9A-Za-z]{11}$/);
    });
  });
});
