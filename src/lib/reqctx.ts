/**
 * Walletlist — src/lib/reqctx.ts
 * WHAT: Minimal async-local request context for tracing interaction flows.
 * WHY: Lets us attach traceId/cmd/kind across nested async calls without threading params everywhere.
 * FLOWS: newTraceId() → runWithCtx(meta, fn) → ctx() inside nested helpers
 * DOCS:
 *  - Node AsyncLocalStorage: https://nodejs.org/api/async_context.html#class-asynclocalstorage
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

export type InteractionKind = "slash" | "button" | "modal" | "select";

export type ReqContext = {
  traceId: string;
  cmd?: string;
  kind?: InteractionKind;
  userId?: string;
  guildId?: string | null;
  channelId?: string | null;
};

const storage = new AsyncLocalStorage<ReqContext>();

const BASE62 = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";

/**
 * 11-char base62 id. Modulo bias is irrelevant here; we only need uniqueness.
 */
export function newTraceId(): string {
  const length = 11;
  const bytes = randomBytes(length);
  let out = "";
  for (let i = 0; i < length; i += 1) {
    out += BASE62[bytes[i] % BASE62.length];
  }
  return out;
}

/**
 * Binds a merged ReqContext for the duration of fn and every async call it makes.
 * Child contexts inherit from the parent and may override fields.
 */
export function runWithCtx<T>(meta: Partial<ReqContext>, fn: () => T): T {
  const parent = storage.getStore();
  const next: ReqContext = {
    traceId: meta.traceId ?? parent?.traceId ?? newTraceId(),
    cmd: meta.cmd ?? parent?.cmd,
    kind: meta.kind ?? parent?.kind,
    userId: meta.userId ?? parent?.userId,
    guildId: meta.guildId ?? parent?.guildId ?? null,
    channelId: meta.channelId ?? parent?.channelId ?? null,
  };
  return storage.run(next, fn);
}

export function ctx(): Partial<ReqContext> {
  return storage.getStore() ?? {};
}
