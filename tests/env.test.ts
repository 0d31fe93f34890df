/**
 * WHAT: Proves the zod environment schema validates required vars and defaults the rest.
 * HOW: Parses shapes against the exported schema; the module-level parse is fed
 *      placeholders first so importing env.ts does not exit.
 * DOCS: https://vitest.dev/guide/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.hoisted(() => {
  process.env.DISCORD_TOKEN ??= "test-token";
  process.env.CLIENT_ID ??= "123456789012345678";
});

import { envSchema } from "../src/lib/env.js";

describe("Environment Validation", () => {
  it("applies defaults for storage and Sentry", () => {
    const result = envSchema.safeParse({ DISCORD_TOKEN: "test-token", CLIENT_ID: "123" });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toMatchObject({
        NODE_ENV: "development",
        STORAGE_DRIVER: "json",
        SETTINGS_PATH: "data/settings.json",
        DB_PATH: "data/data.db",
        SENTRY_TRACES_SAMPLE_RATE: 0.1,
      });
      expect(result.data.GUILD_ID).toBeUndefined();
    }
  });

  it("fails when the token is empty", () => {
    const result = envSchema.safeParse({ DISCORD_TOKEN: "", CLIENT_ID: "123" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe("Missing DISCORD_TOKEN");
    }
  });

  it("rejects an unknown storage driver", () => {
    const result = envSchema.safeParse({ DISCORD_TOKEN: "t", CLIENT_ID: "1", STORAGE_DRIVER: "redis" });
    expect(result.success).toBe(false);
  });

  it("rejects a non-numeric GUILD_ID", () => {
    const result = envSchema.safeParse({ DISCORD_TOKEN: "t", CLIENT_ID: "1", GUILD_ID: "abc" });
    expect(result.success).toBe(false);
  });

  it("coerces the traces sample rate and bounds it", () => {
    const ok = envSchema.safeParse({ DISCORD_TOKEN: "t", CLIENT_ID: "1", SENTRY_TRACES_SAMPLE_RATE: "0.5" });
    expect(ok.success && ok.data.SENTRY_TRACES_SAMPLE_RATE).toBe(0.5);

    const tooHigh = envSchema.safeParse({ DISCORD_TOKEN: "t", CLIENT_ID: "1", SENTRY_TRACES_SAMPLE_RATE: "2" });
    expect(tooHigh.success).toBe(false);
  });
});
