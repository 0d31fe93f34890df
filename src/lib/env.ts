/**
 * Walletlist — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on missing secrets; keep process.env access centralized.
 * FLOWS: load .env → parse/validate → export typed env object
 * DOCS:
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// Tests set their env before importing, so only production overrides the shell.
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Raw extraction. Every value is trimmed; stray whitespace from copy-pasted
 * .env lines is the most common misconfiguration.
 */
const raw = {
  DISCORD_TOKEN: process.env.DISCORD_TOKEN?.trim(),
  CLIENT_ID: process.env.CLIENT_ID?.trim(),
  GUILD_ID: process.env.GUILD_ID?.trim() || undefined,
  NODE_ENV: process.env.NODE_ENV?.trim(),
  STORAGE_DRIVER: process.env.STORAGE_DRIVER?.trim() || undefined,
  SETTINGS_PATH: process.env.SETTINGS_PATH?.trim() || undefined,
  DB_PATH: process.env.DB_PATH?.trim() || undefined,
  LOG_LEVEL: process.env.LOG_LEVEL?.trim(),
  SENTRY_DSN: process.env.SENTRY_DSN?.trim(),
  SENTRY_ENVIRONMENT: process.env.SENTRY_ENVIRONMENT?.trim(),
  SENTRY_TRACES_SAMPLE_RATE: process.env.SENTRY_TRACES_SAMPLE_RATE?.trim() || undefined,
};

export const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  CLIENT_ID: z.string().min(1, "Missing CLIENT_ID"),
  // Without GUILD_ID commands register globally (up to an hour to propagate).
  GUILD_ID: z.string().regex(/^\d+$/, "GUILD_ID must be a snowflake").optional(),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  STORAGE_DRIVER: z.enum(["json", "sqlite"]).default("json"),
  SETTINGS_PATH: z.string().default("data/settings.json"),
  DB_PATH: z.string().default("data/data.db"),

  LOG_LEVEL: z.string().optional(),

  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
});

export type Env = z.infer<typeof envSchema>;

/**
 * safeParse collects every issue so a broken .env is fixed in one pass.
 */
const parsed = envSchema.safeParse(raw);
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}
export const env: Env = parsed.data;
