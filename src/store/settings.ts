/**
 * Walletlist — src/store/settings.ts
 * WHAT: The settings record, its defaults, and the durable document codec.
 * WHY: One zod schema decodes both storage backends, so a file edited by hand and a
 *      SQLite row go through the same checks.
 * FLOWS:
 *  - defaultSettings() → fresh record (channel/role unset, open, cap 1, keep on leave)
 *  - toDocument(settings) → snake_case document written by a backend
 *  - decodeSettings(raw, target) → Settings, or StartupError when the document is bad
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { DEFAULT_MAX_WALLETS } from "../lib/constants.js";
import { StartupError } from "../lib/errors.js";

export type Snowflake = string;

export interface Settings {
  whitelistChannelId: Snowflake | null;
  autoRoleId: Snowflake | null;
  whitelistStatus: boolean;
  maxWallets: number;
  deleteOnLeave: boolean;
  /** userId → addresses in submission order. Never holds an empty list. */
  submittedWallets: Record<Snowflake, string[]>;
}

/** Durable shape. Key names are part of the on-disk format; do not rename. */
export interface SettingsDocument {
  whitelist_channel_id: Snowflake | null;
  auto_role_id: Snowflake | null;
  submitted_wallets: Record<Snowflake, string[]>;
  whitelist_status: boolean;
  max_wallets: number;
  delete_on_leave: boolean;
}

export function defaultSettings(): Settings {
  return {
    whitelistChannelId: null,
    autoRoleId: null,
    whitelistStatus: true,
    maxWallets: DEFAULT_MAX_WALLETS,
    deleteOnLeave: false,
    submittedWallets: {},
  };
}

/**
 * Ids are JSON integers on disk. The backends' parser hands ids past 2^53 over as
 * exact digit strings; a plain number that large has already lost digits and is refused.
 */
const snowflakeSchema = z.union([
  z.string().regex(/^\d{1,20}$/, "must be a numeric Discord id"),
  z
    .number()
    .refine(Number.isSafeInteger, "numeric id is not a safe integer")
    .refine((n) => n >= 0, "id cannot be negative")
    .transform((n) => String(n)),
]);

/** Missing keys fall back to defaults; unknown keys are ignored. */
const settingsDocumentSchema = z.object({
  whitelist_channel_id: snowflakeSchema.nullable().default(null),
  auto_role_id: snowflakeSchema.nullable().default(null),
  submitted_wallets: z
    .record(z.string().regex(/^\d{1,20}$/, "user key must be a numeric Discord id"), z.array(z.string()))
    .default({}),
  whitelist_status: z.boolean().default(true),
  max_wallets: z.number().int().positive().default(DEFAULT_MAX_WALLETS),
  delete_on_leave: z.boolean().default(false),
});

export function toDocument(settings: Settings): SettingsDocument {
  return {
    whitelist_channel_id: settings.whitelistChannelId,
    auto_role_id: settings.autoRoleId,
    submitted_wallets: settings.submittedWallets,
    whitelist_status: settings.whitelistStatus,
    max_wallets: settings.maxWallets,
    delete_on_leave: settings.deleteOnLeave,
  };
}

/**
 * Decode a raw document read from storage.
 * Empty wallet lists are dropped so the no-empty-entry rule holds after load.
 */
export function decodeSettings(raw: unknown, target: string): Settings {
  const parsed = settingsDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new StartupError(`Settings document is invalid (${issues})`, target, { cause: parsed.error });
  }

  const doc = parsed.data;
  const submittedWallets: Record<Snowflake, string[]> = {};
  for (const [userId, wallets] of Object.entries(doc.submitted_wallets)) {
    if (wallets.length > 0) {
      submittedWallets[userId] = [...wallets];
    }
  }

  return {
    whitelistChannelId: doc.whitelist_channel_id,
    autoRoleId: doc.auto_role_id,
    whitelistStatus: doc.whitelist_status,
    maxWallets: doc.max_wallets,
    deleteOnLeave: doc.delete_on_leave,
    submittedWallets,
  };
}

/** Stable serialization used to tell whether a mutation changed anything. */
export function serializeSettings(settings: Settings): string {
  return JSON.stringify(toDocument(settings));
}
