/**
 * Walletlist — src/features/walletExport.ts
 * WHAT: CSV export of every submitted wallet, one row per member.
 * FLOWS: exportWalletsCsv(snapshot, resolveUsername) → resolve names in batches → CSV → Buffer
 *
 * Columns: User ID, Username, Wallets (all of a member's addresses, comma-joined in one cell).
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { toCsv } from "../lib/csv.js";
import { logger } from "../lib/logger.js";
import { UNKNOWN_USER_LABEL, USERNAME_LOOKUP_BATCH_SIZE } from "../lib/constants.js";
import type { Snowflake } from "../store/settings.js";

export const WALLET_CSV_HEADER = ["User ID", "Username", "Wallets"] as const;

/** Null, or a rejection, means the user could not be resolved. */
export type UsernameResolver = (userId: Snowflake) => Promise<string | null>;

/**
 * Build the CSV from a snapshot. Runs outside the store lock; name lookups hit
 * Discord and may be slow.
 */
export async function exportWalletsCsv(
  submittedWallets: Readonly<Record<Snowflake, readonly string[]>>,
  resolveUsername: UsernameResolver
): Promise<Buffer> {
  const entries = Object.entries(submittedWallets);

  const rows: string[][] = [];

  for (let start = 0; start < entries.length; start += USERNAME_LOOKUP_BATCH_SIZE) {
    const batch = entries.slice(start, start + USERNAME_LOOKUP_BATCH_SIZE);
    const batchRows = await Promise.all(
      batch.map(async ([userId, wallets]) => {
        const username = await resolveUsername(userId).catch((err: unknown) => {
          logger.debug({ evt: "export_user_unresolved", userId, err }, "[export] username lookup failed");
          return null;
        });
        return [userId, username ?? UNKNOWN_USER_LABEL, wallets.join(", ")];
      })
    );
    rows.push(...batchRows);
  }

  logger.info({ evt: "wallets_exported", rows: rows.length }, "[export] wallet CSV built");
  return Buffer.from(toCsv(WALLET_CSV_HEADER, rows), "utf-8");
}
