/**
 * Walletlist — src/features/submission.ts
 * WHAT: Records a member's wallet address against the open/closed flag and the per-user cap.
 * WHY: The cap check and the append must happen in one critical section, or two fast
 *      submissions could both pass the check.
 * FLOWS:
 *  - submitWallet() → store.mutate(closed? → cap? → validate → append) → grant role (outside lock)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger, redact } from "../lib/logger.js";
import { ValidationError } from "../lib/errors.js";
import { WALLET_ADDRESS_MAX_LENGTH } from "../lib/constants.js";
import type { SettingsStore } from "../store/settingsStore.js";
import type { Snowflake } from "../store/settings.js";

export type RoleGrantResult =
  | { ok: true; action: "added" | "already_had" }
  | { ok: false; reason: string };

export interface RoleGranter {
  grantRole(userId: Snowflake, roleId: Snowflake): Promise<RoleGrantResult>;
}

export type RejectionReason = "whitelist_closed" | "limit_reached";

export type SubmissionResult =
  | { ok: true; wallets: string[]; roleWarning?: string }
  | { ok: false; reason: RejectionReason; wallets: string[]; maxWallets: number };

export type SubmissionDeps = {
  store: SettingsStore;
  roles: RoleGranter;
};

type Recorded =
  | { ok: true; wallets: string[]; autoRoleId: Snowflake | null }
  | { ok: false; reason: RejectionReason; wallets: string[]; maxWallets: number };

/**
 * Addresses are opaque text kept exactly as typed. Only the empty string and
 * anything past the modal's max length are refused; there is no format check.
 * THROWS: ValidationError
 */
export function validateWalletAddress(address: string): string {
  if (address.length === 0) {
    throw new ValidationError("wallet", "address cannot be empty", address);
  }
  if (address.length > WALLET_ADDRESS_MAX_LENGTH) {
    throw new ValidationError(
      "wallet",
      `address cannot be longer than ${WALLET_ADDRESS_MAX_LENGTH} characters`,
      address.length
    );
  }
  return address;
}

/**
 * submitWallet
 * WHAT: Append `address` to the member's list if submissions are open and under the cap.
 * RETURNS: rejection variants leave the store untouched. On success the role grant has
 *          already been attempted; a failed grant surfaces as `roleWarning`, never as a throw.
 * THROWS: ValidationError (address refused after both policy checks passed),
 *         PersistError (write failed, nothing recorded)
 */
export async function submitWallet(
  deps: SubmissionDeps,
  userId: Snowflake,
  address: string
): Promise<SubmissionResult> {
  const recorded = await deps.store.mutate((draft): Recorded => {
    const current = draft.submittedWallets[userId] ?? [];

    if (!draft.whitelistStatus) {
      return { ok: false, reason: "whitelist_closed", wallets: [...current], maxWallets: draft.maxWallets };
    }
    if (current.length >= draft.maxWallets) {
      return { ok: false, reason: "limit_reached", wallets: [...current], maxWallets: draft.maxWallets };
    }

    const next = [...current, validateWalletAddress(address)];
    draft.submittedWallets[userId] = next;
    return { ok: true, wallets: [...next], autoRoleId: draft.autoRoleId };
  });

  if (!recorded.ok) {
    logger.info(
      { evt: "wallet_rejected", userId, reason: recorded.reason, count: recorded.wallets.length },
      "[submission] rejected"
    );
    return recorded;
  }

  logger.info(
    { evt: "wallet_submitted", userId, wallet: redact(address), count: recorded.wallets.length },
    "[submission] recorded"
  );

  if (!recorded.autoRoleId) {
    return { ok: true, wallets: recorded.wallets };
  }

  const roleWarning = await grantAutoRole(deps.roles, userId, recorded.autoRoleId);
  return roleWarning
    ? { ok: true, wallets: recorded.wallets, roleWarning }
    : { ok: true, wallets: recorded.wallets };
}

/** Returns a warning string when the role could not be granted. */
async function grantAutoRole(
  roles: RoleGranter,
  userId: Snowflake,
  roleId: Snowflake
): Promise<string | undefined> {
  try {
    const result = await roles.grantRole(userId, roleId);
    if (result.ok) return undefined;
    logger.warn({ evt: "role_grant_failed", userId, roleId, reason: result.reason }, "[submission] role not granted");
    return result.reason;
  } catch (err) {
    logger.warn({ evt: "role_grant_failed", userId, roleId, err }, "[submission] role grant threw");
    return err instanceof Error ? err.message : String(err);
  }
}
