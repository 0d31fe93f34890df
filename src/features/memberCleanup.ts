/**
 * Walletlist — src/features/memberCleanup.ts
 * WHAT: Drops a member's submitted wallets when they leave, if delete-on-leave is on.
 * FLOWS: guildMemberRemove → onMemberLeave(userId) → store.mutate(delete entry)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import type { SettingsStore } from "../store/settingsStore.js";
import type { Snowflake } from "../store/settings.js";

/**
 * Resolves true when an entry was removed. Never rejects: a failed write is
 * logged and the entry stays, both in memory and on disk.
 */
export async function onMemberLeave(store: SettingsStore, userId: Snowflake): Promise<boolean> {
  try {
    const removed = await store.mutate((draft) => {
      if (!draft.deleteOnLeave || !(userId in draft.submittedWallets)) {
        return 0;
      }
      const count = draft.submittedWallets[userId]?.length ?? 0;
      delete draft.submittedWallets[userId];
      return count;
    });

    if (removed > 0) {
      logger.info({ evt: "member_cleanup", userId, removed }, "[cleanup] removed wallets of departed member");
      return true;
    }
    return false;
  } catch (err) {
    logger.error({ evt: "member_cleanup_failed", userId, err }, "[cleanup] failed to remove wallets");
    return false;
  }
}
