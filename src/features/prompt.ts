/**
 * Walletlist — src/features/prompt.ts
 * WHAT: Idempotent posting of the wallet-submission prompt.
 * WHY: Several triggers (boot, re-enabling, moving channels, reset) can race; the channel
 *      must end up with exactly one prompt.
 * FLOWS:
 *  - ensurePromptPosted() → read snapshot → skip if closed/no channel → per-channel lock
 *    → hasExistingPrompt? → postPrompt
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { Mutex } from "async-mutex";
import { logger } from "../lib/logger.js";
import type { SettingsStore } from "../store/settingsStore.js";
import type { Snowflake } from "../store/settings.js";

/**
 * Discord side of the prompt. Implemented over discord.js in
 * discordPromptMessenger.ts and by plain objects in tests.
 */
export interface PromptMessenger {
  hasExistingPrompt(channelId: Snowflake): Promise<boolean>;
  postPrompt(channelId: Snowflake): Promise<void>;
}

export type PromptOutcome =
  | { status: "posted"; channelId: Snowflake }
  | { status: "already_present"; channelId: Snowflake }
  | { status: "skipped"; reason: "no_channel" | "closed" }
  | { status: "failed"; channelId: Snowflake; error: unknown };

export class PromptPoster {
  private readonly channelLocks = new Map<Snowflake, Mutex>();

  constructor(
    private readonly store: SettingsStore,
    private readonly messenger: PromptMessenger
  ) {}

  /**
   * Post the prompt to the configured channel unless one is already there.
   * Reads settings when called, so callers must not hold the store lock.
   * Discord failures come back as a "failed" outcome after being logged.
   */
  async ensurePromptPosted(): Promise<PromptOutcome> {
    const { whitelistChannelId, whitelistStatus } = this.store.get();

    if (!whitelistChannelId) {
      return { status: "skipped", reason: "no_channel" };
    }
    if (!whitelistStatus) {
      return { status: "skipped", reason: "closed" };
    }

    const channelId = whitelistChannelId;
    return this.lockFor(channelId).runExclusive(async (): Promise<PromptOutcome> => {
      try {
        if (await this.messenger.hasExistingPrompt(channelId)) {
          logger.debug({ evt: "prompt_present", channelId }, "[prompt] already present");
          return { status: "already_present", channelId };
        }
        await this.messenger.postPrompt(channelId);
        logger.info({ evt: "prompt_posted", channelId }, "[prompt] posted");
        return { status: "posted", channelId };
      } catch (error) {
        logger.warn({ evt: "prompt_post_failed", channelId, err: error }, "[prompt] could not post prompt");
        return { status: "failed", channelId, error };
      }
    });
  }

  private lockFor(channelId: Snowflake): Mutex {
    let lock = this.channelLocks.get(channelId);
    if (!lock) {
      lock = new Mutex();
      this.channelLocks.set(channelId, lock);
    }
    return lock;
  }
}
