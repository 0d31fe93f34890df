/**
 * Walletlist — src/lib/constants.ts
 * WHAT: Centralized constants for limits, timeouts, and defaults.
 * WHY: Single source of truth for magic numbers shared by the store, UI and handlers.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MessageMentionOptions } from "discord.js";

// ===== Discord Message Options =====

/** Suppresses all @mentions; used whenever a reply echoes user-submitted text. */
export const SAFE_ALLOWED_MENTIONS: MessageMentionOptions = { parse: [] };

// ===== Settings Defaults =====

export const DEFAULT_MAX_WALLETS = 1;

/** The cap select menu offers 1..25 (Discord allows at most 25 options). The store accepts any positive integer. */
export const MAX_WALLETS_MENU_LIMIT = 25;

// ===== Wallet Input =====

/** Upper bound on the modal text input; long enough for any chain's address format. */
export const WALLET_ADDRESS_MAX_LENGTH = 128;

// ===== Prompt Lookup =====

/** How many recent channel messages to scan for an existing prompt. */
export const PROMPT_SCAN_LIMIT = 50;

// ===== Timeouts & Delays =====

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

/** SQLite busy timeout for the settings backend */
export const DB_BUSY_TIMEOUT_MS = 5000;

// ===== Export =====

export const UNKNOWN_USER_LABEL = "Unknown User";

/** Username lookups started at once during CSV export; keeps large exports under Discord's rate limits */
export const USERNAME_LOOKUP_BATCH_SIZE = 10;
