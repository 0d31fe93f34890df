/**
 * Walletlist — tests/setup.ts
 * WHAT: Global Vitest setup for deterministic tests.
 *
 * This file runs before EVERY test file via the setupFiles config in vitest.config.ts.
 * Changes here affect all tests - be careful about side effects.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { afterEach, vi } from "vitest";

afterEach(() => {
  // Clean up any fake timers a test might have installed. If we don't do this,
  // a test using vi.useFakeTimers() would leak into subsequent tests.
  vi.clearAllTimers();
  vi.useRealTimers();
});
