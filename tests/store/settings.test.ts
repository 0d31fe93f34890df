/**
 * Walletlist — tests/store/settings.test.ts
 * WHAT: Tests for the settings document codec.
 * WHY: Both backends decode through this schema; a bad document must stop the
 *      bot at boot rather than be silently replaced.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import {
  decodeSettings,
  defaultSettings,
  serializeSettings,
  toDocument,
} from "../../src/store/settings.js";
import { StartupError } from "../../src/lib/errors.js";

describe("defaultSettings", () => {
  it("starts open with no channel or role, a cap of one and keep-on-leave", () => {
    expect(defaultSettings()).toEqual({
      whitelistChannelId: null,
      autoRoleId: null,
      whitelistStatus: true,
      maxWallets: 1,
      deleteOnLeave: false,
      submittedWallets: {},
    });
  });

  it("returns a fresh object each call", () => {
    const a = defaultSettings();
    a.submittedWallets["111"] = ["0xAA"];
    expect(defaultSettings().submittedWallets).toEqual({});
  });
});

describe("toDocument", () => {
  it("uses the snake_case durable key names", () => {
    const settings = {
      ...defaultSettings(),
      whitelistChannelId: "123",
      autoRoleId: "456",
      maxWallets: 3,
      submittedWallets: { "111": ["0xAA"] },
    };

    expect(toDocument(settings)).toEqual({
      whitelist_channel_id: "123",
      auto_role_id: "456",
      submitted_wallets: { "111": ["0xAA"] },
      whitelist_status: true,
      max_wallets: 3,
      delete_on_leave: false,
    });
  });
});

describe("decodeSettings", () => {
  it("decodes a complete document", () => {
    const settings = decodeSettings(
      {
        whitelist_channel_id: "123",
        auto_role_id: "456",
        submitted_wallets: { "111": ["0xAA", "0xBB"] },
        whitelist_status: false,
        max_wallets: 2,
        delete_on_leave: true,
      },
      "test"
    );

    expect(settings).toEqual({
      whitelistChannelId: "123",
      autoRoleId: "456",
      whitelistStatus: false,
      maxWallets: 2,
      deleteOnLeave: true,
      submittedWallets: { "111": ["0xAA", "0xBB"] },
    });
  });

  it("fills missing keys with defaults", () => {
    expect(decodeSettings({}, "test")).toEqual(defaultSettings());
  });

  it("ignores unknown keys", () => {
    const settings = decodeSettings({ max_wallets: 4, legacy_field: "x" }, "test");
    expect(settings.maxWallets).toBe(4);
    expect(settings).not.toHaveProperty("legacy_field");
  });

  it("accepts numeric ids that are safe integers and stores them as strings", () => {
    const settings = decodeSettings({ whitelist_channel_id: 123456789, auto_role_id: 42 }, "test");
    expect(settings.whitelistChannelId).toBe("123456789");
    expect(settings.autoRoleId).toBe("42");
  });

  it("rejects numeric ids beyond the safe integer range", () => {
    expect(() => decodeSettings({ whitelist_channel_id: 2 ** 60 }, "test")).toThrow(StartupError);
  });

  it("drops users whose wallet list is empty", () => {
    const settings = decodeSettings({ submitted_wallets: { "111": [], "222": ["0xCC"] } }, "test");
    expect(settings.submittedWallets).toEqual({ "222": ["0xCC"] });
  });

  it("rejects a non-positive cap", () => {
    expect(() => decodeSettings({ max_wallets: 0 }, "test")).toThrow(StartupError);
  });

  it("rejects a fractional cap", () => {
    expect(() => decodeSettings({ max_wallets: 1.5 }, "test")).toThrow(StartupError);
  });

  it("rejects a non-numeric user key", () => {
    expect(() => decodeSettings({ submitted_wallets: { alice: ["0xAA"] } }, "test")).toThrow(
      StartupError
    );
  });

  it("rejects a document that is not an object", () => {
    expect(() => decodeSettings([1, 2, 3], "test")).toThrow(StartupError);
  });

  it("names the offending path and the target in the error", () => {
    try {
      decodeSettings({ whitelist_status: "yes" }, "/data/settings.json");
      expect.unreachable("decode should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(StartupError);
      if (err instanceof StartupError) {
        expect(err.target).toBe("/data/settings.json");
        expect(err.message).toContain("whitelist_status:");
      }
    }
  });
});

describe("serializeSettings", () => {
  it("is equal for equal records and differs after a change", () => {
    const a = defaultSettings();
    const b = defaultSettings();
    expect(serializeSettings(a)).toBe(serializeSettings(b));

    b.whitelistStatus = false;
    expect(serializeSettings(a)).not.toBe(serializeSettings(b));
  });
});
