/**
 * Walletlist — tests/store/settingsStore.test.ts
 * WHAT: Tests for SettingsStore load, snapshot reads and serialized mutation.
 * WHY: Every feature reads and writes through the store; memory must never get
 *      ahead of disk and concurrent mutations must not lose updates.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { SettingsStore } from "../../src/store/settingsStore.js";
import { defaultSettings, toDocument } from "../../src/store/settings.js";
import { PersistError, StartupError } from "../../src/lib/errors.js";
import { MemoryBackend } from "../utils/memoryBackend.js";

describe("SettingsStore.load", () => {
  it("writes defaults when nothing is stored", async () => {
    const backend = new MemoryBackend();
    const store = await SettingsStore.load(backend);

    expect(store.get()).toEqual(defaultSettings());
    expect(backend.writes).toBe(1);
    expect(backend.lastWritten).toEqual(toDocument(defaultSettings()));
  });

  it("decodes the stored document without rewriting it", async () => {
    const backend = new MemoryBackend({
      whitelist_channel_id: "123",
      submitted_wallets: { "111": ["0xAA"] },
      max_wallets: 3,
    });
    const store = await SettingsStore.load(backend);

    expect(store.get()).toMatchObject({
      whitelistChannelId: "123",
      maxWallets: 3,
      submittedWallets: { "111": ["0xAA"] },
    });
    expect(backend.writes).toBe(0);
  });

  it("throws StartupError when the stored document is invalid", async () => {
    const backend = new MemoryBackend({ max_wallets: -1 });
    await expect(SettingsStore.load(backend)).rejects.toBeInstanceOf(StartupError);
    expect(backend.writes).toBe(0);
  });

  it("throws StartupError when defaults cannot be written", async () => {
    const backend = new MemoryBackend();
    backend.failWrites(new Error("read-only filesystem"));

    await expect(SettingsStore.load(backend)).rejects.toThrow("Default settings could not be written");
  });
});

describe("SettingsStore.get", () => {
  it("returns a copy that later mutations do not touch", async () => {
    const store = await SettingsStore.load(new MemoryBackend());
    const before = store.get();

    await store.mutate((draft) => {
      draft.submittedWallets["111"] = ["0xAA"];
    });

    expect(before.submittedWallets).toEqual({});
    expect(store.get().submittedWallets).toEqual({ "111": ["0xAA"] });
  });

  it("ignores edits made to a returned copy", async () => {
    const store = await SettingsStore.load(new MemoryBackend());
    const copy = store.get();
    copy.whitelistStatus = false;

    expect(store.get().whitelistStatus).toBe(true);
  });
});

describe("SettingsStore.mutate", () => {
  it("persists a changed draft and returns the callback result", async () => {
    const backend = new MemoryBackend();
    const store = await SettingsStore.load(backend);

    const result = await store.mutate((draft) => {
      draft.maxWallets = 5;
      return "done";
    });

    expect(result).toBe("done");
    expect(store.get().maxWallets).toBe(5);
    expect(backend.writes).toBe(2);
    expect(backend.lastWritten?.max_wallets).toBe(5);
  });

  it("skips the write when the draft is unchanged", async () => {
    const backend = new MemoryBackend();
    const store = await SettingsStore.load(backend);

    await store.mutate((draft) => {
      draft.maxWallets = 1;
    });

    expect(backend.writes).toBe(1);
  });

  it("keeps the previous record when the write fails", async () => {
    const backend = new MemoryBackend();
    const store = await SettingsStore.load(backend);
    backend.failNextWrite(new Error("disk full"));

    await expect(
      store.mutate((draft) => {
        draft.whitelistStatus = false;
      })
    ).rejects.toBeInstanceOf(PersistError);

    expect(store.get().whitelistStatus).toBe(true);
    expect(backend.lastWritten?.whitelist_status).toBe(true);
  });

  it("accepts later mutations after a failed write", async () => {
    const backend = new MemoryBackend();
    const store = await SettingsStore.load(backend);
    backend.failNextWrite();

    await expect(
      store.mutate((draft) => {
        draft.maxWallets = 2;
      })
    ).rejects.toThrow("Settings could not be written");

    await store.mutate((draft) => {
      draft.maxWallets = 3;
    });
    expect(store.get().maxWallets).toBe(3);
  });

  it("propagates a callback error without writing", async () => {
    const backend = new MemoryBackend();
    const store = await SettingsStore.load(backend);

    await expect(
      store.mutate((draft) => {
        draft.maxWallets = 9;
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(store.get().maxWallets).toBe(1);
    expect(backend.writes).toBe(1);
  });

  it("does not lose updates under concurrent mutation", async () => {
    const store = await SettingsStore.load(new MemoryBackend());

    await Promise.all(
      Array.from({ length: 20 }, () =>
        store.mutate((draft) => {
          draft.maxWallets += 1;
        })
      )
    );

    expect(store.get().maxWallets).toBe(21);
  });
});

describe("SettingsStore.save and close", () => {
  it("writes the committed record again", async () => {
    const backend = new MemoryBackend();
    const store = await SettingsStore.load(backend);

    await store.save();

    expect(backend.writes).toBe(2);
    expect(backend.lastWritten).toEqual(toDocument(defaultSettings()));
  });

  it("raises PersistError when saving fails", async () => {
    const backend = new MemoryBackend();
    const store = await SettingsStore.load(backend);
    backend.failWrites();

    await expect(store.save()).rejects.toBeInstanceOf(PersistError);
  });

  it("closes the backend", async () => {
    const backend = new MemoryBackend();
    const store = await SettingsStore.load(backend);
    store.close();
    expect(backend.closed).toBe(true);
  });
});
