/**
 * Walletlist — src/store/settingsStore.ts
 * WHAT: Owner of the single settings record: load at boot, snapshot reads, serialized mutation.
 * WHY: Interaction handlers run concurrently; every check-then-act on the record has to
 *      happen inside one critical section, and memory must never get ahead of disk.
 * FLOWS:
 *  - SettingsStore.load(backend) → read → decode (or write defaults) → store
 *  - get() → deep copy of the last committed record (never waits on the lock)
 *  - mutate(fn) → lock → fn(draft) → persist draft if it changed → swap in → unlock
 * DOCS:
 *  - async-mutex: https://github.com/DirtyHairy/async-mutex
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { Mutex } from "async-mutex";
import { logger } from "../lib/logger.js";
import { PersistError, StartupError } from "../lib/errors.js";
import type { SettingsBackend } from "./backend.js";
import {
  decodeSettings,
  defaultSettings,
  serializeSettings,
  toDocument,
  type Settings,
} from "./settings.js";

export class SettingsStore {
  /** Serializes every mutation of the record */
  private readonly mutex = new Mutex();

  private constructor(
    private readonly backend: SettingsBackend,
    private committed: Settings
  ) {}

  /**
   * Load the record from the backend. When nothing is stored yet, defaults are
   * written immediately so the durable copy always exists after boot.
   * THROWS: StartupError when stored data is unreadable or the defaults cannot be written.
   */
  static async load(backend: SettingsBackend): Promise<SettingsStore> {
    const raw = await backend.read();

    if (raw === null) {
      const defaults = defaultSettings();
      try {
        await backend.write(toDocument(defaults));
      } catch (err) {
        throw new StartupError("Default settings could not be written", backend.target, { cause: err });
      }
      logger.info({ evt: "settings_initialized", target: backend.target }, "[settings] wrote defaults");
      return new SettingsStore(backend, defaults);
    }

    const settings = decodeSettings(raw, backend.target);
    logger.info(
      {
        evt: "settings_loaded",
        target: backend.target,
        users: Object.keys(settings.submittedWallets).length,
        whitelistStatus: settings.whitelistStatus,
      },
      "[settings] loaded"
    );
    return new SettingsStore(backend, settings);
  }

  /** Copy of the last committed record. Safe to hold onto; later mutations do not touch it. */
  get(): Settings {
    return structuredClone(this.committed);
  }

  /**
   * Run `fn` against a working copy while holding the lock. If the copy differs
   * from the committed record it is persisted, and only then becomes current.
   * Returning without changing the draft skips the write entirely.
   *
   * THROWS: PersistError when the write fails; the committed record is left as it was.
   *         Anything `fn` throws propagates with no state change.
   */
  async mutate<T>(fn: (draft: Settings) => T): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const draft = structuredClone(this.committed);
      const result = fn(draft);

      if (serializeSettings(draft) === serializeSettings(this.committed)) {
        return result;
      }

      await this.persist(draft);
      this.committed = draft;
      return result;
    });
  }

  /**
   * Write the current record again. Used after a failed persist has been
   * repaired by an operator, and at shutdown.
   */
  async save(): Promise<void> {
    await this.mutex.runExclusive(() => this.persist(this.committed));
  }

  close(): void {
    this.backend.close();
  }

  private async persist(settings: Settings): Promise<void> {
    try {
      await this.backend.write(toDocument(settings));
      logger.debug({ evt: "settings_persisted", target: this.backend.target }, "[settings] persisted");
    } catch (err) {
      logger.error(
        { evt: "settings_persist_failed", target: this.backend.target, err },
        "[settings] persist failed; in-memory record unchanged"
      );
      throw new PersistError("Settings could not be written", this.backend.target, { cause: err });
    }
  }
}
