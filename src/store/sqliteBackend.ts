/**
 * Walletlist — src/store/sqliteBackend.ts
 * WHAT: Settings document stored as one JSON row in SQLite.
 * WHY: For hosts that already back up a data.db; selected with STORAGE_DRIVER=sqlite.
 * FLOWS:
 *  - open(dbPath) → PRAGMAs → CREATE TABLE IF NOT EXISTS settings_kv
 *  - read(): SELECT value → parseDocumentText
 *  - write(): UPSERT the whole document (single statement, atomic)
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite UPSERT: https://sqlite.org/lang_UPSERT.html
 *
 * NOTE: better‑sqlite3 is synchronous; the async signatures only satisfy SettingsBackend.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { logger } from "../lib/logger.js";
import { StartupError } from "../lib/errors.js";
import { DB_BUSY_TIMEOUT_MS } from "../lib/constants.js";
import type { SettingsBackend } from "./backend.js";
import type { SettingsDocument } from "./settings.js";
import { parseDocumentText, stringifyDocument } from "./documentJson.js";

const SETTINGS_KEY = "settings";

export class SqliteBackend implements SettingsBackend {
  private constructor(
    readonly target: string,
    private readonly db: Database.Database
  ) {}

  /**
   * Open (or create) the database. Pass ":memory:" for a throwaway database.
   * THROWS: StartupError when the file cannot be opened as SQLite.
   */
  static open(dbPath: string): SqliteBackend {
    const inMemory = dbPath === ":memory:";
    const target = inMemory ? dbPath : path.resolve(dbPath);
    try {
      if (!inMemory) {
        fs.mkdirSync(path.dirname(target), { recursive: true });
      }
      const db = new Database(target, { fileMustExist: false });
      // WAL lets a backup tool read while we write
      db.pragma("journal_mode = WAL");
      db.pragma("synchronous = NORMAL");
      db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);
      db.exec(`
        CREATE TABLE IF NOT EXISTS settings_kv (
          key          TEXT PRIMARY KEY,
          value        TEXT NOT NULL,
          updated_at_s INTEGER NOT NULL
        )
      `);
      logger.info({ dbPath: target }, "SQLite opened");
      return new SqliteBackend(target, db);
    } catch (err) {
      throw new StartupError("Settings database could not be opened", target, { cause: err });
    }
  }

  async read(): Promise<unknown | null> {
    let row: { value: string } | undefined;
    try {
      row = this.db
        .prepare<[string], { value: string }>("SELECT value FROM settings_kv WHERE key = ?")
        .get(SETTINGS_KEY);
    } catch (err) {
      throw new StartupError("Settings row could not be read", this.target, { cause: err });
    }
    if (!row) return null;

    try {
      return parseDocumentText(row.value);
    } catch (err) {
      throw new StartupError("Settings row is not valid JSON", this.target, { cause: err });
    }
  }

  async write(doc: SettingsDocument): Promise<void> {
    this.db
      .prepare<[string, string, number]>(
        `INSERT INTO settings_kv (key, value, updated_at_s)
         VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at_s = excluded.updated_at_s`
      )
      .run(SETTINGS_KEY, stringifyDocument(doc), Math.floor(Date.now() / 1000));
  }

  /** Raw row access for diagnostics and tests. */
  updatedAt(): number | null {
    const row = this.db
      .prepare<[string], { updated_at_s: number }>("SELECT updated_at_s FROM settings_kv WHERE key = ?")
      .get(SETTINGS_KEY);
    return row?.updated_at_s ?? null;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      logger.info({ dbPath: this.target }, "SQLite closed");
    }
  }
}
