// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { Env } from "../lib/env.js";
import type { SettingsBackend } from "./backend.js";
import { JsonFileBackend } from "./jsonFileBackend.js";
import { SqliteBackend } from "./sqliteBackend.js";

export type BackendConfig = Pick<Env, "STORAGE_DRIVER" | "SETTINGS_PATH" | "DB_PATH">;

/** STORAGE_DRIVER picks the backend; the other path setting is ignored. */
export function openBackend(config: BackendConfig): SettingsBackend {
  return config.STORAGE_DRIVER === "sqlite"
    ? SqliteBackend.open(config.DB_PATH)
    : new JsonFileBackend(config.SETTINGS_PATH);
}
