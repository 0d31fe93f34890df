// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { SettingsDocument } from "./settings.js";

/**
 * Durable home of the settings document.
 *
 * read() resolves null when nothing has been stored yet and throws
 * StartupError when something is stored but cannot be parsed.
 * write() replaces the whole document; a partial write must never be visible.
 */
export interface SettingsBackend {
  /** Human-readable location for logs and errors (file path, db path). */
  readonly target: string;
  read(): Promise<unknown | null>;
  write(doc: SettingsDocument): Promise<void>;
  close(): void;
}
