/**
 * Walletlist — src/store/jsonFileBackend.ts
 * WHAT: Settings document kept as a pretty-printed JSON file.
 * WHY: Default backend; the file is easy to inspect and back up.
 * FLOWS:
 *  - read(): readFile → parseDocumentText (ENOENT → null, bad JSON → StartupError)
 *  - write(): mkdir -p → write sibling temp file → rename over target
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { logger } from "../lib/logger.js";
import { StartupError } from "../lib/errors.js";
import type { SettingsBackend } from "./backend.js";
import type { SettingsDocument } from "./settings.js";
import { parseDocumentText, stringifyDocument } from "./documentJson.js";

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

export class JsonFileBackend implements SettingsBackend {
  readonly target: string;

  constructor(filePath: string) {
    this.target = path.resolve(filePath);
  }

  async read(): Promise<unknown | null> {
    let text: string;
    try {
      text = await readFile(this.target, "utf8");
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) {
        logger.info({ evt: "settings_file_absent", path: this.target }, "[settings] no settings file yet");
        return null;
      }
      throw new StartupError(`Settings file could not be read`, this.target, { cause: err });
    }

    try {
      return parseDocumentText(text);
    } catch (err) {
      throw new StartupError(`Settings file is not valid JSON`, this.target, { cause: err });
    }
  }

  /**
   * rename() within one directory is atomic on POSIX and NTFS, so readers see
   * either the old document or the new one.
   */
  async write(doc: SettingsDocument): Promise<void> {
    await mkdir(path.dirname(this.target), { recursive: true });
    const tempPath = `${this.target}.${process.pid}.${Date.now()}-${Math.random().toString(16).slice(2)}.tmp`;
    try {
      await writeFile(tempPath, `${stringifyDocument(doc, 2)}\n`, "utf8");
      await rename(tempPath, this.target);
    } catch (err) {
      await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        logger.warn({ err: cleanupErr, tempPath }, "[settings] failed to remove temp file");
      });
      throw err;
    }
  }

  close(): void {
    // Nothing held open between writes.
  }
}
