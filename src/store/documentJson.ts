/**
 * Walletlist — src/store/documentJson.ts
 * WHAT: JSON text codec for the stored settings document.
 * WHY: Channel and role ids are stored as JSON integers, and Discord snowflakes are
 *      larger than 2^53; plain JSON.parse would round them to a different id.
 * FLOWS:
 *  - parseDocumentText(text) → numbers that fit a double as numbers, larger ones as exact digit strings
 *  - stringifyDocument(doc) → ids written back as bare JSON integers
 * DOCS:
 *  - lossless-json: https://github.com/josdejong/lossless-json
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { isSafeNumber, LosslessNumber, parse, stringify } from "lossless-json";
import type { SettingsDocument, Snowflake } from "./settings.js";

function parseStoredNumber(value: string): number | string {
  return isSafeNumber(value) ? Number(value) : value;
}

/**
 * THROWS: SyntaxError on malformed JSON (backends wrap it in StartupError).
 */
export function parseDocumentText(text: string): unknown {
  return parse(text, undefined, parseStoredNumber);
}

function idToJson(id: Snowflake | null): LosslessNumber | null {
  return id === null ? null : new LosslessNumber(id);
}

export function stringifyDocument(doc: SettingsDocument, space?: number): string {
  const text = stringify(
    {
      ...doc,
      whitelist_channel_id: idToJson(doc.whitelist_channel_id),
      auto_role_id: idToJson(doc.auto_role_id),
    },
    undefined,
    space
  );
  if (text === undefined) {
    throw new TypeError("Settings document did not serialize to JSON");
  }
  return text;
}
