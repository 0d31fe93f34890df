/**
 * Walletlist — src/lib/csv.ts
 * WHAT: Minimal CSV formatting helpers.
 * DOCS:
 *  - RFC 4180 CSV: https://datatracker.ietf.org/doc/html/rfc4180
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * escapeCsvField
 * WHAT: Escapes a field for CSV output per RFC 4180.
 * HOW: Wraps in quotes if it contains comma/newline/quote; doubles internal quotes.
 */
export function escapeCsvField(value: string | null | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }

  const str = String(value);

  // Double-quote escaping ("") is the standard way to include literal quotes.
  if (str.includes(",") || str.includes("\n") || str.includes("\r") || str.includes('"')) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

/**
 * Join a header and rows into CSV text. Lines end with "\n", including the last one.
 */
export function toCsv(header: readonly string[], rows: ReadonlyArray<readonly string[]>): string {
  const lines = [header, ...rows].map((cells) => cells.map(escapeCsvField).join(","));
  return `${lines.join("\n")}\n`;
}
