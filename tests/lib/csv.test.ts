/**
 * Walletlist — tests/lib/csv.test.ts
 * WHAT: Tests for CSV field escaping and row joining.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { escapeCsvField, toCsv } from "../../src/lib/csv.js";

describe("escapeCsvField", () => {
  it("leaves plain values alone", () => {
    expect(escapeCsvField("0xAA")).toBe("0xAA");
  });

  it("returns an empty string for null and undefined", () => {
    expect(escapeCsvField(null)).toBe("");
    expect(escapeCsvField(undefined)).toBe("");
  });

  it("quotes values containing a comma", () => {
    expect(escapeCsvField("0xAA, 0xBB")).toBe('"0xAA, 0xBB"');
  });

  it("quotes values containing line breaks", () => {
    expect(escapeCsvField("a\nb")).toBe('"a\nb"');
    expect(escapeCsvField("a\rb")).toBe('"a\rb"');
  });

  it("doubles embedded quotes", () => {
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
  });
});

describe("toCsv", () => {
  it("joins header and rows with a trailing newline", () => {
    expect(toCsv(["a", "b"], [["1", "2"], ["3", "4,5"]])).toBe('a,b\n1,2\n3,"4,5"\n');
  });
});
