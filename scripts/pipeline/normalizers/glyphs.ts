/**
 * Full-width to half-width glyph normalizer.
 *
 * - Maps the full-width comma, period and ideographic space
 * - Maps full-width digits 0-9
 * - Passes every other character through unchanged
 */

import type { GlyphTable } from "../types";

function buildTable(): GlyphTable {
  const table = new Map<string, string>([
    ["，", ","],
    ["．", "."],
    ["　", " "],
  ]);
  for (let d = 0; d <= 9; d++) {
    table.set(String.fromCharCode(0xff10 + d), String(d));
  }
  return table;
}

export const FULLWIDTH_TO_HALFWIDTH: GlyphTable = buildTable();

export function normalizeGlyphs(
  text: string,
  table: GlyphTable = FULLWIDTH_TO_HALFWIDTH,
): string {
  let out = "";
  for (const ch of text) {
    out += table.get(ch) ?? ch;
  }
  return out;
}
