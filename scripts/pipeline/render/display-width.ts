/**
 * Display width of text in a CJK spreadsheet font: Fullwidth, Wide and
 * Ambiguous characters take two columns, everything else one.
 */

import { eastAsianWidth } from "get-east-asian-width";

export function displayWidth(text: string): number {
  let width = 0;
  for (const ch of text) {
    const codePoint = ch.codePointAt(0);
    if (codePoint === undefined) continue;
    width += eastAsianWidth(codePoint, { ambiguousAsWide: true });
  }
  return width;
}
