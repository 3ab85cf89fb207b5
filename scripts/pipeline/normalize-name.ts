/**
 * Candidate name formatting for display.
 *
 * Pads two- to four-character names with ideographic spaces so that family
 * and given names line up in a column of mostly Japanese names.
 */

const WIDE_SPACE = "　";

export function formatNameForDisplay(name: string): string {
  const chars = [...name.trim().replace(/[　 ]/g, "")];

  switch (chars.length) {
    case 2:
      // Family and given name of one character each
      return `${chars[0]}${WIDE_SPACE.repeat(3)}${chars[1]}`;
    case 3:
      return `${chars.slice(0, 2).join("")}${WIDE_SPACE.repeat(2)}${chars.slice(2).join("")}`;
    case 4:
      return `${chars.slice(0, 2).join("")}${WIDE_SPACE}${chars.slice(2).join("")}`;
    default:
      return chars.join("");
  }
}
