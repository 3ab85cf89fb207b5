/**
 * Encoding resolution.
 *
 * Feeds arrive as UTF-8, Shift_JIS/CP932 or UTF-16 without any declaration
 * we can trust. Each configured encoding is tried in order; decoding never
 * fails (bad sequences become U+FFFD), so a candidate is only accepted once
 * its text shows both a headline tag and a body tag.
 */

import iconv from "iconv-lite";
import { fail, ok } from "./errors";
import type { StageResult, TagVocabulary } from "./types";

export interface DecodedText {
  encoding: string;
  text: string;
}

export function decodeWith(bytes: Uint8Array, encoding: string): string {
  const buffer = Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes);
  return iconv.decode(buffer, encoding);
}

function hasOpeningTag(text: string, names: readonly string[]): boolean {
  return names.some((name) => text.includes(`<${name}>`));
}

export function resolveEncoding(
  bytes: Uint8Array,
  encodings: readonly string[],
  vocabulary: TagVocabulary,
): StageResult<DecodedText> {
  for (const encoding of encodings) {
    const text = decodeWith(bytes, encoding);
    if (
      hasOpeningTag(text, vocabulary.headline) &&
      hasOpeningTag(text, vocabulary.body)
    ) {
      return ok({ encoding, text });
    }
  }
  return fail(
    "EncodingUnresolved",
    `no headline and data tags found after trying ${encodings.join(", ")}`,
  );
}
