/**
 * Tag-delimited content extraction.
 *
 * The feed is never parsed as XML: partial or malformed markup is common,
 * so content is pulled out with literal tag patterns.
 */

import { fail, ok } from "./errors";
import type { ExtractedContent, StageResult, TagVocabulary } from "./types";

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Content of the first tag in `names` that matches, trimmed. */
export function matchFirstTag(
  text: string,
  names: readonly string[],
): string | null {
  for (const name of names) {
    const tag = escapeRegExp(name);
    const match = new RegExp(`<${tag}>([\\s\\S]*?)</${tag}>`).exec(text);
    if (match) return match[1].trim();
  }
  return null;
}

/** Drop everything from the first opening or closing terminator tag onward. */
export function stripTerminator(body: string, terminator: string): string {
  const tag = escapeRegExp(terminator);
  return body.replace(new RegExp(`</?${tag}>[\\s\\S]*`), "");
}

export function extractContent(
  text: string,
  vocabulary: TagVocabulary,
): StageResult<ExtractedContent> {
  const headline = matchFirstTag(text, vocabulary.headline);
  if (!headline) {
    return fail(
      "TagNotFound",
      `headline not found (tried ${vocabulary.headline.join(", ")})`,
    );
  }

  const rawBody = matchFirstTag(text, vocabulary.body);
  const body =
    rawBody === null ? "" : stripTerminator(rawBody, vocabulary.bodyTerminator);
  if (!body.trim()) {
    return fail(
      "TagNotFound",
      `data body not found (tried ${vocabulary.body.join(", ")})`,
    );
  }

  return ok({ headline, body });
}
