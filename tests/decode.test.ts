import { describe, test, expect } from "vitest";
import iconv from "iconv-lite";
import { ENCODING_PRESETS } from "../scripts/pipeline/config";
import { decodeWith, resolveEncoding } from "../scripts/pipeline/decode";
import { DEFAULT_VOCABULARY } from "../scripts/pipeline/labels";
import { PR_HEADLINE, SAMPLE_BODY, feed } from "./helpers";

const UTF8_FIRST = ENCODING_PRESETS["utf8-first"];
const LEGACY_FIRST = ENCODING_PRESETS["legacy-first"];
const doc = feed(PR_HEADLINE, SAMPLE_BODY);

describe("resolveEncoding", () => {
  test("accepts UTF-8 on the first try", () => {
    const result = resolveEncoding(Buffer.from(doc, "utf8"), UTF8_FIRST, DEFAULT_VOCABULARY);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.encoding).toBe("utf-8");
    expect(result.value.text).toBe(doc);
  });

  test("accepts Shift_JIS when legacy encodings come first", () => {
    const bytes = iconv.encode(doc, "shift_jis");
    const result = resolveEncoding(bytes, LEGACY_FIRST, DEFAULT_VOCABULARY);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.encoding).toBe("shift_jis");
    expect(result.value.text).toContain("比例代表候補者得票順");
  });

  // The two orders disagree: tags are ASCII, so Shift_JIS bytes also pass
  // the tag check when decoded as UTF-8, with the Japanese text lost.
  test("utf8-first accepts Shift_JIS bytes as garbled UTF-8", () => {
    const bytes = iconv.encode(doc, "shift_jis");
    const result = resolveEncoding(bytes, UTF8_FIRST, DEFAULT_VOCABULARY);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.encoding).toBe("utf-8");
    expect(result.value.text).not.toContain("比例代表");
  });

  test("falls through to UTF-16 when single-byte decodings show no tags", () => {
    const bytes = Buffer.concat([
      Buffer.from([0xff, 0xfe]),
      Buffer.from(doc, "utf16le"),
    ]);
    const result = resolveEncoding(bytes, UTF8_FIRST, DEFAULT_VOCABULARY);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.encoding).toBe("utf-16");
    expect(result.value.text).toContain(PR_HEADLINE);
  });

  test("needs both a headline tag and a body tag", () => {
    const headlineOnly = Buffer.from("<HeadLine>h</HeadLine>", "utf8");
    const result = resolveEncoding(headlineOnly, UTF8_FIRST, DEFAULT_VOCABULARY);
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.kind).toBe("EncodingUnresolved");
  });

  test("an empty encoding list never resolves", () => {
    const result = resolveEncoding(Buffer.from(doc, "utf8"), [], DEFAULT_VOCABULARY);
    expect(!result.ok && result.error.kind).toBe("EncodingUnresolved");
  });
});

describe("decodeWith", () => {
  test("substitutes undecodable bytes instead of failing", () => {
    const text = decodeWith(Uint8Array.from([0x61, 0xff, 0x62]), "utf-8");
    expect(text).toBe("a\uFFFDb");
  });
});
