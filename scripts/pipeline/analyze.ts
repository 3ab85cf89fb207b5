/**
 * Single-document pipeline: bytes in, typed record set and report views out.
 *
 * Pure apart from decoding; nothing here touches the filesystem.
 */

import { classifyRows } from "./classify-rows";
import { typeColumns } from "./column-types";
import { resolveEncoding } from "./decode";
import { extractContent } from "./extract-tags";
import { normalizeGlyphs } from "./normalizers/glyphs";
import { segmentReports } from "./segment";
import type { DocumentResult, PipelineOptions } from "./types";

export function analyzeDocument(
  bytes: Uint8Array,
  options: PipelineOptions,
): DocumentResult {
  const decoded = resolveEncoding(bytes, options.encodings, options.vocabulary);
  if (!decoded.ok) return decoded;

  const content = extractContent(decoded.value.text, options.vocabulary);
  if (!content.ok) return content;

  const { headline } = content.value;
  const body = normalizeGlyphs(content.value.body, options.glyphs);

  const classified = classifyRows(body);
  if (!classified.ok) return classified;

  const records = typeColumns(classified.value.header, classified.value.candidates);
  const reports = segmentReports(records, headline, {
    loserColumns: options.loserColumns,
  });

  return {
    ok: true,
    encoding: decoded.value.encoding,
    headline,
    records,
    reports,
  };
}
