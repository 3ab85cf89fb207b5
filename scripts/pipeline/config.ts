/**
 * Run configuration.
 *
 * Usage:
 *   tsx scripts/generate-reports.ts [input-dir]
 *
 * Environment:
 *   ENCODINGS      preset name or comma-separated encoding labels
 *   LOSER_COLUMNS  preset name or comma-separated header names
 */

import iconv from "iconv-lite";
import { DEFAULT_VOCABULARY, NAME, PARTY_NAME, RANK, STATUS, TOTAL } from "./labels";
import { FULLWIDTH_TO_HALFWIDTH } from "./normalizers/glyphs";
import type { PipelineOptions } from "./types";

// Feeds have been seen in both orders; which one wins when several
// encodings decode to tagged text depends on this.
export const ENCODING_PRESETS: Record<string, readonly string[]> = {
  "utf8-first": ["utf-8", "shift_jis", "cp932", "utf-16"],
  "legacy-first": ["shift_jis", "cp932", "utf-8", "utf-16"],
};

export const LOSER_COLUMN_PRESETS: Record<string, readonly string[]> = {
  minimal: [RANK, NAME, TOTAL],
  extended: [RANK, NAME, PARTY_NAME, STATUS, TOTAL],
};

export const DEFAULT_ENCODING_PRESET = "utf8-first";
export const DEFAULT_LOSER_PRESET = "minimal";

export interface RunConfig {
  inputDir: string;
  options: PipelineOptions;
}

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function presetOrList(
  raw: string | undefined,
  presets: Record<string, readonly string[]>,
  fallback: string,
): readonly string[] {
  const value = raw?.trim() || fallback;
  return Object.hasOwn(presets, value) ? presets[value] : splitList(value);
}

export function resolveEncodings(raw: string | undefined): readonly string[] {
  const encodings = presetOrList(raw, ENCODING_PRESETS, DEFAULT_ENCODING_PRESET);
  const unknown = encodings.filter((e) => !iconv.encodingExists(e));
  if (unknown.length > 0) {
    throw new Error(
      `Unknown encoding(s): ${unknown.join(", ")}. ` +
        `Presets: ${Object.keys(ENCODING_PRESETS).join(", ")}`,
    );
  }
  return encodings;
}

export function resolveLoserColumns(raw: string | undefined): readonly string[] {
  const columns = presetOrList(raw, LOSER_COLUMN_PRESETS, DEFAULT_LOSER_PRESET);
  if (columns.length === 0) {
    throw new Error("LOSER_COLUMNS must name at least one column");
  }
  return columns;
}

export function defaultOptions(): PipelineOptions {
  return {
    encodings: ENCODING_PRESETS[DEFAULT_ENCODING_PRESET],
    loserColumns: LOSER_COLUMN_PRESETS[DEFAULT_LOSER_PRESET],
    vocabulary: DEFAULT_VOCABULARY,
    glyphs: FULLWIDTH_TO_HALFWIDTH,
  };
}

export function loadConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  return {
    inputDir: argv[0] || ".",
    options: {
      ...defaultOptions(),
      encodings: resolveEncodings(env.ENCODINGS),
      loserColumns: resolveLoserColumns(env.LOSER_COLUMNS),
    },
  };
}
