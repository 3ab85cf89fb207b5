/**
 * Localized labels found in the result feeds.
 *
 * Header names are matched after glyph normalization, so the total column
 * carries a half-width space.
 */

import type { TagVocabulary } from "./types";

// ---------- Tags ----------

export const DEFAULT_VOCABULARY: TagVocabulary = {
  headline: ["InHeadLine", "HeadLine", "DeliveryHeadline1"],
  body: ["CsvData", "Sentence"],
  bodyTerminator: "InData",
};

// ---------- Header columns ----------

export const RANK = "順位";
export const PERSON_CODE = "政党コード／人物番号";
export const NAME = "政党名／候補者名";
export const STATUS_MARK = "当落マーク";
export const PARTY_CODE = "党派コード";
export const PARTY_NAME = "党派名";
export const STATUS = "身分";
export const CANDIDATE_NAME = "候補者氏名";
export const SPECIAL_LIST = "特定枠";
export const TOTAL = "合 計";

/** Zero-indexed position of the person code used to tell candidates apart from aggregates. */
export const CODE_POSITION = 1;

export const TEXT_COLUMNS: ReadonlySet<string> = new Set([
  PERSON_CODE,
  NAME,
  STATUS_MARK,
  PARTY_CODE,
  PARTY_NAME,
  STATUS,
  CANDIDATE_NAME,
  SPECIAL_LIST,
]);

// ---------- Reports ----------

/** Headline fragment for proportional-representation vote-ranking results. */
export const PR_RANKING_MARKER = "比例代表候補者得票順";

export const WINNER_SUFFIX = "当";
export const LOSER_SUFFIX = "落";
export const WINNER_SHEET = "当選者リスト";
export const LOSER_SHEET = "落選者リスト";

export const WINNER_DROPPED_COLUMNS: readonly string[] = [
  PERSON_CODE,
  STATUS_MARK,
  PARTY_CODE,
];

/** Columns folded into the candidate-name cell when identity is combined. */
export const IDENTITY_COLUMNS: readonly string[] = [PARTY_NAME, STATUS];
