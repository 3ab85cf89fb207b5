/**
 * Report segmentation.
 *
 * The full list is always produced. Winner and loser lists exist only for
 * proportional-representation vote-ranking results, recognized by their
 * headline. Every report gets its own copy of the rows.
 */

import {
  LOSER_SHEET,
  LOSER_SUFFIX,
  PARTY_CODE,
  PR_RANKING_MARKER,
  STATUS_MARK,
  WINNER_DROPPED_COLUMNS,
  WINNER_SHEET,
  WINNER_SUFFIX,
} from "./labels";
import type { CellValue, RecordSet, ReportSet } from "./types";

export interface SegmentOptions {
  loserColumns: readonly string[];
}

// ---------- Record set helpers ----------

function columnIndex(records: RecordSet, name: string): number {
  return records.columns.findIndex((c) => c.name === name);
}

/** Trimmed text of a named column; a missing column reads as blank. */
export function textAt(records: RecordSet, row: CellValue[], name: string): string {
  const i = columnIndex(records, name);
  if (i < 0 || i >= row.length) return "";
  return String(row[i]).trim();
}

export function filterRows(
  records: RecordSet,
  predicate: (row: CellValue[]) => boolean,
): RecordSet {
  return {
    columns: records.columns.map((c) => ({ ...c })),
    rows: records.rows.filter(predicate).map((row) => [...row]),
  };
}

/** Keep the named columns, in the order given, skipping names not present. */
export function selectColumns(records: RecordSet, names: readonly string[]): RecordSet {
  const indexes = names
    .map((name) => columnIndex(records, name))
    .filter((i) => i >= 0);
  return {
    columns: indexes.map((i) => ({ ...records.columns[i] })),
    rows: records.rows.map((row) => indexes.map((i) => row[i])),
  };
}

export function dropColumns(records: RecordSet, names: readonly string[]): RecordSet {
  const drop = new Set(names);
  const keep = records.columns
    .map((c, i) => (drop.has(c.name) ? -1 : i))
    .filter((i) => i >= 0);
  return {
    columns: keep.map((i) => ({ ...records.columns[i] })),
    rows: records.rows.map((row) => keep.map((i) => row[i])),
  };
}

// ---------- Predicates ----------

export function isWinner(records: RecordSet, row: CellValue[]): boolean {
  return textAt(records, row, STATUS_MARK) !== "";
}

/** Defeated party candidates; unaffiliated losers are left out. */
export function isPartyLoser(records: RecordSet, row: CellValue[]): boolean {
  return (
    textAt(records, row, STATUS_MARK) === "" &&
    textAt(records, row, PARTY_CODE) !== ""
  );
}

export function hasRankingReports(headline: string): boolean {
  return headline.includes(PR_RANKING_MARKER);
}

// ---------- Segmentation ----------

export function segmentReports(
  records: RecordSet,
  headline: string,
  options: SegmentOptions,
): ReportSet[] {
  const reports: ReportSet[] = [
    {
      kind: "full",
      suffix: "",
      sheetName: headline,
      combineIdentity: true,
      records: filterRows(records, () => true),
    },
  ];

  if (!hasRankingReports(headline)) return reports;

  const winners = filterRows(records, (row) => isWinner(records, row));
  reports.push({
    kind: "winners",
    suffix: WINNER_SUFFIX,
    sheetName: WINNER_SHEET,
    combineIdentity: true,
    records: dropColumns(winners, WINNER_DROPPED_COLUMNS),
  });

  const losers = filterRows(records, (row) => isPartyLoser(records, row));
  reports.push({
    kind: "losers",
    suffix: LOSER_SUFFIX,
    sheetName: LOSER_SHEET,
    combineIdentity: false,
    records: selectColumns(losers, options.loserColumns),
  });

  return reports;
}
