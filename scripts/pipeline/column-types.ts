/**
 * Column typing for classified candidate rows.
 *
 * Everything that is not a known text column holds a vote count. Counts
 * degrade to zero instead of failing the document.
 */

import { RANK, TEXT_COLUMNS } from "./labels";
import type { CellValue, ColumnKind, HeaderRow, RecordSet, Row } from "./types";

export function columnKind(name: string): ColumnKind {
  if (name === RANK) return "count";
  return TEXT_COLUMNS.has(name) ? "text" : "count";
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Parse a count, dropping thousands separators. Blank or garbage is 0. */
export function parseCount(value: string): number {
  const cleaned = value.trim().replace(/,/g, "");
  if (!DECIMAL.test(cleaned)) return 0;
  const n = Number(cleaned);
  if (!Number.isFinite(n)) return 0;
  return Math.trunc(n);
}

/**
 * Fit a row to the header width. Short rows are padded with blanks; surplus
 * fields are joined back into the last column, which is where an unquoted
 * "1,234" total ends up split.
 */
export function alignRow(row: Row, width: number): Row {
  if (width === 0) return [];
  if (row.length <= width) {
    return [...row, ...new Array<string>(width - row.length).fill("")];
  }
  const head = row.slice(0, width - 1);
  const tail = row.slice(width - 1).join(",");
  return [...head, tail];
}

export function typeColumns(header: HeaderRow, rows: Row[]): RecordSet {
  const columns = header.names.map((name) => ({ name, kind: columnKind(name) }));
  const typed = rows.map((row) =>
    alignRow(row, columns.length).map(
      (value, i): CellValue =>
        columns[i].kind === "count" ? parseCount(value) : value,
    ),
  );
  return { columns, rows: typed };
}
