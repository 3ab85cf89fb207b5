/**
 * Renderer-neutral sheet layout.
 *
 * Turns a report into display columns and cells: identity columns folded
 * into a styled name cell, counts kept numeric, stripes and column widths
 * decided here so the spreadsheet writer only maps them onto its API.
 */

import { IDENTITY_COLUMNS, NAME, PARTY_NAME, STATUS } from "../labels";
import { formatNameForDisplay } from "../normalize-name";
import { textAt } from "../segment";
import type { CellValue, ColumnKind, RecordSet, ReportSet } from "../types";
import { displayWidth } from "./display-width";

export type SegmentStyle = "bold" | "normal";

export interface TextSegment {
  text: string;
  style: SegmentStyle;
}

export type DisplayCell =
  | { type: "text"; value: string }
  | { type: "count"; value: number }
  | { type: "rich"; segments: TextSegment[] };

export interface DisplayColumn {
  name: string;
  kind: ColumnKind;
  width: number;
}

export interface DisplayRow {
  shaded: boolean;
  cells: DisplayCell[];
}

export interface SheetLayout {
  sheetName: string;
  columns: DisplayColumn[];
  rows: DisplayRow[];
}

/** Padding added to the widest cell of each column. */
export const WIDTH_PADDING = 3;

export function identitySegments(
  records: RecordSet,
  row: CellValue[],
): TextSegment[] {
  const segments: TextSegment[] = [
    { text: formatNameForDisplay(textAt(records, row, NAME)), style: "bold" },
  ];
  for (const name of [PARTY_NAME, STATUS]) {
    const value = textAt(records, row, name);
    if (value) segments.push({ text: ` ${value}`, style: "normal" });
  }
  return segments;
}

export function cellText(cell: DisplayCell): string {
  switch (cell.type) {
    case "text":
      return cell.value;
    case "count":
      return String(cell.value);
    case "rich":
      return cell.segments.map((s) => s.text).join("");
  }
}

function toDisplayCell(value: CellValue | undefined, kind: ColumnKind): DisplayCell {
  if (kind === "count" && typeof value === "number") {
    return { type: "count", value };
  }
  return { type: "text", value: value === undefined ? "" : String(value) };
}

export function layoutReport(report: ReportSet): SheetLayout {
  const { records, combineIdentity } = report;
  const hidden = new Set(combineIdentity ? IDENTITY_COLUMNS : []);

  const visible = records.columns
    .map((column, index) => ({ column, index }))
    .filter(({ column }) => !hidden.has(column.name));

  const rows: DisplayRow[] = records.rows.map((row, rowIndex): DisplayRow => ({
    shaded: rowIndex % 2 === 1,
    cells: visible.map(({ column, index }): DisplayCell =>
      combineIdentity && column.name === NAME
        ? { type: "rich", segments: identitySegments(records, row) }
        : toDisplayCell(row[index], column.kind),
    ),
  }));

  const columns: DisplayColumn[] = visible.map(({ column }, i) => {
    let widest = displayWidth(column.name);
    for (const row of rows) {
      widest = Math.max(widest, displayWidth(cellText(row.cells[i])));
    }
    return { name: column.name, kind: column.kind, width: widest + WIDTH_PADDING };
  });

  return { sheetName: report.sheetName, columns, rows };
}
