/**
 * XLSX report writer.
 *
 * Maps a sheet layout onto an ExcelJS worksheet: bold bordered header,
 * shaded alternate rows, thousands-separated counts and a rich-text name
 * cell with the name in bold.
 */

import ExcelJS from "exceljs";
import type { Border, Cell, Workbook } from "exceljs";
import type { ReportSet } from "../types";
import { layoutReport, type DisplayCell, type SheetLayout } from "./layout";

const MAX_SHEET_NAME = 31;
const NAME_FONT = "MS Gothic";
const SHADE_ARGB = "FFF0F0F0";
const COUNT_FORMAT = "#,##0";

export interface ReportWriter {
  write(report: ReportSet, path: string): Promise<void>;
}

/** Excel rejects these characters, leading/trailing quotes and long names. */
export function safeSheetName(name: string): string {
  const cleaned = name.replace(/[\\/*?:[\]]/g, "_").replace(/^'+|'+$/g, "");
  return [...cleaned].slice(0, MAX_SHEET_NAME).join("") || "Sheet1";
}

const thin: Partial<Border> = { style: "thin" };

function applyCell(cell: Cell, value: DisplayCell, shaded: boolean): void {
  switch (value.type) {
    case "text":
      cell.value = value.value;
      break;
    case "count":
      cell.value = value.value;
      cell.numFmt = COUNT_FORMAT;
      cell.alignment = { horizontal: "right" };
      break;
    case "rich":
      cell.value = {
        richText: value.segments.map((s) => ({
          text: s.text,
          font: { name: NAME_FONT, bold: s.style === "bold" },
        })),
      };
      break;
  }
  if (shaded) {
    cell.fill = { type: "pattern", pattern: "solid", fgColor: { argb: SHADE_ARGB } };
  }
}

export function buildWorkbook(layout: SheetLayout): Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(safeSheetName(layout.sheetName));

  layout.columns.forEach((column, c) => {
    const cell = sheet.getCell(1, c + 1);
    cell.value = column.name;
    cell.font = { bold: true };
    cell.alignment = { horizontal: "center", vertical: "middle" };
    cell.border = { top: thin, left: thin, bottom: thin, right: thin };
    sheet.getColumn(c + 1).width = column.width;
  });

  layout.rows.forEach((row, r) => {
    row.cells.forEach((value, c) => {
      applyCell(sheet.getCell(r + 2, c + 1), value, row.shaded);
    });
  });

  return workbook;
}

export const xlsxWriter: ReportWriter = {
  async write(report, path) {
    await buildWorkbook(layoutReport(report)).xlsx.writeFile(path);
  },
};
