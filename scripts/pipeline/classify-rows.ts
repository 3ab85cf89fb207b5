/**
 * Header detection and candidate row classification.
 *
 * Result bodies mix candidate rows with party subtotal rows and blank
 * lines. Only candidate rows carry a person code of four or more digits in
 * the second column; that is the discriminator used here.
 */

import { parseCsv } from "./csv";
import { fail, ok } from "./errors";
import { CODE_POSITION, NAME, RANK } from "./labels";
import type { ClassifiedRows, HeaderRow, Row, StageResult } from "./types";

const PERSON_CODE_RX = /^[0-9]{4,}/;

export function buildHeader(row: Row): HeaderRow {
  const names = row.map((name) => name.trim());
  const index = new Map<string, number>();
  names.forEach((name, i) => {
    if (!index.has(name)) index.set(name, i);
  });
  return { names, index };
}

/** Position of the first row whose first field is the rank label, or -1. */
export function findHeaderRow(rows: Row[]): number {
  return rows.findIndex((row) => row.length > 0 && row[0].trim() === RANK);
}

export function isCandidateRow(row: Row, nameIndex: number): boolean {
  if (row.length <= nameIndex || row.length <= CODE_POSITION) return false;
  if (row[nameIndex].trim() === "") return false;
  return PERSON_CODE_RX.test(row[CODE_POSITION].trim());
}

export function classifyRows(body: string): StageResult<ClassifiedRows> {
  const rows = parseCsv(body);

  const headerAt = findHeaderRow(rows);
  if (headerAt < 0) {
    return fail("HeaderNotFound", `no header row starting with "${RANK}"`);
  }
  const header = buildHeader(rows[headerAt]);

  const nameIndex = header.index.get(NAME);
  if (nameIndex === undefined) {
    return fail("HeaderNotFound", `header row has no "${NAME}" column`);
  }

  const candidates = rows
    .slice(headerAt + 1)
    .filter((row) => isCandidateRow(row, nameIndex));
  if (candidates.length === 0) {
    return fail("NoCandidateData", "no candidate rows after the header");
  }

  return ok({ header, candidates });
}
