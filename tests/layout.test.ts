import { describe, test, expect } from "vitest";
import { buildHeader } from "../scripts/pipeline/classify-rows";
import { LOSER_COLUMN_PRESETS } from "../scripts/pipeline/config";
import { typeColumns } from "../scripts/pipeline/column-types";
import { displayWidth } from "../scripts/pipeline/render/display-width";
import { cellText, layoutReport } from "../scripts/pipeline/render/layout";
import { segmentReports } from "../scripts/pipeline/segment";
import type { ReportSet } from "../scripts/pipeline/types";
import { HEADER, PR_HEADLINE } from "./helpers";

const records = typeColumns(buildHeader(HEADER.split(",")), [
  ["1", "00012345", "山田太郎", "当", "01", "テスト党", "現", "1234"],
  ["2", "00067890", "佐藤花子", "", "01", "テスト党", "新", "500"],
]);

function reportOf(kind: ReportSet["kind"], loserColumns = LOSER_COLUMN_PRESETS.minimal): ReportSet {
  const found = segmentReports(records, PR_HEADLINE, { loserColumns }).find(
    (r) => r.kind === kind,
  );
  if (!found) throw new Error(`no ${kind} report`);
  return found;
}

describe("displayWidth", () => {
  test("narrow characters count one", () => {
    expect(displayWidth("abc")).toBe(3);
    expect(displayWidth("1,234")).toBe(5);
    expect(displayWidth("ｱｲ")).toBe(2);
  });

  test("wide and full-width characters count two", () => {
    expect(displayWidth("順位")).toBe(4);
    expect(displayWidth("／　")).toBe(4);
  });
});

describe("layoutReport", () => {
  test("combined identity hides party and status columns", () => {
    const layout = layoutReport(reportOf("full"));
    expect(layout.columns.map((c) => c.name)).toEqual([
      "順位", "政党コード／人物番号", "政党名／候補者名", "当落マーク", "党派コード", "合 計",
    ]);
  });

  test("the name cell becomes bold name plus party and status", () => {
    const layout = layoutReport(reportOf("full"));
    expect(layout.rows[0].cells[2]).toEqual({
      type: "rich",
      segments: [
        { text: "山田　太郎", style: "bold" },
        { text: " テスト党", style: "normal" },
        { text: " 現", style: "normal" },
      ],
    });
  });

  test("blank party and status are left out of the name cell", () => {
    const independent = typeColumns(buildHeader(HEADER.split(",")), [
      ["3", "00011111", "鈴木一郎", "", "", "", "", "300"],
    ]);
    const layout = layoutReport({
      kind: "full",
      suffix: "",
      sheetName: "s",
      combineIdentity: true,
      records: independent,
    });
    expect(layout.rows[0].cells[2]).toEqual({
      type: "rich",
      segments: [{ text: "鈴木　一郎", style: "bold" }],
    });
  });

  test("counts stay numeric and text stays text", () => {
    const layout = layoutReport(reportOf("full"));
    expect(layout.rows[1].cells[0]).toEqual({ type: "count", value: 2 });
    expect(layout.rows[1].cells[1]).toEqual({ type: "text", value: "00067890" });
    expect(layout.rows[1].cells[5]).toEqual({ type: "count", value: 500 });
  });

  test("alternate rows are shaded", () => {
    const layout = layoutReport(reportOf("full"));
    expect(layout.rows.map((r) => r.shaded)).toEqual([false, true]);
  });

  test("losers keep the plain name", () => {
    const layout = layoutReport(reportOf("losers"));
    expect(layout.sheetName).toBe("落選者リスト");
    expect(layout.rows[0].cells).toEqual([
      { type: "count", value: 2 },
      { type: "text", value: "佐藤花子" },
      { type: "count", value: 500 },
    ]);
  });

  test("extended losers show party and status in their own columns", () => {
    const layout = layoutReport(reportOf("losers", LOSER_COLUMN_PRESETS.extended));
    expect(layout.columns.map((c) => c.name)).toEqual([
      "順位", "政党名／候補者名", "党派名", "身分", "合 計",
    ]);
  });

  test("widths fit the widest header or rendered cell plus padding", () => {
    const layout = layoutReport(reportOf("full"));
    expect(layout.columns.map((c) => c.width)).toEqual([7, 23, 25, 13, 13, 8]);
  });

  test("cellText flattens every cell type", () => {
    expect(cellText({ type: "count", value: 1234 })).toBe("1234");
    expect(
      cellText({
        type: "rich",
        segments: [
          { text: "a", style: "bold" },
          { text: " b", style: "normal" },
        ],
      }),
    ).toBe("a b");
  });
});
