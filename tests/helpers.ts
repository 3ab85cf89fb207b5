/**
 * Shared fixtures for pipeline tests.
 */

import type { Log } from "../scripts/pipeline/batch";

export const HEADER =
  "順位,政党コード／人物番号,政党名／候補者名,当落マーク,党派コード,党派名,身分,合 計";

export const PR_HEADLINE = "令和7年 比例代表候補者得票順 全国/速報";

/** Body used throughout: two candidates and a party subtotal row. */
export const SAMPLE_BODY = [
  "順位,,政党名／候補者名,当落マーク,党派コード,党派名,身分,合 計",
  "1,00012345,山田太郎,当,01,テスト党,現,1,234",
  "2,00067890,佐藤花子,,01,テスト党,新,500",
  ",,テスト党 合計,,01,テスト党,,1734",
].join("\n");

export function feed(
  headline: string,
  body: string,
  tags: { headline?: string; body?: string } = {},
): string {
  const h = tags.headline ?? "InHeadLine";
  const b = tags.body ?? "CsvData";
  return [
    `<?xml version="1.0"?>`,
    `<Delivery>`,
    `<${h}>${headline}</${h}>`,
    `<${b}>`,
    body,
    `</${b}>`,
    `</Delivery>`,
  ].join("\n");
}

export function recordingLog(): { log: Log; lines: string[] } {
  const lines: string[] = [];
  const push = (...args: unknown[]) => {
    lines.push(args.map(String).join(" "));
  };
  return { log: { log: push, warn: push, error: push }, lines };
}
