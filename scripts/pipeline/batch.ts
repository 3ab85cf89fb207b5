/**
 * Batch driver: every `.xml` feed in a directory, one document at a time.
 *
 * A document that cannot be read or fails any stage is reported and
 * skipped; only environment failures on the output side (unwritable
 * directory, full disk) stop the run.
 */

import { readFileSync, readdirSync, statSync, type Dirent } from "fs";
import { basename, join } from "path";
import { analyzeDocument } from "./analyze";
import { errorMessage, isEnvironmentFailure } from "./errors";
import { reportPath } from "./output-paths";
import { xlsxWriter, type ReportWriter } from "./render/xlsx";
import type { PipelineError, PipelineOptions } from "./types";

export type Log = Pick<Console, "log" | "warn" | "error">;

export interface BatchDeps {
  log: Log;
  writer: ReportWriter;
}

export const defaultDeps: BatchDeps = { log: console, writer: xlsxWriter };

export type FileOutcome =
  | { file: string; ok: true; encoding: string; headline: string; written: string[] }
  | { file: string; ok: false; error: PipelineError; written: string[] };

export interface BatchSummary {
  processed: FileOutcome[];
  skipped: FileOutcome[];
}

/** Symlinks count when they resolve to a file; dangling ones are kept so the read reports them. */
function isDocumentEntry(dir: string, entry: Dirent): boolean {
  if (!entry.name.toLowerCase().endsWith(".xml")) return false;
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  const target = statSync(join(dir, entry.name), { throwIfNoEntry: false });
  return target === undefined || target.isFile();
}

/** Files ending in `.xml` (any case), sorted by name. */
export function findDocuments(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => isDocumentEntry(dir, entry))
    .map((entry) => join(dir, entry.name))
    .sort();
}

export async function processFile(
  file: string,
  options: PipelineOptions,
  deps: BatchDeps = defaultDeps,
): Promise<FileOutcome> {
  const { log, writer } = deps;
  log.log(`\n--- ${file} ---`);

  let bytes: Buffer;
  try {
    bytes = readFileSync(file);
  } catch (e) {
    const error: PipelineError = { kind: "ReadFailure", message: errorMessage(e) };
    log.warn(`  skipped [${error.kind}]: ${error.message}`);
    return { file, ok: false, error, written: [] };
  }

  const result = analyzeDocument(bytes, options);
  if (!result.ok) {
    log.warn(`  skipped [${result.error.kind}]: ${result.error.message}`);
    return { file, ok: false, error: result.error, written: [] };
  }
  log.log(`  read as ${result.encoding}: ${result.records.rows.length} candidates`);

  const written: string[] = [];
  for (const report of result.reports) {
    const path = reportPath(file, result.headline, report.suffix);
    try {
      await writer.write(report, path);
    } catch (e) {
      if (isEnvironmentFailure(e)) throw e;
      const error: PipelineError = { kind: "RenderFailure", message: errorMessage(e) };
      log.error(`  failed to write ${basename(path)}: ${error.message}`);
      return { file, ok: false, error, written };
    }
    written.push(path);
    log.log(`  ✓ ${basename(path)} (${report.records.rows.length} rows)`);
  }

  return {
    file,
    ok: true,
    encoding: result.encoding,
    headline: result.headline,
    written,
  };
}

export async function runBatch(
  dir: string,
  options: PipelineOptions,
  deps: BatchDeps = defaultDeps,
): Promise<BatchSummary> {
  const summary: BatchSummary = { processed: [], skipped: [] };

  for (const file of findDocuments(dir)) {
    const outcome = await processFile(file, options, deps);
    if (outcome.ok) summary.processed.push(outcome);
    else summary.skipped.push(outcome);
  }

  return summary;
}

export function printSummary(summary: BatchSummary, elapsedMs: number, log: Log): void {
  log.log(`\n${"=".repeat(60)}`);
  log.log(`  Done in ${(elapsedMs / 1000).toFixed(1)}s`);
  log.log(`  Processed: ${summary.processed.length} documents`);
  log.log(`  Skipped:   ${summary.skipped.length} documents`);
  log.log(`${"=".repeat(60)}`);

  if (summary.skipped.length === 0) return;
  log.error(`\n\x1b[1m\x1b[31m  SKIPPED (${summary.skipped.length}):\x1b[0m`);
  for (const s of summary.skipped) {
    if (s.ok) continue;
    log.error(`    \x1b[31m✗\x1b[0m ${basename(s.file)} [${s.error.kind}]: ${s.error.message}`);
  }
}
