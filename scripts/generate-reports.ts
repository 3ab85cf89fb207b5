/**
 * Generate XLSX reports from every vote-ranking feed in a directory.
 *
 * For each `.xml` feed writes the full candidate list and, for
 * proportional-representation vote-ranking results, winner and loser
 * lists beside it. Skipped documents do not change the exit status.
 *
 * Usage:
 *   tsx scripts/generate-reports.ts [input-dir]
 */

import { existsSync } from "fs";
import { resolve } from "path";
import { defaultDeps, printSummary, runBatch } from "./pipeline/batch";
import { loadConfig } from "./pipeline/config";

async function main() {
  const config = loadConfig(process.argv.slice(2));
  const inputDir = resolve(config.inputDir);

  if (!existsSync(inputDir)) {
    console.error(`Input directory not found: ${inputDir}`);
    process.exitCode = 1;
    return;
  }

  console.log(`Scanning ${inputDir}`);
  console.log(`  encodings: ${config.options.encodings.join(", ")}`);

  const startTime = Date.now();
  const summary = await runBatch(inputDir, config.options, defaultDeps);
  printSummary(summary, Date.now() - startTime, console);
}

main().catch((e: unknown) => {
  console.error(e instanceof Error ? (e.stack ?? e.message) : String(e));
  process.exitCode = 1;
});
