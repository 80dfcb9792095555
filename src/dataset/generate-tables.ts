#!/usr/bin/env node
"use strict";

import path from "path";
import config = require("../config");
import { generateData, getTableTitle } from "../lib/table-data";
import { generateTexCode } from "../lib/latex";
import { LatexCompiler } from "../lib/compiler";
import { writeDataset } from "../lib/dataset-writer";
import { measureRun, summarizeRuns } from "../lib/metrics";
import { printGenerationReport } from "../reporters/console";
import type { PdfCompiler } from "../lib/compiler";
import type { TextSource } from "../lib/text";

interface GenerateOptions {
  dataDir?: string;
  compiler?: PdfCompiler;
  text?: TextSource;
  clock?: () => number;
  sweep?: config.SweepEntry[];
  log?: (line: string) => void;
}

interface GenerateResult {
  name: string;
  pdfPath: string;
  csvPath: string;
  bytes: number;
  rows: number;
  columns: number;
  fillingIsSentences: boolean;
  elapsedMs: number;
}

function getBaseName(entry: config.SweepEntry): string {
  return `${entry.rows}_${entry.columns}_${entry.fillingIsSentences ? "True" : "False"}`;
}

async function generateTable(entry: config.SweepEntry, options: GenerateOptions = {}): Promise<GenerateResult> {
  const dataDir = options.dataDir ?? config.DATA_DIR;
  const compiler = options.compiler ?? new LatexCompiler();
  const name = getBaseName(entry);

  const { result, elapsedMs } = await measureRun(async () => {
    const tableData = generateData(entry.rows, entry.columns, entry.fillingIsSentences, {
      text: options.text,
      clock: options.clock,
    });
    const tableTitle = getTableTitle(entry.columns);
    const texCode = generateTexCode(tableData, tableTitle, { text: options.text });
    const pdf = await compiler.compile(texCode);
    return await writeDataset(path.join(dataDir, name), pdf, tableTitle, tableData);
  });

  return {
    name,
    ...result,
    columns: entry.columns,
    fillingIsSentences: entry.fillingIsSentences,
    elapsedMs,
  };
}

/**
 * Runs the whole sweep one table at a time. The first failure stops the run;
 * pairs written before it stay on disk.
 */
async function generateAllTables(options: GenerateOptions = {}): Promise<GenerateResult[]> {
  const log = options.log ?? console.log;
  const sweep = options.sweep ?? config.getSweep();
  const compiler = options.compiler ?? new LatexCompiler();
  const results: GenerateResult[] = [];
  for (const entry of sweep) {
    const name = getBaseName(entry);
    log(`Generating ${name}...`);
    const result = await generateTable(entry, { ...options, compiler });
    results.push(result);
    log(`  -> ${(result.bytes / 1024).toFixed(1)} KB, ${result.rows} rows, ${result.elapsedMs.toFixed(1)} ms`);
  }
  return results;
}

async function main(): Promise<void> {
  console.log("Generating table datasets into", config.DATA_DIR);
  const results = await generateAllTables();
  printGenerationReport(
    results,
    summarizeRuns(results.map((r) => ({ elapsedMs: r.elapsedMs, bytes: r.bytes })))
  );
  console.log(`\nDone. ${results.length} PDF/CSV pairs ready.`);
}

if (require.main === module) {
  main()
    .then(() => process.exit(0))
    .catch((err) => {
      console.error(err);
      process.exit(1);
    });
}

export type { GenerateOptions, GenerateResult };
export { getBaseName, generateTable, generateAllTables };
