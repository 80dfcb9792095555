"use strict";

import type { RunSummary } from "../lib/metrics";

interface GeneratedTable {
  name: string;
  rows: number;
  columns: number;
  fillingIsSentences: boolean;
  bytes: number;
  elapsedMs: number;
}

interface VerifiedTable {
  name: string;
  ok: boolean;
  error?: string;
}

function formatResult(r: GeneratedTable): Record<string, string | number> {
  return {
    name: r.name,
    rows: r.rows,
    columns: r.columns,
    filling: r.fillingIsSentences ? "sentences" : "timestamps",
    "size (KB)": (r.bytes / 1024).toFixed(1),
    "time (ms)": r.elapsedMs.toFixed(1),
  };
}

function printBlock(title: string): void {
  console.log("\n" + "=".repeat(60));
  console.log(title);
  console.log("=".repeat(60));
}

function printGenerationReport(results: GeneratedTable[], summary: RunSummary): void {
  printBlock("Table Dataset Report");
  console.table(results.map(formatResult));
  console.log(
    `Pairs: ${summary.runs}, total ${(summary.totalMs / 1000).toFixed(2)} s, ` +
      `median ${summary.medianMs.toFixed(1)} ms, p95 ${summary.p95Ms.toFixed(1)} ms, ` +
      `${(summary.bytesWritten / 1024 / 1024).toFixed(2)} MB written`
  );
}

function printVerificationReport(results: VerifiedTable[]): void {
  printBlock("Table Dataset Verification");
  const failed = results.filter((r) => !r.ok);
  console.log(`Checked: ${results.length}, passed: ${results.length - failed.length}, failed: ${failed.length}`);
  if (failed.length) {
    console.table(failed.map((r) => ({ name: r.name, error: r.error ?? "-" })));
  }
}

export { formatResult, printGenerationReport, printVerificationReport };
