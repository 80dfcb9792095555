"use strict";

interface MeasureResult<T> {
  elapsedNs: number;
  elapsedMs: number;
  result: T;
}

async function measureRun<T>(fn: () => Promise<T>): Promise<MeasureResult<T>> {
  const start = process.hrtime.bigint();
  const result = await fn();
  const end = process.hrtime.bigint();

  const elapsedNs = Number(end - start);
  return { elapsedNs, elapsedMs: elapsedNs / 1e6, result };
}

function sorted(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/** Nearest-rank percentile, `q` in (0, 1]. Empty input gives 0. */
function percentile(values: readonly number[], q: number): number {
  if (values.length === 0) return 0;
  const s = sorted(values);
  return s[Math.min(s.length, Math.max(1, Math.ceil(q * s.length))) - 1];
}

function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const s = sorted(values);
  const mid = s.length >> 1;
  return s.length % 2 === 1 ? s[mid] : (s[mid - 1] + s[mid]) / 2;
}

function p95(values: readonly number[]): number {
  return percentile(values, 0.95);
}

interface RunSummary {
  runs: number;
  totalMs: number;
  medianMs: number;
  p95Ms: number;
  bytesWritten: number;
}

function summarizeRuns(runs: { elapsedMs: number; bytes: number }[]): RunSummary {
  const elapsedMs = runs.map((r) => r.elapsedMs);
  return {
    runs: runs.length,
    totalMs: elapsedMs.reduce((s, ms) => s + ms, 0),
    medianMs: median(elapsedMs),
    p95Ms: p95(elapsedMs),
    bytesWritten: runs.reduce((s, r) => s + r.bytes, 0),
  };
}

export type { MeasureResult, RunSummary };
export { measureRun, percentile, median, p95, summarizeRuns };
