"use strict";

import fs from "fs";
import path from "path";
import { parse } from "csv-parse";
import config = require("../config");
import { getTableTitle } from "../lib/table-data";
import { printVerificationReport } from "../reporters/console";
import { getBaseName } from "./generate-tables";

const PDF_SIGNATURE = "%PDF-";

interface VerifyResult {
  name: string;
  ok: boolean;
  rows: number;
  columns: number;
  error?: string;
}

interface VerifyOptions {
  dataDir?: string;
  sweep?: config.SweepEntry[];
  log?: (line: string) => void;
}

function parseCsv(content: string): Promise<string[][]> {
  return new Promise((resolve, reject) => {
    parse(
      content,
      {
        delimiter: config.CSV_DELIMITER,
        quote: config.CSV_QUOTE_CHAR,
        escape: config.CSV_QUOTE_CHAR,
        relax_column_count: true,
      },
      (err, records: string[][]) => {
        if (err) reject(err);
        else resolve(records);
      }
    );
  });
}

function checkRecords(entry: config.SweepEntry, records: string[][]): string | undefined {
  const [header, ...rows] = records;
  const expectedHeader = getTableTitle(entry.columns);
  if (!header || header.length !== expectedHeader.length || header.some((h, i) => h !== expectedHeader[i])) {
    return `header is ${JSON.stringify(header ?? [])}, expected ${JSON.stringify(expectedHeader)}`;
  }
  if (rows.length !== entry.rows) {
    return `expected ${entry.rows} rows, got ${rows.length}`;
  }
  for (let r = 0; r < rows.length; r++) {
    const row = rows[r];
    if (row.length !== entry.columns) {
      return `row ${r}: expected ${entry.columns} cells, got ${row.length}`;
    }
    for (const cell of row) {
      if (entry.fillingIsSentences ? cell.length === 0 : !/^\d+$/.test(cell)) {
        return `row ${r}: unexpected cell ${JSON.stringify(cell)}`;
      }
    }
  }
  return undefined;
}

function hasPdfSignature(filePath: string): boolean {
  const fd = fs.openSync(filePath, "r");
  try {
    const buf = Buffer.alloc(PDF_SIGNATURE.length);
    const read = fs.readSync(fd, buf, 0, buf.length, 0);
    return buf.toString("latin1", 0, read) === PDF_SIGNATURE;
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Checks one artifact pair on disk against the shape its name promises.
 */
async function verifyTable(entry: config.SweepEntry, dataDir: string): Promise<VerifyResult> {
  const name = getBaseName(entry);
  const basePath = path.join(dataDir, name);
  const fail = (error: string): VerifyResult => ({ name, ok: false, rows: entry.rows, columns: entry.columns, error });

  const csvPath = `${basePath}.csv`;
  const pdfPath = `${basePath}.pdf`;
  if (!fs.existsSync(csvPath)) return fail(`missing ${csvPath}`);
  if (!fs.existsSync(pdfPath)) return fail(`missing ${pdfPath}`);
  if (!hasPdfSignature(pdfPath)) return fail(`${pdfPath} is not a PDF document`);

  const records = await parseCsv(fs.readFileSync(csvPath, "utf8"));
  const error = checkRecords(entry, records);
  return error ? fail(error) : { name, ok: true, rows: entry.rows, columns: entry.columns };
}

async function verifyAllTables(options: VerifyOptions = {}): Promise<VerifyResult[]> {
  const dataDir = options.dataDir ?? config.DATA_DIR;
  const log = options.log ?? ((line: string) => process.stdout.write(line));
  const sweep = options.sweep ?? config.getSweep();
  const results: VerifyResult[] = [];
  for (const entry of sweep) {
    log(`${getBaseName(entry)}... `);
    let result: VerifyResult;
    try {
      result = await verifyTable(entry, dataDir);
    } catch (err) {
      result = {
        name: getBaseName(entry),
        ok: false,
        rows: entry.rows,
        columns: entry.columns,
        error: err instanceof Error ? err.message : String(err),
      };
    }
    results.push(result);
    log(result.ok ? "OK\n" : `FAIL: ${result.error}\n`);
  }
  return results;
}

async function main(): Promise<void> {
  console.log("Verifying table datasets in", config.DATA_DIR);
  const results = await verifyAllTables();
  printVerificationReport(results);
  const failed = results.filter((r) => !r.ok).length;
  if (failed > 0) {
    throw new Error(`${failed} of ${results.length} datasets failed verification`);
  }
}

if (require.main === module) {
  main()
    .then(() => process.exit(0))
    .catch((err) => {
      console.error(err instanceof Error ? err.message : err);
      process.exit(1);
    });
}

export type { VerifyResult, VerifyOptions };
export { parseCsv, checkRecords, verifyTable, verifyAllTables };
