"use strict";

import fs from "fs";
import path from "path";
import { stringify } from "csv-stringify";
import config = require("../config");
import type { Table } from "./table-data";

// `|` inside a field travels through csv-stringify as this character and is
// doubled afterwards, so the library never builds a pattern from `|`.
const QUOTE_PLACEHOLDER = "\u0000";

interface WriteResult {
  pdfPath: string;
  csvPath: string;
  bytes: number;
  rows: number;
}

function ensureDataDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Title row followed by the table rows, one `\r\n` terminated record each.
 * A field is wrapped in `|` only when it holds the delimiter, a `|` or a
 * line break.
 */
function toCsv(tableTitle: readonly string[], tableData: Table): Promise<string> {
  return new Promise((resolve, reject) => {
    stringify(
      [[...tableTitle], ...tableData],
      {
        delimiter: config.CSV_DELIMITER,
        quote: config.CSV_QUOTE_CHAR,
        escape: config.CSV_QUOTE_CHAR,
        record_delimiter: config.CSV_NEWLINE,
        quoted_match: [/[\r\n]/, QUOTE_PLACEHOLDER],
        cast: {
          string: (value: string) => value.split(config.CSV_QUOTE_CHAR).join(QUOTE_PLACEHOLDER),
        },
      },
      (err, output: string) => {
        if (err) reject(err);
        else resolve(output.split(QUOTE_PLACEHOLDER).join(config.CSV_QUOTE_CHAR + config.CSV_QUOTE_CHAR));
      }
    );
  });
}

/**
 * Writes `<basePath>.pdf` and `<basePath>.csv`, replacing existing files.
 */
async function writeDataset(
  basePath: string,
  pdf: Uint8Array,
  tableTitle: readonly string[],
  tableData: Table
): Promise<WriteResult> {
  ensureDataDir(path.dirname(basePath));

  const pdfPath = `${basePath}.pdf`;
  fs.writeFileSync(pdfPath, pdf);

  const csvPath = `${basePath}.csv`;
  const csv = await toCsv(tableTitle, tableData);
  fs.writeFileSync(csvPath, csv, "utf8");

  return {
    pdfPath,
    csvPath,
    bytes: pdf.byteLength + Buffer.byteLength(csv, "utf8"),
    rows: tableData.length,
  };
}

export type { WriteResult };
export { ensureDataDir, toCsv, writeDataset };
