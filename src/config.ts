"use strict";

import path from "path";

// Row and column ranges (max is exclusive)
const ROW_COUNT_MIN = 2;
const ROW_COUNT_MAX = 10;
const COLUMN_COUNT_MIN = 2;
const COLUMN_COUNT_MAX = 8;

// true: sentences, false: timestamps
const FILLING_MODES: readonly boolean[] = [true, false];

const DATA_DIR = path.resolve(process.cwd(), "tables");

// Table forming
const COLUMN_DELIMITER = "|";
const COLUMN_SEPARATOR = "&";
const NEW_ROW_SYMBOL = "\\\\";
const TABLE_HORIZONTAL_LINE = "\\hline";
const TEXT_IN_CELL_ORIENTATION = "l";
const TABLE_WIDTH_CM = 15;
const TITLE_GENERIC_NAME = "title";

// CSV dialect
const CSV_DELIMITER = ",";
const CSV_QUOTE_CHAR = "|";
const CSV_NEWLINE = "\r\n";

const LATEX_ENGINE = "pdflatex";
const LATEX_MAX_BUFFER = 16 * 1024 * 1024;

interface SweepEntry {
  rows: number;
  columns: number;
  fillingIsSentences: boolean;
}

function getSweep(): SweepEntry[] {
  const sweep: SweepEntry[] = [];
  for (let rows = ROW_COUNT_MIN; rows < ROW_COUNT_MAX; rows++) {
    for (let columns = COLUMN_COUNT_MIN; columns < COLUMN_COUNT_MAX; columns++) {
      for (const fillingIsSentences of FILLING_MODES) {
        sweep.push({ rows, columns, fillingIsSentences });
      }
    }
  }
  return sweep;
}

export type { SweepEntry };
export {
  ROW_COUNT_MIN,
  ROW_COUNT_MAX,
  COLUMN_COUNT_MIN,
  COLUMN_COUNT_MAX,
  FILLING_MODES,
  DATA_DIR,
  COLUMN_DELIMITER,
  COLUMN_SEPARATOR,
  NEW_ROW_SYMBOL,
  TABLE_HORIZONTAL_LINE,
  TEXT_IN_CELL_ORIENTATION,
  TABLE_WIDTH_CM,
  TITLE_GENERIC_NAME,
  CSV_DELIMITER,
  CSV_QUOTE_CHAR,
  CSV_NEWLINE,
  LATEX_ENGINE,
  LATEX_MAX_BUFFER,
  getSweep,
};
