"use strict";

import config = require("../config");
import { render } from "./template";
import { defaultTextSource } from "./text";
import type { TextSource } from "./text";
import type { Table } from "./table-data";

/** Left, center, right, or a fixed-width paragraph column. */
type TextPosition = "l" | "c" | "r" | `p{${number}cm}`;

interface TexOptions {
  text?: TextSource;
  tableWidthCm?: number;
}

// Placeholders
const TEXT_BEFORE_TABLE = "_TEXT_BEFORE_TABLE";
const TEXT_AFTER_TABLE = "_TEXT_AFTER_TABLE";
const TABLE = "_THE_TABLE_";
const TABLE_SCHEMA = "_TABLE_SCHEMA";
const TABLE_ROWS_LIST = "_TABLE_ROWS_LIST";
const TABLE_TITLE = "_TABLE_TITLE";

const TEX_DOCUMENT_PATTERN = [
  "\\documentclass{article}",
  "\\usepackage[a4paper, portrait, margin=1in]{geometry}",
  "\\usepackage[utf8]{inputenc}",
  "\\usepackage{tabularx}",
  "\\begin{document}",
  TEXT_BEFORE_TABLE,
  "",
  TABLE,
  TEXT_AFTER_TABLE,
  "\\end{document}",
].join("\n");

// \begin{tabular}{|p{5cm}|p{5cm}|}
// \hline
// title0 & title1\\ \hline
// a & b \\ \hline
// c & d \\ \hline
// \end{tabular}
const TEX_TABLE_PATTERN = [
  `\\begin{tabular}{${TABLE_SCHEMA}}`,
  "\\hline",
  `${TABLE_TITLE}\\\\ \\hline`,
  `${TABLE_ROWS_LIST} \\\\ \\hline`,
  "\\end{tabular}",
  "",
].join("\n");

/**
 * Column schema in the form `|pos|pos|...|`.
 */
function getSchema(numberOfColumns: number, textPosition: TextPosition = config.TEXT_IN_CELL_ORIENTATION): string {
  return (config.COLUMN_DELIMITER + textPosition).repeat(numberOfColumns) + config.COLUMN_DELIMITER;
}

/**
 * Width of one column in cm when `tableWidthCm` is shared evenly, truncated
 * to whole centimetres.
 */
function getColumnWidth(numberOfColumns: number, tableWidthCm: number = config.TABLE_WIDTH_CM): number {
  if (!Number.isInteger(numberOfColumns) || numberOfColumns < 1) {
    throw new RangeError(`Column count must be a positive integer, got ${numberOfColumns}`);
  }
  return Math.floor(tableWidthCm / numberOfColumns);
}

function joinCells(cells: readonly string[]): string {
  return cells.join(` ${config.COLUMN_SEPARATOR} `);
}

/**
 * Builds a complete LaTeX document with the table between two filler
 * paragraphs. Cell text is inserted verbatim: LaTeX special characters are
 * not escaped.
 */
function generateTexCode(tableData: Table, tableTitleData: readonly string[], options: TexOptions = {}): string {
  const text = options.text ?? defaultTextSource;
  const textBefore = text.paragraph();
  const textAfter = text.paragraph();

  const numberOfColumns = tableTitleData.length;
  const texTableTitle = joinCells(tableTitleData);
  const texRows = tableData
    .map(joinCells)
    .join(` ${config.NEW_ROW_SYMBOL} ${config.TABLE_HORIZONTAL_LINE}\n`);

  const width = getColumnWidth(numberOfColumns, options.tableWidthCm);
  const schema = getSchema(numberOfColumns, `p{${width}cm}`);

  const texTable = render(TEX_TABLE_PATTERN, {
    [TABLE_ROWS_LIST]: texRows,
    [TABLE_SCHEMA]: schema,
    [TABLE_TITLE]: texTableTitle,
  });

  return render(TEX_DOCUMENT_PATTERN, {
    [TEXT_BEFORE_TABLE]: textBefore,
    [TABLE]: texTable,
    [TEXT_AFTER_TABLE]: textAfter,
  });
}

export type { TextPosition, TexOptions };
export { getSchema, getColumnWidth, generateTexCode };
