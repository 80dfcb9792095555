"use strict";

import config = require("../config");
import { defaultTextSource } from "./text";
import type { TextSource } from "./text";

type Table = string[][];

interface TableDataOptions {
  text?: TextSource;
  /** Milliseconds since the epoch, defaults to Date.now. */
  clock?: () => number;
}

function getText(numberOfSentences = 1, options: TableDataOptions = {}): string {
  const text = options.text ?? defaultTextSource;
  let result = "";
  for (let i = 0; i < numberOfSentences; i++) {
    result += text.sentence();
  }
  return result;
}

function getTimestamp(clock: () => number): string {
  return String(Math.floor(clock() / 1000));
}

function getTableTitle(numberOfColumns: number, titleGenericName: string = config.TITLE_GENERIC_NAME): string[] {
  return Array.from({ length: numberOfColumns }, (_, i) => `${titleGenericName}${i}`);
}

function generateData(
  numberOfRows: number,
  numberOfColumns: number,
  fillingIsSentences: boolean,
  options: TableDataOptions = {}
): Table {
  const clock = options.clock ?? Date.now;
  const table: Table = [];
  for (let r = 0; r < numberOfRows; r++) {
    const cellsInRow: string[] = [];
    for (let c = 0; c < numberOfColumns; c++) {
      cellsInRow.push(fillingIsSentences ? getText(1, options) : getTimestamp(clock));
    }
    table.push(cellsInRow);
  }
  return table;
}

export type { Table, TableDataOptions };
export { getText, getTableTitle, generateData };
