"use strict";

export type { SweepEntry } from "./config";
export { getSweep } from "./config";
export type { TextSource, LoremSourceOptions } from "./lib/text";
export { createLoremSource } from "./lib/text";
export type { Table, TableDataOptions } from "./lib/table-data";
export { getText, getTableTitle, generateData } from "./lib/table-data";
export type { Bindings } from "./lib/template";
export { render } from "./lib/template";
export type { TextPosition, TexOptions } from "./lib/latex";
export { getSchema, getColumnWidth, generateTexCode } from "./lib/latex";
export type { PdfCompiler, LatexCompilerOptions } from "./lib/compiler";
export { LatexCompiler, LatexCompileError } from "./lib/compiler";
export type { WriteResult } from "./lib/dataset-writer";
export { ensureDataDir, toCsv, writeDataset } from "./lib/dataset-writer";
export type { GenerateOptions, GenerateResult } from "./dataset/generate-tables";
export { getBaseName, generateTable, generateAllTables } from "./dataset/generate-tables";
export type { VerifyResult, VerifyOptions } from "./dataset/verify-tables";
export { verifyTable, verifyAllTables } from "./dataset/verify-tables";
