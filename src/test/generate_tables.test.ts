"use strict";

import { describe, it } from "node:test";
import assert from "node:assert";
import fs from "fs";
import os from "os";
import path from "path";
import { generateAllTables, generateTable, getBaseName, getSweep, verifyAllTables } from "../index";
import type { PdfCompiler, SweepEntry, TextSource } from "../index";

const FAKE_PDF = Buffer.from("%PDF-1.4\n%fake\n", "latin1");
const CLOCK = () => 1700000000000;

const text: TextSource = {
  sentence: () => "Lorem ipsum dolor.",
  paragraph: () => "Filler paragraph.",
};

function fakeCompiler(markups: string[] = []): PdfCompiler {
  return {
    compile: async (markup) => {
      markups.push(markup);
      return FAKE_PDF;
    },
  };
}

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "generate-tables-"));
  try {
    await fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

const quiet = (): void => {};

describe("generate tables", () => {
  it("base name spells the filling flag True/False", () => {
    assert.strictEqual(getBaseName({ rows: 2, columns: 2, fillingIsSentences: false }), "2_2_False");
    assert.strictEqual(getBaseName({ rows: 9, columns: 7, fillingIsSentences: true }), "9_7_True");
  });

  it("sweep covers rows 2..9, columns 2..7, sentences before timestamps", () => {
    const sweep = getSweep();
    assert.strictEqual(sweep.length, 8 * 6 * 2);
    assert.deepStrictEqual(sweep[0], { rows: 2, columns: 2, fillingIsSentences: true });
    assert.deepStrictEqual(sweep[1], { rows: 2, columns: 2, fillingIsSentences: false });
    assert.deepStrictEqual(sweep[2], { rows: 2, columns: 3, fillingIsSentences: true });
    assert.deepStrictEqual(sweep[sweep.length - 1], { rows: 9, columns: 7, fillingIsSentences: false });
    assert.strictEqual(new Set(sweep.map(getBaseName)).size, sweep.length);
  });

  it("2_2_False writes a header and two rows of timestamps", async () => {
    await withTempDir(async (dir) => {
      const markups: string[] = [];
      const result = await generateTable(
        { rows: 2, columns: 2, fillingIsSentences: false },
        { dataDir: dir, compiler: fakeCompiler(markups), clock: CLOCK, text }
      );
      const csvPath = path.join(dir, "2_2_False.csv");
      assert.strictEqual(result.name, "2_2_False");
      assert.strictEqual(result.csvPath, csvPath);
      assert.strictEqual(result.pdfPath, path.join(dir, "2_2_False.pdf"));
      assert.strictEqual(result.rows, 2);
      assert.strictEqual(result.columns, 2);
      assert.ok(result.elapsedMs >= 0);

      const csv = fs.readFileSync(csvPath, "utf8");
      assert.strictEqual(csv, "title0,title1\r\n1700000000,1700000000\r\n1700000000,1700000000\r\n");
      assert.strictEqual(csv.split("\r\n").filter((line) => line.length > 0).length, 3);
      assert.deepStrictEqual(fs.readFileSync(result.pdfPath), FAKE_PDF);

      assert.strictEqual(markups.length, 1);
      assert.ok(markups[0].includes("\\begin{tabular}{|p{7cm}|p{7cm}|}\n"));
      assert.ok(markups[0].includes("\n1700000000 & 1700000000 \\\\ \\hline\n1700000000 & 1700000000 \\\\ \\hline\n"));
    });
  });

  it("pdf markup and csv carry the same cells", async () => {
    await withTempDir(async (dir) => {
      const markups: string[] = [];
      await generateTable(
        { rows: 3, columns: 4, fillingIsSentences: true },
        { dataDir: dir, compiler: fakeCompiler(markups), text }
      );
      const csv = fs.readFileSync(path.join(dir, "3_4_True.csv"), "utf8");
      const row = Array.from({ length: 4 }, () => "Lorem ipsum dolor.");
      assert.strictEqual(csv, ["title0,title1,title2,title3", row.join(","), row.join(","), row.join(","), ""].join("\r\n"));
      const rowLine = `${row.join(" & ")} \\\\ \\hline\n`;
      assert.strictEqual(markups[0].split(rowLine).length - 1, 3);
    });
  });

  it("running the sweep twice gives the same paths and shapes", async () => {
    await withTempDir(async (dir) => {
      const sweep: SweepEntry[] = [
        { rows: 2, columns: 2, fillingIsSentences: true },
        { rows: 2, columns: 2, fillingIsSentences: false },
        { rows: 3, columns: 5, fillingIsSentences: false },
      ];
      const lines: string[] = [];
      const first = await generateAllTables({ dataDir: dir, sweep, compiler: fakeCompiler(), log: (l) => lines.push(l) });
      const second = await generateAllTables({ dataDir: dir, sweep, compiler: fakeCompiler(), log: quiet });

      assert.deepStrictEqual(
        first.map((r) => r.csvPath),
        second.map((r) => r.csvPath)
      );
      assert.deepStrictEqual(
        second.map((r) => [r.rows, r.columns]),
        [
          [2, 2],
          [2, 2],
          [3, 5],
        ]
      );
      assert.deepStrictEqual(fs.readdirSync(dir).sort(), [
        "2_2_False.csv",
        "2_2_False.pdf",
        "2_2_True.csv",
        "2_2_True.pdf",
        "3_5_False.csv",
        "3_5_False.pdf",
      ]);
      assert.strictEqual(lines[0], "Generating 2_2_True...");
      assert.strictEqual(lines.length, 6);

      const verified = await verifyAllTables({ dataDir: dir, sweep, log: quiet });
      assert.deepStrictEqual(
        verified.map((r) => r.ok),
        [true, true, true]
      );
    });
  });

  it("stops at the first compiler failure", async () => {
    await withTempDir(async (dir) => {
      let calls = 0;
      const compiler: PdfCompiler = {
        compile: async () => {
          calls++;
          if (calls === 2) throw new Error("engine crashed");
          return FAKE_PDF;
        },
      };
      const sweep: SweepEntry[] = [
        { rows: 2, columns: 2, fillingIsSentences: true },
        { rows: 2, columns: 3, fillingIsSentences: true },
        { rows: 2, columns: 4, fillingIsSentences: true },
      ];
      await assert.rejects(generateAllTables({ dataDir: dir, sweep, compiler, text, log: quiet }), /engine crashed/);
      assert.strictEqual(calls, 2);
      assert.deepStrictEqual(fs.readdirSync(dir).sort(), ["2_2_True.csv", "2_2_True.pdf"]);
    });
  });
});
