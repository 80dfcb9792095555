"use strict";

import fs from "fs/promises";
import os from "os";
import path from "path";
import { execFile } from "child_process";
import { promisify } from "util";
import config = require("../config");

/**
 * Turns a LaTeX source string into PDF bytes.
 */
interface PdfCompiler {
  compile(markup: string): Promise<Buffer>;
}

type ExecFileResult = { stdout: string; stderr: string };
type ExecFileFn = (
  command: string,
  args: string[],
  options: { cwd: string; maxBuffer: number }
) => Promise<ExecFileResult>;

type LatexCompileErrorCode = "LATEX_ENGINE_NOT_FOUND" | "LATEX_COMPILE_FAILED";

class LatexCompileError extends Error {
  readonly code: LatexCompileErrorCode;
  /** Engine output, when the engine ran. */
  readonly log?: string;

  constructor(message: string, code: LatexCompileErrorCode, log?: string) {
    super(message);
    this.name = "LatexCompileError";
    this.code = code;
    this.log = log;
  }
}

interface LatexCompilerOptions {
  engine?: string;
  execFileFn?: ExecFileFn;
}

const execFileAsync = promisify(execFile);

async function defaultExecFile(
  command: string,
  args: string[],
  options: { cwd: string; maxBuffer: number }
): Promise<ExecFileResult> {
  const { stdout, stderr } = await execFileAsync(command, args, { ...options, encoding: "utf8" });
  return { stdout, stderr };
}

const JOB_NAME = "table";

function buildEngineArgs(texFile: string): string[] {
  return ["-interaction=nonstopmode", "-halt-on-error", texFile];
}

function toCompileError(err: unknown, engine: string): LatexCompileError {
  if (err instanceof Error && "code" in err && err.code === "ENOENT") {
    return new LatexCompileError(
      `${engine}: LaTeX engine not found. Install a TeX distribution that provides ${engine}.`,
      "LATEX_ENGINE_NOT_FOUND"
    );
  }
  const log = err instanceof Error && "stdout" in err && typeof err.stdout === "string" ? err.stdout : undefined;
  const reason = err instanceof Error ? err.message : String(err);
  return new LatexCompileError(`${engine} failed: ${reason}`, "LATEX_COMPILE_FAILED", log);
}

/**
 * Runs a LaTeX engine in a scratch directory and returns the produced PDF.
 * No timeout is applied; a hanging engine stalls the caller.
 */
class LatexCompiler implements PdfCompiler {
  private readonly engine: string;
  private readonly execFileFn: ExecFileFn;

  constructor(options: LatexCompilerOptions = {}) {
    this.engine = options.engine ?? config.LATEX_ENGINE;
    this.execFileFn = options.execFileFn ?? defaultExecFile;
  }

  async compile(markup: string): Promise<Buffer> {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "pdf-table-dataset-"));
    try {
      await fs.writeFile(path.join(workDir, `${JOB_NAME}.tex`), markup, "utf8");
      let run: ExecFileResult;
      try {
        run = await this.execFileFn(this.engine, buildEngineArgs(`${JOB_NAME}.tex`), {
          cwd: workDir,
          maxBuffer: config.LATEX_MAX_BUFFER,
        });
      } catch (err) {
        throw toCompileError(err, this.engine);
      }
      try {
        return await fs.readFile(path.join(workDir, `${JOB_NAME}.pdf`));
      } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") {
          throw new LatexCompileError(`${this.engine} produced no PDF`, "LATEX_COMPILE_FAILED", run.stdout);
        }
        throw err;
      }
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }
}

export type { PdfCompiler, ExecFileFn, LatexCompilerOptions };
export { LatexCompiler, LatexCompileError, buildEngineArgs };
