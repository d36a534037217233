/**
 * Run a TeX engine on a source file and report the PDF, the log and the
 * diagnostics parsed from it.
 */
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { loadConfig } from "../config/load.js";
import type { Engine } from "../config/schema.js";
import { which } from "../discovery/which.js";
import { Diagnostic, parseLatexLog } from "../parsers/latexLog.js";
import { ToolError, errorMessage, isErrnoException } from "../utils/errors.js";
import { LATEX_SOURCE_EXTENSIONS, readTextWithFallback } from "../utils/files.js";
import { RunResult, runCommand } from "../utils/process.js";
import { ensureInsideWorkspace, getWorkspaceRoot, resolveInputPath } from "../utils/security.js";
import { timed } from "../utils/timing.js";

export const MAX_PASSES = 3;

export interface CompileOptions {
  path: string;
  engine?: Engine;
  outDir?: string;
  // Per pass; defaults to the configured compile timeout
  timeoutMs?: number;
  // Engine runs; more than one resolves cross-references and the TOC
  passes?: number;
  shellEscape?: boolean;
  // Aborting kills the running engine and skips the remaining passes
  signal?: AbortSignal;
}

export interface CompileResult {
  success: boolean;
  pdfPath?: string;
  logPath?: string;
  errorMessage?: string;
  diagnostics: Diagnostic[];
  log: string;
  // Passes actually run
  passes: number;
  command: string;
  args: string[];
  code: number | null;
  timedOut: boolean;
  elapsedMs: number;
}

function engineExecutable(engine: Engine): string {
  const name = os.platform() === "win32" ? `${engine}.exe` : engine;
  return which(name) || name;
}

function mtimeOrUndefined(p: string): number | undefined {
  try {
    return fs.statSync(p).mtimeMs;
  } catch {
    return undefined;
  }
}

function checkPasses(passes: number | undefined): number {
  const n = passes ?? 1;
  if (!Number.isInteger(n) || n < 1 || n > MAX_PASSES) {
    throw new ToolError("invalid-argument", `passes must be an integer between 1 and ${MAX_PASSES}`);
  }
  return n;
}

type PassOutcome = { ok: true; result: RunResult } | { ok: false; error: string };

async function runEnginePass(
  engine: Engine,
  exe: string,
  args: string[],
  options: { cwd: string; timeoutMs: number; signal?: AbortSignal }
): Promise<PassOutcome> {
  try {
    return { ok: true, result: await runCommand(exe, args, options) };
  } catch (err: unknown) {
    const error = isErrnoException(err) && err.code === "ENOENT"
      ? `TeX engine '${engine}' not found; install a TeX distribution or put ${engine} on PATH`
      : `Failed to start ${engine}: ${errorMessage(err)}`;
    return { ok: false, error };
  }
}

export async function compileLatex(opts: CompileOptions): Promise<CompileResult> {
  const cfg = loadConfig();
  const src = resolveInputPath(opts.path, { extensions: LATEX_SOURCE_EXTENSIONS });
  const passes = checkPasses(opts.passes);
  if (opts.shellEscape && !cfg.allowShellEscape) {
    throw new ToolError("shell-escape-disabled", "Shell escape is disabled; enable allowShellEscape in the configuration");
  }

  const srcDir = path.dirname(src.path);
  const outDir = opts.outDir ? ensureInsideWorkspace(path.resolve(srcDir, opts.outDir), getWorkspaceRoot()) : srcDir;
  fs.mkdirSync(outDir, { recursive: true });

  const engine = opts.engine ?? cfg.defaultEngine;
  const timeoutMs = opts.timeoutMs ?? cfg.compileTimeoutMs;
  const exe = engineExecutable(engine);
  const args = [
    "-interaction=nonstopmode",
    "-file-line-error",
    opts.shellEscape ? "-shell-escape" : "-no-shell-escape",
    `-output-directory=${outDir}`,
    src.path,
  ];

  const stem = path.parse(src.path).name;
  const pdfPath = path.join(outDir, stem + ".pdf");
  const logPath = path.join(outDir, stem + ".log");
  const pdfBefore = mtimeOrUndefined(pdfPath);

  const { value: run, elapsedMs } = await timed(async () => {
    let last: RunResult | undefined;
    let ran = 0;
    while (ran < passes) {
      const pass = await runEnginePass(engine, exe, args, { cwd: srcDir, timeoutMs, signal: opts.signal });
      if (!pass.ok) return { last, ran, startError: pass.error };
      last = pass.result;
      ran++;
      if (last.timedOut || last.code !== 0 || opts.signal?.aborted) break;
    }
    return { last, ran, startError: undefined };
  });

  const { last, ran, startError } = run;
  if (!last) {
    return {
      success: false,
      errorMessage: startError ?? `${engine} did not run`,
      diagnostics: [],
      log: "",
      passes: 0,
      command: exe,
      args,
      code: null,
      timedOut: false,
      elapsedMs,
    };
  }

  const hasLog = fs.existsSync(logPath);
  const log = hasLog ? readTextWithFallback(logPath).text : last.stdout + (last.stderr ? "\n" + last.stderr : "");
  const diagnostics = parseLatexLog(log);

  const pdfAfter = mtimeOrUndefined(pdfPath);
  const producedPdf = pdfAfter !== undefined && (pdfBefore === undefined || pdfAfter > pdfBefore);
  const cancelled = opts.signal?.aborted === true;
  // A later pass that could not start leaves the run incomplete
  const success = !startError && !cancelled && !last.timedOut && last.code === 0 && producedPdf;

  let failure: string | undefined;
  if (cancelled) {
    failure = "LaTeX compilation cancelled";
  } else if (startError) {
    failure = `${startError} (after ${ran} of ${passes} passes)`;
  } else if (last.timedOut) {
    failure = `LaTeX compilation timed out after ${timeoutMs}ms`;
  } else if (last.code !== 0) {
    const firstError = diagnostics.find((d) => d.type === "error");
    failure = `LaTeX compilation failed with exit code ${last.code}` + (firstError ? `: ${firstError.message}` : "");
  } else if (!producedPdf) {
    failure = `${engine} exited successfully but produced no PDF at ${pdfPath}`;
  }

  return {
    success,
    pdfPath: success ? pdfPath : undefined,
    logPath: hasLog ? logPath : undefined,
    errorMessage: failure,
    diagnostics,
    log,
    passes: ran,
    command: last.command,
    args: last.args,
    code: last.code,
    timedOut: last.timedOut,
    elapsedMs,
  };
}
