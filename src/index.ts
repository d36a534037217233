#!/usr/bin/env node
import { compileLatex } from "./tools/compile.js";
import { validateLatexFile } from "./tools/validate.js";
import { extractPdfInfo } from "./tools/pdfInfo.js";
import { cleanLatex } from "./tools/cleanup.js";
import { ENGINES, Engine } from "./config/schema.js";

const USAGE = [
  "Usage:",
  "  latex-tools validate <file.tex> [--strict]",
  "  latex-tools compile <file.tex> [--engine pdflatex|xelatex|lualatex] [--outdir <dir>] [--passes <n>]",
  "  latex-tools info <file.pdf> [--text] [--password <pw>]",
  "  latex-tools clean <file.tex|dir> [--dry-run] [--recursive] [--backup]",
].join("\n");

class UsageError extends Error {}

function flagValue(args: string[], name: string): string | undefined {
  const i = args.indexOf(name);
  if (i < 0) return undefined;
  const v = args[i + 1];
  if (v === undefined || v.startsWith("--")) throw new UsageError(`${name} needs a value`);
  return v;
}

function isEngine(v: string): v is Engine {
  return ENGINES.some((e) => e === v);
}

// First argument that is neither a flag nor a flag's value
function positional(args: string[], valued: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    if (valued.includes(args[i])) { i++; continue; }
    if (!args[i].startsWith("--")) return args[i];
  }
  return undefined;
}

async function run(cmd: string | undefined, args: string[]): Promise<unknown> {
  switch (cmd) {
    case "validate": {
      const file = positional(args, []);
      if (!file) throw new UsageError("validate needs a file");
      return validateLatexFile({ path: file, mode: args.includes("--strict") ? "strict" : "quick" });
    }
    case "compile": {
      const file = positional(args, ["--engine", "--outdir", "--passes"]);
      if (!file) throw new UsageError("compile needs a file");
      const engine = flagValue(args, "--engine");
      if (engine !== undefined && !isEngine(engine)) throw new UsageError(`Unknown engine '${engine}'`);
      const passes = flagValue(args, "--passes");
      return compileLatex({
        path: file,
        engine,
        outDir: flagValue(args, "--outdir"),
        passes: passes === undefined ? undefined : Number(passes),
      });
    }
    case "info": {
      const file = positional(args, ["--password"]);
      if (!file) throw new UsageError("info needs a file");
      return extractPdfInfo({ path: file, includeText: args.includes("--text"), password: flagValue(args, "--password") });
    }
    case "clean": {
      const target = positional(args, []);
      if (!target) throw new UsageError("clean needs a path");
      return cleanLatex({
        path: target,
        dryRun: args.includes("--dry-run"),
        recursive: args.includes("--recursive"),
        backup: args.includes("--backup"),
      });
    }
    default:
      throw new UsageError(cmd ? `Unknown command '${cmd}'` : "No command given");
  }
}

async function main() {
  const [cmd, ...args] = process.argv.slice(2);
  try {
    const res = await run(cmd, args);
    console.log(JSON.stringify(res, null, 2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`${err.message}\n\n${USAGE}`);
      process.exitCode = 2;
      return;
    }
    console.error("Error:", err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
}

void main();
