/**
 * Removal of LaTeX build artifacts next to a source file or inside a
 * directory, with dry-run and backup support.
 */
import fs from "node:fs";
import path from "node:path";
import { ToolError, errorMessage } from "../utils/errors.js";
import { isLatexSource } from "../utils/files.js";
import { resolveInputPath } from "../utils/security.js";
import { timedSync } from "../utils/timing.js";

export const DEFAULT_CLEANUP_EXTENSIONS: readonly string[] = [
  ".aux", ".log", ".out", ".fls", ".fdb_latexmk", ".toc", ".lof", ".lot",
  ".bbl", ".blg", ".bcf", ".run.xml", ".nav", ".snm", ".vrb",
  ".idx", ".ilg", ".ind", ".glo", ".gls", ".glg",
  ".synctex.gz", ".figlist", ".fpl", ".makefile", ".xdv",
];

// Never removed, whatever extensions are requested
export const PROTECTED_EXTENSIONS: readonly string[] = [
  ".tex", ".latex", ".ltx", ".pdf", ".bib", ".sty", ".cls", ".dtx", ".ins",
  ".png", ".jpg", ".jpeg", ".gif", ".svg", ".eps", ".ps",
  ".txt", ".md", ".py", ".sh", ".bat",
];

const EXTENSION_RE = /^\.[A-Za-z0-9_][A-Za-z0-9_.-]*$/;
const BACKUP_DIR_RE = /^backup_.+_\d{8}_\d{6}$/;

export interface CleanupOptions {
  path: string;
  extensions?: string[];
  dryRun?: boolean;
  recursive?: boolean;
  backup?: boolean;
  // Clock for the backup directory name
  now?: Date;
}

export interface CleanupFailure {
  path: string;
  error: string;
}

export interface CleanupResult {
  success: boolean;
  target: string;
  targetKind: "source-file" | "file" | "directory";
  dryRun: boolean;
  recursive: boolean;
  extensions: string[];
  removed: string[];
  wouldRemove: string[];
  failed: CleanupFailure[];
  backupDir?: string;
  elapsedMs: number;
}

export function normalizeExtensions(exts: readonly string[]): string[] {
  const out: string[] = [];
  for (const raw of exts) {
    const e = raw.trim().toLowerCase();
    const ext = e.startsWith(".") ? e : "." + e;
    if (!EXTENSION_RE.test(ext)) {
      throw new ToolError("invalid-argument", `Invalid extension: '${raw}'`);
    }
    if (!out.includes(ext)) out.push(ext);
  }
  if (!out.length) throw new ToolError("invalid-argument", "At least one extension is required");
  return out;
}

export function isProtected(file: string): boolean {
  return PROTECTED_EXTENSIONS.includes(path.extname(file).toLowerCase());
}

function matchesExtension(file: string, exts: readonly string[]): boolean {
  const name = path.basename(file).toLowerCase();
  return exts.some((e) => name.length > e.length && name.endsWith(e));
}

function isRegularFile(p: string): boolean {
  try {
    return fs.lstatSync(p).isFile();
  } catch {
    return false;
  }
}

function walk(dir: string, recursive: boolean, out: string[]): void {
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isFile()) {
      out.push(full);
    } else if (recursive && entry.isDirectory() && !entry.name.startsWith(".") && !BACKUP_DIR_RE.test(entry.name)) {
      walk(full, recursive, out);
    }
  }
}

function timestamp(d: Date): string {
  const p = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}${p(d.getMonth() + 1)}${p(d.getDate())}_${p(d.getHours())}${p(d.getMinutes())}${p(d.getSeconds())}`;
}

export function cleanLatex(opts: CleanupOptions): CleanupResult {
  const target = resolveInputPath(opts.path, { kind: "any" });
  const exts = normalizeExtensions(opts.extensions ?? DEFAULT_CLEANUP_EXTENSIONS);
  const dryRun = !!opts.dryRun;
  const recursive = !!opts.recursive;

  const { value, elapsedMs } = timedSync(() => {
    let targetKind: CleanupResult["targetKind"];
    let baseDir: string;
    let candidates: string[] = [];

    if (target.isDirectory) {
      targetKind = "directory";
      baseDir = target.path;
      walk(target.path, recursive, candidates);
      candidates = candidates.filter((f) => matchesExtension(f, exts));
    } else if (isLatexSource(target.path)) {
      targetKind = "source-file";
      baseDir = path.dirname(target.path);
      const stem = path.parse(target.path).name;
      candidates = exts.map((e) => path.join(baseDir, stem + e)).filter(isRegularFile);
    } else {
      targetKind = "file";
      baseDir = path.dirname(target.path);
      if (matchesExtension(target.path, exts)) candidates = [target.path];
    }

    candidates = [...new Set(candidates)].filter((f) => !isProtected(f)).sort();

    const removed: string[] = [];
    const failed: CleanupFailure[] = [];
    let backupDir: string | undefined;

    if (!dryRun && candidates.length) {
      if (opts.backup) {
        const label = target.isDirectory ? path.basename(target.path) : path.parse(target.path).name;
        backupDir = path.join(baseDir, `backup_${label}_${timestamp(opts.now ?? new Date())}`);
        fs.mkdirSync(backupDir, { recursive: true });
      }
      for (const file of candidates) {
        try {
          if (backupDir) {
            const dest = path.join(backupDir, path.relative(baseDir, file));
            fs.mkdirSync(path.dirname(dest), { recursive: true });
            fs.copyFileSync(file, dest);
          }
          fs.unlinkSync(file);
          removed.push(file);
        } catch (err: unknown) {
          failed.push({ path: file, error: errorMessage(err) });
        }
      }
    }

    return { targetKind, removed, failed, backupDir, wouldRemove: dryRun ? candidates : [] };
  });

  return {
    success: value.failed.length === 0,
    target: target.path,
    targetKind: value.targetKind,
    dryRun,
    recursive,
    extensions: exts,
    removed: value.removed,
    wouldRemove: value.wouldRemove,
    failed: value.failed,
    backupDir: value.backupDir,
    elapsedMs,
  };
}
