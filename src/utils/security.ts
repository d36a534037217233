/**
 * Path validation shared by every tool: workspace containment, existence,
 * file type, readability and extension checks.
 */
import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/load.js";
import { ToolError } from "./errors.js";

export function getWorkspaceRoot(): string | null {
  const cfg = loadConfig();
  return cfg.workspaceRoot ? path.resolve(cfg.workspaceRoot) : null;
}

export function ensureInsideWorkspace(p: string, root: string | null): string {
  const abs = path.resolve(p);
  if (!root) return abs;
  const fold = (s: string) => (process.platform === "win32" ? s.toLowerCase() : s);
  const a = fold(path.normalize(abs));
  const b = fold(path.normalize(path.resolve(root)));
  if (a === b || a.startsWith(b.endsWith(path.sep) ? b : b + path.sep)) return abs;
  throw new ToolError("outside-workspace", `Path escapes workspace root: ${abs} (root=${root})`);
}

export function isInsideWorkspace(p: string, root: string | null): boolean {
  try {
    ensureInsideWorkspace(p, root);
    return true;
  } catch (err: unknown) {
    if (err instanceof ToolError) return false;
    throw err;
  }
}

export interface PathRequirements {
  // "file" (default) or "any" to also accept directories
  kind?: "file" | "any";
  // Lower-case extensions including the dot; checked for files only
  extensions?: readonly string[];
  // Workspace root override; defaults to the configured root
  workspaceRoot?: string | null;
}

export interface ResolvedPath {
  path: string;
  isDirectory: boolean;
  sizeBytes: number;
}

export function resolveInputPath(p: string | undefined, req: PathRequirements = {}): ResolvedPath {
  if (p === undefined || p.trim() === "") {
    throw new ToolError("invalid-argument", "Path cannot be empty");
  }
  const root = req.workspaceRoot === undefined ? getWorkspaceRoot() : req.workspaceRoot;
  const abs = ensureInsideWorkspace(p, root);

  let stat: fs.Stats;
  try {
    stat = fs.statSync(abs);
  } catch {
    throw new ToolError("not-found", `File not found: ${p}`);
  }

  const isDirectory = stat.isDirectory();
  if (isDirectory && req.kind !== "any") {
    throw new ToolError("not-a-file", `Path is a directory, not a file: ${p}`);
  }
  if (!isDirectory && !stat.isFile()) {
    throw new ToolError("not-a-file", `Not a regular file: ${p}`);
  }

  try {
    fs.accessSync(abs, fs.constants.R_OK);
  } catch {
    throw new ToolError("not-readable", `Path is not readable: ${p}`);
  }

  if (!isDirectory && req.extensions && req.extensions.length) {
    const ext = path.extname(abs).toLowerCase();
    if (!req.extensions.includes(ext)) {
      throw new ToolError(
        "unsupported-extension",
        `File extension '${ext}' not allowed. Allowed: ${[...req.extensions].sort().join(", ")}`
      );
    }
  }

  return { path: abs, isDirectory, sizeBytes: stat.size };
}
