import fs from "node:fs";
import path from "node:path";
import os from "node:os";

// TeX installations that are commonly missing from PATH (GUI launches, services)
const POSIX_TEX_DIRS = [
  "/Library/TeX/texbin",
  "/usr/texbin",
  "/opt/texbin",
  "/usr/local/bin",
  "/usr/bin",
];
const TEXLIVE_ROOT = "/usr/local/texlive";

function isExecutableFile(p: string): boolean {
  try {
    if (!fs.statSync(p).isFile()) return false;
    fs.accessSync(p, os.platform() === "win32" ? fs.constants.F_OK : fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

// /usr/local/texlive/<year>/bin/<arch>, newest year first
function texliveBinDirs(): string[] {
  if (!fs.existsSync(TEXLIVE_ROOT)) return [];
  const dirs: string[] = [];
  const years = fs.readdirSync(TEXLIVE_ROOT, { withFileTypes: true })
    .filter((e) => e.isDirectory() && /^\d{4}$/.test(e.name))
    .map((e) => e.name)
    .sort()
    .reverse();
  for (const y of years) {
    const bin = path.join(TEXLIVE_ROOT, y, "bin");
    if (!fs.existsSync(bin)) continue;
    for (const arch of fs.readdirSync(bin, { withFileTypes: true })) {
      if (arch.isDirectory()) dirs.push(path.join(bin, arch.name));
    }
  }
  return dirs;
}

/** Locate an executable on PATH, then in well-known TeX directories. */
export function which(command: string, envPath: string = process.env.PATH || ""): string | null {
  const isWin = os.platform() === "win32";
  const exts = isWin ? (process.env.PATHEXT || ".EXE;.CMD;.BAT").split(";").map((e) => e.toLowerCase()) : [""];
  const names = exts.map((ext) => (command.toLowerCase().endsWith(ext) ? command : command + ext));

  const dirs = envPath.split(path.delimiter).filter(Boolean);
  if (!isWin) dirs.push(...POSIX_TEX_DIRS, ...texliveBinDirs());

  for (const dir of dirs) {
    for (const name of names) {
      const p = path.join(dir, name);
      if (isExecutableFile(p)) return p;
    }
  }
  return null;
}
