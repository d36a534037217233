/**
 * Style and compatibility checks run in strict mode. They only produce
 * warnings and never change validity.
 */
import { LineIndex, commandMatches, firstCommand } from "./source.js";
import type {
  DeprecatedPackage,
  MissingPackage,
  ObsoleteFontCommand,
  WarningFinding,
} from "./findings.js";

interface PackageRule {
  use: string;
  packages: readonly string[];
  pattern: RegExp;
}

function envRule(use: string, packages: readonly string[]): PackageRule {
  return { use, packages, pattern: new RegExp(`\\\\begin\\s*\\{${use}\\*?\\}`, "g") };
}

function cmdRule(use: string, packages: readonly string[]): PackageRule {
  return { use, packages, pattern: new RegExp(`\\\\${use}(?![A-Za-z])`, "g") };
}

const PACKAGE_RULES: readonly PackageRule[] = [
  envRule("tikzpicture", ["tikz"]),
  cmdRule("includegraphics", ["graphicx", "graphics"]),
  cmdRule("href", ["hyperref"]),
  cmdRule("url", ["url", "hyperref"]),
  envRule("lstlisting", ["listings"]),
  envRule("algorithm", ["algorithm", "algorithm2e"]),
  envRule("align", ["amsmath", "mathtools"]),
  envRule("gather", ["amsmath", "mathtools"]),
  cmdRule("multirow", ["multirow"]),
];

// Packages a document class loads on its own
const CLASS_PACKAGES: ReadonlyMap<string, readonly string[]> = new Map([
  ["beamer", ["hyperref", "graphicx"]],
]);

const DEPRECATED_PACKAGES: ReadonlyMap<string, string> = new Map([
  ["epsfig", "graphicx"],
  ["psfig", "graphicx"],
  ["subfigure", "subcaption"],
  ["caption2", "caption"],
  ["a4wide", "geometry"],
  ["times", "newtxtext/newtxmath or mathptmx"],
  ["palatino", "newpxtext/newpxmath or mathpazo"],
  ["fancyheadings", "fancyhdr"],
  ["scrpage2", "scrlayer-scrpage"],
  ["doublespace", "setspace"],
  ["isolatin1", "inputenc"],
  ["t1enc", "fontenc with the T1 option"],
  ["floatflt", "wrapfig"],
]);

const FONT_SWITCHES: ReadonlyMap<string, string> = new Map([
  ["bf", "\\textbf{...} or \\bfseries"],
  ["it", "\\textit{...} or \\itshape"],
  ["rm", "\\textrm{...} or \\rmfamily"],
  ["sf", "\\textsf{...} or \\sffamily"],
  ["sc", "\\textsc{...} or \\scshape"],
  ["sl", "\\textsl{...} or \\slshape"],
  ["tt", "\\texttt{...} or \\ttfamily"],
]);

// Classes that are not organised in sections
const UNSECTIONED_CLASSES: ReadonlySet<string> = new Set(["beamer", "letter", "standalone"]);

const LOAD_PACKAGE = /\\(?:usepackage|RequirePackage)\s*(?:\[[^\]]*\])?\s*\{([^}]*)\}/g;
const FONT_SWITCH = /\\(bf|it|rm|sf|sc|sl|tt)(?![A-Za-z])/g;
const TITLE = /\\title\s*(?:\[[^\]]*\])?\s*\{/g;
const AUTHOR = /\\author\s*(?:\[[^\]]*\])?\s*\{/g;
const MAKETITLE = /\\maketitle(?![A-Za-z])/g;
const SECTIONING = /\\(?:part|chapter|section|subsection|subsubsection)(?![A-Za-z])/g;
const BLANK_RUN = /\n(?:[ \t]*\r?\n){2,}/;

/** Loaded package names mapped to the offset of their first \usepackage. */
function loadedPackages(text: string): Map<string, number> {
  const loaded = new Map<string, number>();
  for (const m of commandMatches(text, LOAD_PACKAGE)) {
    for (const raw of m[1].split(",")) {
      const name = raw.trim();
      if (name && !loaded.has(name)) loaded.set(name, m.index);
    }
  }
  return loaded;
}

function missingPackages(text: string, index: LineIndex, loaded: Map<string, number>, documentClass?: string): MissingPackage[] {
  const implied: readonly string[] = documentClass ? CLASS_PACKAGES.get(documentClass) ?? [] : [];
  const out: MissingPackage[] = [];
  for (const rule of PACKAGE_RULES) {
    if (rule.packages.some((p) => loaded.has(p) || implied.includes(p))) continue;
    const at = firstCommand(text, rule.pattern);
    if (at >= 0) out.push({ kind: "MissingPackage", use: rule.use, packages: rule.packages, at: index.positionAt(at) });
  }
  return out;
}

function deprecatedPackages(index: LineIndex, loaded: Map<string, number>): DeprecatedPackage[] {
  const out: DeprecatedPackage[] = [];
  for (const [name, offset] of loaded) {
    const replacement = DEPRECATED_PACKAGES.get(name);
    if (replacement) out.push({ kind: "DeprecatedPackage", name, replacement, at: index.positionAt(offset) });
  }
  return out;
}

function obsoleteFontCommands(text: string, index: LineIndex): ObsoleteFontCommand[] {
  const seen = new Set<string>();
  const out: ObsoleteFontCommand[] = [];
  for (const m of commandMatches(text, FONT_SWITCH)) {
    const command = m[1];
    const replacement = FONT_SWITCHES.get(command);
    if (!replacement || seen.has(command)) continue;
    seen.add(command);
    out.push({ kind: "ObsoleteFontCommand", command, replacement, at: index.positionAt(m.index) });
  }
  return out;
}

export interface StrictCheckContext {
  index: LineIndex;
  documentClass?: string;
}

export function runStrictChecks(text: string, ctx: StrictCheckContext): WarningFinding[] {
  const { index, documentClass } = ctx;
  const loaded = loadedPackages(text);
  const warnings: WarningFinding[] = [
    ...missingPackages(text, index, loaded, documentClass),
    ...deprecatedPackages(index, loaded),
    ...obsoleteFontCommands(text, index),
  ];

  if (firstCommand(text, TITLE) >= 0 && firstCommand(text, AUTHOR) >= 0 && firstCommand(text, MAKETITLE) < 0) {
    warnings.push({ kind: "MaketitleMissing" });
  }

  const blank = text.search(BLANK_RUN);
  if (blank >= 0) warnings.push({ kind: "ExcessBlankLines", at: index.positionAt(blank) });

  const unsectioned = documentClass !== undefined && UNSECTIONED_CLASSES.has(documentClass);
  if (!unsectioned && firstCommand(text, SECTIONING) < 0) {
    warnings.push({ kind: "NoSectioning" });
  }
  return warnings;
}
