import type { SourcePosition } from "./source.js";

export interface MissingDocumentClass {
  kind: "MissingDocumentClass";
  // Set when \documentclass only appears after \begin{document}
  misplacedAt?: SourcePosition;
}

export interface MissingBeginDocument {
  kind: "MissingBeginDocument";
}

export interface MissingEndDocument {
  kind: "MissingEndDocument";
}

export interface UnbalancedBraces {
  kind: "UnbalancedBraces";
  // < 0: closing braces without an opener; > 0: openers never closed
  delta: number;
  // first unmatched closing brace (delta < 0 only)
  at?: SourcePosition;
}

export interface UnmatchedEnvironment {
  kind: "UnmatchedEnvironment";
  name: string;
  side: "begin" | "end";
  at: SourcePosition;
}

export type ErrorFinding =
  | MissingDocumentClass
  | MissingBeginDocument
  | MissingEndDocument
  | UnbalancedBraces
  | UnmatchedEnvironment;

export interface MissingPackage {
  kind: "MissingPackage";
  use: string;
  packages: readonly string[];
  at: SourcePosition;
}

export interface DeprecatedPackage {
  kind: "DeprecatedPackage";
  name: string;
  replacement: string;
  at: SourcePosition;
}

export interface ObsoleteFontCommand {
  kind: "ObsoleteFontCommand";
  command: string;
  replacement: string;
  at: SourcePosition;
}

export interface MaketitleMissing {
  kind: "MaketitleMissing";
}

export interface ExcessBlankLines {
  kind: "ExcessBlankLines";
  at: SourcePosition;
}

export interface NoSectioning {
  kind: "NoSectioning";
}

export type WarningFinding =
  | MissingPackage
  | DeprecatedPackage
  | ObsoleteFontCommand
  | MaketitleMissing
  | ExcessBlankLines
  | NoSectioning;

export type Finding = ErrorFinding | WarningFinding;

export interface ValidationResult {
  // false exactly when `errors` is non-empty
  valid: boolean;
  errors: ErrorFinding[];
  warnings: WarningFinding[];
}

const where = (at: SourcePosition) => `line ${at.line}, column ${at.column}`;

export function describeFinding(f: Finding): string {
  switch (f.kind) {
    case "MissingDocumentClass":
      return f.misplacedAt
        ? `\\documentclass must come before \\begin{document} (found at ${where(f.misplacedAt)})`
        : "Missing \\documentclass command";
    case "MissingBeginDocument":
      return "Missing \\begin{document}";
    case "MissingEndDocument":
      return "Missing \\end{document}";
    case "UnbalancedBraces":
      if (f.delta < 0) {
        const loc = f.at ? ` at ${where(f.at)}` : "";
        return `Unmatched closing brace }${loc} (${-f.delta} extra)`;
      }
      return `Unmatched opening braces: ${f.delta} unclosed`;
    case "UnmatchedEnvironment":
      return f.side === "begin"
        ? `Unclosed environment: ${f.name} (\\begin at ${where(f.at)})`
        : `Environment ended without matching begin: ${f.name} (\\end at ${where(f.at)})`;
    case "MissingPackage": {
      const pkgs = f.packages.map((p) => `'${p}'`).join(" or ");
      return `'${f.use}' used at ${where(f.at)} but package ${pkgs} not loaded`;
    }
    case "DeprecatedPackage":
      return `Package '${f.name}' is obsolete; use ${f.replacement} instead (${where(f.at)})`;
    case "ObsoleteFontCommand":
      return `Obsolete font command \\${f.command} at ${where(f.at)}; use ${f.replacement}`;
    case "MaketitleMissing":
      return "Title and author defined but \\maketitle not called";
    case "ExcessBlankLines":
      return `Multiple consecutive blank lines at ${where(f.at)}`;
    case "NoSectioning":
      return "No section structure found in document";
  }
}
