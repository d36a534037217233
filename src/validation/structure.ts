import type { BraceRecovery } from "../config/schema.js";
import { scanBraces } from "./braces.js";
import { matchEnvironments } from "./environments.js";
import { runStrictChecks } from "./heuristics.js";
import { LineIndex, commandMatches, firstCommand, maskComments } from "./source.js";
import type { ErrorFinding, ValidationResult, WarningFinding } from "./findings.js";

export const VALIDATION_MODES = ["quick", "strict"] as const;
export type ValidationMode = (typeof VALIDATION_MODES)[number];

export interface ValidateOptions {
  mode?: ValidationMode;
  braceRecovery?: BraceRecovery;
}

const DOCUMENT_CLASS = /\\documentclass\s*(?:\[[^\]]*\])?\s*\{([^}]+)\}/g;
const BEGIN_DOCUMENT = /\\begin\s*\{document\}/g;
const END_DOCUMENT = /\\end\s*\{document\}/g;

/**
 * Structural checks over a whole document. Findings are appended in a fixed
 * order: document class, begin/end document, braces, environments. Every
 * input, including empty text, yields a result. `%` comments are ignored.
 */
export function validateDocument(raw: string, opts: ValidateOptions = {}): ValidationResult {
  const mode = opts.mode ?? "quick";
  const text = maskComments(raw);
  const index = new LineIndex(text);
  const errors: ErrorFinding[] = [];

  const classMatch = commandMatches(text, DOCUMENT_CLASS)[0];
  const beginAt = firstCommand(text, BEGIN_DOCUMENT);
  const endAt = firstCommand(text, END_DOCUMENT);

  if (!classMatch) {
    errors.push({ kind: "MissingDocumentClass" });
  } else if (beginAt >= 0 && classMatch.index > beginAt) {
    errors.push({ kind: "MissingDocumentClass", misplacedAt: index.positionAt(classMatch.index) });
  }
  if (beginAt < 0) errors.push({ kind: "MissingBeginDocument" });
  if (endAt < 0) errors.push({ kind: "MissingEndDocument" });

  const braces = scanBraces(text, { recovery: opts.braceRecovery });
  if (braces.unmatchedClosers.length) {
    errors.push({
      kind: "UnbalancedBraces",
      delta: -braces.unmatchedClosers.length,
      at: index.positionAt(braces.unmatchedClosers[0]),
    });
  }
  if (braces.depth > 0) {
    errors.push({ kind: "UnbalancedBraces", delta: braces.depth });
  }

  errors.push(...matchEnvironments(text, index));

  const warnings: WarningFinding[] = mode === "strict"
    ? runStrictChecks(text, { index, documentClass: classMatch?.[1].trim() })
    : [];

  return { valid: errors.length === 0, errors, warnings };
}

export function isValidationMode(v: string): v is ValidationMode {
  return v === "quick" || v === "strict";
}
