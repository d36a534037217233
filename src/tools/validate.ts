import { loadConfig } from "../config/load.js";
import type { BraceRecovery } from "../config/schema.js";
import { ToolError } from "../utils/errors.js";
import { LATEX_SOURCE_EXTENSIONS, TextEncoding, readTextWithFallback } from "../utils/files.js";
import { resolveInputPath } from "../utils/security.js";
import { timedSync } from "../utils/timing.js";
import {
  ErrorFinding,
  ValidationMode,
  WarningFinding,
  describeFinding,
  isValidationMode,
  validateDocument,
} from "../validation/index.js";

export interface ValidateArgs {
  path: string;
  mode?: string;
  // Overrides the configured policy
  braceRecovery?: BraceRecovery;
}

export interface ValidateToolResult {
  path: string;
  mode: ValidationMode;
  valid: boolean;
  errors: string[];
  warnings: string[];
  findings: { errors: ErrorFinding[]; warnings: WarningFinding[] };
  encoding: TextEncoding;
  elapsedMs: number;
}

/**
 * Validate the structure of a LaTeX source file without compiling it.
 * Throws ToolError when the file cannot be read; structural problems are
 * reported in the result.
 */
export function validateLatexFile(args: ValidateArgs): ValidateToolResult {
  const mode = args.mode ?? "quick";
  if (!isValidationMode(mode)) {
    throw new ToolError("invalid-argument", `Unknown validation mode '${mode}' (expected quick or strict)`);
  }
  const src = resolveInputPath(args.path, { extensions: LATEX_SOURCE_EXTENSIONS });
  const braceRecovery = args.braceRecovery ?? loadConfig().braceRecovery;

  const { value, elapsedMs } = timedSync(() => {
    const { text, encoding } = readTextWithFallback(src.path);
    return { encoding, result: validateDocument(text, { mode, braceRecovery }) };
  });
  const { result, encoding } = value;

  return {
    path: src.path,
    mode,
    valid: result.valid,
    errors: result.errors.map(describeFinding),
    warnings: result.warnings.map(describeFinding),
    findings: { errors: result.errors, warnings: result.warnings },
    encoding,
    elapsedMs,
  };
}
