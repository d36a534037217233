export { validateDocument, isValidationMode, VALIDATION_MODES } from "./structure.js";
export type { ValidateOptions, ValidationMode } from "./structure.js";
export { scanBraces } from "./braces.js";
export type { BraceScan, BraceScanOptions } from "./braces.js";
export { matchEnvironments } from "./environments.js";
export type { EnvironmentStackEntry } from "./environments.js";
export { runStrictChecks } from "./heuristics.js";
export { describeFinding } from "./findings.js";
export type { ErrorFinding, WarningFinding, Finding, ValidationResult } from "./findings.js";
export { LineIndex, maskComments } from "./source.js";
export type { SourcePosition } from "./source.js";
