import { z } from "zod";

export const ENGINES = ["pdflatex", "xelatex", "lualatex"] as const;
export type Engine = (typeof ENGINES)[number];

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// What the brace scanner does after an unmatched closing brace
export const BRACE_RECOVERY = ["continue", "stop"] as const;
export type BraceRecovery = (typeof BRACE_RECOVERY)[number];

export const ConfigSchema = z.object({
  // Root of the workspace; paths must reside under this directory when set
  workspaceRoot: z.string().min(1).optional(),
  // Allow shell escape (default false unless enabled)
  allowShellEscape: z.boolean(),
  // Default TeX engine for compilation
  defaultEngine: z.enum(ENGINES),
  // Default compile timeout per engine pass
  compileTimeoutMs: z.number().int().positive(),
  braceRecovery: z.enum(BRACE_RECOVERY),
  logLevel: z.enum(LOG_LEVELS),
});

export type Config = z.infer<typeof ConfigSchema>;

export const defaultConfig: Config = {
  allowShellEscape: false,
  defaultEngine: "pdflatex",
  compileTimeoutMs: 60_000,
  braceRecovery: "continue",
  logLevel: "info",
};
