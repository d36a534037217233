import fs from "node:fs";
import path from "node:path";
import { Config, ConfigSchema, defaultConfig } from "./schema.js";

export const CONFIG_FILE_NAME = ".latex-tools-mcp.json";

let _cfgCache: Config | null = null;

function readJsonIfExists(p: string): unknown {
  if (!fs.existsSync(p)) return {};
  const raw = fs.readFileSync(p, "utf8");
  try {
    return JSON.parse(raw);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid JSON in ${p}: ${reason}`);
  }
}

function isTruthy(v: string): boolean {
  const s = v.toLowerCase();
  return s === "1" || s === "true" || s === "on" || s === "yes";
}

// Environment overrides; values stay raw so the schema reports bad ones by name
function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (env.WORKSPACE_ROOT) out.workspaceRoot = path.resolve(env.WORKSPACE_ROOT);
  if (env.LATEX_TOOLS_ALLOW_SHELL_ESCAPE) out.allowShellEscape = isTruthy(env.LATEX_TOOLS_ALLOW_SHELL_ESCAPE);
  if (env.LATEX_TOOLS_ENGINE) out.defaultEngine = env.LATEX_TOOLS_ENGINE;
  if (env.LATEX_TOOLS_TIMEOUT_MS) out.compileTimeoutMs = Number(env.LATEX_TOOLS_TIMEOUT_MS);
  if (env.LATEX_TOOLS_BRACE_RECOVERY) out.braceRecovery = env.LATEX_TOOLS_BRACE_RECOVERY;
  if (env.LATEX_TOOLS_LOG_LEVEL) out.logLevel = env.LATEX_TOOLS_LOG_LEVEL;
  return out;
}

/**
 * Merge defaults, the optional project file at `<workspace>/.latex-tools-mcp.json`
 * and environment variables, in that order of precedence (last wins).
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Config {
  const envCfg = fromEnv(env);
  const ws = typeof envCfg.workspaceRoot === "string" ? envCfg.workspaceRoot : cwd;
  const fileCfg = readJsonIfExists(path.join(ws, CONFIG_FILE_NAME));
  const fileObj = typeof fileCfg === "object" && fileCfg !== null ? fileCfg : {};

  const parsed = ConfigSchema.safeParse({ ...defaultConfig, ...fileObj, ...envCfg });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  const cfg = parsed.data;
  if (cfg.workspaceRoot) cfg.workspaceRoot = path.resolve(ws, cfg.workspaceRoot);
  return cfg;
}

export function loadConfig(): Config {
  if (_cfgCache) return _cfgCache;
  _cfgCache = resolveConfig();
  return _cfgCache;
}

export function reloadConfig(): Config {
  _cfgCache = null;
  return loadConfig();
}
