/**
 * MCP server definition.
 *
 * Exposed tools:
 *  - latex.compile
 *  - latex.validate
 *  - pdf.info
 *  - latex.clean
 *
 * Handlers are thin adapters over src/tools. Results are returned as pretty
 * JSON text; any thrown error becomes an `isError` result so the client sees
 * the message instead of a protocol failure. The stdio entry point lives in
 * main.ts.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { loadConfig } from "../config/load.js";
import { ENGINES } from "../config/schema.js";
import { compileLatex, MAX_PASSES } from "../tools/compile.js";
import { validateLatexFile } from "../tools/validate.js";
import { extractPdfInfo } from "../tools/pdfInfo.js";
import { cleanLatex } from "../tools/cleanup.js";
import { errorMessage } from "../utils/errors.js";
import { Logger, createLogger } from "../utils/log.js";
import { VALIDATION_MODES } from "../validation/index.js";

export const SERVER_NAME = "latex-tools-mcp";
export const SERVER_VERSION = "0.1.0";

// ---------------------------------------------------------------------------
// Zod shapes for tool inputs (registerTool takes a raw shape, not a ZodObject)
// ---------------------------------------------------------------------------

const LatexCompileInput = {
  path: z.string().describe("Path to the .tex file to compile"),
  engine: z.enum(ENGINES).optional().describe("TeX engine (default from configuration, usually pdflatex)"),
  outDir: z.string().optional().describe("Output directory; created if missing. Defaults to the source directory"),
  timeoutMs: z.number().int().positive().optional().describe("Timeout per engine pass in milliseconds"),
  passes: z.number().int().min(1).max(MAX_PASSES).optional().describe("Number of engine runs (default 1)"),
  shellEscape: z.boolean().optional().describe("Enable \\write18 (refused unless allowed in configuration)"),
} as const;

const LatexValidateInput = {
  path: z.string().describe("Path to the .tex file to validate"),
  mode: z.enum(VALIDATION_MODES).optional().describe("quick: structural errors only; strict: also style and package warnings"),
} as const;

const PdfInfoInput = {
  path: z.string().describe("Path to the PDF file to inspect"),
  includeText: z.boolean().optional().describe("Also return the text of every page"),
  password: z.string().optional().describe("Password for an encrypted PDF"),
} as const;

const LatexCleanInput = {
  path: z.string().describe("A .tex file (cleans its build files) or a directory"),
  extensions: z.array(z.string()).nonempty().optional().describe("Extensions to remove (default: common LaTeX auxiliary files)"),
  dryRun: z.boolean().optional().describe("List what would be removed without removing it"),
  recursive: z.boolean().optional().describe("Descend into subdirectories (directory targets only)"),
  backup: z.boolean().optional().describe("Copy files into a timestamped backup directory before removing them"),
} as const;

// ---------------------------------------------------------------------------
// Result helpers
// ---------------------------------------------------------------------------

function jsonResult(value: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

function errorResult(err: unknown): CallToolResult {
  return { content: [{ type: "text", text: `Error: ${errorMessage(err)}` }], isError: true };
}

async function runTool(log: Logger, name: string, fn: () => unknown): Promise<CallToolResult> {
  log.debug("%s: start", name);
  try {
    const result = await fn();
    log.debug("%s: done", name);
    return jsonResult(result);
  } catch (err: unknown) {
    log.error("%s failed: %s", name, errorMessage(err));
    return errorResult(err);
  }
}

export interface ServerOptions {
  logger?: Logger;
}

export function createServer(opts: ServerOptions = {}): McpServer {
  const log = opts.logger ?? createLogger(SERVER_NAME, loadConfig().logLevel);
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    "latex.compile",
    {
      title: "Compile LaTeX",
      description: "Compile a .tex file to PDF with pdflatex, xelatex or lualatex and return structured diagnostics from the log",
      inputSchema: LatexCompileInput,
    },
    (args, extra) => runTool(log, "latex.compile", () => compileLatex({ ...args, signal: extra.signal }))
  );

  server.registerTool(
    "latex.validate",
    {
      title: "Validate LaTeX",
      description: "Check document structure (documentclass, begin/end document, brace balance, environment nesting) without compiling",
      inputSchema: LatexValidateInput,
    },
    (args) => runTool(log, "latex.validate", () => validateLatexFile(args))
  );

  server.registerTool(
    "pdf.info",
    {
      title: "PDF info",
      description: "Page count, page sizes, PDF version, encryption flag, document metadata and optionally page text",
      inputSchema: PdfInfoInput,
    },
    (args) => runTool(log, "pdf.info", () => extractPdfInfo(args))
  );

  server.registerTool(
    "latex.clean",
    {
      title: "Clean LaTeX build files",
      description: "Remove auxiliary files (.aux, .log, .toc, ...) for a .tex file or in a directory",
      inputSchema: LatexCleanInput,
    },
    (args) => runTool(log, "latex.clean", () => cleanLatex(args))
  );

  return server;
}
