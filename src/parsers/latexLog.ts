/**
 * TeX log parser.
 *
 * Turns the engine's log into structured diagnostics:
 * - `file:line: message` lines (-file-line-error style)
 * - `! message` error blocks, with the `l.<n>` marker that follows them
 * - missing files/packages (LaTeX Error: File `...' not found, kpathsea)
 * - LaTeX and package warnings (undefined citations/references, rerun requests)
 * - over/underfull boxes with their source line range
 * - the final "Output written on" / "No pages of output" summary
 *
 * TeX logs are loosely structured, so this is heuristic.
 */

export interface Diagnostic {
  type: "error" | "warning" | "info";
  message: string;
  file?: string;
  line?: number;
  code?: string;
  hint?: string;
}

interface ErrorRule {
  pattern: RegExp;
  code: string;
  hint: (m: RegExpExecArray) => string;
}

const ERROR_RULES: readonly ErrorRule[] = [
  {
    pattern: /^Undefined control sequence/,
    code: "undefined-control-sequence",
    hint: () => "Check for typos or a missing \\usepackage providing this command",
  },
  {
    pattern: /LaTeX Error: Environment (\S+) undefined/,
    code: "undefined-environment",
    hint: (m) => `Environment '${m[1]}' is not defined; check its spelling or load the package that provides it`,
  },
  {
    pattern: /^Missing \$ inserted/,
    code: "missing-dollar",
    hint: () => "A math-only command was used in text mode, or a $ is unbalanced",
  },
  {
    pattern: /^Too many \}'s/,
    code: "extra-brace",
    hint: () => "Remove the extra closing brace or add the missing opening one",
  },
  {
    pattern: /^Runaway argument/,
    code: "runaway-argument",
    hint: () => "An argument is missing its closing brace",
  },
  {
    pattern: /LaTeX Error: \\begin\{(\S+)\} .*ended by \\end\{(\S+)\}/,
    code: "environment-mismatch",
    hint: (m) => `\\begin{${m[1]}} is closed by \\end{${m[2]}}`,
  },
  {
    pattern: /^Emergency stop/,
    code: "emergency-stop",
    hint: () => "TeX stopped early; fix the first error reported above",
  },
];

const FILE_LINE_ERROR_RE = /^(.+?\.(?:tex|ltx|latex|sty|cls|bib|bbl)):(\d+):\s*(.*)$/;
const BANG_RE = /^! (.*)$/;
const L_DOT_RE = /^l\.(\d+)\b/;
const LATEX_MISSING_FILE_RE = /LaTeX Error:\s*File\s*`([^']+)'\s*not found/;
const KPATHSEA_MISSING_RE = /kpathsea:.*?file\s*`([^']+)'\s*not found/;
const WARNING_RE = /^(?:LaTeX|Package\s+\S+|Class\s+\S+)\s+Warning:\s*(.*)$/;
const WARNING_LINE_RE = /on input line (\d+)/;
const BOX_RE = /^(Overfull|Underfull) \\([hv]box)\s*\([^)]*\)\s+(?:in paragraph|in alignment|detected) at lines?\s+(\d+)(?:--(\d+))?/;
const OUTPUT_RE = /^Output written on (.+?) \((\d+) pages?/;

// Files opened by TeX show up as "(./chapter.tex" and close with ")"
const PUSH_FILE_RE = /\(((?:\.{0,2}\/)?[^()\s]+\.(?:tex|ltx|sty|cls|bbl|aux))/g;
const POP_FILE_RE = /^\s*\)+\s*$/;

// How far after "! ..." to look for the "l.<n>" marker
const L_DOT_LOOKAHEAD = 12;

function asPkgName(maybeFile: string): string | undefined {
  const m = /^(.*)\.sty$/i.exec(maybeFile.trim());
  return m ? m[1] : undefined;
}

function missingFileDiagnostic(file: string, at: string | undefined): Diagnostic {
  const pkg = asPkgName(file);
  return {
    type: "error",
    message: `Missing file: ${file}`,
    file: at,
    code: pkg ? "missing-package" : "missing-file",
    hint: pkg
      ? `Package missing: install '${pkg}' with your TeX distribution's package manager (tlmgr install ${pkg})`
      : "Check the path and that the file is part of the project (see \\graphicspath for images)",
  };
}

function classifyError(message: string): Pick<Diagnostic, "code" | "hint"> {
  for (const rule of ERROR_RULES) {
    const m = rule.pattern.exec(message);
    if (m) return { code: rule.code, hint: rule.hint(m) };
  }
  return {};
}

function lookAheadLine(lines: string[], from: number): number | undefined {
  const end = Math.min(lines.length, from + L_DOT_LOOKAHEAD);
  for (let j = from; j < end; j++) {
    const m = L_DOT_RE.exec(lines[j]);
    if (m) return Number(m[1]);
  }
  return undefined;
}

function normalize(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

export function parseLatexLog(text: string): Diagnostic[] {
  const diags: Diagnostic[] = [];
  const lines = text.split(/\r?\n/);
  const fileStack: string[] = [];
  const currentFile = () => (fileStack.length ? fileStack[fileStack.length - 1] : undefined);
  const add = (d: Diagnostic) => { diags.push({ ...d, message: normalize(d.message) }); };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    for (const m of line.matchAll(PUSH_FILE_RE)) fileStack.push(m[1]);
    if (POP_FILE_RE.test(line)) {
      const closes = line.trim().length;
      for (let k = 0; k < closes; k++) fileStack.pop();
      continue;
    }

    let m = LATEX_MISSING_FILE_RE.exec(line) || KPATHSEA_MISSING_RE.exec(line);
    if (m) {
      add(missingFileDiagnostic(m[1], currentFile()));
      continue;
    }

    m = FILE_LINE_ERROR_RE.exec(line);
    if (m) {
      const message = m[3];
      add({ type: "error", message, file: m[1], line: Number(m[2]), ...classifyError(message) });
      continue;
    }

    m = BANG_RE.exec(line);
    if (m) {
      const message = m[1];
      add({ type: "error", message, file: currentFile(), line: lookAheadLine(lines, i + 1), ...classifyError(message) });
      continue;
    }

    m = WARNING_RE.exec(line);
    if (m) {
      // Warnings wrap onto following lines until a blank line
      let message = m[1];
      let j = i + 1;
      while (j < lines.length && lines[j].trim() !== "" && /^\s|^\(\S+\)\s/.test(lines[j])) {
        message += " " + lines[j].replace(/^\(\S+\)\s*/, "").trim();
        j++;
      }
      i = j - 1;
      const lineNo = WARNING_LINE_RE.exec(message);
      let code: string | undefined;
      let hint: string | undefined;
      if (/Citation .* undefined|There were undefined citations/.test(message)) {
        code = "citation-undefined";
        hint = "Run the bibliography tool (biber/bibtex) and compile again";
      } else if (/Reference .* undefined|There were undefined references/.test(message)) {
        code = "reference-undefined";
        hint = "Compile again so cross-references resolve, or check the \\label exists";
      } else if (/Label\(s\) may have changed|Rerun to get/.test(message)) {
        code = "rerun";
        hint = "Compile again so cross-references update";
      }
      add({ type: "warning", message, file: currentFile(), line: lineNo ? Number(lineNo[1]) : undefined, code, hint });
      continue;
    }

    m = BOX_RE.exec(line);
    if (m) {
      const start = Number(m[3]);
      const end = m[4] ? Number(m[4]) : start;
      add({
        type: "warning",
        message: line,
        file: currentFile(),
        line: start,
        code: `${m[1].toLowerCase()}-${m[2]}`,
        hint: end !== start ? `Paragraph spans lines ${start}-${end}` : undefined,
      });
      continue;
    }

    m = OUTPUT_RE.exec(line);
    if (m) {
      const pages = Number(m[2]);
      add({ type: "info", message: `Output written on ${m[1]} (${pages} page${pages === 1 ? "" : "s"})`, code: "output" });
      continue;
    }

    if (/^No pages of output\./.test(line)) {
      add({ type: "warning", message: "No pages of output", code: "no-output", hint: "The document body produced nothing to typeset" });
    }
  }

  return diags;
}
