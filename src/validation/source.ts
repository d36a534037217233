/**
 * Position helpers shared by the scanners.
 */

export interface SourcePosition {
  // 0-based UTF-16 offset into the document text
  offset: number;
  // 1-based
  line: number;
  column: number;
}

const BACKSLASH = 0x5c;
const PERCENT = 0x25;
const LF = 0x0a;
const CR = 0x0d;

// True when the character at `index` is preceded by an odd run of backslashes
function isEscaped(text: string, index: number): boolean {
  let n = 0;
  for (let i = index - 1; i >= 0 && text.charCodeAt(i) === BACKSLASH; i--) n++;
  return n % 2 === 1;
}

/** Maps offsets to line/column; built once per document. */
export class LineIndex {
  private readonly starts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === LF) this.starts.push(i + 1);
    }
  }

  positionAt(offset: number): SourcePosition {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.starts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return { offset, line: lo + 1, column: offset - this.starts[lo] + 1 };
  }
}

/**
 * Matches of `pattern` whose leading backslash is not itself escaped, in
 * document order. The module-level pattern is copied, never mutated.
 */
export function commandMatches(text: string, pattern: RegExp): RegExpExecArray[] {
  const flags = pattern.flags.includes("g") ? pattern.flags : pattern.flags + "g";
  const re = new RegExp(pattern.source, flags);
  const out: RegExpExecArray[] = [];
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    if (m[0].length === 0) re.lastIndex++;
    if (!isEscaped(text, m.index)) out.push(m);
  }
  return out;
}

/** Offset of the first unescaped match of `pattern`, or -1. */
export function firstCommand(text: string, pattern: RegExp): number {
  const flags = pattern.flags.includes("g") ? pattern.flags : pattern.flags + "g";
  const re = new RegExp(pattern.source, flags);
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    if (m[0].length === 0) re.lastIndex++;
    if (!isEscaped(text, m.index)) return m.index;
  }
  return -1;
}

/**
 * Blank out comment text: everything after an unescaped `%` up to the line
 * break becomes spaces. The `%` itself and every offset stay put, so
 * positions reported on the masked text are positions in the original and
 * comment lines never read as blank lines.
 */
export function maskComments(text: string): string {
  if (!text.includes("%")) return text;
  let out = "";
  let from = 0;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) !== PERCENT || isEscaped(text, i)) continue;
    let end = text.indexOf("\n", i);
    if (end < 0) end = text.length;
    if (end - 1 > i && text.charCodeAt(end - 1) === CR) end--;
    out += text.slice(from, i + 1) + " ".repeat(end - i - 1);
    from = end;
    i = end - 1;
  }
  return out + text.slice(from);
}
