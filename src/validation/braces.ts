import type { BraceRecovery } from "../config/schema.js";

const BACKSLASH = 0x5c;
const OPEN = 0x7b;
const CLOSE = 0x7d;

export interface BraceScan {
  balanced: boolean;
  // Opening braces still unclosed at the end of the scan (or where it stopped)
  depth: number;
  // Offsets of closing braces seen at depth 0
  unmatchedClosers: number[];
}

export interface BraceScanOptions {
  recovery?: BraceRecovery;
}

/**
 * Count unescaped braces left to right. A closing brace at depth 0 is
 * recorded and the depth stays at 0; with `recovery: "stop"` the scan ends
 * there instead.
 */
export function scanBraces(text: string, opts: BraceScanOptions = {}): BraceScan {
  const recovery = opts.recovery ?? "continue";
  const unmatchedClosers: number[] = [];
  let depth = 0;
  // length of the backslash run immediately before the current character
  let run = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charCodeAt(i);
    if (ch === BACKSLASH) {
      run++;
      continue;
    }
    const escaped = run % 2 === 1;
    run = 0;
    if (escaped) continue;

    if (ch === OPEN) {
      depth++;
    } else if (ch === CLOSE) {
      if (depth > 0) {
        depth--;
      } else {
        unmatchedClosers.push(i);
        if (recovery === "stop") break;
      }
    }
  }

  return { balanced: depth === 0 && unmatchedClosers.length === 0, depth, unmatchedClosers };
}
