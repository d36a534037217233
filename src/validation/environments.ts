import { LineIndex, commandMatches } from "./source.js";
import type { UnmatchedEnvironment } from "./findings.js";

const ENV_TOKEN = /\\(begin|end)\s*\{([A-Za-z*]+)\}/g;

export interface EnvironmentStackEntry {
  name: string;
  offset: number;
}

/**
 * Match `\begin{name}` / `\end{name}` in strict LIFO order.
 *
 * Only the top of the stack is compared: an `\end` that does not close the
 * innermost open environment is reported and leaves the stack as it is.
 * Environments still open at the end are reported in document order.
 */
export function matchEnvironments(text: string, index: LineIndex = new LineIndex(text)): UnmatchedEnvironment[] {
  const stack: EnvironmentStackEntry[] = [];
  const findings: UnmatchedEnvironment[] = [];

  for (const m of commandMatches(text, ENV_TOKEN)) {
    const [, marker, name] = m;
    if (marker === "begin") {
      stack.push({ name, offset: m.index });
      continue;
    }
    const top = stack[stack.length - 1];
    if (top && top.name === name) {
      stack.pop();
    } else {
      findings.push({ kind: "UnmatchedEnvironment", name, side: "end", at: index.positionAt(m.index) });
    }
  }

  for (const open of stack) {
    findings.push({ kind: "UnmatchedEnvironment", name: open.name, side: "begin", at: index.positionAt(open.offset) });
  }
  return findings;
}
