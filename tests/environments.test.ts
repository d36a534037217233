import { describe, it, expect } from "vitest";
import { matchEnvironments } from "../src/validation/environments.js";
import { LineIndex } from "../src/validation/source.js";

describe("matchEnvironments", () => {
  it("matches identical nested names in LIFO order", () => {
    expect(matchEnvironments("\\begin{a}\\begin{a}\\end{a}\\end{a}")).toEqual([]);
  });

  it("reports a crossing close and the environment left open", () => {
    expect(matchEnvironments("\\begin{a}\\begin{b}\\end{a}\\end{b}")).toEqual([
      { kind: "UnmatchedEnvironment", name: "a", side: "end", at: { offset: 18, line: 1, column: 19 } },
      { kind: "UnmatchedEnvironment", name: "a", side: "begin", at: { offset: 0, line: 1, column: 1 } },
    ]);
  });

  it("reports exactly one unclosed begin when one end is missing", () => {
    const findings = matchEnvironments("\\begin{foo}\n\\begin{foo}\n\\end{foo}");
    expect(findings).toEqual([
      { kind: "UnmatchedEnvironment", name: "foo", side: "begin", at: { offset: 0, line: 1, column: 1 } },
    ]);
  });

  it("reports an end without any begin", () => {
    expect(matchEnvironments("text\n\\end{itemize}")).toEqual([
      { kind: "UnmatchedEnvironment", name: "itemize", side: "end", at: { offset: 5, line: 2, column: 1 } },
    ]);
  });

  it("accepts starred names and whitespace before the brace", () => {
    expect(matchEnvironments("\\begin {align*}x\\end{align*}")).toEqual([]);
  });

  it("skips markers whose backslash is escaped", () => {
    expect(matchEnvironments("\\\\begin{x}")).toEqual([]);
  });
});

describe("LineIndex", () => {
  it("maps offsets to 1-based line and column", () => {
    const idx = new LineIndex("ab\ncd");
    expect(idx.positionAt(0)).toEqual({ offset: 0, line: 1, column: 1 });
    expect(idx.positionAt(3)).toEqual({ offset: 3, line: 2, column: 1 });
    expect(idx.positionAt(4)).toEqual({ offset: 4, line: 2, column: 2 });
  });
});
