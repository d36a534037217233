import { describe, it, expect } from "vitest";
import { parseLatexLog } from "../src/parsers/latexLog.js";

describe("parseLatexLog", () => {
  it("parses errors, warnings, boxes and the output summary", () => {
    const log = [
      "This is pdfTeX, Version 3.141592653",
      "(./main.tex",
      "LaTeX Warning: Citation `knuth' on page 1 undefined on input line 7.",
      "",
      "./main.tex:12: Undefined control sequence.",
      "l.12 \\foo",
      "! Emergency stop.",
      "Overfull \\hbox (10.0pt too wide) in paragraph at lines 10--12",
      "Output written on main.pdf (1 page, 1234 bytes).",
    ].join("\n");

    const diags = parseLatexLog(log);

    expect(diags).toHaveLength(5);
    expect(diags[0]).toMatchObject({ type: "warning", file: "./main.tex", line: 7, code: "citation-undefined" });
    expect(diags[1]).toMatchObject({
      type: "error",
      message: "Undefined control sequence.",
      file: "./main.tex",
      line: 12,
      code: "undefined-control-sequence",
    });
    expect(diags[2]).toMatchObject({ type: "error", message: "Emergency stop.", file: "./main.tex", code: "emergency-stop" });
    expect(diags[2].line).toBeUndefined();
    expect(diags[3]).toMatchObject({
      type: "warning",
      file: "./main.tex",
      line: 10,
      code: "overfull-hbox",
      hint: "Paragraph spans lines 10-12",
    });
    expect(diags[4]).toEqual({ type: "info", message: "Output written on main.pdf (1 page)", code: "output" });
    expect(diags.filter((d) => d.type === "error")).toHaveLength(2);
  });

  it("takes the line number from the l.<n> marker after a ! error", () => {
    const diags = parseLatexLog("! Undefined control sequence.\n<recently read> \\bad\nl.42 \\bad");
    expect(diags).toHaveLength(1);
    expect(diags[0]).toMatchObject({ type: "error", line: 42, code: "undefined-control-sequence" });
  });

  it("turns a missing .sty into a missing-package error", () => {
    const diags = parseLatexLog("! LaTeX Error: File `foo.sty' not found.");
    expect(diags).toHaveLength(1);
    expect(diags[0]).toMatchObject({ type: "error", message: "Missing file: foo.sty", code: "missing-package" });
    expect(diags[0].hint).toContain("tlmgr install foo");
  });

  it("classifies undefined environments", () => {
    const diags = parseLatexLog("./a.tex:3: LaTeX Error: Environment itemise undefined.");
    expect(diags[0]).toMatchObject({ file: "./a.tex", line: 3, code: "undefined-environment" });
  });

  it("tracks the current file through nested inputs", () => {
    const diags = parseLatexLog("(./a.tex (./b.tex\n)\n! Oops.");
    expect(diags).toEqual([{ type: "error", message: "Oops.", file: "./a.tex" }]);
  });

  it("joins package warnings that wrap onto continuation lines", () => {
    const log = "Package natbib Warning: Citation `x' on page 2 undefined on input\n(natbib)                line 5.\n";
    const diags = parseLatexLog(log);
    expect(diags).toHaveLength(1);
    expect(diags[0]).toMatchObject({
      type: "warning",
      message: "Citation `x' on page 2 undefined on input line 5.",
      line: 5,
      code: "citation-undefined",
    });
  });
});
