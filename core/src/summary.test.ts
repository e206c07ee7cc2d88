import { describe, expect, it } from "vitest";
import { createDryRunSummary, createSummary } from "./summary";
import type { AnalysisResult, CommentMap, SymbolKind, SymbolRecord } from "./types";

function record(name: string, kind: SymbolKind, line: number, sourceFile: string): SymbolRecord {
  return { name, kind, sourceFile, line, offset: 0, language: "python" };
}

const results: AnalysisResult = new Map([
  [
    "a.py",
    [
      record("calc", "function", 1, "a.py"),
      record("calc", "function", 1, "a.py"),
      record("Proc", "class", 3, "a.py")
    ]
  ],
  ["b.py", [record("start", "function", 1, "b.py")]],
  ["c.py", [record("orphan", "function", 1, "c.py")]]
]);

const comments: CommentMap = new Map([
  [
    "a.py",
    new Map([
      ["calc", "C1"],
      ["Proc", "P1"]
    ])
  ],
  ["b.py", new Map([["start", "S1"]])]
]);

describe("createSummary", () => {
  it("lists each documented symbol once per file with totals", () => {
    expect(createSummary(results, comments)).toBe(
      [
        "docgap summary",
        "=".repeat(50),
        "",
        "a.py",
        "  - function: calc",
        "  - class: Proc",
        "",
        "b.py",
        "  - function: start",
        "",
        "Total files to modify: 2",
        "Total functions/classes to document: 3"
      ].join("\n")
    );
  });
});

describe("createDryRunSummary", () => {
  it("appends a comment preview", () => {
    const summary = createDryRunSummary(results, comments);
    expect(summary.split("\n")[0]).toBe("docgap dry run summary");
    expect(summary.endsWith(
      ["Generated comments preview:", "-".repeat(30), "", "calc:", "C1", "", "Proc:", "P1", "", "start:", "S1"].join("\n")
    )).toBe(true);
  });

  it("previews at most three files and two symbols per file", () => {
    const many: AnalysisResult = new Map();
    const manyComments: CommentMap = new Map();
    for (const file of ["1", "2", "3", "4"]) {
      const names = ["a", "b", "c"].map((suffix) => `s${file}${suffix}`);
      many.set(`${file}.py`, names.map((name, index) => record(name, "function", index + 1, `${file}.py`)));
      manyComments.set(`${file}.py`, new Map(names.map((name) => [name, "c"])));
    }

    const preview = createDryRunSummary(many, manyComments).split(`Generated comments preview:\n${"-".repeat(30)}`)[1];

    const expected = ["1", "2", "3"]
      .flatMap((file) => [`\ns${file}a:`, "c", `\ns${file}b:`, "c"])
      .map((line) => `\n${line}`)
      .join("");
    expect(preview).toBe(expected);
    expect(createDryRunSummary(many, manyComments)).toContain("Total functions/classes to document: 12");
  });
});
