import { afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import { createAnalyzer } from "./analyzer";
import { createGrammarRegistry, loadGrammars, type GrammarRegistry, type GrammarState } from "./grammarRegistry";
import { getAllAdapters, getLanguageAdapter } from "./language";
import type { SyntaxArena } from "./treeAnalyzer";
import type { LanguageId } from "./types";

afterEach(() => {
  vi.restoreAllMocks();
});

const code = "def a():\n    pass\ndef b():\n    pass\n";

// Only `a` is in the tree, so a result naming `b` can only come from the regex rules.
const arenaWithA: SyntaxArena = {
  nodes: [
    { type: "module", startIndex: 0, endIndex: code.length, startRow: 0, children: [1] },
    { type: "function_definition", startIndex: 0, endIndex: 17, startRow: 0, children: [2] },
    { type: "identifier", startIndex: 4, endIndex: 5, startRow: 0, children: [] }
  ]
};

function registryWith(state: GrammarState) {
  return createGrammarRegistry(new Map<LanguageId, GrammarState>([["python", state]]));
}

describe("createGrammarRegistry", () => {
  it("reports languages it was not given as unavailable", () => {
    expect(createGrammarRegistry().get("rust")).toEqual({ status: "unavailable", reason: "grammar not loaded" });
  });
});

describe("loadGrammars", () => {
  it("marks a grammar that cannot be loaded as unavailable", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const registry = await loadGrammars([getLanguageAdapter("python")], {
      locateGrammar: () => "/nonexistent/docgap/tree-sitter-python.wasm"
    });

    expect(registry.get("python").status).toBe("unavailable");
    expect(registry.diagnostics).toHaveLength(1);
    expect(registry.diagnostics[0]).toMatchObject({ kind: "parser-unavailable", language: "python" });
  });
});

describe("engine selection", () => {
  it("uses the tree engine when the grammar is parsed", () => {
    const analyzer = createAnalyzer({ grammars: registryWith({ status: "parsed", parse: () => arenaWithA }) });
    expect(analyzer.analyzeSource(code, "ab.py").map((record) => record.name)).toEqual(["a"]);
  });

  it("falls back to regex rules when parsing throws", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const analyzer = createAnalyzer({
      grammars: registryWith({
        status: "parsed",
        parse: () => {
          throw new Error("parser crashed");
        }
      })
    });
    expect(analyzer.analyzeSource(code, "ab.py").map((record) => record.name)).toEqual(["a", "b"]);
  });

  it("falls back to regex rules when the grammar is unavailable", () => {
    const analyzer = createAnalyzer({ grammars: registryWith({ status: "unavailable", reason: "test" }) });
    expect(analyzer.analyzeSource(code, "ab.py").map((record) => record.name)).toEqual(["a", "b"]);
  });
});

const fixtures: Array<{ language: LanguageId; file: string; code: string; names: string[] }> = [
  {
    language: "python",
    file: "shape.py",
    code: "def add(a, b):\n    return a + b\n\nclass Shape:\n    def area(self):\n        return 0\n",
    names: ["add", "Shape", "area"]
  },
  {
    language: "javascript",
    file: "shape.js",
    code: "function add(a, b) {\n  return a + b;\n}\nclass Shape {\n  area() {\n    return 0;\n  }\n}\n",
    names: ["add", "Shape", "area"]
  },
  {
    language: "typescript",
    file: "point.ts",
    code:
      "/** Documented. */\nexport class Foo {}\nexport function add(a: number, b: number): number {\n  return a + b;\n}\n" +
      "interface Point {\n  x: number;\n}\n",
    names: ["add", "Point"]
  },
  {
    language: "java",
    file: "Greeter.java",
    code: "public class Greeter {\n    public String greet(String name) {\n        return name;\n    }\n}\n",
    names: ["Greeter", "greet"]
  },
  {
    language: "c",
    file: "make.c",
    code: "int *make(void) {\n    return 0;\n}\n\nint plain(void) {\n    return 1;\n}\n",
    names: ["make", "plain"]
  },
  {
    language: "cpp",
    file: "shape.cpp",
    code: "class Shape {\npublic:\n    int area() { return 0; }\n};\n\nint& pick(int& a) {\n    return a;\n}\n",
    names: ["Shape", "area", "pick"]
  },
  {
    language: "go",
    file: "point.go",
    code:
      "package main\n\ntype Point struct {\n\tX int\n}\n\nfunc (p Point) Norm() int {\n\treturn p.X\n}\n\n" +
      "func Add(a, b int) int {\n\treturn a + b\n}\n",
    names: ["Point", "Norm", "Add"]
  },
  {
    language: "rust",
    file: "lib.rs",
    code: "pub struct Point {\n    x: i32,\n}\n\npub fn add(a: i32, b: i32) -> i32 {\n    a + b\n}\n",
    names: ["Point", "add"]
  }
];

describe("bundled grammars", () => {
  let grammars: GrammarRegistry = createGrammarRegistry();

  beforeAll(async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    grammars = await loadGrammars(getAllAdapters());
    warn.mockRestore();
  }, 30_000);

  for (const fixture of fixtures) {
    it(`finds undocumented ${fixture.language} definitions in the syntax tree`, (context) => {
      if (grammars.get(fixture.language).status !== "parsed") {
        context.skip();
      }
      const analyzer = createAnalyzer({ grammars });
      expect(analyzer.analyzeSource(fixture.code, fixture.file).map((record) => record.name)).toEqual(fixture.names);
    });
  }
});
