import path from "path";
import { Parser, Language, Tree } from "web-tree-sitter";
import type { LanguageAdapter } from "./language";
import type { ArenaNode, SyntaxArena } from "./treeAnalyzer";
import type { Diagnostic, LanguageId } from "./types";

export type GrammarState =
  | { status: "parsed"; parse: (code: string) => SyntaxArena | null }
  | { status: "unavailable"; reason: string };

/**
 * Grammar availability per language, decided once when the registry is
 * built. Nothing is loaded or retried while files are being analyzed.
 */
export type GrammarRegistry = {
  get(language: LanguageId): GrammarState;
  diagnostics: Diagnostic[];
};

export type LoadGrammarsOptions = {
  locateGrammar?: (wasmFile: string) => string;
};

const NOT_LOADED: GrammarState = { status: "unavailable", reason: "grammar not loaded" };

export function createGrammarRegistry(
  states: Map<LanguageId, GrammarState> = new Map(),
  diagnostics: Diagnostic[] = []
): GrammarRegistry {
  return {
    get: (language) => states.get(language) ?? NOT_LOADED,
    diagnostics
  };
}

export function resolveGrammarPath(wasmFile: string): string {
  const packageDir = path.dirname(require.resolve("tree-sitter-wasms/package.json"));
  return path.join(packageDir, "out", wasmFile);
}

let runtime: Promise<void> | null = null;

function initParserRuntime(): Promise<void> {
  if (!runtime) {
    runtime = Parser.init().catch((error: unknown) => {
      runtime = null;
      throw error;
    });
  }
  return runtime;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function flattenTree(tree: Tree): SyntaxArena {
  const nodes: ArenaNode[] = [];
  const parents: number[] = [];
  const cursor = tree.walk();

  try {
    for (;;) {
      const index = nodes.length;
      nodes.push({
        type: cursor.nodeType,
        startIndex: cursor.startIndex,
        endIndex: cursor.endIndex,
        startRow: cursor.startPosition.row,
        children: []
      });
      const parent = parents[parents.length - 1];
      if (parent !== undefined) {
        nodes[parent].children.push(index);
      }

      if (cursor.gotoFirstChild()) {
        parents.push(index);
        continue;
      }
      while (!cursor.gotoNextSibling()) {
        if (!cursor.gotoParent()) {
          return { nodes };
        }
        parents.pop();
      }
    }
  } finally {
    cursor.delete();
  }
}

function createParse(parser: Parser): (code: string) => SyntaxArena | null {
  return (code) => {
    const tree = parser.parse(code);
    if (!tree) {
      return null;
    }
    try {
      return flattenTree(tree);
    } finally {
      tree.delete();
    }
  };
}

/**
 * Load the wasm grammar of every adapter. A language whose grammar fails to
 * load is marked unavailable and falls back to its regex rules; if the
 * runtime itself cannot start, every language does.
 */
export async function loadGrammars(
  adapters: LanguageAdapter[],
  options: LoadGrammarsOptions = {}
): Promise<GrammarRegistry> {
  const locate = options.locateGrammar ?? resolveGrammarPath;
  const states = new Map<LanguageId, GrammarState>();
  const diagnostics: Diagnostic[] = [];

  const markUnavailable = (adapter: LanguageAdapter, reason: string): void => {
    states.set(adapter.id, { status: "unavailable", reason });
    diagnostics.push({ kind: "parser-unavailable", language: adapter.id, message: reason });
    console.warn(
      `[grammarRegistry] ${adapter.displayName} grammar unavailable, using regex rules: ${reason}`
    );
  };

  try {
    await initParserRuntime();
  } catch (error) {
    for (const adapter of adapters) {
      markUnavailable(adapter, `tree-sitter runtime failed to start (${describeError(error)})`);
    }
    return createGrammarRegistry(states, diagnostics);
  }

  for (const adapter of adapters) {
    try {
      const language = await Language.load(locate(adapter.grammar.wasmFile));
      const parser = new Parser();
      parser.setLanguage(language);
      states.set(adapter.id, { status: "parsed", parse: createParse(parser) });
    } catch (error) {
      markUnavailable(adapter, describeError(error));
    }
  }

  return createGrammarRegistry(states, diagnostics);
}
