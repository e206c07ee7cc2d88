import path from "path";
import { readFile } from "fs/promises";
import fg from "fast-glob";
import { getAdapterForFile, type LanguageAdapter } from "./language";
import { createGrammarRegistry, type GrammarRegistry } from "./grammarRegistry";
import { createIgnoreRules, isPathExcluded, toPosixRelative, type IgnoreRuleSet } from "./ignoreRules";
import { analyzeWithRegex } from "./regexAnalyzer";
import { analyzeWithTree } from "./treeAnalyzer";
import type { AnalysisResult, Diagnostic, LanguageId, SymbolRecord } from "./types";

export type AnalyzerOptions = {
  ignoreRules?: IgnoreRuleSet;
  grammars?: GrammarRegistry;
  /** Restrict analysis to these languages; others are treated as unsupported. */
  supportedLanguages?: LanguageId[];
};

export type FileAnalysis = {
  symbols: SymbolRecord[];
  diagnostics: Diagnostic[];
};

export type DirectoryAnalysis = {
  results: AnalysisResult;
  diagnostics: Diagnostic[];
  filesAnalyzed: number;
  cancelled: boolean;
};

export type AnalyzeDirectoryOptions = {
  signal?: AbortSignal;
};

export type Analyzer = {
  analyzeSource(code: string, filePath: string): SymbolRecord[];
  analyzeFile(filePath: string, root?: string): Promise<FileAnalysis>;
  analyzeDirectory(directory: string, options?: AnalyzeDirectoryOptions): Promise<DirectoryAnalysis>;
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function matchPathFor(root: string, filePath: string): string {
  const absolute = path.resolve(filePath);
  const relative = toPosixRelative(path.resolve(root), absolute);
  if (!relative.startsWith("..")) {
    return relative;
  }
  return absolute.split(path.sep).join("/").replace(/^\/+/, "");
}

export function createAnalyzer(options: AnalyzerOptions = {}): Analyzer {
  const rules = options.ignoreRules ?? createIgnoreRules();
  const grammars = options.grammars ?? createGrammarRegistry();
  const supported = options.supportedLanguages ? new Set(options.supportedLanguages) : null;

  function adapterFor(filePath: string): LanguageAdapter | null {
    const adapter = getAdapterForFile(filePath);
    if (!adapter || (supported && !supported.has(adapter.id))) {
      return null;
    }
    return adapter;
  }

  function analyzeWithAdapter(code: string, filePath: string, adapter: LanguageAdapter): SymbolRecord[] {
    if (!code || code.includes("\0")) {
      return [];
    }

    const grammar = grammars.get(adapter.id);
    if (grammar.status === "parsed") {
      try {
        const arena = grammar.parse(code);
        if (arena) {
          return analyzeWithTree(arena, code, filePath, adapter);
        }
        console.warn(`[analyzer] parser returned no tree, using regex rules: ${filePath}`);
      } catch (error) {
        console.warn(`[analyzer] parse failed, using regex rules: ${filePath} (${describeError(error)})`);
      }
    }

    return analyzeWithRegex(code, filePath, adapter);
  }

  async function analyzeReadable(filePath: string, adapter: LanguageAdapter): Promise<FileAnalysis> {
    let code: string;
    try {
      code = await readFile(filePath, "utf8");
    } catch (error) {
      const message = describeError(error);
      console.warn(`[analyzer] cannot read ${filePath}: ${message}`);
      return {
        symbols: [],
        diagnostics: [{ kind: "file-read", path: filePath, language: adapter.id, message }]
      };
    }
    return { symbols: analyzeWithAdapter(code, filePath, adapter), diagnostics: [] };
  }

  function analyzeSource(code: string, filePath: string): SymbolRecord[] {
    const adapter = adapterFor(filePath);
    return adapter ? analyzeWithAdapter(code, filePath, adapter) : [];
  }

  async function analyzeFile(filePath: string, root = process.cwd()): Promise<FileAnalysis> {
    const adapter = adapterFor(filePath);
    if (!adapter || isPathExcluded(rules, matchPathFor(root, filePath))) {
      return { symbols: [], diagnostics: [] };
    }
    return analyzeReadable(filePath, adapter);
  }

  async function analyzeDirectory(
    directory: string,
    walkOptions: AnalyzeDirectoryOptions = {}
  ): Promise<DirectoryAnalysis> {
    const results: AnalysisResult = new Map();
    const diagnostics: Diagnostic[] = [];
    let filesAnalyzed = 0;
    let cancelled = false;

    // Patterns go to the walker so ignored directories are never entered.
    const entries = await fg("**/*", {
      cwd: path.resolve(directory),
      onlyFiles: true,
      dot: true,
      followSymbolicLinks: false,
      suppressErrors: true,
      ignore: rules.patterns
    });
    entries.sort();

    for (const relative of entries) {
      if (walkOptions.signal?.aborted) {
        cancelled = true;
        break;
      }
      const adapter = adapterFor(relative);
      if (!adapter || isPathExcluded(rules, relative)) {
        continue;
      }

      const filePath = path.join(directory, relative);
      const analysis = await analyzeReadable(filePath, adapter);
      filesAnalyzed += 1;
      diagnostics.push(...analysis.diagnostics);
      if (analysis.symbols.length > 0) {
        results.set(filePath, analysis.symbols);
      }
    }

    return { results, diagnostics, filesAnalyzed, cancelled };
  }

  return { analyzeSource, analyzeFile, analyzeDirectory };
}
