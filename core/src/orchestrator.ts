import { readFile } from "fs/promises";
import type { Analyzer } from "./analyzer";
import { extractDefinitionContext } from "./extract/definitionContext";
import { createRuleBasedSynthesizer } from "./llm/ruleBasedComment";
import type { CommentSynthesizer } from "./llm/synthesizeComment";
import { applyPatchBatch, type PatchOptions, type PatchRequest } from "./patchApplicator";
import { createDryRunSummary, createSummary, documentableSymbols } from "./summary";
import type { AnalysisResult, CommentMap, Diagnostic, SymbolRecord } from "./types";
import type { VcsCollaborator } from "./vcs/gitCollaborator";

export type OrchestratorOptions = {
  analyzer: Analyzer;
  synthesizer: CommentSynthesizer;
  /** Used when `synthesizer` fails. Defaults to the rule-based synthesizer. */
  fallback?: CommentSynthesizer;
  vcs?: VcsCollaborator;
  patchOptions?: PatchOptions;
};

export type RunOptions = {
  directory: string;
  dryRun?: boolean;
  createChange?: boolean;
  signal?: AbortSignal;
};

export type RunReport = {
  analysis: AnalysisResult;
  comments: CommentMap;
  summary: string;
  patched: SymbolRecord[];
  unpatched: SymbolRecord[];
  filesModified: string[];
  /** Symbols documented, or in a dry run, symbols that would be. */
  symbolCount: number;
  changeUrl?: string;
  diagnostics: Diagnostic[];
  cancelled: boolean;
};

export type Orchestrator = {
  run(options: RunOptions): Promise<RunReport>;
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function readForContext(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    console.warn(`[orchestrator] cannot read ${filePath} for context: ${describeError(error)}`);
    return null;
  }
}

export function createOrchestrator(options: OrchestratorOptions): Orchestrator {
  const fallback = options.fallback ?? createRuleBasedSynthesizer();

  async function synthesizeOne(
    symbol: SymbolRecord,
    context: string | undefined,
    diagnostics: Diagnostic[]
  ): Promise<string> {
    try {
      const comment = await options.synthesizer.synthesize(symbol, symbol.language, context);
      if (comment.trim()) {
        return comment;
      }
      throw new Error("synthesizer returned empty text");
    } catch (error) {
      const message = `${symbol.name}: ${describeError(error)}`;
      console.warn(`[orchestrator] synthesis failed, using rule-based comment: ${message}`);
      diagnostics.push({
        kind: "synthesis-failure",
        path: symbol.sourceFile,
        language: symbol.language,
        message
      });
      return fallback.synthesize(symbol, symbol.language);
    }
  }

  /**
   * One comment per distinct name per file. Later records sharing a name
   * reuse the first one's comment.
   */
  async function synthesizeComments(
    analysis: AnalysisResult,
    diagnostics: Diagnostic[],
    signal?: AbortSignal
  ): Promise<{ comments: CommentMap; cancelled: boolean }> {
    const comments: CommentMap = new Map();
    for (const [filePath, symbols] of analysis) {
      if (signal?.aborted) {
        return { comments, cancelled: true };
      }
      const code = await readForContext(filePath);
      const fileComments = new Map<string, string>();
      for (const symbol of symbols) {
        if (fileComments.has(symbol.name)) {
          continue;
        }
        const context = code === null ? undefined : extractDefinitionContext(code, symbol) ?? undefined;
        fileComments.set(symbol.name, await synthesizeOne(symbol, context, diagnostics));
      }
      comments.set(filePath, fileComments);
    }
    return { comments, cancelled: false };
  }

  function buildBatch(analysis: AnalysisResult, comments: CommentMap): Map<string, PatchRequest[]> {
    const batch = new Map<string, PatchRequest[]>();
    for (const [filePath, symbols] of analysis) {
      const fileComments = comments.get(filePath);
      const requests: PatchRequest[] = [];
      for (const symbol of documentableSymbols(symbols, fileComments)) {
        const comment = fileComments?.get(symbol.name);
        if (comment !== undefined) {
          requests.push({ symbol, comment });
        }
      }
      if (requests.length > 0) {
        batch.set(filePath, requests);
      }
    }
    return batch;
  }

  async function run(runOptions: RunOptions): Promise<RunReport> {
    const dryRun = Boolean(runOptions.dryRun);
    console.log(`[orchestrator] analyzing ${runOptions.directory}${dryRun ? " (dry run)" : ""}`);
    const analysisRun = await options.analyzer.analyzeDirectory(runOptions.directory, {
      signal: runOptions.signal
    });
    const analysis = analysisRun.results;
    const diagnostics = [...analysisRun.diagnostics];
    console.log(
      `[orchestrator] ${analysisRun.filesAnalyzed} files analyzed, ${analysis.size} with undocumented symbols`
    );

    const synthesis = await synthesizeComments(analysis, diagnostics, runOptions.signal);
    const comments = synthesis.comments;
    const cancelled = analysisRun.cancelled || synthesis.cancelled;
    const batch = buildBatch(analysis, comments);
    const planned = [...batch.values()].reduce((count, requests) => count + requests.length, 0);

    if (dryRun || cancelled) {
      return {
        analysis,
        comments,
        summary: dryRun ? createDryRunSummary(analysis, comments) : createSummary(analysis, comments),
        patched: [],
        unpatched: [],
        filesModified: [],
        symbolCount: dryRun ? planned : 0,
        diagnostics,
        cancelled
      };
    }

    const patchResults = await applyPatchBatch(batch, options.patchOptions);
    const patched: SymbolRecord[] = [];
    const unpatched: SymbolRecord[] = [];
    const filesModified: string[] = [];
    for (const result of patchResults) {
      patched.push(...result.patched);
      unpatched.push(...result.unpatched);
      diagnostics.push(...result.diagnostics);
      if (result.patched.length > 0) {
        filesModified.push(result.filePath);
      }
    }
    console.log(`[orchestrator] documented ${patched.length} symbols in ${filesModified.length} files`);

    let changeUrl: string | undefined;
    if (runOptions.createChange && options.vcs && filesModified.length > 0) {
      changeUrl = await options.vcs.createDocumentationChange(filesModified, patched.length);
      if (changeUrl === undefined) {
        diagnostics.push({ kind: "vcs", message: "documentation change was not published" });
      }
    }

    return {
      analysis,
      comments,
      summary: createSummary(analysis, comments),
      patched,
      unpatched,
      filesModified,
      symbolCount: patched.length,
      changeUrl,
      diagnostics,
      cancelled
    };
  }

  return { run };
}
