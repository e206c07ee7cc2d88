import path from "path";
import { createAnalyzer } from "./analyzer";
import type { RunConfig } from "./config";
import { createGrammarRegistry, loadGrammars } from "./grammarRegistry";
import { DEFAULT_IGNORE_PATTERNS, loadIgnoreRules } from "./ignoreRules";
import { getAllAdapters } from "./language";
import { createRuleBasedSynthesizer } from "./llm/ruleBasedComment";
import { createLlmSynthesizer } from "./llm/synthesizeComment";
import type { ChatTransport } from "./llm/openaiCompat";
import { createOrchestrator, type RunReport } from "./orchestrator";
import { createGitCollaborator, type GitRunner } from "./vcs/gitCollaborator";

export type DocumentDirectoryOptions = {
  dryRun?: boolean;
  createChange?: boolean;
  signal?: AbortSignal;
  transport?: ChatTransport;
  gitRunner?: GitRunner;
};

/**
 * Analyze `directory`, document what lacks documentation, and optionally
 * publish the change. Grammars and ignore rules are loaded once per call.
 */
export async function documentDirectory(
  directory: string,
  config: RunConfig,
  options: DocumentDirectoryOptions = {}
): Promise<RunReport> {
  const root = path.resolve(directory);
  const ignoreRules = await loadIgnoreRules(root, [
    ...DEFAULT_IGNORE_PATTERNS,
    ...config.extraIgnorePatterns
  ]);
  const languages = config.languages;
  const adapters = getAllAdapters().filter((adapter) => !languages || languages.includes(adapter.id));
  const grammars = config.disableTreeSitter ? createGrammarRegistry() : await loadGrammars(adapters);

  const orchestrator = createOrchestrator({
    analyzer: createAnalyzer({
      ignoreRules,
      grammars,
      supportedLanguages: languages ?? undefined
    }),
    synthesizer: config.llm
      ? createLlmSynthesizer(config.llm, options.transport)
      : createRuleBasedSynthesizer(),
    vcs: createGitCollaborator({ cwd: root, baseBranch: config.baseBranch, run: options.gitRunner }),
    patchOptions: { indentPythonClassDocstrings: config.indentPythonClassDocstrings }
  });

  const report = await orchestrator.run({
    directory: root,
    dryRun: options.dryRun,
    createChange: options.createChange,
    signal: options.signal
  });
  return { ...report, diagnostics: [...grammars.diagnostics, ...report.diagnostics] };
}

export { createAnalyzer } from "./analyzer";
export type { Analyzer, AnalyzerOptions, DirectoryAnalysis, FileAnalysis } from "./analyzer";
export { resolveRunConfig } from "./config";
export type { RunConfig } from "./config";
export { ConfigError, SynthesisError } from "./errors";
export { createGrammarRegistry, loadGrammars } from "./grammarRegistry";
export type { GrammarRegistry, GrammarState } from "./grammarRegistry";
export { DEFAULT_IGNORE_PATTERNS, createIgnoreRules, isIgnored, isPathExcluded, loadIgnoreRules } from "./ignoreRules";
export type { IgnoreRuleSet } from "./ignoreRules";
export { hasBodyDocstring, hasDocumentationBefore, isDocumented } from "./docPresence";
export { analyzeWithRegex } from "./regexAnalyzer";
export { analyzeWithTree, collectDefinitions } from "./treeAnalyzer";
export type { ArenaNode, SyntaxArena } from "./treeAnalyzer";
export { classifyLanguage, getAdapterForFile, getAllAdapters, getLanguageAdapter } from "./language";
export type { LanguageAdapter } from "./language";
export { applyPatchBatch, applyToContent, patchFile } from "./patchApplicator";
export type { FilePatchResult, PatchOptions, PatchRequest } from "./patchApplicator";
export { createDryRunSummary, createSummary } from "./summary";
export { createRuleBasedSynthesizer, ruleBasedComment } from "./llm/ruleBasedComment";
export { createLlmSynthesizer } from "./llm/synthesizeComment";
export type { CommentSynthesizer, LlmConfig } from "./llm/synthesizeComment";
export { createOrchestrator } from "./orchestrator";
export type { Orchestrator, RunOptions, RunReport } from "./orchestrator";
export { createGitCollaborator } from "./vcs/gitCollaborator";
export type { GitRunner, VcsCollaborator } from "./vcs/gitCollaborator";
export type {
  AnalysisResult,
  CommentMap,
  Diagnostic,
  LanguageId,
  SymbolKind,
  SymbolRecord
} from "./types";
