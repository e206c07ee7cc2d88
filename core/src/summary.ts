import type { AnalysisResult, CommentMap, SymbolRecord } from "./types";

export const PREVIEW_FILE_LIMIT = 3;
export const PREVIEW_SYMBOLS_PER_FILE = 2;

export type SummaryOptions = {
  title?: string;
  preview?: boolean;
};

/**
 * Records of one file that have a comment, each distinct (name, line) once,
 * in analysis order.
 */
export function documentableSymbols(
  symbols: SymbolRecord[],
  comments: Map<string, string> | undefined
): SymbolRecord[] {
  if (!comments) {
    return [];
  }
  const seen = new Set<string>();
  const result: SymbolRecord[] = [];
  for (const symbol of symbols) {
    const key = `${symbol.line}:${symbol.name}`;
    if (!comments.has(symbol.name) || seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(symbol);
  }
  return result;
}

export function createSummary(
  results: AnalysisResult,
  comments: CommentMap,
  options: SummaryOptions = {}
): string {
  const lines = [options.title ?? "docgap summary", "=".repeat(50), ""];
  const previews: string[] = [];
  let totalFiles = 0;
  let totalSymbols = 0;
  let previewFiles = 0;

  for (const [filePath, symbols] of results) {
    const fileComments = comments.get(filePath);
    const documentable = documentableSymbols(symbols, fileComments);
    if (!fileComments || documentable.length === 0) {
      continue;
    }

    totalFiles += 1;
    totalSymbols += documentable.length;
    lines.push(filePath);
    for (const symbol of documentable) {
      lines.push(`  - ${symbol.kind}: ${symbol.name}`);
    }
    lines.push("");

    if (options.preview && previewFiles < PREVIEW_FILE_LIMIT) {
      previewFiles += 1;
      for (const symbol of documentable.slice(0, PREVIEW_SYMBOLS_PER_FILE)) {
        previews.push(`\n${symbol.name}:`, fileComments.get(symbol.name) ?? "");
      }
    }
  }

  lines.push(
    `Total files to modify: ${totalFiles}`,
    `Total functions/classes to document: ${totalSymbols}`
  );

  if (options.preview) {
    lines.push("", "Generated comments preview:", "-".repeat(30), ...previews);
  }

  return lines.join("\n");
}

export function createDryRunSummary(results: AnalysisResult, comments: CommentMap): string {
  return createSummary(results, comments, { title: "docgap dry run summary", preview: true });
}
