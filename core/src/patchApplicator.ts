import path from "path";
import { readFile, rename, stat, unlink, writeFile } from "fs/promises";
import type { Diagnostic, SymbolRecord } from "./types";
import { findBlockHeaderEnd } from "./blockHeader";

export type PatchOptions = {
  /**
   * Python class docstrings are inserted as given by default, unlike
   * function docstrings which are indented into the body. Set to indent
   * both the same way.
   */
  indentPythonClassDocstrings?: boolean;
};

export type PatchRequest = {
  symbol: SymbolRecord;
  comment: string;
};

export type ContentPatch = {
  content: string;
  applied: SymbolRecord[];
  skipped: SymbolRecord[];
};

export type FilePatchResult = {
  filePath: string;
  patched: SymbolRecord[];
  unpatched: SymbolRecord[];
  diagnostics: Diagnostic[];
};

type Insertion = {
  index: number;
  lines: string[];
};

const INDENT_UNIT = "    ";

function leadingWhitespace(line: string): string {
  return /^[ \t]*/.exec(line)?.[0] ?? "";
}

function splitComment(comment: string): string[] {
  return comment.replace(/\r\n/g, "\n").replace(/\n+$/, "").split("\n");
}

function indentLines(lines: string[], prefix: string): string[] {
  return lines.map((line) => (line.trim() ? `${prefix}${line}` : ""));
}

/**
 * Where a comment for `symbol` goes in `lines`, and the lines to insert.
 * Python comments go below the definition line, every other language
 * above it.
 */
export function planInsertion(
  lines: string[],
  symbol: SymbolRecord,
  comment: string,
  options: PatchOptions = {}
): Insertion | null {
  const defIndex = symbol.line - 1;
  if (defIndex < 0 || defIndex >= lines.length) {
    return null;
  }
  const body = splitComment(comment);
  if (body.every((line) => !line.trim())) {
    return null;
  }
  const indent = leadingWhitespace(lines[defIndex]);

  if (symbol.language === "python") {
    // A body on the header line has nowhere to take a docstring.
    const header = findBlockHeaderEnd(lines, defIndex);
    if (!header || header.rest) {
      return null;
    }
    const reindent = symbol.kind === "function" || Boolean(options.indentPythonClassDocstrings);
    return {
      index: header.line + 1,
      lines: reindent ? indentLines(body, indent + INDENT_UNIT) : body
    };
  }

  return { index: defIndex, lines: indentLines(body, indent) };
}

/**
 * Insert every requested comment into `content` in one pass. Requests are
 * applied from the bottom of the file up so that each record's line number
 * still refers to the original text. A repeated request for the same name
 * on the same line is applied once.
 */
export function applyToContent(
  content: string,
  requests: PatchRequest[],
  options: PatchOptions = {}
): ContentPatch {
  const lineEnding = content.includes("\r\n") ? "\r" : "";
  const lines = content.split("\n");
  const applied: SymbolRecord[] = [];
  const skipped: SymbolRecord[] = [];
  const seen = new Set<string>();

  const ordered = requests
    .map((request, order) => ({ request, order }))
    .sort((a, b) => b.request.symbol.line - a.request.symbol.line || a.order - b.order);

  for (const { request } of ordered) {
    const key = `${request.symbol.line}:${request.symbol.name}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);

    const insertion = planInsertion(lines, request.symbol, request.comment, options);
    if (!insertion) {
      skipped.push(request.symbol);
      continue;
    }
    lines.splice(insertion.index, 0, ...insertion.lines.map((line) => `${line}${lineEnding}`));
    applied.push(request.symbol);
  }

  applied.sort((a, b) => a.line - b.line);
  return { content: lines.join("\n"), applied, skipped };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function writeAtomically(filePath: string, content: string): Promise<void> {
  const { mode } = await stat(filePath);
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.docgap.tmp`
  );
  try {
    await writeFile(tempPath, content, { encoding: "utf8", mode });
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      console.warn(`[patchApplicator] could not remove ${tempPath}: ${describeError(cleanupError)}`);
    });
    throw error;
  }
}

/**
 * Load, patch and rewrite one file. Read and write failures are reported
 * per symbol instead of thrown.
 */
export async function patchFile(
  filePath: string,
  requests: PatchRequest[],
  options: PatchOptions = {}
): Promise<FilePatchResult> {
  const symbols = requests.map((request) => request.symbol);
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    const message = describeError(error);
    console.warn(`[patchApplicator] cannot read ${filePath}: ${message}`);
    return {
      filePath,
      patched: [],
      unpatched: symbols,
      diagnostics: [{ kind: "file-read", path: filePath, message }]
    };
  }

  const result = applyToContent(content, requests, options);
  if (result.applied.length === 0) {
    return { filePath, patched: [], unpatched: result.skipped, diagnostics: [] };
  }

  try {
    await writeAtomically(filePath, result.content);
  } catch (error) {
    const message = describeError(error);
    console.warn(`[patchApplicator] cannot write ${filePath}: ${message}`);
    return {
      filePath,
      patched: [],
      unpatched: [...result.applied, ...result.skipped],
      diagnostics: [{ kind: "file-write", path: filePath, message }]
    };
  }

  return { filePath, patched: result.applied, unpatched: result.skipped, diagnostics: [] };
}

/**
 * Patch files one after another; a failing file does not stop the batch.
 */
export async function applyPatchBatch(
  batch: Map<string, PatchRequest[]>,
  options: PatchOptions = {}
): Promise<FilePatchResult[]> {
  const results: FilePatchResult[] = [];
  for (const [filePath, requests] of batch) {
    results.push(await patchFile(filePath, requests, options));
  }
  return results;
}
