import { getLanguageAdapter } from "../language";
import type { SymbolRecord } from "../types";

export const MAX_CONTEXT_LINES = 40;
export const MAX_CONTEXT_CHARS = 4000;

function lineStartAt(code: string, offset: number): number {
  return code.lastIndexOf("\n", Math.max(0, offset - 1)) + 1;
}

function lineStartFor(code: string, line: number): number {
  let start = 0;
  for (let current = 1; current < line; current += 1) {
    const next = code.indexOf("\n", start);
    if (next === -1) {
      return -1;
    }
    start = next + 1;
  }
  return start;
}

function indentWidth(line: string): number {
  return (/^[ \t]*/.exec(line)?.[0] ?? "").length;
}

/**
 * Indentation-delimited block: the definition line plus every following line
 * that is blank or indented deeper than it.
 */
function findIndentedBlock(code: string, start: number): string {
  const lines = code.slice(start).split("\n");
  const baseIndent = indentWidth(lines[0]);
  let end = 1;
  for (; end < lines.length; end += 1) {
    const line = lines[end];
    if (line.trim() && indentWidth(line) <= baseIndent) {
      break;
    }
  }
  return lines.slice(0, end).join("\n").trimEnd();
}

/**
 * Brace-delimited block: from the definition line through the brace that
 * closes the first `{` after the name. Falls back to the definition line
 * when no balanced block follows.
 */
function findBracedBlock(code: string, start: number, from: number): string {
  const lineEnd = code.indexOf("\n", start);
  const firstLine = code.slice(start, lineEnd === -1 ? code.length : lineEnd);
  const open = code.indexOf("{", from);
  if (open === -1) {
    return firstLine.trimEnd();
  }
  const terminator = code.indexOf(";", from);
  if (terminator !== -1 && terminator < open) {
    return code.slice(start, terminator + 1).trimEnd();
  }

  let depth = 0;
  for (let cursor = open; cursor < code.length; cursor += 1) {
    const ch = code[cursor];
    if (ch === "{") depth += 1;
    if (ch === "}") {
      depth -= 1;
      if (depth === 0) {
        return code.slice(start, cursor + 1).trimEnd();
      }
    }
  }
  return firstLine.trimEnd();
}

export function truncateContext(excerpt: string, marker: string): string {
  const lines = excerpt.split("\n");
  let truncated = lines.slice(0, MAX_CONTEXT_LINES).join("\n");
  if (truncated.length > MAX_CONTEXT_CHARS) {
    truncated = truncated.slice(0, MAX_CONTEXT_CHARS);
  }
  if (truncated.length < excerpt.length) {
    truncated += `\n${marker} truncated`;
  }
  return truncated;
}

/**
 * Source excerpt of the definition `symbol` points at, for use as synthesis
 * context. Returns null when the record's line is not in `code`.
 */
export function extractDefinitionContext(code: string, symbol: SymbolRecord): string | null {
  const adapter = getLanguageAdapter(symbol.language);
  const offsetInRange = symbol.offset >= 0 && symbol.offset < code.length;
  const start = offsetInRange ? lineStartAt(code, symbol.offset) : lineStartFor(code, symbol.line);
  if (start < 0 || start >= code.length) {
    return null;
  }

  const excerpt =
    symbol.language === "python"
      ? findIndentedBlock(code, start)
      : findBracedBlock(code, start, Math.max(start, offsetInRange ? symbol.offset : start));
  if (!excerpt.trim()) {
    return null;
  }
  return truncateContext(excerpt, adapter.profile.lineComment);
}
