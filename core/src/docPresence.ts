import type { LanguageProfile } from "./types";
import { findBlockHeaderEnd } from "./blockHeader";

// Segments of text (not non-empty lines) examined above a definition.
export const LOOKBEHIND_LINES = 5;

// A line starting with one of these never ends the upward scan.
const CONTINUATION_PREFIXES = ["//", "#", "/*", "*", "///"];

/**
 * Same segments as `content.slice(0, offset).split("\n").slice(-count)`,
 * without splitting everything above the definition.
 */
function precedingSegments(content: string, offset: number, count: number): string[] {
  let start = offset;
  let found = 0;
  while (found < count && start > 0) {
    const newline = content.lastIndexOf("\n", start - 1);
    if (newline === -1) {
      break;
    }
    start = newline;
    found += 1;
  }
  const from = found === count ? start + 1 : 0;
  return content.slice(from, offset).split("\n");
}

function opensComment(line: string, profile: LanguageProfile): boolean {
  if (line.startsWith(profile.lineComment) || line.startsWith(profile.docComment)) {
    return true;
  }
  if (profile.blockComment) {
    const { open, close } = profile.blockComment;
    if (line.includes(open) || line.includes(close)) {
      return true;
    }
  }
  return (profile.docstringMarkers ?? []).some((marker) => line.includes(marker));
}

export function lineStartOf(content: string, offset: number): number {
  return offset > 0 ? content.lastIndexOf("\n", offset - 1) + 1 : 0;
}

/**
 * Scans the lines above the one holding `offset`, nearest first. Text before
 * `offset` on its own line (`export `, `async `, indentation) is never read as
 * a preceding line; the empty segment left in its place still counts as one
 * of the examined lines. Blank lines are skipped; the first non-comment line
 * ends the scan.
 *
 * A comment closing off a previous definition and separated from this one by
 * blank lines only is taken as this definition's documentation.
 */
export function hasDocumentationBefore(
  content: string,
  offset: number,
  profile: LanguageProfile
): boolean {
  const window = precedingSegments(content, lineStartOf(content, offset), LOOKBEHIND_LINES);

  for (let i = window.length - 1; i >= 0; i -= 1) {
    const line = window[i].trim();
    if (!line) {
      continue;
    }
    if (opensComment(line, profile)) {
      return true;
    }
    if (!CONTINUATION_PREFIXES.some((prefix) => line.startsWith(prefix))) {
      return false;
    }
  }

  return false;
}

/**
 * True when the definition's body opens with a docstring. The header may span
 * several lines, and the docstring may sit on the header line itself.
 */
export function hasBodyDocstring(
  content: string,
  offset: number,
  profile: LanguageProfile
): boolean {
  const markers = profile.docstringMarkers ?? [];
  if (markers.length === 0) {
    return false;
  }
  const lines = content.slice(lineStartOf(content, offset)).split("\n");
  const header = findBlockHeaderEnd(lines, 0);
  if (header?.rest) {
    return markers.some((marker) => header.rest.startsWith(marker));
  }
  for (let index = (header?.line ?? 0) + 1; index < lines.length; index += 1) {
    const line = lines[index].trim();
    if (line) {
      return markers.some((marker) => line.startsWith(marker));
    }
  }
  return false;
}

export function isDocumented(content: string, offset: number, profile: LanguageProfile): boolean {
  if (hasDocumentationBefore(content, offset, profile)) {
    return true;
  }
  return Boolean(profile.bodyDocstrings) && hasBodyDocstring(content, offset, profile);
}
