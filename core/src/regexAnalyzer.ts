import type { LanguageAdapter } from "./language";
import { isDocumented } from "./docPresence";
import type { SymbolRecord } from "./types";

function globalPattern(pattern: RegExp): RegExp {
  const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
  return new RegExp(pattern.source, flags);
}

export function lineAt(code: string, offset: number): number {
  let line = 1;
  for (let index = code.indexOf("\n"); index !== -1 && index < offset; index = code.indexOf("\n", index + 1)) {
    line += 1;
  }
  return line;
}

/**
 * Run each of the adapter's rules over the whole file and keep the matches
 * with no documentation. Rules do not claim regions, so two rules matching
 * the same definition produce two records.
 */
export function analyzeWithRegex(
  code: string,
  filePath: string,
  adapter: LanguageAdapter
): SymbolRecord[] {
  const symbols: SymbolRecord[] = [];

  for (const rule of adapter.regexRules) {
    for (const match of code.matchAll(globalPattern(rule.pattern))) {
      const name = match[1];
      const offset = match.index;
      if (!name || offset === undefined) {
        continue;
      }
      if (isDocumented(code, offset, adapter.profile)) {
        continue;
      }
      symbols.push({
        name,
        kind: rule.kind,
        sourceFile: filePath,
        line: lineAt(code, offset),
        offset,
        language: adapter.id
      });
    }
  }

  return symbols;
}
