import type { LanguageId, SymbolRecord } from "../types";
import type { CommentSynthesizer } from "./synthesizeComment";

/**
 * `calculate_sum` -> "Calculate sum", `DataProcessor` -> "Data processor".
 * Names with no letters come back unchanged.
 */
export function nameToSentence(name: string): string {
  const words = name
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .replace(/_+/g, " ")
    .trim()
    .toLowerCase();
  if (!words) {
    return name;
  }
  return words.charAt(0).toUpperCase() + words.slice(1);
}

function pythonComment(symbol: SymbolRecord, sentence: string): string {
  if (symbol.kind === "class") {
    return ['"""', `${sentence} class.`, "", "TODO: Add class description", '"""'].join("\n");
  }
  return [
    '"""',
    `${sentence}.`,
    "",
    "Args:",
    "    TODO: Add parameter descriptions",
    "",
    "Returns:",
    "    TODO: Add return description",
    '"""'
  ].join("\n");
}

function blockComment(symbol: SymbolRecord, sentence: string, language: LanguageId): string {
  if (symbol.kind === "class") {
    return ["/**", ` * ${sentence} class`, " *", " * TODO: Add class description", " */"].join("\n");
  }
  const typed = language === "javascript" || language === "typescript";
  return [
    "/**",
    ` * ${sentence}`,
    " *",
    typed ? " * @param {*} TODO: Add parameter descriptions" : " * @param TODO: Add parameter descriptions",
    typed ? " * @returns {*} TODO: Add return description" : " * @return TODO: Add return description",
    " */"
  ].join("\n");
}

function lineComments(symbol: SymbolRecord, sentence: string, marker: string): string {
  if (symbol.kind === "class") {
    return [`${marker} ${sentence} type.`, `${marker} TODO: Add type description`].join("\n");
  }
  return [
    `${marker} ${sentence}.`,
    `${marker} TODO: Add parameter and return descriptions`
  ].join("\n");
}

/**
 * Placeholder documentation built from the symbol's name alone. Never fails
 * and never returns an empty string.
 */
export function ruleBasedComment(symbol: SymbolRecord, language: LanguageId = symbol.language): string {
  const sentence = nameToSentence(symbol.name);
  switch (language) {
    case "python":
      return pythonComment(symbol, sentence);
    case "go":
      return lineComments(symbol, sentence, "//");
    case "rust":
      return lineComments(symbol, sentence, "///");
    default:
      return blockComment(symbol, sentence, language);
  }
}

export function createRuleBasedSynthesizer(): CommentSynthesizer {
  return {
    async synthesize(symbol, language) {
      return ruleBasedComment(symbol, language);
    }
  };
}
