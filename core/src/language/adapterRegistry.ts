import type { LanguageId, LanguageProfile, SymbolKind } from "../types";

export type RegexRule = {
  pattern: RegExp;
  kind: SymbolKind;
};

export type DefinitionSpec = {
  kind: SymbolKind;
  /**
   * Node type of the child that carries the identifier, for grammars that
   * wrap the name (C declarators, Go type specs).
   */
  nameFrom?: string;
  /** Wrapper node types searched for `nameFrom` when it is not a direct child. */
  through?: string[];
};

export type GrammarSpec = {
  wasmFile: string;
  definitions: Record<string, DefinitionSpec>;
  identifierTypes: string[];
};

export type LanguageAdapter = {
  id: LanguageId;
  displayName: string;
  profile: LanguageProfile;
  grammar: GrammarSpec;
  /**
   * Fallback rules applied over the whole file, in order. Group 1 must
   * capture the symbol name.
   */
  regexRules: RegexRule[];
};

const registry = new Map<LanguageId, LanguageAdapter>();
const extensionMap = new Map<string, LanguageAdapter>();

export function registerLanguageAdapter(adapter: LanguageAdapter): void {
  registry.set(adapter.id, adapter);
  for (const ext of adapter.profile.extensions) {
    extensionMap.set(ext.toLowerCase(), adapter);
  }
}

export function getLanguageAdapter(id: LanguageId): LanguageAdapter {
  const adapter = registry.get(id);
  if (!adapter) {
    throw new Error(`No language adapter registered for "${id}".`);
  }
  return adapter;
}

/**
 * Get the appropriate language adapter for a file based on its extension.
 * @returns The matching adapter, or null if no adapter handles this file type
 */
export function getAdapterForFile(filePath: string): LanguageAdapter | null {
  const base = filePath.split(/[\\/]/).pop() ?? "";
  const dot = base.lastIndexOf(".");
  if (dot <= 0) {
    return null;
  }
  const ext = base.slice(dot + 1).toLowerCase();
  return extensionMap.get(ext) || null;
}

export function classifyLanguage(filePath: string): LanguageId | null {
  return getAdapterForFile(filePath)?.id ?? null;
}

export function getAllAdapters(): LanguageAdapter[] {
  return Array.from(registry.values());
}

export function isLanguageId(value: string): value is LanguageId {
  for (const id of registry.keys()) {
    if (id === value) {
      return true;
    }
  }
  return false;
}
