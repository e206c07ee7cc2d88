import type { DefinitionSpec, GrammarSpec, LanguageAdapter } from "./language";
import { isDocumented } from "./docPresence";
import type { SymbolKind, SymbolRecord } from "./types";

export type ArenaNode = {
  type: string;
  startIndex: number;
  endIndex: number;
  startRow: number; // 0-indexed
  children: number[];
};

/**
 * A parsed tree flattened into an array. Children refer to other entries by
 * index; the root is entry 0.
 */
export type SyntaxArena = {
  nodes: ArenaNode[];
};

export type DefinitionNode = {
  name: string;
  kind: SymbolKind;
  node: ArenaNode;
};

function firstChildOfType(arena: SyntaxArena, node: ArenaNode, types: string[]): ArenaNode | null {
  for (const index of node.children) {
    const child = arena.nodes[index];
    if (child && types.includes(child.type)) {
      return child;
    }
  }
  return null;
}

function resolveName(
  arena: SyntaxArena,
  node: ArenaNode,
  code: string,
  grammar: GrammarSpec,
  spec: DefinitionSpec
): string | null {
  const { nameFrom } = spec;
  let holder: ArenaNode | null = node;
  if (nameFrom) {
    const wrappers = spec.through ?? [];
    let current: ArenaNode | null = node;
    holder = null;
    while (current && !holder) {
      holder = firstChildOfType(arena, current, [nameFrom]);
      current = holder ? null : firstChildOfType(arena, current, wrappers);
    }
  }
  if (!holder) {
    return null;
  }
  const nameNode = firstChildOfType(arena, holder, grammar.identifierTypes);
  if (!nameNode) {
    return null;
  }
  const name = code.slice(nameNode.startIndex, nameNode.endIndex).trim();
  return name || null;
}

/**
 * Pre-order walk with an explicit stack, so an enclosing definition is
 * always reported before the ones nested in it.
 */
export function collectDefinitions(
  arena: SyntaxArena,
  code: string,
  grammar: GrammarSpec
): DefinitionNode[] {
  const found: DefinitionNode[] = [];
  if (arena.nodes.length === 0) {
    return found;
  }

  const stack: number[] = [0];
  while (stack.length > 0) {
    const index = stack.pop();
    const node = index === undefined ? undefined : arena.nodes[index];
    if (!node) {
      continue;
    }

    const spec = grammar.definitions[node.type];
    if (spec) {
      const name = resolveName(arena, node, code, grammar, spec);
      if (name) {
        found.push({ name, kind: spec.kind, node });
      }
    }

    for (let i = node.children.length - 1; i >= 0; i -= 1) {
      stack.push(node.children[i]);
    }
  }

  return found;
}

export function analyzeWithTree(
  arena: SyntaxArena,
  code: string,
  filePath: string,
  adapter: LanguageAdapter
): SymbolRecord[] {
  return collectDefinitions(arena, code, adapter.grammar)
    .filter(({ node }) => !isDocumented(code, node.startIndex, adapter.profile))
    .map(({ name, kind, node }) => ({
      name,
      kind,
      sourceFile: filePath,
      line: node.startRow + 1,
      offset: node.startIndex,
      language: adapter.id
    }));
}
