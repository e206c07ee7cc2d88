import type { LanguageAdapter } from "./adapterRegistry";
import { cStyleProfile } from "./utils";

/**
 * Go doc comments are plain `//` lines directly above the declaration.
 */
export const goAdapter: LanguageAdapter = {
    id: "go",
    displayName: "Go",
    profile: cStyleProfile(["go"], "//"),
    grammar: {
        wasmFile: "tree-sitter-go.wasm",
        definitions: {
            function_declaration: { kind: "function" },
            method_declaration: { kind: "function" },
            type_declaration: { kind: "class", nameFrom: "type_spec" }
        },
        identifierTypes: ["identifier", "field_identifier", "type_identifier"]
    },
    regexRules: [
        { pattern: /^type\s+(\w+)\s+struct\s*\{/m, kind: "class" },
        { pattern: /^type\s+(\w+)\s+interface\s*\{/m, kind: "class" },
        // Optional receiver: func (s *Server) Start(
        { pattern: /^func\s+(?:\(\s*\w*\s*\*?\s*[\w.]+(?:\[[^\]]*\])?\s*\)\s*)?(\w+)\s*(?:\[[^\]]*\])?\s*\(/m, kind: "function" }
    ]
};
