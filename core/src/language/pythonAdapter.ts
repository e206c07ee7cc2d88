import type { LanguageAdapter } from "./adapterRegistry";

export const pythonAdapter: LanguageAdapter = {
    id: "python",
    displayName: "Python",
    profile: {
        extensions: ["py"],
        lineComment: "#",
        docComment: '"""',
        docstringMarkers: ['"""', "'''"],
        bodyDocstrings: true
    },
    grammar: {
        wasmFile: "tree-sitter-python.wasm",
        definitions: {
            function_definition: { kind: "function" },
            class_definition: { kind: "class" }
        },
        identifierTypes: ["identifier"]
    },
    // Methods match the def rule too; nested defs are reported like top-level ones.
    regexRules: [
        { pattern: /def\s+(\w+)\s*\(/, kind: "function" },
        { pattern: /class\s+(\w+)\s*[(:]/, kind: "class" }
    ]
};
