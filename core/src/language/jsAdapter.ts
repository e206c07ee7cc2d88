import type { GrammarSpec, LanguageAdapter, RegexRule } from "./adapterRegistry";
import { cStyleProfile } from "./utils";

/**
 * JavaScript and TypeScript share one rule table. The patterns are not
 * anchored, so `const x = (a + b)` counts as a function and a method
 * shorthand such as `handler: function` is reported under its key.
 */
const regexRules: RegexRule[] = [
    { pattern: /function\s+(\w+)\s*\(/, kind: "function" },
    { pattern: /const\s+(\w+)\s*=\s*\(/, kind: "function" },
    { pattern: /let\s+(\w+)\s*=\s*\(/, kind: "function" },
    { pattern: /var\s+(\w+)\s*=\s*\(/, kind: "function" },
    { pattern: /(\w+)\s*:\s*function/, kind: "function" },
    { pattern: /class\s+(\w+)\s*[{\s]/, kind: "class" }
];

const jsDefinitions: GrammarSpec["definitions"] = {
    function_declaration: { kind: "function" },
    generator_function_declaration: { kind: "function" },
    method_definition: { kind: "function" },
    class_declaration: { kind: "class" }
};

export const jsAdapter: LanguageAdapter = {
    id: "javascript",
    displayName: "JavaScript",
    profile: cStyleProfile(["js", "jsx", "mjs", "cjs"]),
    grammar: {
        wasmFile: "tree-sitter-javascript.wasm",
        definitions: jsDefinitions,
        identifierTypes: ["identifier", "property_identifier"]
    },
    regexRules
};

export const tsAdapter: LanguageAdapter = {
    id: "typescript",
    displayName: "TypeScript",
    profile: cStyleProfile(["ts", "tsx"]),
    grammar: {
        wasmFile: "tree-sitter-typescript.wasm",
        definitions: {
            ...jsDefinitions,
            abstract_class_declaration: { kind: "class" },
            interface_declaration: { kind: "class" }
        },
        identifierTypes: ["identifier", "property_identifier", "type_identifier"]
    },
    regexRules
};
