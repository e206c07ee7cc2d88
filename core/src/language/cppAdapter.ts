import type { DefinitionSpec, LanguageAdapter, RegexRule } from "./adapterRegistry";
import { cStyleProfile } from "./utils";

// `int *make(void)` nests the function declarator in a pointer declarator.
const functionDefinition: DefinitionSpec = {
    kind: "function",
    nameFrom: "function_declarator",
    through: ["pointer_declarator", "reference_declarator", "parenthesized_declarator"]
};

// Definitions only: a parameter list followed by a body. Prototypes end in `;` and are skipped.
const functionRule: RegexRule = {
    pattern: /^[ \t]*(?!(?:if|else|for|while|switch|return|do|case)\b)(?:[\w<>,*&]+[ \t]+[*&]*)+?(?:\w+::)*~?(\w+)\s*\([^;{}]*\)\s*(?:const\s*)?(?:noexcept\s*)?(?:override\s*)?\{/m,
    kind: "function"
};

export const cAdapter: LanguageAdapter = {
    id: "c",
    displayName: "C",
    profile: cStyleProfile(["c", "h"]),
    grammar: {
        wasmFile: "tree-sitter-c.wasm",
        definitions: {
            function_definition: functionDefinition
        },
        identifierTypes: ["identifier"]
    },
    regexRules: [
        { pattern: /^[ \t]*(?:typedef\s+)?struct\s+(\w+)[^;{(]*\{/m, kind: "class" },
        functionRule
    ]
};

export const cppAdapter: LanguageAdapter = {
    id: "cpp",
    displayName: "C++",
    profile: cStyleProfile(["cpp", "cc", "cxx", "hpp", "hh", "hxx"]),
    grammar: {
        wasmFile: "tree-sitter-cpp.wasm",
        definitions: {
            function_definition: functionDefinition,
            class_specifier: { kind: "class" }
        },
        identifierTypes: ["identifier", "field_identifier", "qualified_identifier", "type_identifier"]
    },
    regexRules: [
        { pattern: /^[ \t]*(?:template\s*<[^>]*>\s*)?(?:class|struct)\s+(\w+)[^;{(]*\{/m, kind: "class" },
        functionRule
    ]
};
