import type { LanguageAdapter } from "./adapterRegistry";
import { cStyleProfile } from "./utils";

export const javaAdapter: LanguageAdapter = {
    id: "java",
    displayName: "Java",
    profile: cStyleProfile(["java"]),
    grammar: {
        wasmFile: "tree-sitter-java.wasm",
        definitions: {
            method_declaration: { kind: "function" },
            constructor_declaration: { kind: "function" },
            class_declaration: { kind: "class" },
            interface_declaration: { kind: "class" },
            enum_declaration: { kind: "class" }
        },
        identifierTypes: ["identifier"]
    },
    regexRules: [
        {
            pattern: /^[ \t]*(?:(?:public|private|protected|abstract|final|static)\s+)*(?:class|interface|enum)\s+(\w+)/m,
            kind: "class"
        },
        {
            // Return type followed by name and a parameter list opening a body or ending a declaration.
            pattern: /^[ \t]*(?:(?:public|private|protected|static|final|abstract|synchronized|native)\s+)*(?:<[\w,\s?]+>\s*)?(?!(?:return|new|else|throw)\b)[\w.]+(?:<[\w,\s?<>]+>)?(?:\[\])*\s+(?!(?:if|for|while|switch|catch)\b)(\w+)\s*\([^)]*\)\s*(?:throws\s+[\w.,\s]+)?[{;]/m,
            kind: "function"
        }
    ]
};
