import type { LanguageAdapter } from "./adapterRegistry";
import { cStyleProfile } from "./utils";

const visibility = String.raw`(?:pub(?:\([^)]*\))?\s+)?`;

export const rustAdapter: LanguageAdapter = {
    id: "rust",
    displayName: "Rust",
    profile: cStyleProfile(["rs"], "///"),
    grammar: {
        wasmFile: "tree-sitter-rust.wasm",
        definitions: {
            function_item: { kind: "function" },
            struct_item: { kind: "class" },
            enum_item: { kind: "class" },
            trait_item: { kind: "class" }
        },
        identifierTypes: ["identifier", "type_identifier"]
    },
    regexRules: [
        { pattern: new RegExp(String.raw`^[ \t]*${visibility}struct\s+(\w+)`, "m"), kind: "class" },
        { pattern: new RegExp(String.raw`^[ \t]*${visibility}enum\s+(\w+)`, "m"), kind: "class" },
        { pattern: new RegExp(String.raw`^[ \t]*${visibility}(?:unsafe\s+)?trait\s+(\w+)`, "m"), kind: "class" },
        {
            pattern: new RegExp(
                String.raw`^[ \t]*${visibility}(?:const\s+)?(?:async\s+)?(?:unsafe\s+)?(?:extern\s+"[^"]*"\s+)?fn\s+(\w+)`,
                "m"
            ),
            kind: "function"
        }
    ]
};
