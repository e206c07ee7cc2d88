import type { LanguageProfile } from "../types";

/**
 * Comment tokens shared by the C family (C, C++, Java, JS/TS, Go, Rust).
 */
export function cStyleProfile(extensions: string[], docComment = "/**"): LanguageProfile {
    return {
        extensions,
        lineComment: "//",
        blockComment: { open: "/*", close: "*/" },
        docComment
    };
}
