export type LanguageId =
  | "python"
  | "javascript"
  | "typescript"
  | "java"
  | "c"
  | "cpp"
  | "go"
  | "rust";

export type SymbolKind = "function" | "class";

/**
 * An undocumented definition found by analysis. Only valid against the
 * content it was computed from; any insertion above it makes `line` and
 * `offset` stale.
 */
export type SymbolRecord = {
  name: string;
  kind: SymbolKind;
  sourceFile: string;
  line: number; // 1-indexed
  offset: number; // 0-indexed char position
  language: LanguageId;
};

// file path → records in discovery order
export type AnalysisResult = Map<string, SymbolRecord[]>;

// file path → symbol name → comment text
export type CommentMap = Map<string, Map<string, string>>;

export type LanguageProfile = {
  extensions: string[];
  lineComment: string;
  blockComment?: { open: string; close: string };
  docComment: string;
  docstringMarkers?: string[];
  /**
   * Documentation lives as the first statement of the body (Python
   * docstrings) rather than above the definition.
   */
  bodyDocstrings?: boolean;
};

export type DiagnosticKind =
  | "file-read"
  | "file-write"
  | "parser-unavailable"
  | "synthesis-failure"
  | "vcs";

export type Diagnostic = {
  kind: DiagnosticKind;
  path?: string;
  language?: LanguageId;
  message: string;
};
