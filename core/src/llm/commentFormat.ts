import type { LanguageId } from "../types";

export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```[\w-]*[ \t]*\r?\n([\s\S]*?)\r?\n?```$/.exec(trimmed);
  return (fenced ? fenced[1] : trimmed).trim();
}

function prefixLines(lines: string[], prefix: string): string[] {
  return lines.map((line) => (line.trim() ? `${prefix} ${line}` : prefix));
}

/**
 * Wrap plain text in the language's doc-comment syntax. Text that already
 * opens a comment is returned unchanged.
 */
export function formatAsComment(text: string, language: LanguageId): string {
  const body = text.trim();
  const lines = body.split(/\r?\n/);

  switch (language) {
    case "python":
      if (body.startsWith('"""') || body.startsWith("'''")) {
        return body;
      }
      return lines.length === 1 ? `"""${body}"""` : ['"""', ...lines, '"""'].join("\n");
    case "go":
      if (lines.every((line) => !line.trim() || line.trim().startsWith("//"))) {
        return body;
      }
      return prefixLines(lines, "//").join("\n");
    case "rust":
      if (lines.every((line) => !line.trim() || line.trim().startsWith("//"))) {
        return body;
      }
      return prefixLines(lines, "///").join("\n");
    default:
      if (body.startsWith("/*") || body.startsWith("//")) {
        return body;
      }
      return ["/**", ...prefixLines(lines, " *"), " */"].join("\n");
  }
}
