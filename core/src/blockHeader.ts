export type BlockHeader = {
  /** Index of the line holding the header's closing `:`. */
  line: number;
  /** Code after that `:` on the same line, comment removed. Empty unless the body is inline. */
  rest: string;
};

const OPENERS = "([{";
const CLOSERS = ")]}";

/**
 * Find the end of an indentation-block header (`def`, `class`) that starts on
 * `lines[start]` and may continue over several lines inside brackets. The
 * header ends at the first `:` outside brackets, strings and comments.
 */
export function findBlockHeaderEnd(lines: string[], start: number): BlockHeader | null {
  let depth = 0;
  let quote: string | null = null;

  for (let index = start; index < lines.length; index += 1) {
    const line = lines[index];
    for (let column = 0; column < line.length; column += 1) {
      const ch = line[column];

      if (quote) {
        if (ch === "\\") {
          column += 1;
        } else if (line.startsWith(quote, column)) {
          column += quote.length - 1;
          quote = null;
        }
        continue;
      }

      if (ch === '"' || ch === "'") {
        const triple = ch.repeat(3);
        quote = line.startsWith(triple, column) ? triple : ch;
        column += quote.length - 1;
      } else if (ch === "#") {
        break;
      } else if (OPENERS.includes(ch)) {
        depth += 1;
      } else if (CLOSERS.includes(ch)) {
        depth = Math.max(0, depth - 1);
      } else if (ch === ":" && depth === 0) {
        const after = line.slice(column + 1);
        const comment = after.indexOf("#");
        return { line: index, rest: (comment === -1 ? after : after.slice(0, comment)).trim() };
      }
    }
    // Only a triple-quoted string may run on past the end of a line.
    if (quote && quote.length === 1) {
      quote = null;
    }
  }

  return null;
}
