import { describe, expect, it } from "vitest";
import { formatAsComment, stripCodeFences } from "./commentFormat";

describe("stripCodeFences", () => {
  it("removes a fenced block and its language tag", () => {
    expect(stripCodeFences('```python\n"""Doc."""\n```')).toBe('"""Doc."""');
  });

  it("leaves unfenced text trimmed", () => {
    expect(stripCodeFences("  Adds numbers.  ")).toBe("Adds numbers.");
  });
});

describe("formatAsComment", () => {
  it("wraps plain text in the language's comment form", () => {
    expect(formatAsComment("Adds two numbers.", "python")).toBe('"""Adds two numbers."""');
    expect(formatAsComment("Line one\nLine two", "typescript")).toBe("/**\n * Line one\n * Line two\n */");
    expect(formatAsComment("Adds.\n\nMore.", "go")).toBe("// Adds.\n//\n// More.");
    expect(formatAsComment("Adds.", "rust")).toBe("/// Adds.");
  });

  it("wraps multi-line Python text on separate lines", () => {
    expect(formatAsComment("Adds.\nReturns the sum.", "python")).toBe('"""\nAdds.\nReturns the sum.\n"""');
  });

  it("returns text that is already a comment unchanged", () => {
    expect(formatAsComment("/** Adds. */", "javascript")).toBe("/** Adds. */");
    expect(formatAsComment("'''Adds.'''", "python")).toBe("'''Adds.'''");
    expect(formatAsComment("// Adds.", "go")).toBe("// Adds.");
  });
});
