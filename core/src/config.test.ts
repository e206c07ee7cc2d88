import { describe, expect, it } from "vitest";
import { resolveRunConfig } from "./config";
import { ConfigError } from "./errors";

describe("resolveRunConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(resolveRunConfig({})).toEqual({
      llm: null,
      extraIgnorePatterns: [],
      languages: null,
      indentPythonClassDocstrings: false,
      disableTreeSitter: false,
      baseBranch: "main"
    });
  });

  it("reads the LLM settings and clamps the temperature", () => {
    const config = resolveRunConfig({
      DOCGAP_LLM_PROVIDER: "openai",
      DOCGAP_LLM_API_KEY: "test-secret",
      DOCGAP_LLM_TEMPERATURE: "3"
    });
    expect(config.llm).toEqual({
      provider: "openai",
      apiKey: "test-secret",
      model: "gpt-4o-mini",
      baseUrl: "",
      temperature: 1,
      maxTokens: 256,
      systemPrompt: undefined,
      userPrompt: undefined
    });
  });

  it("parses lists and flags", () => {
    const config = resolveRunConfig({
      DOCGAP_IGNORE: "**/fixtures/**, **/*.gen.ts",
      DOCGAP_LANGUAGES: "Python,go,python",
      DOCGAP_PYTHON_CLASS_INDENT: "yes",
      DOCGAP_DISABLE_TREE_SITTER: "1",
      DOCGAP_BASE_BRANCH: "develop"
    });
    expect(config.extraIgnorePatterns).toEqual(["**/fixtures/**", "**/*.gen.ts"]);
    expect(config.languages).toEqual(["python", "go"]);
    expect(config.indentPythonClassDocstrings).toBe(true);
    expect(config.disableTreeSitter).toBe(true);
    expect(config.baseBranch).toBe("develop");
  });

  it("rejects invalid values", () => {
    const llm = { DOCGAP_LLM_PROVIDER: "openai", DOCGAP_LLM_API_KEY: "test-secret" };
    expect(() => resolveRunConfig({ ...llm, DOCGAP_LLM_TEMPERATURE: "hot" })).toThrow(ConfigError);
    expect(() => resolveRunConfig({ ...llm, DOCGAP_LLM_MAX_TOKENS: "0" })).toThrow(ConfigError);
    expect(() => resolveRunConfig({ DOCGAP_LANGUAGES: "python,cobol" })).toThrow('unknown language "cobol"');
    expect(() => resolveRunConfig({ DOCGAP_PYTHON_CLASS_INDENT: "maybe" })).toThrow(ConfigError);
    expect(() => resolveRunConfig({ DOCGAP_LLM_PROVIDER: "openai" })).toThrow(ConfigError);
    expect(() =>
      resolveRunConfig({ DOCGAP_LLM_PROVIDER: "local", DOCGAP_LLM_API_KEY: "test-secret" })
    ).toThrow("DOCGAP_LLM_BASE_URL is required");
  });
});
