import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SynthesisError } from "../errors";
import type { SymbolRecord } from "../types";
import type { OpenAICompatRequest } from "./openaiCompat";
import { createLlmSynthesizer, DEFAULT_SYSTEM_PROMPT, renderUserPrompt, type LlmConfig } from "./synthesizeComment";

const config: LlmConfig = {
  provider: "local",
  apiKey: "test-secret",
  model: "test-model",
  baseUrl: "http://localhost:9999/v1",
  temperature: 0.2,
  maxTokens: 256
};

const symbol: SymbolRecord = {
  name: "add",
  kind: "function",
  sourceFile: "math.js",
  line: 1,
  offset: 0,
  language: "javascript"
};

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("renderUserPrompt", () => {
  it("fills every placeholder", () => {
    expect(renderUserPrompt("{{language}} {{kind}} {{name}} {{file}}\n{{context}}", symbol, "javascript", "code")).toBe(
      "javascript function add math.js\ncode"
    );
  });

  it("notes when no source is available", () => {
    expect(renderUserPrompt("{{context}}", symbol, "javascript")).toBe("(source not available; infer from the name only)");
  });
});

describe("createLlmSynthesizer", () => {
  it("sends one chat completion request and formats the reply", async () => {
    const transport = vi.fn(async (_request: OpenAICompatRequest) => "```\nAdds two numbers.\n```");
    const synthesizer = createLlmSynthesizer(config, transport);

    await expect(synthesizer.synthesize(symbol, "javascript", "function add(a, b) {}")).resolves.toBe(
      "/**\n * Adds two numbers.\n */"
    );

    expect(transport).toHaveBeenCalledTimes(1);
    const [request] = transport.mock.calls[0];
    expect(request.apiKey).toBe("test-secret");
    expect(request.baseUrl).toBe("http://localhost:9999/v1");
    expect(request.payload).toMatchObject({ model: "test-model", temperature: 0.2, max_tokens: 256 });
    expect(request.payload.messages[0]).toEqual({ role: "system", content: DEFAULT_SYSTEM_PROMPT });
    expect(request.payload.messages[1].content).toContain("name: add");
    expect(request.payload.messages[1].content).toContain("function add(a, b) {}");
  });

  it("rejects an empty reply", async () => {
    const synthesizer = createLlmSynthesizer(config, async () => null);
    await expect(synthesizer.synthesize(symbol, "javascript")).rejects.toBeInstanceOf(SynthesisError);
  });

  it("wraps transport failures", async () => {
    const synthesizer = createLlmSynthesizer(config, async () => {
      throw new Error("boom");
    });
    await expect(synthesizer.synthesize(symbol, "javascript")).rejects.toThrow("LLM call failed for add: boom");
  });

  it("refuses to call a provider without a base URL", async () => {
    const transport = vi.fn(async (_request: OpenAICompatRequest) => "unused");
    const synthesizer = createLlmSynthesizer({ ...config, provider: "custom", baseUrl: "" }, transport);

    await expect(synthesizer.synthesize(symbol, "javascript")).rejects.toBeInstanceOf(SynthesisError);
    expect(transport).not.toHaveBeenCalled();
  });
});
