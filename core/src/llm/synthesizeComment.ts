import { SynthesisError } from "../errors";
import type { LanguageId, SymbolRecord } from "../types";
import { formatAsComment, stripCodeFences } from "./commentFormat";
import {
  callOpenAICompatible,
  type ChatTransport,
  type OpenAICompatPayload,
  resolveBaseUrl
} from "./openaiCompat";

export interface CommentSynthesizer {
  /** Resolves to non-empty comment text or rejects with SynthesisError. */
  synthesize(symbol: SymbolRecord, language: LanguageId, context?: string): Promise<string>;
}

export type LlmConfig = {
  provider: string;
  apiKey: string;
  model: string;
  baseUrl: string;
  temperature: number;
  maxTokens: number;
  systemPrompt?: string;
  userPrompt?: string;
};

export const DEFAULT_SYSTEM_PROMPT =
  "You write documentation comments for source code. " +
  "Reply with the comment only, in the language's usual doc-comment syntax, " +
  "without code fences and without repeating the code. " +
  "Describe what the symbol does and, for functions, its parameters and return value. " +
  "Use only what the code shows; if it shows little, keep the comment short.";

export const DEFAULT_USER_PROMPT = [
  "language: {{language}}",
  "kind: {{kind}}",
  "name: {{name}}",
  "file: {{file}}",
  "code:",
  "```",
  "{{context}}",
  "```"
].join("\n");

const NO_CONTEXT_NOTE = "(source not available; infer from the name only)";

export function renderUserPrompt(
  template: string,
  symbol: SymbolRecord,
  language: LanguageId,
  context?: string
): string {
  const values: Record<string, string> = {
    language,
    kind: symbol.kind,
    name: symbol.name,
    file: symbol.sourceFile,
    context: context?.trim() ? context : NO_CONTEXT_NOTE
  };
  let rendered = template;
  for (const [key, value] of Object.entries(values)) {
    rendered = rendered.split(`{{${key}}}`).join(value);
  }
  return rendered;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Synthesizer backed by an OpenAI-compatible chat completion endpoint.
 * `transport` is injectable so tests never reach the network.
 */
export function createLlmSynthesizer(
  config: LlmConfig,
  transport: ChatTransport = callOpenAICompatible
): CommentSynthesizer {
  const systemPrompt = config.systemPrompt?.trim() || DEFAULT_SYSTEM_PROMPT;
  const userTemplate = config.userPrompt?.trim() || DEFAULT_USER_PROMPT;

  return {
    async synthesize(symbol, language, context) {
      const baseUrl = resolveBaseUrl(config.provider, config.baseUrl);
      if (!baseUrl) {
        throw new SynthesisError(
          `no base URL configured for provider "${config.provider}"; set DOCGAP_LLM_BASE_URL`
        );
      }
      if (!config.apiKey) {
        throw new SynthesisError(`no API key configured for provider "${config.provider}"`);
      }

      const userPrompt = renderUserPrompt(userTemplate, symbol, language, context);
      const payload: OpenAICompatPayload = {
        model: config.model,
        temperature: config.temperature,
        max_tokens: config.maxTokens,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: userPrompt }
        ]
      };

      console.log(`[synthesizeComment] LLM prompt file=${symbol.sourceFile} symbol=${symbol.name}`);
      let text: string | null;
      try {
        text = await transport({ apiKey: config.apiKey, baseUrl, payload });
      } catch (error) {
        throw new SynthesisError(`LLM call failed for ${symbol.name}: ${describeError(error)}`, {
          cause: error
        });
      }

      const cleaned = text ? stripCodeFences(text) : "";
      if (!cleaned) {
        throw new SynthesisError(`LLM returned no text for ${symbol.name}`);
      }
      return formatAsComment(cleaned, language);
    }
  };
}
