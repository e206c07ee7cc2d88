import { ConfigError } from "./errors";
import { isLanguageId } from "./language";
import type { LlmConfig } from "./llm/synthesizeComment";
import type { LanguageId } from "./types";

export type RunConfig = {
  /** null when no provider is configured; comments are then rule-based. */
  llm: LlmConfig | null;
  extraIgnorePatterns: string[];
  /** null means every registered language. */
  languages: LanguageId[] | null;
  indentPythonClassDocstrings: boolean;
  disableTreeSitter: boolean;
  baseBranch: string;
};

type Env = Record<string, string | undefined>;

const DEFAULT_MODEL = "gpt-4o-mini";
const DEFAULT_TEMPERATURE = 0.2;
const DEFAULT_MAX_TOKENS = 256;
const DEFAULT_BASE_BRANCH = "main";

function readString(env: Env, key: string): string {
  return env[key]?.trim() ?? "";
}

function readList(env: Env, key: string): string[] {
  return readString(env, key)
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, key: string): boolean {
  const raw = readString(env, key).toLowerCase();
  if (["", "0", "false", "no", "off"].includes(raw)) {
    return false;
  }
  if (["1", "true", "yes", "on"].includes(raw)) {
    return true;
  }
  throw new ConfigError(`${key} must be a boolean, got "${raw}"`);
}

function readLanguages(env: Env): LanguageId[] | null {
  const names = readList(env, "DOCGAP_LANGUAGES");
  if (names.length === 0) {
    return null;
  }
  const languages: LanguageId[] = [];
  for (const name of names) {
    const normalized = name.toLowerCase();
    if (!isLanguageId(normalized)) {
      throw new ConfigError(`DOCGAP_LANGUAGES: unknown language "${name}"`);
    }
    if (!languages.includes(normalized)) {
      languages.push(normalized);
    }
  }
  return languages;
}

function readLlmConfig(env: Env): LlmConfig | null {
  const provider = readString(env, "DOCGAP_LLM_PROVIDER");
  if (!provider) {
    return null;
  }
  const apiKey = readString(env, "DOCGAP_LLM_API_KEY");
  if (!apiKey) {
    throw new ConfigError("DOCGAP_LLM_API_KEY is required when DOCGAP_LLM_PROVIDER is set");
  }
  const baseUrl = readString(env, "DOCGAP_LLM_BASE_URL");
  if (!baseUrl && provider !== "openai") {
    throw new ConfigError(`DOCGAP_LLM_BASE_URL is required for provider "${provider}"`);
  }

  const maxTokens = readNumber(env, "DOCGAP_LLM_MAX_TOKENS", DEFAULT_MAX_TOKENS);
  if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
    throw new ConfigError(`DOCGAP_LLM_MAX_TOKENS must be a positive integer, got ${maxTokens}`);
  }
  const temperature = readNumber(env, "DOCGAP_LLM_TEMPERATURE", DEFAULT_TEMPERATURE);

  return {
    provider,
    apiKey,
    model: readString(env, "DOCGAP_LLM_MODEL") || DEFAULT_MODEL,
    baseUrl,
    temperature: Math.min(1, Math.max(0, temperature)),
    maxTokens,
    systemPrompt: readString(env, "DOCGAP_LLM_SYSTEM_PROMPT") || undefined,
    userPrompt: readString(env, "DOCGAP_LLM_USER_PROMPT") || undefined
  };
}

/**
 * Read the run configuration from environment variables. Invalid values
 * throw ConfigError before any work starts.
 */
export function resolveRunConfig(env: Env = process.env): RunConfig {
  return {
    llm: readLlmConfig(env),
    extraIgnorePatterns: readList(env, "DOCGAP_IGNORE"),
    languages: readLanguages(env),
    indentPythonClassDocstrings: readBoolean(env, "DOCGAP_PYTHON_CLASS_INDENT"),
    disableTreeSitter: readBoolean(env, "DOCGAP_DISABLE_TREE_SITTER"),
    baseBranch: readString(env, "DOCGAP_BASE_BRANCH") || DEFAULT_BASE_BRANCH
  };
}
