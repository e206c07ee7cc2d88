export type OpenAICompatPayload = {
  model: string;
  temperature: number;
  max_tokens: number;
  messages: Array<{ role: "system" | "user"; content: string }>;
};

export type OpenAICompatRequest = {
  apiKey: string;
  baseUrl: string;
  payload: OpenAICompatPayload;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

export type ChatTransport = (request: OpenAICompatRequest) => Promise<string | null>;

const DEFAULT_TIMEOUT_MS = 60_000;

export async function callOpenAICompatible(params: OpenAICompatRequest): Promise<string | null> {
  const { apiKey, baseUrl, payload } = params;
  const fetchImpl = params.fetchImpl ?? fetch;
  const url = `${baseUrl.replace(/\/$/, "")}/chat/completions`;

  const response = await fetchImpl(url, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${apiKey}`
    },
    body: JSON.stringify(payload),
    signal: AbortSignal.timeout(params.timeoutMs ?? DEFAULT_TIMEOUT_MS)
  });

  if (!response.ok) {
    const text = await response.text().catch(() => "");
    throw new Error(`LLM request failed: ${response.status} ${text}`);
  }

  const data = (await response.json()) as {
    choices?: Array<{ message?: { content?: string } }>;
  };
  return data.choices?.[0]?.message?.content?.trim() ?? null;
}

export function resolveBaseUrl(provider: string, baseUrl: string): string | null {
  if (baseUrl) {
    return baseUrl;
  }
  if (provider === "openai") {
    return "https://api.openai.com/v1";
  }
  return null;
}
