import type { CompletionOptions, ContentGenerationService } from "./aiClient";
import { HttpContentService } from "./aiClient";
import type { AppConfig } from "./config";
import { ConfigError } from "./errors";

const OPENAI_RESPONSES_ENDPOINT = "https://api.openai.com/v1/responses";

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

async function postJson(
  fetchImpl: typeof fetch,
  url: string,
  apiKey: string,
  body: unknown,
  signal: AbortSignal | undefined,
  label: string
): Promise<unknown> {
  const resp = await fetchImpl(url, {
    method: "POST",
    headers: {
      Authorization: `Bearer ${apiKey}`,
      "Content-Type": "application/json",
    },
    body: JSON.stringify(body),
    signal,
  });

  if (!resp.ok) {
    const errText = await resp.text().catch(() => "");
    throw new Error(`${label} error ${resp.status}: ${errText || resp.statusText}`);
  }
  return resp.json();
}

/** Text from a Responses API payload: `output_text`, or the concatenated output_text parts. */
export function extractResponsesText(data: unknown): string {
  if (!isRecord(data)) return "";
  if (typeof data.output_text === "string") return data.output_text;

  let text = "";
  if (Array.isArray(data.output)) {
    for (const o of data.output) {
      const content = isRecord(o) ? o.content : undefined;
      if (!Array.isArray(content)) continue;
      for (const c of content) {
        if (isRecord(c) && c.type === "output_text" && typeof c.text === "string") text += c.text;
      }
    }
  }
  return text;
}

export function extractChatCompletionText(data: unknown): string {
  if (!isRecord(data) || !Array.isArray(data.choices)) return "";
  const first: unknown = data.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return "";
  const content = first.message.content;
  return typeof content === "string" ? content : "";
}

export class OpenAIResponsesService implements ContentGenerationService {
  readonly name = "openai";

  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const body: Record<string, unknown> = {
      model: this.model,
      input: [{ role: "user", content: [{ type: "input_text", text: prompt }] }],
    };
    if (options.temperature !== undefined) body.temperature = options.temperature;
    if (options.maxTokens !== undefined) body.max_output_tokens = options.maxTokens;
    const data = await postJson(this.fetchImpl, OPENAI_RESPONSES_ENDPOINT, this.apiKey, body, options.signal, "OpenAI");
    const text = extractResponsesText(data);
    if (!text) throw new Error("OpenAI returned no text output.");
    return text;
  }
}

/** Any OpenAI-compatible `/chat/completions` endpoint (Groq by default). */
export class ChatCompletionsService implements ContentGenerationService {
  readonly name = "chat-completions";

  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    private readonly baseUrl: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages: [{ role: "user", content: prompt }],
    };
    if (options.temperature !== undefined) body.temperature = options.temperature;
    if (options.maxTokens !== undefined) body.max_tokens = options.maxTokens;

    const url = `${this.baseUrl.replace(/\/+$/, "")}/chat/completions`;
    const data = await postJson(this.fetchImpl, url, this.apiKey, body, options.signal, "Chat completions");
    const text = extractChatCompletionText(data);
    if (!text) throw new Error("Chat completions returned no message content.");
    return text;
  }
}

/**
 * Builds the backend named by `config.provider`.
 * `allowHttp` is false on the server route, which must not call itself.
 */
export function createContentService(
  config: AppConfig,
  opts: { allowHttp?: boolean; fetchImpl?: typeof fetch } = {}
): ContentGenerationService {
  const fetchImpl = opts.fetchImpl ?? fetch;

  switch (config.provider) {
    case "openai":
      if (!config.openai.apiKey) throw new ConfigError("Missing OPENAI_API_KEY for the openai content provider.");
      return new OpenAIResponsesService(config.openai.apiKey, config.openai.model, fetchImpl);
    case "groq":
      if (!config.groq.apiKey) throw new ConfigError("Missing GROQ_API_KEY for the groq content provider.");
      return new ChatCompletionsService(config.groq.apiKey, config.groq.model, config.groq.baseUrl, fetchImpl);
    case "http":
      if (opts.allowHttp === false) {
        throw new ConfigError("CONTENT_PROVIDER=http cannot be used by the generate route itself.");
      }
      return new HttpContentService(config.generateApiUrl, fetchImpl);
  }
}
