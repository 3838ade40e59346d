export type CompletionOptions = {
  temperature?: number;
  maxTokens?: number;
  /** Identifies the caller's generation run; the generate route keys its cache on it. */
  generationId?: string;
  signal?: AbortSignal;
};

/** Anything that turns a natural-language prompt into free-form text. */
export interface ContentGenerationService {
  readonly name: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export type GenerateRequest = {
  prompt: string;
  temperature?: number;
  maxTokens?: number;
  generationId?: string;
};

export type GenerateResponse = { text: string; cached?: boolean };

function isGenerateResponse(data: unknown): data is GenerateResponse {
  return typeof data === "object" && data !== null && "text" in data && typeof data.text === "string";
}

/** Talks to the project's own `/api/generate` route, which holds the provider keys. */
export class HttpContentService implements ContentGenerationService {
  readonly name = "http";

  constructor(private readonly endpoint: string, private readonly fetchImpl: typeof fetch = fetch) {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const body: GenerateRequest = {
      prompt,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      generationId: options.generationId,
    };
    const res = await this.fetchImpl(this.endpoint, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal: options.signal,
    });

    if (!res.ok) {
      const txt = await res.text().catch(() => "");
      throw new Error(`Generate failed (${res.status}): ${txt || res.statusText}`);
    }

    const data: unknown = await res.json();
    if (!isGenerateResponse(data)) throw new Error("Invalid response from generator.");
    return data.text;
  }
}
