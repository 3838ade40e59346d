import type { VercelRequest, VercelResponse } from "@vercel/node";
import { z } from "zod";
import type { ContentGenerationService } from "../src/aiClient";
import { loadConfig } from "../src/config";
import { getErrorMessage } from "../src/errors";
import { createContentService } from "../src/llmProviders";
import { createLogger } from "../src/logger";
import { RateLimiter, TtlCache, clientIpFrom, sha256, type RateDecision } from "../src/requestGuards";

const MAX_PROMPT_CHARS = 20_000;

const BodySchema = z.object({
  prompt: z.string().trim().min(1, "Missing prompt.").max(MAX_PROMPT_CHARS, "Prompt too long."),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().max(8000).optional(),
  generationId: z.string().max(200).optional(),
});

export type RouteRequest = Pick<VercelRequest, "method" | "headers" | "body"> & {
  socket?: { remoteAddress?: string };
};

export type RouteResponse = {
  status(code: number): RouteResponse;
  setHeader(name: string, value: string): unknown;
  send(body: string): unknown;
};

export type GenerateBackend = { service: ContentGenerationService; timeoutMs: number };

export type GenerateRouteOptions = {
  cache?: TtlCache<string>;
  limiter?: RateLimiter;
  /** Resolved on the first request that needs it. */
  backend?: () => GenerateBackend;
};

const log = createLogger("api/generate");

function backendFromEnv(): GenerateBackend {
  const config = loadConfig();
  log.setLevel(config.logLevel);
  return {
    service: createContentService(config, { allowHttp: false }),
    timeoutMs: config.generationTimeoutMs,
  };
}

function json(res: RouteResponse, status: number, body: unknown) {
  res.status(status).setHeader("Content-Type", "application/json");
  res.send(JSON.stringify(body));
}

function setRateHeaders(res: RouteResponse, d: RateDecision) {
  res.setHeader("X-RateLimit-Limit", String(d.limit));
  res.setHeader("X-RateLimit-Remaining", String(d.remaining));
  res.setHeader("X-RateLimit-Reset", String(d.resetAt));
}

function parseBody(raw: unknown): unknown {
  if (typeof raw !== "string") return raw;
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

export function createGenerateHandler(opts: GenerateRouteOptions = {}) {
  const cache = opts.cache ?? new TtlCache<string>();
  const limiter = opts.limiter ?? new RateLimiter();
  const resolveBackend = opts.backend ?? backendFromEnv;
  let backend: GenerateBackend | null = null;

  return async function handler(req: RouteRequest, res: RouteResponse) {
    if (req.method !== "POST") return json(res, 405, { error: "Method Not Allowed" });

    const decision = limiter.check(clientIpFrom(req.headers, req.socket?.remoteAddress));
    setRateHeaders(res, decision);
    if (!decision.allowed) {
      res.setHeader("Retry-After", String(decision.retryAfterSeconds ?? 1));
      return json(res, 429, {
        error: "Rate limit exceeded. Please wait and retry.",
        retryAfterSeconds: decision.retryAfterSeconds,
      });
    }

    const body = BodySchema.safeParse(parseBody(req.body));
    if (!body.success) {
      return json(res, 400, { error: body.error.issues.map((i) => i.message).join(" ") });
    }

    // Identical prompts from different generation runs must not share a batch.
    const { prompt, temperature, maxTokens, generationId } = body.data;
    const cacheKey = sha256(JSON.stringify({ prompt, temperature, maxTokens, generationId }));

    const cached = cache.get(cacheKey);
    if (cached !== null) {
      res.setHeader("X-Cache", "HIT");
      return json(res, 200, { text: cached, cached: true });
    }

    try {
      backend ??= resolveBackend();
      const text = await backend.service.complete(prompt, {
        temperature,
        maxTokens,
        signal: AbortSignal.timeout(backend.timeoutMs),
      });
      cache.set(cacheKey, text);
      res.setHeader("X-Cache", "MISS");
      return json(res, 200, { text, cached: false });
    } catch (e) {
      const message = getErrorMessage(e);
      log.error("Generation failed:", message);
      return json(res, 500, { error: message });
    }
  };
}

export default createGenerateHandler();
