/**
 * Typed environment configuration.
 *
 * Validated once by `loadConfig`; callers pass the result down instead of
 * reading `process.env` themselves.
 */

import { z } from "zod";
import { ConfigError } from "./errors";

export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";
export const DEFAULT_GROQ_MODEL = "llama-3.3-70b-versatile";
export const DEFAULT_GROQ_BASE_URL = "https://api.groq.com/openai/v1";
export const DEFAULT_GENERATION_TIMEOUT_MS = 30_000;

const emptyToUndefined = (val: string | undefined) => (val && val.trim() ? val.trim() : undefined);

const envSchema = z.object({
  CONTENT_PROVIDER: z.enum(["openai", "groq", "http"]).default("openai"),

  OPENAI_API_KEY: z.string().optional().transform(emptyToUndefined),
  OPENAI_MODEL: z.string().min(1).default(DEFAULT_OPENAI_MODEL),

  GROQ_API_KEY: z.string().optional().transform(emptyToUndefined),
  GROQ_MODEL: z.string().min(1).default(DEFAULT_GROQ_MODEL),
  GROQ_BASE_URL: z.string().url("Invalid GROQ_BASE_URL").default(DEFAULT_GROQ_BASE_URL),

  GENERATE_API_URL: z.string().url("Invalid GENERATE_API_URL").default("http://localhost:3000/api/generate"),

  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_GENERATION_TIMEOUT_MS),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type Env = z.infer<typeof envSchema>;

export type ContentProvider = Env["CONTENT_PROVIDER"];

export type AppConfig = {
  provider: ContentProvider;
  openai: { apiKey?: string; model: string };
  groq: { apiKey?: string; model: string; baseUrl: string };
  generateApiUrl: string;
  generationTimeoutMs: number;
  logLevel: Env["LOG_LEVEL"];
};

export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse({
    CONTENT_PROVIDER: source.CONTENT_PROVIDER || undefined,
    OPENAI_API_KEY: source.OPENAI_API_KEY,
    OPENAI_MODEL: source.OPENAI_MODEL || undefined,
    GROQ_API_KEY: source.GROQ_API_KEY,
    GROQ_MODEL: source.GROQ_MODEL || undefined,
    GROQ_BASE_URL: source.GROQ_BASE_URL || undefined,
    GENERATE_API_URL: source.GENERATE_API_URL || undefined,
    GENERATION_TIMEOUT_MS: source.GENERATION_TIMEOUT_MS || undefined,
    LOG_LEVEL: source.LOG_LEVEL || undefined,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid environment variables: ${issues.join("; ")}`, issues);
  }

  const env = parsed.data;
  return {
    provider: env.CONTENT_PROVIDER,
    openai: { apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL },
    groq: { apiKey: env.GROQ_API_KEY, model: env.GROQ_MODEL, baseUrl: env.GROQ_BASE_URL },
    generateApiUrl: env.GENERATE_API_URL,
    generationTimeoutMs: env.GENERATION_TIMEOUT_MS,
    logLevel: env.LOG_LEVEL,
  };
}
