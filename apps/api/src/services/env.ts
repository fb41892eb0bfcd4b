import { z } from "zod";
import type { PipelineConfig } from "../agents/config";
import { ConfigError } from "./errors";

const int = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const count = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((v) => v === "true");

export const EnvSchema = z.object({
  PORT: z.string().default("8787"),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  LLM_PROVIDER: z.enum(["ollama", "openrouter"]).default("ollama"),

  OLLAMA_BASE_URL: z.string().default("http://localhost:11434"),
  OLLAMA_MODEL: z.string().default("llama3.1"),
  OLLAMA_MODEL_FAST: z.string().optional(),

  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_MODEL: z.string().default("anthropic/claude-3.5-sonnet"),
  OPENROUTER_MODEL_FAST: z.string().optional(),

  SEARCH_PROVIDER: z.enum(["serper", "tavily"]).default("serper"),
  SERPER_API_KEY: z.string().optional(),
  TAVILY_API_KEY: z.string().optional(),
  SEARCH_RESULTS_PER_QUERY: int(5),
  SEARCH_CACHE_TTL_SECONDS: int(30 * 60),
  EVIDENCE_FETCH_PAGES: flag("false"),

  UPSTASH_REDIS_REST_URL: z.string().optional(),
  UPSTASH_REDIS_REST_TOKEN: z.string().optional(),
  RATE_LIMIT_PER_MINUTE: int(30),

  CONTEXT_SENTENCES_BEFORE: count(5),
  CONTEXT_SENTENCES_AFTER: count(5),
  STAGE_CONCURRENCY: int(8),
  MAX_CONCURRENT_CLAIMS: int(5),
  SEARCH_CONCURRENCY: int(4),
  LLM_TIMEOUT_MS: int(60_000),
  SEARCH_TIMEOUT_MS: int(15_000),
  VOTING_COMPLETIONS: int(1),
  VOTING_MIN_SUCCESSES: int(1),
  DROP_UNRESOLVED_SENTENCES: flag("false"),
  MAX_QUERIES: int(3),
  MAX_EVIDENCE: int(20),
  VERIFY_MAX_RETRIES: count(3)
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export const env = parseEnv(process.env);

export function loadPipelineConfig(source: Env): PipelineConfig {
  return {
    contextBefore: source.CONTEXT_SENTENCES_BEFORE,
    contextAfter: source.CONTEXT_SENTENCES_AFTER,
    stageConcurrency: source.STAGE_CONCURRENCY,
    maxConcurrentClaims: source.MAX_CONCURRENT_CLAIMS,
    searchConcurrency: source.SEARCH_CONCURRENCY,
    llmTimeoutMs: source.LLM_TIMEOUT_MS,
    searchTimeoutMs: source.SEARCH_TIMEOUT_MS,
    completions: source.VOTING_COMPLETIONS,
    minSuccesses: Math.min(source.VOTING_MIN_SUCCESSES, source.VOTING_COMPLETIONS),
    dropUnresolvedSentences: source.DROP_UNRESOLVED_SENTENCES,
    maxQueries: source.MAX_QUERIES,
    maxEvidence: source.MAX_EVIDENCE,
    maxRetries: source.VERIFY_MAX_RETRIES
  };
}
