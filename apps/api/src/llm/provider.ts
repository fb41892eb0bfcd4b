import { FactCheckError, GenerationError } from "../services/errors";

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type LLMJsonSpec<T> = {
  /**
   * Short JSON schema-like instruction. The model must output ONLY JSON.
   */
  instruction: string;

  /**
   * Parse/validate JSON object into T (e.g., via Zod).
   * This should throw if invalid.
   */
  parse: (raw: unknown) => T;
};

export type ChatOptions<TJson> = {
  messages: ChatMessage[];
  temperature?: number;

  /**
   * If provided, the model is instructed to output ONLY JSON and the output
   * is parsed/validated via json.parse(...).
   */
  json?: LLMJsonSpec<TJson>;

  signal?: AbortSignal;
};

export interface LLMProvider {
  readonly name: string;
  chat<TJson = never>(opts: ChatOptions<TJson>): Promise<{ text: string; json?: TJson }>;
}

/**
 * fetch() rejected before any HTTP status: the provider is unreachable.
 * Our own timeout/cancel reasons pass through untouched.
 */
export function requestFailure(provider: string, e: unknown): Error {
  if (e instanceof FactCheckError) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new GenerationError(`${provider} unreachable: ${message}`, { systemic: true, cause: e });
}

export function responseFailure(provider: string, status: number, body: string): GenerationError {
  return new GenerationError(`${provider} chat failed (${status}): ${body.slice(0, 500)}`, {
    status,
    systemic: status === 401 || status === 403
  });
}
