import { env } from "../services/env";
import { GenerationError } from "../services/errors";
import { jsonOnlySystemPrompt, parseJsonReply } from "./jsonSchema";
import { requestFailure, responseFailure, type ChatOptions, type LLMProvider } from "./provider";

/**
 * OpenRouter Chat Completions wrapper.
 */
export class OpenRouterProvider implements LLMProvider {
  readonly name = "OpenRouter";
  private apiKey: string | undefined;
  private model: string;

  constructor(opts: { apiKey?: string; model?: string } = {}) {
    this.apiKey = opts.apiKey ?? env.OPENROUTER_API_KEY;
    this.model = opts.model ?? env.OPENROUTER_MODEL;
  }

  private ensureKey(): string {
    if (!this.apiKey) throw new GenerationError("OPENROUTER_API_KEY is not set.", { systemic: true });
    return this.apiKey;
  }

  async chat<TJson = never>(opts: ChatOptions<TJson>): Promise<{ text: string; json?: TJson }> {
    const apiKey = this.ensureKey();

    const messages = opts.json
      ? [{ role: "system" as const, content: jsonOnlySystemPrompt(opts.json.instruction) }, ...opts.messages]
      : opts.messages;

    let res: Response;
    try {
      res = await fetch("https://openrouter.ai/api/v1/chat/completions", {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
          "HTTP-Referer": "http://localhost",
          "X-Title": "claimcheck"
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          temperature: opts.temperature ?? 0.2,
          stream: false
        }),
        signal: opts.signal
      });
    } catch (e) {
      throw requestFailure(this.name, e);
    }

    if (!res.ok) throw responseFailure(this.name, res.status, await res.text());

    const data = (await res.json()) as { choices?: Array<{ message?: { content?: string } }> };
    const text = data.choices?.[0]?.message?.content ?? "";

    if (!opts.json) return { text };
    return { text, json: parseJsonReply(this.name, text, opts.json) };
  }
}
