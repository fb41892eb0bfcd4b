import { env } from "../services/env";
import { jsonOnlySystemPrompt, parseJsonReply } from "./jsonSchema";
import { requestFailure, responseFailure, type ChatOptions, type LLMProvider } from "./provider";

type OllamaChatResponse = {
  message?: { content?: string };
  response?: string;
  choices?: Array<{ message?: { content?: string } }>;
};

/**
 * Ollama Chat API wrapper (non-streaming).
 */
export class OllamaProvider implements LLMProvider {
  readonly name = "Ollama";
  private baseUrl: string;
  private model: string;

  constructor(opts: { baseUrl?: string; model?: string } = {}) {
    this.baseUrl = opts.baseUrl ?? env.OLLAMA_BASE_URL;
    this.model = opts.model ?? env.OLLAMA_MODEL;
  }

  private options(temperature?: number) {
    return {
      ...(temperature != null ? { temperature } : {}),
      ...(process.env.OLLAMA_NUM_PREDICT ? { num_predict: Number(process.env.OLLAMA_NUM_PREDICT) } : {}),
      ...(process.env.OLLAMA_TOP_P ? { top_p: Number(process.env.OLLAMA_TOP_P) } : {})
    };
  }

  async chat<TJson = never>(opts: ChatOptions<TJson>): Promise<{ text: string; json?: TJson }> {
    const messages = opts.json
      ? [{ role: "system" as const, content: jsonOnlySystemPrompt(opts.json.instruction) }, ...opts.messages]
      : opts.messages;

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/api/chat`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: this.model,
          messages,
          stream: false,
          ...(opts.json ? { format: "json" } : {}),
          options: this.options(opts.temperature)
        }),
        signal: opts.signal
      });
    } catch (e) {
      throw requestFailure(this.name, e);
    }

    if (!res.ok) throw responseFailure(this.name, res.status, await res.text());

    const data = (await res.json()) as OllamaChatResponse;

    // Chat shape first, then the legacy generate shape.
    const text = data.message?.content ?? data.response ?? data.choices?.[0]?.message?.content ?? "";

    if (!opts.json) return { text };
    return { text, json: parseJsonReply(this.name, text, opts.json) };
  }
}
