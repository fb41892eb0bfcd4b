import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { OpenRouterProvider } from "../src/llm/openrouter";
import { OllamaProvider } from "../src/llm/ollama";
import { GenerationError } from "../src/services/errors";

const OkSchema = z.object({ ok: z.boolean() });
const okJson = { instruction: '{"ok":true}', parse: (raw: unknown) => OkSchema.parse(raw) };

function stubFetch(respond: () => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => respond());
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function sentBody(fetchMock: ReturnType<typeof stubFetch>, call = 0): unknown {
  return JSON.parse(String(fetchMock.mock.calls[call]?.[1]?.body));
}

async function rejection(promise: Promise<unknown>): Promise<GenerationError> {
  try {
    await promise;
  } catch (e) {
    if (e instanceof GenerationError) return e;
    throw e;
  }
  throw new Error("expected a GenerationError");
}

describe("OpenRouterProvider", () => {
  const provider = () => new OpenRouterProvider({ apiKey: "test-key", model: "test/model" });

  it("asks for JSON only and parses the reply", async () => {
    const fetchMock = stubFetch(
      () => new Response(JSON.stringify({ choices: [{ message: { content: '```json\n{"ok":true}\n```' } }] }))
    );

    const out = await provider().chat({ messages: [{ role: "user", content: "hi" }], json: okJson });

    expect(out.json).toEqual({ ok: true });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://openrouter.ai/api/v1/chat/completions");
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({ Authorization: "Bearer test-key" });
    expect(sentBody(fetchMock)).toMatchObject({
      model: "test/model",
      temperature: 0.2,
      stream: false,
      messages: [
        {
          role: "system",
          content: 'You MUST output ONLY valid JSON.\nNo markdown. No prose. No code fences.\nJSON Spec: {"ok":true}'
        },
        { role: "user", content: "hi" }
      ]
    });
  });

  it("treats rejected credentials as systemic", async () => {
    stubFetch(() => new Response("unauthorized", { status: 401 }));

    const error = await rejection(provider().chat({ messages: [] }));
    expect(error.message).toBe("OpenRouter chat failed (401): unauthorized");
    expect(error.status).toBe(401);
    expect(error.systemic).toBe(true);
  });

  it("treats server errors as item failures", async () => {
    stubFetch(() => new Response("overloaded", { status: 503 }));

    const error = await rejection(provider().chat({ messages: [] }));
    expect(error.systemic).toBe(false);
    expect(error.status).toBe(503);
  });

  it("treats a network failure as systemic", async () => {
    stubFetch(() => {
      throw new TypeError("fetch failed");
    });

    const error = await rejection(provider().chat({ messages: [] }));
    expect(error.message).toBe("OpenRouter unreachable: fetch failed");
    expect(error.systemic).toBe(true);
  });

  it("fails before calling out without a key", async () => {
    const fetchMock = stubFetch(() => new Response("{}"));

    const error = await rejection(new OpenRouterProvider({ apiKey: "" }).chat({ messages: [] }));
    expect(error.message).toBe("OPENROUTER_API_KEY is not set.");
    expect(error.systemic).toBe(true);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("reports malformed output as an item failure", async () => {
    stubFetch(() => new Response(JSON.stringify({ choices: [{ message: { content: "I cannot do that." } }] })));

    const error = await rejection(provider().chat({ messages: [], json: okJson }));
    expect(error.message).toBe(
      "OpenRouter returned output that does not match the expected JSON: Model did not return JSON."
    );
    expect(error.systemic).toBe(false);
  });
});

describe("OllamaProvider", () => {
  const provider = () => new OllamaProvider({ baseUrl: "http://ollama.test", model: "test-model" });

  it("requests JSON format and reads the chat message", async () => {
    const fetchMock = stubFetch(() => new Response(JSON.stringify({ message: { content: '{"ok":false}' } })));

    const out = await provider().chat({ messages: [{ role: "user", content: "hi" }], temperature: 0.1, json: okJson });

    expect(out).toEqual({ text: '{"ok":false}', json: { ok: false } });
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://ollama.test/api/chat");
    expect(sentBody(fetchMock)).toMatchObject({ model: "test-model", stream: false, format: "json" });
  });

  it("returns plain text when no JSON is requested", async () => {
    const fetchMock = stubFetch(() => new Response(JSON.stringify({ message: { content: "plain" } })));

    await expect(provider().chat({ messages: [{ role: "user", content: "hi" }] })).resolves.toEqual({ text: "plain" });
    expect(sentBody(fetchMock)).not.toHaveProperty("format");
  });

  it("passes the caller's signal to fetch", async () => {
    const fetchMock = stubFetch(() => new Response(JSON.stringify({ message: { content: "x" } })));
    const controller = new AbortController();

    await provider().chat({ messages: [], signal: controller.signal });
    expect(fetchMock.mock.calls[0]?.[1]?.signal).toBe(controller.signal);
  });

  it("treats a refused connection as systemic", async () => {
    stubFetch(() => {
      throw new TypeError("fetch failed");
    });

    const error = await rejection(provider().chat({ messages: [] }));
    expect(error.message).toBe("Ollama unreachable: fetch failed");
    expect(error.systemic).toBe(true);
  });
});
