import { env } from "../services/env";
import { LLMGenerator } from "./generator";
import type { LLMProvider } from "./provider";
import { OllamaProvider } from "./ollama";
import { OpenRouterProvider } from "./openrouter";

export function getLLM(): LLMProvider {
  return env.LLM_PROVIDER === "openrouter" ? new OpenRouterProvider() : new OllamaProvider();
}

/**
 * Fast LLM for cheap steps (selection, validation, query generation).
 * Falls back to the main model when no fast model is configured.
 */
export function getLLMFast(): LLMProvider {
  if (env.LLM_PROVIDER === "openrouter") {
    return new OpenRouterProvider({ model: env.OPENROUTER_MODEL_FAST ?? env.OPENROUTER_MODEL });
  }
  return new OllamaProvider({ model: env.OLLAMA_MODEL_FAST ?? env.OLLAMA_MODEL });
}

export function getGenerator(): LLMGenerator {
  return new LLMGenerator(getLLM(), getLLMFast());
}
