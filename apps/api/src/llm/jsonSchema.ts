import { GenerationError } from "../services/errors";
import type { LLMJsonSpec } from "./provider";

export function jsonOnlySystemPrompt(instruction: string): string {
  return [
    "You MUST output ONLY valid JSON.",
    "No markdown. No prose. No code fences.",
    `JSON Spec: ${instruction}`
  ].join("\n");
}

export function safeJsonParse(text: string): unknown {
  const t = text.trim();
  try {
    return JSON.parse(t);
  } catch {
    const firstObj = t.indexOf("{");
    const firstArr = t.indexOf("[");
    const start =
      firstObj === -1 ? firstArr : firstArr === -1 ? firstObj : Math.min(firstObj, firstArr);

    if (start === -1) throw new Error("Model did not return JSON.");

    const endObj = t.lastIndexOf("}");
    const endArr = t.lastIndexOf("]");
    const end = Math.max(endObj, endArr);

    if (end <= start) throw new Error("Model returned malformed JSON.");

    return JSON.parse(t.slice(start, end + 1));
  }
}

/**
 * Model text → validated JSON. Any failure is a malformed-output
 * GenerationError (item-level, never systemic).
 */
export function parseJsonReply<T>(provider: string, text: string, spec: LLMJsonSpec<T>): T {
  try {
    return spec.parse(safeJsonParse(text));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new GenerationError(`${provider} returned output that does not match the expected JSON: ${reason}`, {
      cause: e
    });
  }
}
