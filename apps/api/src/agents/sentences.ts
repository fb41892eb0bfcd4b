import type { ContextualSentence } from "../types/factcheck";

// Lowercased, without the trailing period.
const ABBREVIATIONS = new Set([
  "mr", "mrs", "ms", "dr", "prof", "sr", "jr", "st", "vs", "etc", "e.g", "i.e",
  "u.s", "u.k", "u.n", "inc", "ltd", "corp", "approx", "jan", "feb", "mar", "apr",
  "jun", "jul", "aug", "sep", "sept", "oct", "nov", "dec"
]);

// Abbreviations only when a number follows: "No. 5", "Fig. 2".
const NUMBERED = new Set(["no", "nos", "fig", "vol", "p", "pp"]);

const LIST_MARKER = /^\d+$/;

const BOUNDARY = /([.!?]+)(["'”’)\]]*)(\s+)/g;

function endsWithAbbreviation(before: string, next: string): boolean {
  const word = before.slice(before.lastIndexOf(" ") + 1).replace(/^[("'“‘[]+/, "");
  if (/^[A-Z]$/.test(word)) return true; // initials: "J. K. Rowling"
  const lower = word.toLowerCase();
  if (NUMBERED.has(lower)) return /\d/.test(next);
  return ABBREVIATIONS.has(lower);
}

function splitLine(line: string): string[] {
  const out: string[] = [];
  let start = 0;

  for (const m of line.matchAll(BOUNDARY)) {
    const index = m.index ?? 0;
    const end = index + m[1].length + m[2].length;
    const next = line.charAt(index + m[0].length);

    if (next && next === next.toLowerCase() && next !== next.toUpperCase()) continue;
    if (m[1] === "." && start === 0 && LIST_MARKER.test(line.slice(0, index))) continue;
    if (m[1] === "." && endsWithAbbreviation(line.slice(start, index), next)) continue;

    out.push(line.slice(start, end).trim());
    start = index + m[0].length;
  }

  out.push(line.slice(start).trim());
  return out.filter(Boolean);
}

/**
 * Line breaks always end a sentence; inside a line, terminal punctuation
 * followed by whitespace and a non-lowercase letter does, except after
 * abbreviations and initials.
 */
export function splitSentences(text: string): string[] {
  return text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((l) => l.trim())
    .filter(Boolean)
    .flatMap(splitLine);
}

export type ContextWindow = { before: number; after: number };

export function buildExcerpt(sentences: string[], index: number, window: ContextWindow): string {
  const start = Math.max(0, index - window.before);
  const end = Math.min(sentences.length, index + window.after + 1);
  const body = sentences.slice(start, end).join(" ");
  return `${start > 0 ? "[...] " : ""}${body}${end < sentences.length ? " [...]" : ""}`;
}

export function buildContextualSentences(
  question: string,
  answer: string,
  window: ContextWindow
): ContextualSentence[] {
  const sentences = splitSentences(answer);

  return sentences.map((sentence, i) => ({
    original_sentence: sentence,
    context_for_llm: `Question: ${question}\nExcerpt: ${buildExcerpt(sentences, i, window)}`,
    question,
    original_index: i
  }));
}
