import type { ChatMessage } from "./provider";
import {
  DecompositionOutputSchema,
  DisambiguationOutputSchema,
  EvidenceEvaluationOutputSchema,
  QueryGenerationOutputSchema,
  ReportSummaryOutputSchema,
  SelectionOutputSchema,
  ValidationOutputSchema,
  type SentenceInput,
  type StageInputs,
  type StageName,
  type StageOutputs
} from "./stages";
import type { Evidence, Verdict } from "../types/factcheck";

export type StageSpec<K extends StageName> = {
  /** Cheap steps run on the fast model. */
  tier: "main" | "fast";
  temperature: number;
  instruction: string;
  messages: (input: StageInputs[K]) => ChatMessage[];
  parse: (raw: unknown) => StageOutputs[K];
};

export type StageSpecs = { [K in StageName]: StageSpec<K> };

function clamp(s: string, max: number) {
  const t = (s ?? "").trim();
  return t.length > max ? t.slice(0, max) + "…" : t;
}

function sentenceMessage(input: SentenceInput): ChatMessage {
  return {
    role: "user",
    content: [input.context, "", "Sentence:", input.sentence].join("\n")
  };
}

/**
 * Numbered evidence list; the evaluator cites sources by these 1-based numbers.
 */
export function evidencePack(evidence: Evidence[]): string {
  if (evidence.length === 0) return "No relevant evidence was found.";

  return evidence
    .map((e, i) =>
      [
        `Source[${i + 1}]`,
        `URL: ${e.url}`,
        ...(e.title ? [`Title: ${clamp(e.title, 160)}`] : []),
        `Text: ${clamp(e.text, 1200)}`
      ].join("\n")
    )
    .join("\n\n");
}

function verdictsPack(verdicts: Verdict[]): string {
  return verdicts.map((v, i) => `Claim[${i + 1}] (${v.result}): ${v.claim_text}\nReasoning: ${v.reasoning}`).join("\n");
}

export const STAGE_SPECS: StageSpecs = {
  selection: {
    tier: "fast",
    temperature: 0,
    instruction: '{"processed_sentence":"string or null","no_verifiable_claims":false,"remains_unchanged":true}',
    messages: (input) => [
      {
        role: "system",
        content: [
          "You assist a fact-checker. Decide whether the sentence contains at least one specific, verifiable proposition.",
          "Use the question and the excerpt around the sentence; '[...]' means part of the response is not shown.",
          "Introductions, conclusions, opinions, speculation and statements about missing information are not verifiable.",
          "Whether the proposition is true or relevant does not matter.",
          "If it is verifiable, rewrite it as a complete sentence that keeps only the verifiable information.",
          "Set remains_unchanged when no rewrite is needed, and no_verifiable_claims when nothing is verifiable (processed_sentence null)."
        ].join("\n")
      },
      sentenceMessage(input)
    ],
    parse: (raw) => SelectionOutputSchema.parse(raw)
  },

  disambiguation: {
    tier: "main",
    temperature: 0,
    instruction: '{"disambiguated_sentence":"string or null","cannot_be_disambiguated":false}',
    messages: (input) => [
      {
        role: "system",
        content: [
          "You assist a fact-checker. Rewrite the sentence so it can be understood without its context.",
          "Resolve pronouns, partial names, acronyms and time references when the question or the excerpt makes the meaning clear.",
          "Vagueness is not ambiguity; leave vague wording as it is.",
          "Do not add facts from outside the question, the excerpt and the sentence. Drop citations.",
          "If an ambiguity has no clear resolution, set cannot_be_disambiguated and disambiguated_sentence null."
        ].join("\n")
      },
      sentenceMessage(input)
    ],
    parse: (raw) => DisambiguationOutputSchema.parse(raw)
  },

  decomposition: {
    tier: "main",
    temperature: 0,
    instruction: '{"claims":["..."],"no_claims":false}',
    messages: (input) => [
      {
        role: "system",
        content: [
          "You assist a fact-checker. Split the sentence into specific, verifiable, self-contained propositions.",
          "Each proposition is one complete sentence that states one fact.",
          "Add context the proposition needs in square brackets, e.g. \"The [Boston] council expects the law to pass in 2025\".",
          "Set no_claims and return an empty list when the sentence has no verifiable proposition."
        ].join("\n")
      },
      sentenceMessage(input)
    ],
    parse: (raw) => DecompositionOutputSchema.parse(raw)
  },

  validation: {
    tier: "fast",
    temperature: 0,
    instruction: '{"is_complete_declarative":true}',
    messages: (input) => [
      {
        role: "system",
        content:
          "Decide whether the claim, read in isolation, is a complete declarative sentence (it has a subject and a verb and states something)."
      },
      { role: "user", content: `Claim:\n${input.claim}` }
    ],
    parse: (raw) => ValidationOutputSchema.parse(raw)
  },

  query_generation: {
    tier: "fast",
    temperature: 0,
    instruction: '{"queries":["search query 1","search query 2"]}',
    messages: (input) => {
      const retry = input.previous
        ? [
            "",
            'A previous attempt ended with "Insufficient Information".',
            "Previous queries:",
            ...input.previous.queries.map((q, i) => `${i + 1}. ${q}`),
            "Why the evidence was insufficient:",
            input.previous.reasoning || "No reasoning given.",
            "Write new queries that target the missing information; do not repeat the previous ones."
          ]
        : [];

      return [
        {
          role: "system",
          content: [
            `Write up to ${input.maxQueries} web search queries that would find evidence for or against the claim.`,
            "Cover different phrasings, keep the key entities, names, numbers and dates, and avoid special characters.",
            ...retry
          ].join("\n")
        },
        { role: "user", content: `Claim: "${input.claim}"` }
      ];
    },
    parse: (raw) => QueryGenerationOutputSchema.parse(raw)
  },

  evidence_evaluation: {
    tier: "main",
    temperature: 0,
    instruction:
      '{"verdict":"Supported|Refuted|Insufficient Information|Conflicting Evidence","reasoning":"...","influential_source_indices":[1]}',
    messages: (input) => [
      {
        role: "system",
        content: [
          "You are a fact-checker. Judge the claim using ONLY the evidence below, not prior knowledge.",
          "verdict is one of:",
          "- Supported: the evidence clearly supports the claim.",
          "- Refuted: the evidence clearly contradicts the claim.",
          "- Insufficient Information: the evidence does not settle the claim.",
          "- Conflicting Evidence: sources disagree on the claim.",
          "Give 1-2 sentences of reasoning and the 1-based numbers of the sources that decided the verdict (empty when none did)."
        ].join("\n")
      },
      {
        role: "user",
        content: [
          "Claim:",
          input.claim,
          "",
          "Source sentence:",
          input.sourceText,
          "",
          "Evidence:",
          evidencePack(input.evidence)
        ].join("\n")
      }
    ],
    parse: (raw) => EvidenceEvaluationOutputSchema.parse(raw)
  },

  report_summary: {
    tier: "main",
    temperature: 0.2,
    instruction: '{"summary":"..."}',
    messages: (input) => [
      {
        role: "system",
        content: "Summarise the fact-check of the answer in 2-4 sentences: how many claims held up, which were refuted or unclear."
      },
      {
        role: "user",
        content: ["Question:", input.question, "", "Answer:", input.answer, "", "Verdicts:", verdictsPack(input.verdicts)].join(
          "\n"
        )
      }
    ],
    parse: (raw) => ReportSummaryOutputSchema.parse(raw)
  }
};
