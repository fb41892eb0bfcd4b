import { z } from "zod";
import type { Evidence, Verdict } from "../types/factcheck";

/**
 * The text-generation collaborator: one structured call per pipeline step.
 */
export type StageName =
  | "selection"
  | "disambiguation"
  | "decomposition"
  | "validation"
  | "query_generation"
  | "evidence_evaluation"
  | "report_summary";

export type SentenceInput = {
  question: string;
  /** The sentence's `context_for_llm`. */
  context: string;
  sentence: string;
};

export type StageInputs = {
  selection: SentenceInput;
  disambiguation: SentenceInput;
  decomposition: SentenceInput;
  validation: { claim: string };
  query_generation: {
    claim: string;
    maxQueries: number;
    previous?: { queries: string[]; reasoning: string };
  };
  evidence_evaluation: { claim: string; sourceText: string; evidence: Evidence[] };
  report_summary: { question: string; answer: string; verdicts: Verdict[] };
};

export const SelectionOutputSchema = z.object({
  processed_sentence: z.string().nullable().default(null),
  no_verifiable_claims: z.boolean(),
  remains_unchanged: z.boolean().default(false)
});

export const DisambiguationOutputSchema = z.object({
  disambiguated_sentence: z.string().nullable().default(null),
  cannot_be_disambiguated: z.boolean().default(false)
});

export const DecompositionOutputSchema = z.object({
  claims: z.array(z.string()).default([]),
  no_claims: z.boolean().default(false)
});

export const ValidationOutputSchema = z.object({
  is_complete_declarative: z.boolean()
});

const QuerySchema = z.union([
  z.string(),
  z.object({
    query: z.string(),
    rationale: z.string().optional()
  })
]);

export const QueryGenerationOutputSchema = z
  .object({ queries: z.array(QuerySchema).default([]) })
  .transform((raw) => ({ queries: raw.queries.map((q) => (typeof q === "string" ? q : q.query)) }));

export const EvidenceEvaluationOutputSchema = z.object({
  verdict: z.string(),
  reasoning: z.string().default(""),
  influential_source_indices: z.array(z.coerce.number().int()).default([])
});

export const ReportSummaryOutputSchema = z.object({
  summary: z.string().min(1)
});

export type StageOutputs = {
  selection: z.infer<typeof SelectionOutputSchema>;
  disambiguation: z.infer<typeof DisambiguationOutputSchema>;
  decomposition: z.infer<typeof DecompositionOutputSchema>;
  validation: z.infer<typeof ValidationOutputSchema>;
  query_generation: z.infer<typeof QueryGenerationOutputSchema>;
  evidence_evaluation: z.infer<typeof EvidenceEvaluationOutputSchema>;
  report_summary: z.infer<typeof ReportSummaryOutputSchema>;
};

export type GenerateOptions = {
  signal?: AbortSignal;
};

export interface Generator {
  /**
   * Throws GenerationError on provider failure or output that does not match
   * the stage's schema.
   */
  generate<S extends StageName>(stage: S, input: StageInputs[S], opts?: GenerateOptions): Promise<StageOutputs[S]>;
}
