import { z } from "zod";

export const VERIFICATION_RESULTS = [
  "Supported",
  "Refuted",
  "Insufficient Information",
  "Conflicting Evidence"
] as const;

export type VerificationResult = (typeof VERIFICATION_RESULTS)[number];

export type ContextualSentence = {
  original_sentence: string;
  context_for_llm: string;
  question: string;
  original_index: number;
};

export type SelectedContent = {
  original_context_item: ContextualSentence;
  processed_sentence: string;
};

export type DisambiguatedContent = {
  original_selected_item: SelectedContent;
  disambiguated_sentence: string;
};

/**
 * claim_id is "<original_index>.<claim_index>" and stays stable through
 * validation, verification and the report.
 */
export type PotentialClaim = {
  claim_id: string;
  claim_index: number;
  claim_text: string;
  disambiguated_sentence: string;
  original_sentence: string;
  original_index: number;
};

export type ValidatedClaim = PotentialClaim & {
  is_complete_declarative: boolean;
};

export const EvidenceSchema = z.object({
  url: z.string(),
  text: z.string(),
  title: z.string().optional()
});

export type Evidence = z.infer<typeof EvidenceSchema>;

export type Verdict = {
  claim_id: string;
  claim_text: string;
  disambiguated_sentence: string;
  original_sentence: string;
  original_index: number;
  result: VerificationResult;
  reasoning: string;
  sources: Evidence[];
};

export type FactCheckReport = {
  question: string;
  answer: string;
  claims_verified: number;
  verified_claims: Verdict[];
  summary: string;
  timestamp: string;
};

export const FactCheckInputSchema = z.object({
  question: z.string().trim().min(1, "question must be a non-empty string"),
  answer: z.string()
});

export type FactCheckInput = z.infer<typeof FactCheckInputSchema>;

export function claimIdFor(originalIndex: number, claimIndex: number): string {
  return `${originalIndex}.${claimIndex}`;
}
