import type { ErrorEventData } from "./events";
import type { FactCheckReport, Verdict } from "./factcheck";

export type ClaimStatus = "pending" | "searching" | "verified" | "failed";

export type ClaimProgress = {
  claim_id: string;
  claim_text: string;
  original_index: number;
  status: ClaimStatus;
  queries: string[];
  evidence_count: number;
  verdict?: Verdict;
  error?: string;
};

export type RunStatus = "running" | "done" | "error" | "cancelled";

/**
 * Consumer-side view of one run, folded from its events.
 */
export type RunSnapshot = {
  run_id: string | null;
  status: RunStatus;
  question: string | null;
  counts: {
    sentences: number;
    selected: number;
    disambiguated: number;
    potential_claims: number;
    validated_claims: number;
  };
  claims: ClaimProgress[];
  report: FactCheckReport | null;
  errors: ErrorEventData[];
};
