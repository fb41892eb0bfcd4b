import type {
  ContextualSentence,
  DisambiguatedContent,
  Evidence,
  FactCheckReport,
  PotentialClaim,
  SelectedContent,
  ValidatedClaim,
  Verdict
} from "./factcheck";

export type ErrorScope = "stage" | "claim" | "run";

export type ErrorEventData = {
  message: string;
  scope: ErrorScope;
  identifier?: string;
};

export type FactCheckEvent =
  | { type: "RunStarted"; data: { run_id: string; question: string } }
  | { type: "ContextualSentenceAdded"; data: ContextualSentence }
  | { type: "SelectedContentAdded"; data: SelectedContent }
  | { type: "DisambiguatedContentAdded"; data: DisambiguatedContent }
  | { type: "PotentialClaimAdded"; data: PotentialClaim }
  | { type: "ValidatedClaimAdded"; data: ValidatedClaim }
  | { type: "SearchQueryGenerated"; data: { claim_id: string; claim_text: string; query: string } }
  | { type: "EvidenceRetrieved"; data: { claim_id: string; claim_text: string; evidence: Evidence[] } }
  | { type: "ClaimVerificationResult"; data: Verdict }
  | { type: "FactCheckReportGenerated"; data: FactCheckReport }
  | { type: "Error"; data: ErrorEventData };

/**
 * Receives every event of a run, in emission order.
 */
export type EventSink = (event: FactCheckEvent) => void;

/**
 * Claim the event belongs to, for consumers that key interleaved
 * verifier progress by claim.
 */
export function claimIdOf(event: FactCheckEvent): string | undefined {
  switch (event.type) {
    case "PotentialClaimAdded":
    case "ValidatedClaimAdded":
    case "SearchQueryGenerated":
    case "EvidenceRetrieved":
    case "ClaimVerificationResult":
      return event.data.claim_id;
    case "Error":
      return event.data.scope === "claim" ? event.data.identifier : undefined;
    case "RunStarted":
    case "ContextualSentenceAdded":
    case "SelectedContentAdded":
    case "DisambiguatedContentAdded":
    case "FactCheckReportGenerated":
      return undefined;
    default: {
      const unreachable: never = event;
      return unreachable;
    }
  }
}
