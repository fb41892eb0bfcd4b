import type { FactCheckEvent } from "../types/events";
import type { ClaimProgress, RunSnapshot } from "../types/run";

export function emptySnapshot(): RunSnapshot {
  return {
    run_id: null,
    status: "running",
    question: null,
    counts: { sentences: 0, selected: 0, disambiguated: 0, potential_claims: 0, validated_claims: 0 },
    claims: [],
    report: null,
    errors: []
  };
}

function updateClaim(
  snapshot: RunSnapshot,
  claimId: string,
  update: (claim: ClaimProgress) => ClaimProgress
): RunSnapshot {
  if (!snapshot.claims.some((c) => c.claim_id === claimId)) return snapshot;
  return {
    ...snapshot,
    claims: snapshot.claims.map((c) => (c.claim_id === claimId ? update(c) : c))
  };
}

function bump(snapshot: RunSnapshot, key: keyof RunSnapshot["counts"]): RunSnapshot {
  return { ...snapshot, counts: { ...snapshot.counts, [key]: snapshot.counts[key] + 1 } };
}

/**
 * Pure reducer: returns a new snapshot and never mutates the old one.
 */
export function applyEvent(snapshot: RunSnapshot, event: FactCheckEvent): RunSnapshot {
  switch (event.type) {
    case "RunStarted":
      return { ...snapshot, run_id: event.data.run_id, question: event.data.question };
    case "ContextualSentenceAdded":
      return bump(snapshot, "sentences");
    case "SelectedContentAdded":
      return bump(snapshot, "selected");
    case "DisambiguatedContentAdded":
      return bump(snapshot, "disambiguated");
    case "PotentialClaimAdded":
      return bump(snapshot, "potential_claims");
    case "ValidatedClaimAdded": {
      const next = bump(snapshot, "validated_claims");
      const claim: ClaimProgress = {
        claim_id: event.data.claim_id,
        claim_text: event.data.claim_text,
        original_index: event.data.original_index,
        status: "pending",
        queries: [],
        evidence_count: 0
      };
      return { ...next, claims: [...next.claims, claim] };
    }
    case "SearchQueryGenerated": {
      const { query } = event.data;
      return updateClaim(snapshot, event.data.claim_id, (c) => ({
        ...c,
        status: "searching",
        queries: [...c.queries, query]
      }));
    }
    case "EvidenceRetrieved": {
      const count = event.data.evidence.length;
      return updateClaim(snapshot, event.data.claim_id, (c) => ({ ...c, evidence_count: count }));
    }
    case "ClaimVerificationResult": {
      const verdict = event.data;
      return updateClaim(snapshot, verdict.claim_id, (c) => ({ ...c, status: "verified", verdict }));
    }
    case "FactCheckReportGenerated":
      return { ...snapshot, status: "done", report: event.data };
    case "Error": {
      const error = event.data;
      const next: RunSnapshot = {
        ...snapshot,
        status: error.scope === "run" ? "error" : snapshot.status,
        errors: [...snapshot.errors, error]
      };
      if (error.scope !== "claim" || !error.identifier) return next;
      return updateClaim(next, error.identifier, (c) => ({ ...c, status: "failed", error: error.message }));
    }
    default: {
      const unreachable: never = event;
      return unreachable;
    }
  }
}
