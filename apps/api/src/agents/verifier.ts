import type { LimitFunction } from "p-limit";
import type { Generator } from "../llm/stages";
import type { SearchProvider } from "../services/search";
import { SearchError, errorMessage } from "../services/errors";
import type { Logger } from "../services/logger";
import { callWithTimeout } from "../services/timeout";
import type { FactCheckEvent } from "../types/events";
import {
  VERIFICATION_RESULTS,
  type Evidence,
  type ValidatedClaim,
  type Verdict,
  type VerificationResult
} from "../types/factcheck";
import type { PipelineConfig } from "./config";
import { mustPropagate } from "./stage";

export type ClaimState = "QueryGen" | "Retrieving" | "Evaluating" | "Settled";

export type VerifierContext = {
  generator: Generator;
  search: SearchProvider;
  config: PipelineConfig;
  signal: AbortSignal;
  logger: Logger;
  emit: (event: FactCheckEvent) => void;
  /** Shared by every claim of the run. */
  searchLimit: LimitFunction;
};

export type PreviousAttempt = { queries: string[]; reasoning: string };

export type Evaluation = {
  result: VerificationResult;
  reasoning: string;
  sources: Evidence[];
};

function uniqueTrimmed(values: string[]): string[] {
  return [...new Set(values.map((v) => v.trim()).filter(Boolean))];
}

export async function generateQueries(
  claim: ValidatedClaim,
  ctx: VerifierContext,
  previous?: PreviousAttempt
): Promise<string[]> {
  try {
    const out = await callWithTimeout(
      (signal) =>
        ctx.generator.generate(
          "query_generation",
          { claim: claim.claim_text, maxQueries: ctx.config.maxQueries, previous },
          { signal }
        ),
      { ms: ctx.config.llmTimeoutMs, label: `query generation for claim ${claim.claim_id}`, signal: ctx.signal }
    );

    const queries = uniqueTrimmed(out.queries).slice(0, ctx.config.maxQueries);
    if (queries.length) return queries;
    ctx.logger.warn("No search queries generated; searching for the claim itself", { claim_id: claim.claim_id });
  } catch (e) {
    if (mustPropagate(e)) throw e;
    ctx.logger.warn("Query generation failed; searching for the claim itself", {
      claim_id: claim.claim_id,
      error: errorMessage(e)
    });
  }
  return [claim.claim_text];
}

/**
 * Interleaves ranked result lists (first result of every query, then the
 * second, ...), keeping the first occurrence of each URL.
 */
export function mergeEvidence(lists: Evidence[][], max: number): Evidence[] {
  const seen = new Set<string>();
  const out: Evidence[] = [];
  const depth = Math.max(0, ...lists.map((l) => l.length));

  for (let rank = 0; rank < depth; rank++) {
    for (const list of lists) {
      if (out.length >= max) return out;
      const item = list[rank];
      if (!item || !item.url || seen.has(item.url)) continue;
      seen.add(item.url);
      out.push(item);
    }
  }
  return out;
}

export async function retrieveEvidence(
  claim: ValidatedClaim,
  queries: string[],
  ctx: VerifierContext
): Promise<Evidence[]> {
  const settled = await Promise.allSettled(
    queries.map((query) =>
      ctx.searchLimit(() =>
        callWithTimeout((signal) => ctx.search.search(query, { signal }), {
          ms: ctx.config.searchTimeoutMs,
          label: `search "${query}"`,
          signal: ctx.signal
        })
      )
    )
  );

  const lists: Evidence[][] = [];
  const failures: string[] = [];
  settled.forEach((r, i) => {
    if (r.status === "fulfilled") {
      lists.push(r.value);
      return;
    }
    if (mustPropagate(r.reason)) throw r.reason;
    failures.push(errorMessage(r.reason));
    ctx.logger.warn("Search failed", { claim_id: claim.claim_id, query: queries[i], error: errorMessage(r.reason) });
  });

  if (lists.length === 0) {
    throw new SearchError(
      `All ${queries.length} searches failed for claim ${claim.claim_id}: ${failures[0] ?? "no queries"}`,
      ctx.search.name
    );
  }
  return mergeEvidence(lists, ctx.config.maxEvidence);
}

export function normalizeVerdictLabel(label: string): VerificationResult | null {
  const key = label.trim().toLowerCase().replace(/[\s_-]+/g, " ");
  return VERIFICATION_RESULTS.find((r) => r.toLowerCase() === key) ?? null;
}

export async function evaluateEvidence(
  claim: ValidatedClaim,
  evidence: Evidence[],
  ctx: VerifierContext
): Promise<Evaluation> {
  const out = await callWithTimeout(
    (signal) =>
      ctx.generator.generate(
        "evidence_evaluation",
        { claim: claim.claim_text, sourceText: claim.disambiguated_sentence, evidence },
        { signal }
      ),
    { ms: ctx.config.llmTimeoutMs, label: `evaluation of claim ${claim.claim_id}`, signal: ctx.signal }
  );

  let result = normalizeVerdictLabel(out.verdict);
  if (result === null) {
    ctx.logger.warn("Unknown verdict label", { claim_id: claim.claim_id, verdict: out.verdict });
    result = "Insufficient Information";
  }

  const picked = new Set(out.influential_source_indices.filter((i) => i >= 1 && i <= evidence.length));
  const sources = [...picked].map((i) => evidence[i - 1]);

  return { result, reasoning: out.reasoning.trim(), sources };
}

/**
 * QueryGen -> Retrieving -> Evaluating, looping back to QueryGen while the
 * verdict is Insufficient Information and retries remain. Every claim ends in
 * Settled, including one that throws.
 */
export async function verifyClaim(
  claim: ValidatedClaim,
  ctx: VerifierContext,
  onState?: (state: ClaimState) => void
): Promise<Verdict> {
  let previous: PreviousAttempt | undefined;
  let retries = 0;

  try {
    for (;;) {
      onState?.("QueryGen");
      const queries = await generateQueries(claim, ctx, previous);
      for (const query of queries) {
        ctx.emit({ type: "SearchQueryGenerated", data: { claim_id: claim.claim_id, claim_text: claim.claim_text, query } });
      }

      onState?.("Retrieving");
      const evidence = await retrieveEvidence(claim, queries, ctx);
      ctx.emit({ type: "EvidenceRetrieved", data: { claim_id: claim.claim_id, claim_text: claim.claim_text, evidence } });

      onState?.("Evaluating");
      const evaluation = await evaluateEvidence(claim, evidence, ctx);

      if (evaluation.result === "Insufficient Information" && retries < ctx.config.maxRetries) {
        retries += 1;
        ctx.logger.info("Insufficient information; retrying with new queries", { claim_id: claim.claim_id, retry: retries });
        previous = { queries, reasoning: evaluation.reasoning };
        continue;
      }

      return {
        claim_id: claim.claim_id,
        claim_text: claim.claim_text,
        disambiguated_sentence: claim.disambiguated_sentence,
        original_sentence: claim.original_sentence,
        original_index: claim.original_index,
        ...evaluation
      };
    }
  } finally {
    onState?.("Settled");
  }
}
