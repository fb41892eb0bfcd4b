import type { Generator } from "../llm/stages";
import { errorMessage } from "../services/errors";
import type { Logger } from "../services/logger";
import { callWithTimeout } from "../services/timeout";
import { VERIFICATION_RESULTS, type FactCheckReport, type Verdict } from "../types/factcheck";
import { mustPropagate } from "./stage";

export type ReportContext = {
  generator: Generator;
  llmTimeoutMs: number;
  signal: AbortSignal;
  logger: Logger;
  now: () => Date;
};

export const NO_CLAIMS_SUMMARY = "No verifiable claims were found in the answer.";

export function byLineage(a: Verdict, b: Verdict): number {
  if (a.original_index !== b.original_index) return a.original_index - b.original_index;
  return Number(a.claim_id.split(".")[1]) - Number(b.claim_id.split(".")[1]);
}

/**
 * "2 claims verified: 1 Supported, 1 Refuted." Labels appear in a fixed order.
 */
export function countSummary(verdicts: Verdict[]): string {
  const n = verdicts.length;
  const parts = VERIFICATION_RESULTS.map((label) => ({
    label,
    count: verdicts.filter((v) => v.result === label).length
  }))
    .filter((p) => p.count > 0)
    .map((p) => `${p.count} ${p.label}`);

  return `${n} ${n === 1 ? "claim" : "claims"} verified: ${parts.join(", ")}.`;
}

async function summarize(
  question: string,
  answer: string,
  verdicts: Verdict[],
  attempted: number,
  ctx: ReportContext
): Promise<string> {
  if (attempted === 0) return NO_CLAIMS_SUMMARY;
  if (verdicts.length === 0) return `None of the ${attempted} extracted claims could be verified.`;

  try {
    const out = await callWithTimeout(
      (signal) => ctx.generator.generate("report_summary", { question, answer, verdicts }, { signal }),
      { ms: ctx.llmTimeoutMs, label: "report summary", signal: ctx.signal }
    );
    return out.summary.trim() || countSummary(verdicts);
  } catch (e) {
    if (mustPropagate(e)) throw e;
    ctx.logger.warn("Summary generation failed; using counts", { error: errorMessage(e) });
    return countSummary(verdicts);
  }
}

/**
 * `attempted` is the number of validated claims, including those whose
 * verification failed.
 */
export async function generateReport(
  question: string,
  answer: string,
  verdicts: Verdict[],
  attempted: number,
  ctx: ReportContext
): Promise<FactCheckReport> {
  const verified_claims = [...verdicts].sort(byLineage);
  const summary = await summarize(question, answer, verified_claims, attempted, ctx);

  return {
    question,
    answer,
    claims_verified: verified_claims.length,
    verified_claims,
    summary,
    timestamp: ctx.now().toISOString()
  };
}
