import { describe, it, expect } from "vitest";
import { NO_CLAIMS_SUMMARY, countSummary, generateReport, type ReportContext } from "../src/agents/reporter";
import { GenerationError } from "../src/services/errors";
import type { Verdict, VerificationResult } from "../src/types/factcheck";
import { silentLogger, stubGenerator, type StubGenerator } from "./helpers/stubs";

function verdict(claimId: string, result: VerificationResult = "Supported"): Verdict {
  const [sentence] = claimId.split(".");
  return {
    claim_id: claimId,
    claim_text: `claim ${claimId}`,
    disambiguated_sentence: `sentence ${sentence}`,
    original_sentence: `sentence ${sentence}`,
    original_index: Number(sentence),
    result,
    reasoning: "",
    sources: []
  };
}

function context(generator: StubGenerator): ReportContext {
  return {
    generator,
    llmTimeoutMs: 1_000,
    signal: new AbortController().signal,
    logger: silentLogger,
    now: () => new Date("2026-03-04T05:06:07.000Z")
  };
}

describe("countSummary", () => {
  it("counts verdicts per label in a fixed order", () => {
    expect(countSummary([verdict("0.0", "Refuted"), verdict("1.0", "Supported")])).toBe(
      "2 claims verified: 1 Supported, 1 Refuted."
    );
  });

  it("uses the singular for one claim", () => {
    expect(countSummary([verdict("0.0", "Conflicting Evidence")])).toBe("1 claim verified: 1 Conflicting Evidence.");
  });
});

describe("generateReport", () => {
  it("orders verdicts by sentence and claim", async () => {
    const report = await generateReport(
      "Q?",
      "A.",
      [verdict("1.0"), verdict("0.1"), verdict("0.0")],
      3,
      context(stubGenerator())
    );

    expect(report.verified_claims.map((v) => v.claim_id)).toEqual(["0.0", "0.1", "1.0"]);
    expect(report.claims_verified).toBe(3);
    expect(report.summary).toBe("stub summary");
    expect(report.timestamp).toBe("2026-03-04T05:06:07.000Z");
  });

  it("orders claim ordinals numerically", async () => {
    const report = await generateReport("Q?", "A.", [verdict("0.10"), verdict("0.2")], 2, context(stubGenerator()));
    expect(report.verified_claims.map((v) => v.claim_id)).toEqual(["0.2", "0.10"]);
  });

  it("skips the model when nothing was checked", async () => {
    const generator = stubGenerator();
    const report = await generateReport("Q?", "", [], 0, context(generator));

    expect(report.summary).toBe(NO_CLAIMS_SUMMARY);
    expect(generator.calls).toEqual([]);
  });

  it("says so when no claim could be verified", async () => {
    const report = await generateReport("Q?", "A.", [], 2, context(stubGenerator()));
    expect(report.summary).toBe("None of the 2 extracted claims could be verified.");
  });

  it("falls back to counts when the summary fails", async () => {
    const generator = stubGenerator({
      report_summary: () => {
        throw new GenerationError("report_summary: bad JSON");
      }
    });

    const report = await generateReport("Q?", "A.", [verdict("0.0"), verdict("0.1", "Refuted")], 2, context(generator));
    expect(report.summary).toBe("2 claims verified: 1 Supported, 1 Refuted.");
  });

  it("propagates systemic failures", async () => {
    const generator = stubGenerator({
      report_summary: () => {
        throw new GenerationError("OpenRouter chat failed (403): forbidden", { status: 403, systemic: true });
      }
    });

    await expect(generateReport("Q?", "A.", [verdict("0.0")], 1, context(generator))).rejects.toThrow(
      "OpenRouter chat failed (403): forbidden"
    );
  });
});
