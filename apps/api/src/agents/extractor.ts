import { callWithTimeout } from "../services/timeout";
import type { GenerateOptions, Generator, StageInputs, StageName, StageOutputs } from "../llm/stages";
import {
  claimIdFor,
  type ContextualSentence,
  type DisambiguatedContent,
  type PotentialClaim,
  type SelectedContent,
  type ValidatedClaim
} from "../types/factcheck";
import type { PipelineConfig } from "./config";
import { runStage, withVoting, type StageContext } from "./stage";

export type ExtractionContext = StageContext & {
  generator: Generator;
  config: PipelineConfig;
};

function generate<S extends StageName>(
  ctx: ExtractionContext,
  stage: S,
  input: StageInputs[S],
  label: string
): Promise<StageOutputs[S]> {
  return callWithTimeout(
    (signal) => {
      const opts: GenerateOptions = { signal };
      return ctx.generator.generate(stage, input, opts);
    },
    { ms: ctx.config.llmTimeoutMs, label, signal: ctx.signal }
  );
}

function sentenceInput(item: ContextualSentence, sentence: string) {
  return { question: item.question, context: item.context_for_llm, sentence };
}

const sentenceId = (item: ContextualSentence) => `sentence ${item.original_index}`;

export function selectContent(items: ContextualSentence[], ctx: ExtractionContext): Promise<SelectedContent[]> {
  return runStage(
    items,
    {
      name: "selection",
      describe: sentenceId,
      process: async (item) => {
        const processed = await withVoting(ctx.config.completions, ctx.config.minSuccesses, async () => {
          const out = await generate(ctx, "selection", sentenceInput(item, item.original_sentence), `selection of ${sentenceId(item)}`);
          if (out.no_verifiable_claims) return null;
          if (out.remains_unchanged) return item.original_sentence;
          return out.processed_sentence?.trim() || null;
        });
        return processed === null ? [] : [{ original_context_item: item, processed_sentence: processed }];
      },
      toEvent: (data) => ({ type: "SelectedContentAdded", data })
    },
    ctx
  );
}

export function disambiguateContent(items: SelectedContent[], ctx: ExtractionContext): Promise<DisambiguatedContent[]> {
  return runStage(
    items,
    {
      name: "disambiguation",
      describe: (item) => sentenceId(item.original_context_item),
      process: async (item) => {
        const source = item.original_context_item;
        const resolved = await withVoting(ctx.config.completions, ctx.config.minSuccesses, async () => {
          const out = await generate(
            ctx,
            "disambiguation",
            sentenceInput(source, item.processed_sentence),
            `disambiguation of ${sentenceId(source)}`
          );
          if (out.cannot_be_disambiguated) return null;
          return out.disambiguated_sentence?.trim() || null;
        });

        if (resolved === null) {
          if (ctx.config.dropUnresolvedSentences) return [];
          ctx.logger.debug("Keeping selected sentence as is", { sentence: source.original_index });
          return [{ original_selected_item: item, disambiguated_sentence: item.processed_sentence }];
        }
        return [{ original_selected_item: item, disambiguated_sentence: resolved }];
      },
      toEvent: (data) => ({ type: "DisambiguatedContentAdded", data })
    },
    ctx
  );
}

function uniqueClaims(claims: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of claims) {
    const claim = raw.trim();
    if (!claim || seen.has(claim)) continue;
    seen.add(claim);
    out.push(claim);
  }
  return out;
}

export function decomposeClaims(items: DisambiguatedContent[], ctx: ExtractionContext): Promise<PotentialClaim[]> {
  return runStage(
    items,
    {
      name: "decomposition",
      describe: (item) => sentenceId(item.original_selected_item.original_context_item),
      process: async (item) => {
        const source = item.original_selected_item.original_context_item;
        const claims = await withVoting(ctx.config.completions, ctx.config.minSuccesses, async () => {
          const out = await generate(
            ctx,
            "decomposition",
            sentenceInput(source, item.disambiguated_sentence),
            `decomposition of ${sentenceId(source)}`
          );
          const found = out.no_claims ? [] : uniqueClaims(out.claims);
          return found.length ? found : null;
        });

        return (claims ?? []).map((claim_text, claim_index) => ({
          claim_id: claimIdFor(source.original_index, claim_index),
          claim_index,
          claim_text,
          disambiguated_sentence: item.disambiguated_sentence,
          original_sentence: source.original_sentence,
          original_index: source.original_index
        }));
      },
      toEvent: (data) => ({ type: "PotentialClaimAdded", data })
    },
    ctx
  );
}

export function validateClaims(items: PotentialClaim[], ctx: ExtractionContext): Promise<ValidatedClaim[]> {
  return runStage(
    items,
    {
      name: "validation",
      describe: (item) => item.claim_id,
      process: async (item) => {
        const out = await generate(ctx, "validation", { claim: item.claim_text }, `validation of claim ${item.claim_id}`);
        return out.is_complete_declarative ? [{ ...item, is_complete_declarative: true }] : [];
      },
      toEvent: (data) => ({ type: "ValidatedClaimAdded", data })
    },
    ctx
  );
}
