import { createId } from "@paralleldrive/cuid2";
import pLimit from "p-limit";
import type { Generator } from "../llm/stages";
import { EventChannel } from "../services/eventChannel";
import {
  CancelledError,
  IllegalTransitionError,
  ValidationError,
  errorMessage,
  isSystemic
} from "../services/errors";
import { createLogger, type Logger } from "../services/logger";
import type { SearchProvider } from "../services/search";
import type { EventSink, FactCheckEvent } from "../types/events";
import {
  FactCheckInputSchema,
  type FactCheckInput,
  type FactCheckReport,
  type ValidatedClaim,
  type Verdict
} from "../types/factcheck";
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "./config";
import { decomposeClaims, disambiguateContent, selectContent, validateClaims, type ExtractionContext } from "./extractor";
import { generateReport } from "./reporter";
import { buildContextualSentences } from "./sentences";
import { mustPropagate } from "./stage";
import { verifyClaim, type ClaimState, type VerifierContext } from "./verifier";

export const PIPELINE_STATES = [
  "Idle",
  "Splitting",
  "Selecting",
  "Disambiguating",
  "Decomposing",
  "Validating",
  "Verifying",
  "Reporting",
  "Done"
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number] | "Error" | "Cancelled";

export type RunResult =
  | { status: "done"; run_id: string; report: FactCheckReport }
  | { status: "error"; run_id: string; message: string }
  | { status: "cancelled"; run_id: string };

export type RunOptions = {
  sink: EventSink;
  signal?: AbortSignal;
  onStateChange?: (state: PipelineState, previous: PipelineState) => void;
  onClaimStateChange?: (claimId: string, state: ClaimState) => void;
};

export type PipelineDeps = {
  generator: Generator;
  search: SearchProvider;
  logger?: Logger;
  now?: () => Date;
  createId?: () => string;
};

function isTerminal(state: PipelineState) {
  return state === "Done" || state === "Error" || state === "Cancelled";
}

function orderOf(state: PipelineState): number {
  return PIPELINE_STATES.findIndex((s) => s === state);
}

/**
 * Forward-only: a main state may only move further along PIPELINE_STATES,
 * and any non-terminal state may end in Error or Cancelled.
 */
export class RunStateMachine {
  private current: PipelineState = "Idle";

  constructor(private readonly onChange?: (state: PipelineState, previous: PipelineState) => void) {}

  get state(): PipelineState {
    return this.current;
  }

  to(next: PipelineState): void {
    const from = this.current;
    const legal =
      !isTerminal(from) && (next === "Error" || next === "Cancelled" || orderOf(next) > orderOf(from));
    if (!legal) throw new IllegalTransitionError(from, next);

    this.current = next;
    this.onChange?.(next, from);
  }
}

/**
 * Per-run event gate. Once closed, events are dropped; a sink that throws
 * closes the gate and cancels the run.
 */
class RunEvents {
  private closed = false;

  constructor(
    private readonly sink: EventSink,
    private readonly logger: Logger,
    private readonly onSinkFailure: () => void
  ) {}

  emit = (event: FactCheckEvent): void => {
    if (this.closed) return;
    try {
      this.sink(event);
    } catch (e) {
      this.logger.error("Event sink threw; cancelling run", { event: event.type, error: errorMessage(e) });
      this.closed = true;
      this.onSinkFailure();
    }
  };

  close(): void {
    this.closed = true;
  }
}

/**
 * Runs the fact-check state machine. Holds configuration and collaborators
 * only; all per-run state lives in `run`.
 */
export class FactCheckPipeline {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly deps: PipelineDeps,
    readonly config: PipelineConfig = DEFAULT_PIPELINE_CONFIG
  ) {
    this.logger = deps.logger ?? createLogger("pipeline");
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.createId ?? createId;
  }

  /**
   * Rejects with ValidationError before any event when the input is invalid;
   * otherwise always resolves.
   */
  async run(input: FactCheckInput, opts: RunOptions): Promise<RunResult> {
    const parsed = FactCheckInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues.map((i) => i.message).join("; "));
    }
    const { question, answer } = parsed.data;

    const run_id = this.newId();
    const logger = this.logger;
    const machine = new RunStateMachine(opts.onStateChange);
    const controller = new AbortController();
    const events = new RunEvents(opts.sink, logger, () => controller.abort(new CancelledError("Event sink failed")));

    if (opts.signal?.aborted) {
      machine.to("Cancelled");
      return { status: "cancelled", run_id };
    }

    const onCallerAbort = () => {
      events.close();
      controller.abort(new CancelledError());
    };
    opts.signal?.addEventListener("abort", onCallerAbort, { once: true });

    logger.info("Run started", { run_id, question });
    try {
      events.emit({ type: "RunStarted", data: { run_id, question } });
      const report = await this.execute(question, answer, {
        machine,
        emit: events.emit,
        signal: controller.signal,
        onClaimStateChange: opts.onClaimStateChange
      });
      machine.to("Done");
      logger.info("Run finished", { run_id, claims_verified: report.claims_verified });
      return { status: "done", run_id, report };
    } catch (e) {
      if (!isSystemic(e) && (e instanceof CancelledError || controller.signal.aborted)) {
        events.close();
        machine.to("Cancelled");
        logger.info("Run cancelled", { run_id, state: machine.state });
        return { status: "cancelled", run_id };
      }

      const message = errorMessage(e);
      logger.error("Run failed", { run_id, error: message });
      events.emit({ type: "Error", data: { message, scope: "run", identifier: run_id } });
      events.close();
      controller.abort(new CancelledError("Run failed"));
      if (!isTerminal(machine.state)) machine.to("Error");
      return { status: "error", run_id, message };
    } finally {
      opts.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private async execute(
    question: string,
    answer: string,
    run: {
      machine: RunStateMachine;
      emit: (event: FactCheckEvent) => void;
      signal: AbortSignal;
      onClaimStateChange?: (claimId: string, state: ClaimState) => void;
    }
  ): Promise<FactCheckReport> {
    const { config } = this;
    const advance = (state: PipelineState) => {
      if (run.signal.aborted) throw new CancelledError();
      run.machine.to(state);
    };

    const stage: ExtractionContext = {
      emit: run.emit,
      limit: pLimit(config.stageConcurrency),
      signal: run.signal,
      logger: this.logger,
      generator: this.deps.generator,
      config
    };

    advance("Splitting");
    const sentences = buildContextualSentences(question, answer, {
      before: config.contextBefore,
      after: config.contextAfter
    });
    for (const data of sentences) run.emit({ type: "ContextualSentenceAdded", data });

    advance("Selecting");
    const selected = await selectContent(sentences, stage);

    advance("Disambiguating");
    const disambiguated = await disambiguateContent(selected, stage);

    advance("Decomposing");
    const potential = await decomposeClaims(disambiguated, stage);

    advance("Validating");
    const validated = await validateClaims(potential, stage);

    advance("Verifying");
    const verdicts = await this.verifyAll(validated, {
      generator: this.deps.generator,
      search: this.deps.search,
      config,
      signal: run.signal,
      logger: this.logger,
      emit: run.emit,
      searchLimit: pLimit(config.searchConcurrency)
    }, run.onClaimStateChange);

    advance("Reporting");
    const report = await generateReport(question, answer, verdicts, validated.length, {
      generator: this.deps.generator,
      llmTimeoutMs: config.llmTimeoutMs,
      signal: run.signal,
      logger: this.logger,
      now: this.now
    });
    run.emit({ type: "FactCheckReportGenerated", data: report });
    return report;
  }

  private async verifyAll(
    claims: ValidatedClaim[],
    ctx: VerifierContext,
    onClaimStateChange?: (claimId: string, state: ClaimState) => void
  ): Promise<Verdict[]> {
    const limit = pLimit(this.config.maxConcurrentClaims);

    const settled = await Promise.all(
      claims.map((claim) =>
        limit(async (): Promise<Verdict | null> => {
          if (ctx.signal.aborted) throw new CancelledError();
          try {
            const verdict = await verifyClaim(claim, ctx, (state) => onClaimStateChange?.(claim.claim_id, state));
            ctx.emit({ type: "ClaimVerificationResult", data: verdict });
            return verdict;
          } catch (e) {
            if (mustPropagate(e)) throw e;
            ctx.logger.error("Claim verification failed", { claim_id: claim.claim_id, error: errorMessage(e) });
            ctx.emit({ type: "Error", data: { message: errorMessage(e), scope: "claim", identifier: claim.claim_id } });
            return null;
          }
        })
      )
    );

    return settled.filter((v): v is Verdict => v !== null);
  }
}

/**
 * The same run as an async iterable of events. Breaking out of the loop
 * cancels the run; the generator's return value is the RunResult.
 */
export async function* streamFactCheck(
  pipeline: FactCheckPipeline,
  input: FactCheckInput,
  signal?: AbortSignal
): AsyncGenerator<FactCheckEvent, RunResult, undefined> {
  const channel = new EventChannel<FactCheckEvent>();
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });
  if (signal?.aborted) controller.abort();

  const run = pipeline
    .run(input, { sink: (event) => channel.push(event), signal: controller.signal })
    .then(
      (result) => ({ ok: true as const, result }),
      (error: unknown) => ({ ok: false as const, error })
    )
    .finally(() => channel.close());

  let finished = false;
  try {
    for await (const event of channel) yield event;
    finished = true;
    const outcome = await run;
    if (!outcome.ok) throw outcome.error;
    return outcome.result;
  } finally {
    if (!finished) {
      controller.abort();
      await run;
    }
    signal?.removeEventListener("abort", onAbort);
  }
}
