import type { LimitFunction } from "p-limit";
import { CancelledError, errorMessage, isSystemic } from "../services/errors";
import type { Logger } from "../services/logger";
import type { FactCheckEvent } from "../types/events";

/**
 * What a stage task needs from the run it belongs to.
 */
export type StageContext = {
  emit: (event: FactCheckEvent) => void;
  limit: LimitFunction;
  signal: AbortSignal;
  logger: Logger;
};

export type StageDefinition<I, O> = {
  name: string;
  /** Identifier used in item-level Error events. */
  describe: (item: I) => string;
  process: (item: I) => Promise<O[]>;
  toEvent: (output: O) => FactCheckEvent;
};

// Cancellation and systemic provider failures end the run instead of one item.
export function mustPropagate(e: unknown): boolean {
  return e instanceof CancelledError || isSystemic(e);
}

/**
 * Map-or-filter over `items`, one task per item. Outputs are emitted in input
 * order as soon as every earlier item has settled. A failing item is reported
 * and dropped; cancellation and systemic errors reject the stage.
 */
export async function runStage<I, O>(items: I[], def: StageDefinition<I, O>, ctx: StageContext): Promise<O[]> {
  const settled: Array<O[] | undefined> = new Array(items.length);
  let next = 0;

  const flush = () => {
    while (next < items.length) {
      const outputs = settled[next];
      if (outputs === undefined) return;
      for (const output of outputs) ctx.emit(def.toEvent(output));
      next += 1;
    }
  };

  const tasks = items.map((item, i) =>
    ctx.limit(async () => {
      if (ctx.signal.aborted) throw new CancelledError();
      try {
        settled[i] = await def.process(item);
      } catch (e) {
        if (mustPropagate(e)) throw e;
        const identifier = def.describe(item);
        ctx.logger.error(`${def.name} failed for item`, { identifier, error: errorMessage(e) });
        ctx.emit({ type: "Error", data: { message: errorMessage(e), scope: "stage", identifier } });
        settled[i] = [];
      }
      flush();
    })
  );

  await Promise.all(tasks);
  return settled.flatMap((outputs) => outputs ?? []);
}

/**
 * Run `completions` attempts of one LLM decision and keep the first positive
 * answer if at least `minSuccesses` attempts were positive (null = negative).
 * When every attempt throws, the first error is rethrown.
 */
export async function withVoting<R>(
  completions: number,
  minSuccesses: number,
  attempt: () => Promise<R | null>
): Promise<R | null> {
  const results = await Promise.allSettled(Array.from({ length: Math.max(1, completions) }, () => attempt()));

  const propagated = results.find((r) => r.status === "rejected" && mustPropagate(r.reason));
  if (propagated?.status === "rejected") throw propagated.reason;

  const successes: R[] = [];
  let firstError: unknown;
  let failures = 0;
  for (const r of results) {
    if (r.status === "rejected") {
      failures += 1;
      firstError ??= r.reason;
    } else if (r.value !== null) {
      successes.push(r.value);
    }
  }

  if (failures === results.length) throw firstError;
  if (successes.length < minSuccesses) return null;
  return successes[0];
}
