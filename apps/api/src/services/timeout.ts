import { CancelledError, TimeoutError } from "./errors";

/**
 * Run one external call with its own AbortSignal, bounded by `ms` and tied to
 * the run's signal. Rejects with TimeoutError or CancelledError even if the
 * callee ignores the signal.
 */
export async function callWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  opts: { ms: number; label: string; signal?: AbortSignal }
): Promise<T> {
  if (opts.signal?.aborted) throw new CancelledError();

  const controller = new AbortController();
  let fail: (error: Error) => void = () => undefined;
  const guard = new Promise<never>((_resolve, reject) => {
    fail = reject;
  });

  const timer = setTimeout(() => {
    const error = new TimeoutError(opts.label, opts.ms);
    controller.abort(error);
    fail(error);
  }, opts.ms);

  const onAbort = () => {
    const error = new CancelledError();
    controller.abort(error);
    fail(error);
  };
  opts.signal?.addEventListener("abort", onAbort, { once: true });

  try {
    return await Promise.race([fn(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener("abort", onAbort);
  }
}
