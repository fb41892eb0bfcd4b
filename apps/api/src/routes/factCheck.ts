import type { FactCheckPipeline } from "../agents/pipeline";
import { errorMessage } from "../services/errors";
import { createLogger } from "../services/logger";
import { applyEvent, emptySnapshot } from "../services/runSnapshot";
import type { FactCheckEvent } from "../types/events";
import { FactCheckInputSchema, type FactCheckInput } from "../types/factcheck";

const SSE_KEEPALIVE_MS = 10_000;

const logger = createLogger("routes");

export interface EventWriter {
  write(chunk: string): unknown;
}

// The parts of Express's req/res the handlers touch.
export interface RouteRequest {
  body: unknown;
}

export interface RouteResponse extends EventWriter {
  readonly writableEnded: boolean;
  status(code: number): RouteResponse;
  json(body: unknown): unknown;
  setHeader(name: string, value: string): unknown;
  flushHeaders?(): void;
  end(): unknown;
  on(event: "close", listener: () => void): unknown;
}

export type RouteHandler = (req: RouteRequest, res: RouteResponse, next: (err?: unknown) => void) => Promise<void>;

/**
 * One SSE frame: `event: <type>` and the JSON payload, then a blank line.
 */
export function writeSseEvent(writer: EventWriter, event: FactCheckEvent): void {
  writer.write(`event: ${event.type}\ndata: ${JSON.stringify(event.data)}\n\n`);
}

function sseHeaders(res: RouteResponse) {
  res.status(200);
  res.setHeader("Content-Type", "text/event-stream; charset=utf-8");
  res.setHeader("Cache-Control", "no-cache, no-transform");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no");
  res.flushHeaders?.();
}

function parseBody(req: RouteRequest, res: RouteResponse): FactCheckInput | null {
  const parsed = FactCheckInputSchema.safeParse(req.body);
  if (parsed.success) return parsed.data;

  res.status(400).json({
    error: "Invalid request",
    issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message }))
  });
  return null;
}

// Aborts when the client goes away before the response is finished.
function disconnectSignal(res: RouteResponse): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

/**
 * POST /api/fact-check
 * Streams every pipeline event as SSE; a disconnect cancels the run.
 */
export function factCheckStreamHandler(pipeline: FactCheckPipeline): RouteHandler {
  return async (req, res) => {
    const input = parseBody(req, res);
    if (!input) return;

    const signal = disconnectSignal(res);
    sseHeaders(res);

    const ka = setInterval(() => {
      if (!res.writableEnded) res.write(`: ping\n\n`);
    }, SSE_KEEPALIVE_MS);

    try {
      const result = await pipeline.run(input, { sink: (event) => writeSseEvent(res, event), signal });
      logger.info("Stream finished", { run_id: result.run_id, status: result.status });
    } catch (err) {
      const message = errorMessage(err);
      logger.error("Stream failed", { error: message });
      writeSseEvent(res, { type: "Error", data: { message, scope: "run" } });
    } finally {
      clearInterval(ka);
      if (!res.writableEnded) res.end();
    }
  };
}

/**
 * POST /api/fact-check/batch
 * Runs to completion and answers with the folded run snapshot.
 */
export function factCheckBatchHandler(pipeline: FactCheckPipeline): RouteHandler {
  return async (req, res, next) => {
    const input = parseBody(req, res);
    if (!input) return;

    let snapshot = emptySnapshot();
    try {
      const result = await pipeline.run(input, {
        sink: (event) => {
          snapshot = applyEvent(snapshot, event);
        },
        signal: disconnectSignal(res)
      });
      if (result.status === "cancelled") return;

      res.status(result.status === "error" ? 502 : 200).json({
        run_id: result.run_id,
        status: result.status,
        report: snapshot.report,
        errors: snapshot.errors,
        claims: snapshot.claims,
        counts: snapshot.counts
      });
    } catch (err) {
      next(err);
    }
  };
}
