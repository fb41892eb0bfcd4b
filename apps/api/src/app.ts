import express from "express";
import cors from "cors";
import type { FactCheckPipeline } from "./agents/pipeline";
import { FactCheckError, ValidationError } from "./services/errors";
import { env } from "./services/env";
import { createLogger } from "./services/logger";
import { createRateLimitCheck, rateLimit, type RateLimitCheck } from "./services/rateLimit";
import { factCheckBatchHandler, factCheckStreamHandler } from "./routes/factCheck";

const logger = createLogger("http");

export type AppOptions = {
  corsOrigin?: string;
  rateLimitCheck?: RateLimitCheck;
};

/**
 * Express API service:
 * - CORS locked to the configured web origin
 * - Rate limiting per IP
 * - SSE streaming for /api/fact-check, JSON for /api/fact-check/batch
 */
export function createApp(pipeline: FactCheckPipeline, opts: AppOptions = {}) {
  const app = express();

  app.use(
    cors({
      origin: opts.corsOrigin ?? env.CORS_ORIGIN,
      credentials: false
    })
  );

  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => res.json({ ok: true }));

  app.use(rateLimit(opts.rateLimitCheck ?? createRateLimitCheck()));

  app.post("/api/fact-check", factCheckStreamHandler(pipeline));
  app.post("/api/fact-check/batch", factCheckBatchHandler(pipeline));

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const message = err instanceof Error ? err.message : "Unknown error";
    if (res.headersSent) {
      logger.error("Unhandled error after headers sent", { error: message });
      return;
    }
    if (err instanceof ValidationError) {
      res.status(400).json({ error: message, code: err.code });
      return;
    }
    logger.error("Unhandled error", { error: message });
    res.status(500).json({ error: message, ...(err instanceof FactCheckError ? { code: err.code } : {}) });
  });

  return app;
}
