import { Ratelimit } from "@upstash/ratelimit";
import { Redis } from "@upstash/redis";
import type { RequestHandler } from "express";
import { env } from "./env";

export type RateLimitResult = { allowed: boolean; remaining: number };

export type RateLimitCheck = (key: string) => Promise<RateLimitResult>;

/**
 * Sliding window over the timestamps of recent hits, per key. Used when
 * Upstash is not configured.
 */
export class MemoryRateLimiter {
  private readonly hits = new Map<string, number[]>();

  constructor(
    private readonly limit: number,
    private readonly windowMs = 60_000,
    private readonly now: () => number = Date.now
  ) {}

  check = async (key: string): Promise<RateLimitResult> => {
    const now = this.now();
    const recent = (this.hits.get(key) ?? []).filter((t) => now - t < this.windowMs);

    if (recent.length >= this.limit) {
      this.hits.set(key, recent);
      return { allowed: false, remaining: 0 };
    }

    recent.push(now);
    this.hits.set(key, recent);
    return { allowed: true, remaining: this.limit - recent.length };
  };
}

export function createRateLimitCheck(limit: number = env.RATE_LIMIT_PER_MINUTE): RateLimitCheck {
  if (env.UPSTASH_REDIS_REST_URL && env.UPSTASH_REDIS_REST_TOKEN) {
    const limiter = new Ratelimit({
      redis: new Redis({ url: env.UPSTASH_REDIS_REST_URL, token: env.UPSTASH_REDIS_REST_TOKEN }),
      limiter: Ratelimit.slidingWindow(limit, "1 m"),
      prefix: "claimcheck:ratelimit"
    });
    return async (key) => {
      const r = await limiter.limit(key);
      return { allowed: r.success, remaining: r.remaining };
    };
  }
  return new MemoryRateLimiter(limit).check;
}

/**
 * Per-IP limit; the first x-forwarded-for hop wins over the socket address.
 */
export function rateLimit(check: RateLimitCheck): RequestHandler {
  return (req, res, next) => {
    const ip =
      req.headers["x-forwarded-for"]?.toString().split(",")[0]?.trim() || req.socket.remoteAddress || "unknown";

    check(ip)
      .then((r) => {
        res.setHeader("X-RateLimit-Remaining", String(r.remaining));
        if (!r.allowed) {
          res.status(429).json({ error: "Rate limit exceeded" });
          return;
        }
        next();
      })
      .catch(next);
  };
}
