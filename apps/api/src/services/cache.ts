import { Redis } from "@upstash/redis";
import type { z } from "zod";
import { env } from "./env";
import { createLogger } from "./logger";

/**
 * String cache: Upstash Redis when configured, an in-memory map otherwise.
 * Keys are namespaced under `claimcheck:`.
 */
const redis =
  env.UPSTASH_REDIS_REST_URL && env.UPSTASH_REDIS_REST_TOKEN
    ? new Redis({ url: env.UPSTASH_REDIS_REST_URL, token: env.UPSTASH_REDIS_REST_TOKEN })
    : null;

const PREFIX = "claimcheck:";
const logger = createLogger("cache");

type CacheValue = { value: string; expiresAt: number };
const mem = new Map<string, CacheValue>();

export async function cacheGet(key: string): Promise<string | null> {
  if (redis) {
    // the client parses JSON-looking values on read
    const v = await redis.get<unknown>(PREFIX + key);
    if (v === null || v === undefined) return null;
    return typeof v === "string" ? v : JSON.stringify(v);
  }

  const hit = mem.get(PREFIX + key);
  if (!hit) return null;

  if (Date.now() > hit.expiresAt) {
    mem.delete(PREFIX + key);
    return null;
  }

  return hit.value;
}

export async function cacheSet(key: string, value: string, ttlSeconds: number): Promise<void> {
  if (redis) {
    await redis.set(PREFIX + key, value, { ex: ttlSeconds });
    return;
  }

  mem.set(PREFIX + key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
}

/**
 * Cached JSON value, or null when missing or no longer matching `schema`.
 */
export async function cacheGetJson<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
  const raw = await cacheGet(key);
  if (raw === null) return null;

  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    logger.warn("Ignoring cached value with unexpected shape", { key });
  } catch (e) {
    logger.warn("Ignoring unparseable cached value", { key, error: e instanceof Error ? e.message : String(e) });
  }
  return null;
}

export function cacheSetJson(key: string, value: unknown, ttlSeconds: number): Promise<void> {
  return cacheSet(key, JSON.stringify(value), ttlSeconds);
}

export function cacheClear(): void {
  mem.clear();
}
