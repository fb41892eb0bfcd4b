import { request, Agent, type Dispatcher } from "undici";
import { cacheGet, cacheSet } from "./cache";
import { errorMessage } from "./errors";
import { createLogger } from "./logger";

const PAGE_TIMEOUT_MS = 8_000;
const PAGE_TTL_SECONDS = 6 * 60 * 60;

const logger = createLogger("fetch");
const agent = new Agent({ connect: { timeout: 4_000 } });

/**
 * HTML of a result page, or null when it is unreachable, not a 2xx or not
 * HTML. Only pages that loaded are cached.
 */
export async function fetchPageHtml(
  url: string,
  signal?: AbortSignal,
  dispatcher: Dispatcher = agent
): Promise<string | null> {
  const key = `page:v1:${url}`;
  const cached = await cacheGet(key);
  if (cached) return cached;

  const abort = new AbortController();
  const timer = setTimeout(() => abort.abort(), PAGE_TIMEOUT_MS);
  const onAbort = () => abort.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const res = await request(url, {
      headers: { "User-Agent": "claimcheck/1.0 (+evidence enrichment)", Accept: "text/html,application/xhtml+xml" },
      dispatcher,
      signal: abort.signal,
      headersTimeout: 5_000,
      bodyTimeout: 7_000
    });

    const contentType = String(res.headers["content-type"] ?? "").toLowerCase();
    if (res.statusCode < 200 || res.statusCode >= 300 || !contentType.includes("text/html")) {
      await res.body.dump();
      return null;
    }

    const html = await res.body.text();
    if (html) await cacheSet(key, html, PAGE_TTL_SECONDS);
    return html || null;
  } catch (e) {
    logger.debug("Page fetch failed", { url, error: errorMessage(e) });
    return null;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}
