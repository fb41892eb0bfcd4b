import { z } from "zod";
import { env } from "./env";
import { cacheGetJson, cacheSetJson } from "./cache";
import { loadReadablePage, type ExtractedDoc } from "./extract";
import { FactCheckError, SearchError } from "./errors";
import { createLogger } from "./logger";
import { EvidenceSchema, type Evidence } from "../types/factcheck";

export type SearchOptions = { signal?: AbortSignal };

/**
 * The search collaborator. An empty list is a valid answer; provider
 * failures throw SearchError.
 */
export interface SearchProvider {
  readonly name: string;
  search(query: string, opts?: SearchOptions): Promise<Evidence[]>;
}

const logger = createLogger("search");

const SerperResponseSchema = z.object({
  organic: z
    .array(z.object({ title: z.string().optional(), link: z.string().optional(), snippet: z.string().optional() }))
    .default([])
});

const TavilyResponseSchema = z.object({
  results: z
    .array(z.object({ title: z.string().optional(), url: z.string().optional(), content: z.string().optional() }))
    .default([])
});

async function postJson<T>(
  provider: string,
  url: string,
  init: RequestInit,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  let res: Response;
  try {
    res = await fetch(url, { method: "POST", ...init });
  } catch (e) {
    if (e instanceof FactCheckError) throw e;
    throw new SearchError(`${provider} unreachable: ${e instanceof Error ? e.message : String(e)}`, provider, undefined, {
      cause: e
    });
  }

  if (!res.ok) {
    throw new SearchError(`${provider} search failed (${res.status}): ${(await res.text()).slice(0, 300)}`, provider, res.status);
  }
  const parsed = schema.safeParse(await res.json());
  if (!parsed.success) throw new SearchError(`${provider} returned an unexpected response shape`, provider, res.status);
  return parsed.data;
}

/**
 * Serper (Google) web search; the snippet is the evidence text.
 */
export class SerperSearch implements SearchProvider {
  readonly name = "Serper";

  constructor(
    private readonly apiKey: string | undefined = env.SERPER_API_KEY,
    private readonly k: number = env.SEARCH_RESULTS_PER_QUERY
  ) {}

  async search(query: string, opts: SearchOptions = {}): Promise<Evidence[]> {
    if (!this.apiKey) throw new SearchError("SERPER_API_KEY is not set.", this.name);

    const data = await postJson(
      this.name,
      "https://google.serper.dev/search",
      {
        headers: { "X-API-KEY": this.apiKey, "Content-Type": "application/json" },
        body: JSON.stringify({ q: query, num: this.k }),
        signal: opts.signal
      },
      SerperResponseSchema
    );

    return data.organic
      .slice(0, this.k)
      .filter((r) => r.link)
      .map((r) => ({ url: r.link ?? "", text: r.snippet ?? "", ...(r.title ? { title: r.title } : {}) }));
  }
}

/**
 * Tavily search; returns page content extracts rather than short snippets.
 */
export class TavilySearch implements SearchProvider {
  readonly name = "Tavily";

  constructor(
    private readonly apiKey: string | undefined = env.TAVILY_API_KEY,
    private readonly k: number = env.SEARCH_RESULTS_PER_QUERY
  ) {}

  async search(query: string, opts: SearchOptions = {}): Promise<Evidence[]> {
    if (!this.apiKey) throw new SearchError("TAVILY_API_KEY is not set.", this.name);

    const data = await postJson(
      this.name,
      "https://api.tavily.com/search",
      {
        headers: { Authorization: `Bearer ${this.apiKey}`, "Content-Type": "application/json" },
        body: JSON.stringify({ query, max_results: this.k, search_depth: "basic", topic: "general" }),
        signal: opts.signal
      },
      TavilyResponseSchema
    );

    return data.results
      .slice(0, this.k)
      .filter((r) => r.url)
      .map((r) => ({ url: r.url ?? "", text: r.content ?? "", ...(r.title ? { title: r.title } : {}) }));
  }
}

/**
 * Caches successful results per provider and normalised query.
 */
export class CachedSearch implements SearchProvider {
  readonly name: string;

  constructor(
    private readonly inner: SearchProvider,
    private readonly ttlSeconds: number = env.SEARCH_CACHE_TTL_SECONDS
  ) {
    this.name = inner.name;
  }

  private key(query: string) {
    return `search:v1:${this.inner.name}:${query.trim().toLowerCase().replace(/\s+/g, " ")}`;
  }

  async search(query: string, opts: SearchOptions = {}): Promise<Evidence[]> {
    const key = this.key(query);
    const cached = await cacheGetJson(key, z.array(EvidenceSchema));
    if (cached) return cached;

    const results = await this.inner.search(query, opts);
    await cacheSetJson(key, results, this.ttlSeconds);
    return results;
  }
}

export type PageLoader = (url: string, signal?: AbortSignal) => Promise<ExtractedDoc | null>;

/**
 * Replaces short search snippets with the page's readable text when the page
 * can be fetched. Pages that fail keep their snippet.
 */
export class PageEnrichedSearch implements SearchProvider {
  readonly name: string;

  constructor(
    private readonly inner: SearchProvider,
    private readonly loadPage: PageLoader = loadReadablePage,
    private readonly maxChars = 4_000
  ) {
    this.name = inner.name;
  }

  private async enrich(evidence: Evidence, signal?: AbortSignal): Promise<Evidence> {
    try {
      const doc = await this.loadPage(evidence.url, signal);
      if (!doc || doc.text.length <= evidence.text.length) return evidence;
      return {
        url: evidence.url,
        text: doc.text.slice(0, this.maxChars),
        title: evidence.title ?? doc.title
      };
    } catch (e) {
      logger.warn("Page enrichment failed; keeping snippet", {
        url: evidence.url,
        error: e instanceof Error ? e.message : String(e)
      });
      return evidence;
    }
  }

  async search(query: string, opts: SearchOptions = {}): Promise<Evidence[]> {
    const results = await this.inner.search(query, opts);
    return Promise.all(results.map((r) => this.enrich(r, opts.signal)));
  }
}

export function getSearch(): SearchProvider {
  const base: SearchProvider = env.SEARCH_PROVIDER === "tavily" ? new TavilySearch() : new SerperSearch();
  const cached = new CachedSearch(base);
  return env.EVIDENCE_FETCH_PAGES ? new PageEnrichedSearch(cached) : cached;
}
