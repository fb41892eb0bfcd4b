import { describe, it, expect, vi, beforeEach } from "vitest";
import { CachedSearch, PageEnrichedSearch, SerperSearch, TavilySearch, type PageLoader } from "../src/services/search";
import { cacheClear } from "../src/services/cache";
import { SearchError } from "../src/services/errors";
import type { Evidence } from "../src/types/factcheck";
import { StubSearch } from "./helpers/stubs";

function stubFetch(body: unknown, status = 200) {
  const fetchMock = vi.fn(
    async (_url: string, _init?: RequestInit) =>
      new Response(typeof body === "string" ? body : JSON.stringify(body), { status })
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

async function searchError(promise: Promise<unknown>): Promise<SearchError> {
  try {
    await promise;
  } catch (e) {
    if (e instanceof SearchError) return e;
    throw e;
  }
  throw new Error("expected a SearchError");
}

describe("SerperSearch", () => {
  it("maps organic results with a link", async () => {
    const fetchMock = stubFetch({
      organic: [
        { title: "Paris", link: "https://example.org/paris", snippet: "Capital of France." },
        { snippet: "No link here." },
        { link: "https://example.org/france", snippet: "France." }
      ]
    });

    await expect(new SerperSearch("test-key", 5).search("capital of France")).resolves.toEqual([
      { url: "https://example.org/paris", text: "Capital of France.", title: "Paris" },
      { url: "https://example.org/france", text: "France." }
    ]);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://google.serper.dev/search");
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({ "X-API-KEY": "test-key" });
    expect(JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body))).toEqual({ q: "capital of France", num: 5 });
  });

  it("treats no results as a valid answer", async () => {
    stubFetch({});
    await expect(new SerperSearch("test-key", 5).search("nothing")).resolves.toEqual([]);
  });

  it("fails with the HTTP status", async () => {
    stubFetch("slow down", 429);

    const error = await searchError(new SerperSearch("test-key", 5).search("q"));
    expect(error.message).toBe("Serper search failed (429): slow down");
    expect(error.status).toBe(429);
    expect(error.provider).toBe("Serper");
  });

  it("fails on an unexpected body", async () => {
    stubFetch({ organic: "not a list" });
    await expect(new SerperSearch("test-key", 5).search("q")).rejects.toThrow(
      "Serper returned an unexpected response shape"
    );
  });

  it("needs an API key", async () => {
    const fetchMock = stubFetch({});
    await expect(new SerperSearch("", 5).search("q")).rejects.toThrow("SERPER_API_KEY is not set.");
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("TavilySearch", () => {
  it("uses page content as the evidence text", async () => {
    const fetchMock = stubFetch({
      results: [{ title: "Paris", url: "https://example.org/paris", content: "Paris is the capital of France." }]
    });

    await expect(new TavilySearch("test-key", 3).search("capital of France")).resolves.toEqual([
      { url: "https://example.org/paris", text: "Paris is the capital of France.", title: "Paris" }
    ]);
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toMatchObject({ Authorization: "Bearer test-key" });
    expect(JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body))).toMatchObject({
      query: "capital of France",
      max_results: 3
    });
  });

  it("wraps network failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );

    await expect(new TavilySearch("test-key", 3).search("q")).rejects.toThrow("Tavily unreachable: fetch failed");
  });
});

describe("CachedSearch", () => {
  beforeEach(() => cacheClear());

  it("reuses results for the same normalised query", async () => {
    const inner = new StubSearch(() => [{ url: "https://example.org", text: "x" }]);
    const search = new CachedSearch(inner, 60);

    await search.search("Paris  Capital");
    const second = await search.search(" paris capital");

    expect(inner.queries).toEqual(["Paris  Capital"]);
    expect(second).toEqual([{ url: "https://example.org", text: "x" }]);
  });

  it("does not cache failures", async () => {
    let calls = 0;
    const inner = new StubSearch(() => {
      calls += 1;
      if (calls === 1) throw new SearchError("down", "stub");
      return [];
    });
    const search = new CachedSearch(inner, 60);

    await expect(search.search("q")).rejects.toThrow("down");
    await expect(search.search("q")).resolves.toEqual([]);
  });
});

describe("PageEnrichedSearch", () => {
  const snippet: Evidence = { url: "https://example.org/paris", text: "Short snippet.", title: "Paris" };

  function enriched(loader: PageLoader, maxChars = 4_000) {
    return new PageEnrichedSearch(new StubSearch(() => [snippet]), loader, maxChars);
  }

  it("replaces a snippet by longer page text", async () => {
    const search = enriched(async () => ({ title: "Page title", text: "Paris is the capital and largest city of France." }), 20);

    await expect(search.search("q")).resolves.toEqual([
      { url: snippet.url, text: "Paris is the capital", title: "Paris" }
    ]);
  });

  it("keeps the snippet when the page is shorter or missing", async () => {
    await expect(enriched(async () => ({ title: "T", text: "Tiny." })).search("q")).resolves.toEqual([snippet]);
    await expect(enriched(async () => null).search("q")).resolves.toEqual([snippet]);
  });

  it("keeps the snippet when loading the page fails", async () => {
    const search = enriched(async () => {
      throw new Error("socket hang up");
    });

    await expect(search.search("q")).resolves.toEqual([snippet]);
  });
});
