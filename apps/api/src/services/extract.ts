import { JSDOM, VirtualConsole } from "jsdom";
import { Readability } from "@mozilla/readability";
import { z } from "zod";
import { cacheGetJson, cacheSetJson } from "./cache";
import { fetchPageHtml } from "./fetch";
import { createLogger } from "./logger";

const ExtractedDocSchema = z.object({ title: z.string(), text: z.string() });

export type ExtractedDoc = z.infer<typeof ExtractedDocSchema>;

const logger = createLogger("extract");

function extractCacheKey(url: string) {
  return `extract:v1:${url}`;
}

/**
 * Readability extraction using JSDOM, with CSS parse noise silenced and
 * extracted text cached for a day.
 */
export async function extractReadable(html: string, url: string): Promise<ExtractedDoc> {
  const key = extractCacheKey(url);
  const cached = await cacheGetJson(key, ExtractedDocSchema);
  if (cached) return cached;

  const virtualConsole = new VirtualConsole();
  virtualConsole.on("jsdomError", (err: Error) => {
    if (err.message.includes("Could not parse CSS stylesheet")) return;
    logger.debug("jsdom error", { url, message: err.message });
  });

  const dom = new JSDOM(html, { url, virtualConsole });
  const article = new Readability(dom.window.document).parse();

  const title = article?.title?.trim() || new URL(url).hostname;
  const text = (article?.textContent ?? "").replace(/\s+\n/g, "\n").trim();

  const doc: ExtractedDoc = { title, text };
  await cacheSetJson(key, doc, 24 * 60 * 60);

  return doc;
}

/**
 * Readable text of a page, or null when it cannot be fetched or is not HTML.
 */
export async function loadReadablePage(url: string, signal?: AbortSignal): Promise<ExtractedDoc | null> {
  const html = await fetchPageHtml(url, signal);
  return html === null ? null : extractReadable(html, url);
}
