/**
 * RSS / Atom feed retrieval
 * Parses <item> (RSS 2.0, RDF) and <entry> (Atom) blocks with regular expressions.
 */

import { getEnabledSources } from "../../config/sources";
import type { FeedItem, FeedResult, SourceConfig } from "../model";
import { errorMessage, logger } from "../logger";
import { fetchTextWithTimeout, isAbortError, runInBatches } from "./batch";

function stripCdata(s: string): string {
  return s.replace(/^<!\[CDATA\[/, "").replace(/\]\]>$/, "");
}

// Code points past U+10FFFF become U+FFFD
function fromCodePoint(code: number): string {
  return code <= 0x10ffff ? String.fromCodePoint(code) : "\uFFFD";
}

export function decodeXmlEntities(s: string): string {
  return s
    .replace(/&#x([0-9a-f]+);/gi, (_, hex: string) => fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, dec: string) => fromCodePoint(parseInt(dec, 10)))
    .replaceAll("&lt;", "<")
    .replaceAll("&gt;", ">")
    .replaceAll("&quot;", '"')
    .replaceAll("&apos;", "'")
    .replaceAll("&#39;", "'")
    .replaceAll("&amp;", "&");
}

function escapeTag(tag: string): string {
  return tag.replace(/:/g, "\\:");
}

function extractTag(block: string, tag: string): string | null {
  const name = escapeTag(tag);
  const re = new RegExp(`<${name}(?:\\s[^>]*)?>([\\s\\S]*?)<\\/${name}>`, "i");
  const m = block.match(re);
  if (!m) return null;
  return decodeXmlEntities(stripCdata(m[1].trim())).trim();
}

function extractFirstTag(block: string, tags: string[]): string | null {
  for (const tag of tags) {
    const value = extractTag(block, tag);
    if (value) return value;
  }
  return null;
}

function stripHtml(s: string): string {
  return s
    .replace(/<[^>]+>/g, " ")
    .replace(/&nbsp;/gi, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Atom links are attributes: prefer rel="alternate" (or no rel), else the first href
 */
function extractAtomLink(block: string): string | null {
  const links = block.match(/<link\b[^>]*>/gi) ?? [];
  let fallback: string | null = null;

  for (const link of links) {
    const href = link.match(/\bhref\s*=\s*["']([^"']+)["']/i)?.[1];
    if (!href) continue;
    const rel = link.match(/\brel\s*=\s*["']([^"']+)["']/i)?.[1];
    if (!rel || rel === "alternate") {
      return decodeXmlEntities(href);
    }
    fallback ??= decodeXmlEntities(href);
  }

  return fallback;
}

function parseDate(value: string | null): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function parseBlock(block: string, sourceName: string): FeedItem | null {
  const title = stripHtml(extractTag(block, "title") ?? "");

  let link = extractTag(block, "link");
  if (!link) {
    link = extractAtomLink(block);
  }
  if (!link) {
    const guid = extractTag(block, "guid") ?? extractTag(block, "id");
    if (guid && /^https?:\/\//i.test(guid)) {
      link = guid;
    }
  }

  if (!title || !link) {
    return null;
  }

  const description = extractFirstTag(block, ["description", "summary", "content:encoded", "content"]);

  return {
    title,
    link: link.trim(),
    publishedAt: parseDate(extractFirstTag(block, ["pubDate", "published", "updated", "dc:date"])),
    description: description ? stripHtml(description) : undefined,
    sourceName,
  };
}

/**
 * Parse an RSS, RDF or Atom document. Entries without a title or link are skipped.
 */
export function parseFeed(xml: string, sourceName: string = ""): FeedItem[] {
  if (!/<rss\b|<feed\b|<rdf:RDF\b/i.test(xml)) {
    throw new Error("Invalid feed: no RSS or Atom root element");
  }

  const items: FeedItem[] = [];
  const re = /<(item|entry)\b[^>]*>([\s\S]*?)<\/\1>/gi;
  let m: RegExpExecArray | null;
  while ((m = re.exec(xml))) {
    const item = parseBlock(m[2], sourceName);
    if (item) items.push(item);
  }
  return items;
}

export interface FeedFetchOptions {
  concurrency: number;
  timeoutMs: number;
  userAgent: string;
}

/**
 * Fetch and parse a single feed; never throws
 */
export async function fetchFeed(source: SourceConfig, options: FeedFetchOptions): Promise<FeedResult> {
  const failed = (error: string): FeedResult => ({
    sourceName: source.name,
    sourceUrl: source.url,
    success: false,
    items: [],
    error,
    itemCount: 0,
  });

  try {
    const resp = await fetchTextWithTimeout(
      source.url,
      {
        method: "GET",
        headers: {
          "user-agent": options.userAgent,
          accept: "application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5",
        },
      },
      options.timeoutMs
    );

    if (!resp.ok) {
      logger.warn(`[RSS] HTTP ${resp.status} for ${source.name}`);
      return failed(`HTTP ${resp.status}`);
    }

    const items = parseFeed(resp.text, source.name);
    logger.debug(`[RSS] ${source.name}: ${items.length} items`);
    return {
      sourceName: source.name,
      sourceUrl: source.url,
      success: true,
      items,
      itemCount: items.length,
    };
  } catch (error) {
    const message = isAbortError(error) ? "Request timed out" : errorMessage(error);
    logger.warn(`[RSS] Failed to fetch ${source.name}`, { error: message });
    return failed(message);
  }
}

/**
 * Fetch every enabled source in bounded batches
 */
export async function fetchFeeds(sources: SourceConfig[], options: FeedFetchOptions): Promise<FeedResult[]> {
  const enabled = getEnabledSources(sources);
  logger.info(`[RSS] Fetching ${enabled.length} feeds (concurrency ${options.concurrency})`);

  const results = await runInBatches(enabled, options.concurrency, (source) => fetchFeed(source, options));

  const successful = results.filter((r) => r.success).length;
  logger.info(`[RSS] ${successful}/${results.length} feeds fetched successfully`);
  return results;
}

export interface SourceCheck {
  name: string;
  status: "ok" | "failed" | "disabled";
  detail: string;
}

/**
 * Probe each source's feed; disabled sources are reported, not fetched
 */
export async function checkSources(sources: SourceConfig[], options: FeedFetchOptions): Promise<SourceCheck[]> {
  return runInBatches(sources, options.concurrency, async (source): Promise<SourceCheck> => {
    if (!source.enabled) {
      return { name: source.name, status: "disabled", detail: "Disabled" };
    }
    const result = await fetchFeed(source, options);
    return result.success
      ? { name: source.name, status: "ok", detail: `${result.itemCount} items` }
      : { name: source.name, status: "failed", detail: result.error ?? "Unknown error" };
  });
}
