/**
 * Article page fetching and main-content extraction
 *
 * Pages are parsed with linkedom and reduced to readable text with Mozilla
 * Readability, falling back to a regex strip when Readability finds nothing.
 */

import crypto from "crypto";
import { Readability } from "@mozilla/readability";
import { parseHTML } from "linkedom";
import type { ArticleContent, FeedItem } from "../model";
import { errorMessage, logger } from "../logger";
import { fetchTextWithTimeout, isAbortError, runInBatches } from "./batch";

const PAYWALL_MARKERS = ["paywall", "subscribe to read", "members only"];
const MIN_READABLE_CHARS = 100;

export interface ArticleFetchOptions {
  concurrency: number;
  timeoutMs: number;
  userAgent: string;
}

/**
 * Collapse whitespace per line, drop blank lines, lowercase
 */
export function normalizeText(text: string): string {
  return text
    .split(/\r?\n|\r/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join("\n")
    .toLowerCase();
}

export function computeContentHash(text: string): string {
  return crypto.createHash("sha256").update(normalizeText(text)).digest("hex");
}

/**
 * Hostname without a leading "www."
 */
export function extractOutlet(url: string): string {
  try {
    const hostname = new URL(url).hostname;
    if (!hostname) return "unknown";
    return hostname.startsWith("www.") ? hostname.slice(4) : hostname;
  } catch {
    return "unknown";
  }
}

export function hasPaywallMarker(html: string): boolean {
  const lower = html.toLowerCase();
  return PAYWALL_MARKERS.some((marker) => lower.includes(marker));
}

export function describeHttpError(status: number): string {
  if (status === 404) return "Article not found (404)";
  if (status === 403) return "Access forbidden (403)";
  if (status >= 500) return `Server error (${status})`;
  return `HTTP ${status}`;
}

export interface ExtractedPage {
  title: string;
  text: string;
  publishedAt?: Date;
}

function cleanLines(text: string): string {
  return text
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n")
    .trim();
}

function fallbackExtract(html: string): ExtractedPage {
  const titleMatch = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i);
  const title = titleMatch ? titleMatch[1].replace(/\s+/g, " ").trim() : "";

  let cleaned = html
    .replace(/<script[\s\S]*?<\/script>/gi, "")
    .replace(/<style[\s\S]*?<\/style>/gi, "")
    .replace(/<nav[\s\S]*?<\/nav>/gi, "")
    .replace(/<header[\s\S]*?<\/header>/gi, "")
    .replace(/<footer[\s\S]*?<\/footer>/gi, "")
    .replace(/<aside[\s\S]*?<\/aside>/gi, "");

  const articleMatch = cleaned.match(/<(?:article|main)[^>]*>([\s\S]*?)<\/(?:article|main)>/i);
  if (articleMatch) {
    cleaned = articleMatch[1];
  } else {
    const bodyMatch = cleaned.match(/<body[^>]*>([\s\S]*?)<\/body>/i);
    if (bodyMatch) cleaned = bodyMatch[1];
  }

  const text = cleaned
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/(?:p|div|h[1-6]|li|tr|blockquote|section)>/gi, "\n")
    .replace(/<[^>]+>/g, " ")
    .replace(/&nbsp;/gi, " ")
    .replace(/&lt;/gi, "<")
    .replace(/&gt;/gi, ">")
    .replace(/&quot;/gi, '"')
    .replace(/&#39;/gi, "'")
    .replace(/&amp;/gi, "&");

  return { title, text: cleanLines(text) };
}

/**
 * Extract the readable title and body text from an HTML page
 */
export function extractContent(html: string, url: string): ExtractedPage {
  try {
    const { document } = parseHTML(html);
    const article = new Readability(document, { charThreshold: MIN_READABLE_CHARS }).parse();

    if (article && article.textContent && article.textContent.trim().length > MIN_READABLE_CHARS) {
      const published = article.publishedTime ? new Date(article.publishedTime) : undefined;
      return {
        title: (article.title || "").trim(),
        text: cleanLines(article.textContent),
        publishedAt: published && !Number.isNaN(published.getTime()) ? published : undefined,
      };
    }
  } catch (error) {
    logger.debug(`[FETCH] Readability failed for ${url}`, { error: errorMessage(error) });
  }

  return fallbackExtract(html);
}

/**
 * Fetch and extract one article; failures are reported on the result, never thrown
 */
export async function fetchArticle(item: FeedItem, options: ArticleFetchOptions): Promise<ArticleContent> {
  const failed = (error: string, finalUrl: string = item.link): ArticleContent => ({
    url: item.link,
    canonicalUrl: finalUrl,
    title: item.title,
    text: "",
    outlet: extractOutlet(finalUrl),
    publishedAt: item.publishedAt,
    contentHash: "",
    fetchSuccess: false,
    error,
    sourceName: item.sourceName,
  });

  try {
    const resp = await fetchTextWithTimeout(
      item.link,
      {
        method: "GET",
        redirect: "follow",
        headers: {
          "user-agent": options.userAgent,
          accept: "text/html,application/xhtml+xml",
        },
      },
      options.timeoutMs
    );

    if (!resp.ok) {
      return failed(describeHttpError(resp.status));
    }

    const finalUrl = resp.url || item.link;
    const html = resp.text;

    if (hasPaywallMarker(html)) {
      return failed("Paywall detected", finalUrl);
    }

    const page = extractContent(html, finalUrl);
    if (!page.text) {
      return failed("Failed to extract article content", finalUrl);
    }

    return {
      url: item.link,
      canonicalUrl: finalUrl,
      title: page.title || item.title,
      text: page.text,
      outlet: extractOutlet(finalUrl),
      publishedAt: item.publishedAt ?? page.publishedAt,
      contentHash: computeContentHash(page.text),
      fetchSuccess: true,
      sourceName: item.sourceName,
    };
  } catch (error) {
    if (isAbortError(error)) {
      return failed("Request timed out");
    }
    return failed(`Unexpected error: ${errorMessage(error)}`);
  }
}

/**
 * Count failures by error message
 */
export function summarizeFetchErrors(articles: ArticleContent[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const article of articles) {
    if (!article.fetchSuccess) {
      const key = article.error || "Unknown error";
      counts[key] = (counts[key] ?? 0) + 1;
    }
  }
  return counts;
}

export async function fetchArticles(items: FeedItem[], options: ArticleFetchOptions): Promise<ArticleContent[]> {
  if (items.length === 0) {
    return [];
  }

  logger.info(`[FETCH] Fetching ${items.length} articles (concurrency ${options.concurrency})`);
  const articles = await runInBatches(items, options.concurrency, (item) => fetchArticle(item, options));

  const successful = articles.filter((a) => a.fetchSuccess).length;
  logger.info(`[FETCH] ${successful}/${articles.length} articles extracted`, {
    failures: summarizeFetchErrors(articles),
  });
  return articles;
}
