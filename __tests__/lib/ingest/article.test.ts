/**
 * Tests for article fetching, extraction and content hashing
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import crypto from "crypto";
import type { ArticleContent, FeedItem } from "@/src/lib/model";
import {
  computeContentHash,
  describeHttpError,
  extractContent,
  extractOutlet,
  fetchArticle,
  fetchArticles,
  normalizeText,
  summarizeFetchErrors,
} from "@/src/lib/ingest/article";

const OPTIONS = { concurrency: 2, timeoutMs: 1000, userAgent: "test-agent" };

const ARTICLE_SENTENCE =
  "The new model was deployed to production across three regions and served millions of requests in its first week.";

const ARTICLE_HTML = `<!DOCTYPE html>
<html>
  <head><title>Model ships</title></head>
  <body>
    <nav>Home | About</nav>
    <article>
      <h1>Model ships</h1>
      <p>${ARTICLE_SENTENCE}</p>
      <p>${ARTICLE_SENTENCE}</p>
    </article>
  </body>
</html>`;

function createMockItem(overrides: Partial<FeedItem> = {}): FeedItem {
  return {
    title: "Feed title",
    link: "https://www.example.com/story",
    publishedAt: new Date("2025-01-10T08:00:00Z"),
    sourceName: "Example",
    ...overrides,
  };
}

describe("normalizeText", () => {
  it("should trim lines, drop blanks and lowercase", () => {
    expect(normalizeText("  Hello World \n\n  Second   line  ")).toBe("hello world\nsecond   line");
  });
});

describe("computeContentHash", () => {
  it("should hash the normalized text", () => {
    const expected = crypto.createHash("sha256").update("hello\nworld").digest("hex");
    expect(computeContentHash("Hello\n\nWorld")).toBe(expected);
    expect(computeContentHash("  hello\r\nWORLD  ")).toBe(expected);
  });
});

describe("extractOutlet", () => {
  it("should strip a leading www", () => {
    expect(extractOutlet("https://www.example.com/a/b")).toBe("example.com");
    expect(extractOutlet("https://news.example.org/")).toBe("news.example.org");
  });

  it("should return unknown for unparsable URLs", () => {
    expect(extractOutlet("not a url")).toBe("unknown");
  });
});

describe("describeHttpError", () => {
  it("should describe common statuses", () => {
    expect(describeHttpError(404)).toBe("Article not found (404)");
    expect(describeHttpError(403)).toBe("Access forbidden (403)");
    expect(describeHttpError(502)).toBe("Server error (502)");
    expect(describeHttpError(429)).toBe("HTTP 429");
  });
});

describe("extractContent", () => {
  it("should fall back to stripping markup for short pages", () => {
    const html = "<html><head><title>T</title></head><body><nav>menu</nav><p>Short body</p></body></html>";
    expect(extractContent(html, "https://example.com")).toEqual({ title: "T", text: "Short body" });
  });

  it("should extract the article body", () => {
    const page = extractContent(ARTICLE_HTML, "https://example.com/story");
    expect(page.text).toContain(ARTICLE_SENTENCE);
  });
});

describe("fetchArticle", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should extract a successful page", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response(ARTICLE_HTML, { status: 200 })));

    const article = await fetchArticle(createMockItem(), OPTIONS);

    expect(article.fetchSuccess).toBe(true);
    expect(article.url).toBe("https://www.example.com/story");
    expect(article.canonicalUrl).toBe("https://www.example.com/story");
    expect(article.outlet).toBe("example.com");
    expect(article.publishedAt).toEqual(new Date("2025-01-10T08:00:00Z"));
    expect(article.sourceName).toBe("Example");
    expect(article.text).toContain(ARTICLE_SENTENCE);
    expect(article.contentHash).toBe(computeContentHash(article.text));
  });

  it("should describe HTTP failures", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("missing", { status: 404 })));

    const article = await fetchArticle(createMockItem(), OPTIONS);
    expect(article).toEqual({
      url: "https://www.example.com/story",
      canonicalUrl: "https://www.example.com/story",
      title: "Feed title",
      text: "",
      outlet: "example.com",
      publishedAt: new Date("2025-01-10T08:00:00Z"),
      contentHash: "",
      fetchSuccess: false,
      error: "Article not found (404)",
      sourceName: "Example",
    });
  });

  it("should detect paywalls", async () => {
    const html = "<html><body><div>Subscribe to read the full story</div></body></html>";
    vi.stubGlobal("fetch", vi.fn(async () => new Response(html, { status: 200 })));

    const article = await fetchArticle(createMockItem(), OPTIONS);
    expect(article.fetchSuccess).toBe(false);
    expect(article.error).toBe("Paywall detected");
  });

  it("should fail pages with no extractable text", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("<html><body></body></html>", { status: 200 })));

    const article = await fetchArticle(createMockItem(), OPTIONS);
    expect(article.error).toBe("Failed to extract article content");
  });

  it("should report timeouts", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw Object.assign(new Error("The operation was aborted"), { name: "AbortError" });
      })
    );

    const article = await fetchArticle(createMockItem(), OPTIONS);
    expect(article.error).toBe("Request timed out");
  });

  it("should time out a page whose body stalls", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_input: string | URL | Request, init?: RequestInit) => {
        const body = new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new TextEncoder().encode("<html><body><p>Half a page"));
            init?.signal?.addEventListener("abort", () => {
              controller.error(Object.assign(new Error("This operation was aborted"), { name: "AbortError" }));
            });
          },
        });
        return new Response(body, { status: 200 });
      })
    );

    const article = await fetchArticle(createMockItem(), { ...OPTIONS, timeoutMs: 50 });
    expect(article.fetchSuccess).toBe(false);
    expect(article.error).toBe("Request timed out");
  });

  it("should wrap unexpected errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );

    const article = await fetchArticle(createMockItem(), OPTIONS);
    expect(article.error).toBe("Unexpected error: fetch failed");
  });
});

describe("fetchArticles", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should return an empty list without fetching", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    expect(await fetchArticles([], OPTIONS)).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("should keep item order", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (input: string | URL | Request) =>
        String(input).endsWith("/missing") ? new Response("", { status: 404 }) : new Response(ARTICLE_HTML, { status: 200 })
      )
    );

    const articles = await fetchArticles(
      [
        createMockItem({ link: "https://example.com/missing" }),
        createMockItem({ link: "https://example.com/ok" }),
        createMockItem({ link: "https://example.com/ok-too" }),
      ],
      OPTIONS
    );

    expect(articles.map((a) => a.url)).toEqual([
      "https://example.com/missing",
      "https://example.com/ok",
      "https://example.com/ok-too",
    ]);
    expect(articles.map((a) => a.fetchSuccess)).toEqual([false, true, true]);
  });
});

describe("summarizeFetchErrors", () => {
  it("should count failures by message", () => {
    const base: ArticleContent = {
      url: "u",
      canonicalUrl: "u",
      title: "t",
      text: "",
      contentHash: "",
      fetchSuccess: false,
    };
    expect(
      summarizeFetchErrors([
        { ...base, error: "HTTP 429" },
        { ...base, error: "HTTP 429" },
        { ...base },
        { ...base, fetchSuccess: true },
      ])
    ).toEqual({ "HTTP 429": 2, "Unknown error": 1 });
  });
});
