/**
 * Tests for the ranking signals
 */

import { describe, it, expect } from "vitest";
import type { Article, HistoricalArticle } from "@/src/lib/model";
import {
  type ScoringContext,
  clamp01,
  daysSinceFirstSeen,
  isSimilar,
  noveltySignal,
  preferenceSignal,
  recencySignal,
  sourceSignal,
  topicSignal,
  weightedMatches,
} from "@/src/lib/pipeline/scorers";

const NOW = new Date("2025-01-10T12:00:00Z");
const HOUR_MS = 60 * 60 * 1000;

function createMockArticle(overrides: Partial<Article> = {}): Article {
  return {
    id: 1,
    sourceId: 1,
    sourceName: "Test Source",
    sourceWeight: 0.8,
    sourceCategory: "industry",
    canonicalUrl: "https://example.com/story",
    title: "A story about things",
    outlet: "example.com",
    contentHash: "hash-1",
    publishedAt: NOW,
    firstSeenAt: NOW,
    lastSeenAt: NOW,
    ...overrides,
  };
}

function createMockContext(overrides: Partial<ScoringContext> = {}): ScoringContext {
  return {
    now: NOW,
    recentArticles: [],
    content: "",
    sourceCategory: "industry",
    ...overrides,
  };
}

function createHistorical(overrides: Partial<HistoricalArticle> = {}): HistoricalArticle {
  return {
    id: 99,
    canonicalUrl: "https://other.com/previous",
    contentHash: "hash-previous",
    title: "Unrelated older coverage",
    firstSeenAt: new Date(NOW.getTime() - 12 * HOUR_MS),
    ...overrides,
  };
}

describe("clamp01", () => {
  it("should clamp values into [0, 1]", () => {
    expect(clamp01(-0.5)).toBe(0);
    expect(clamp01(1.7)).toBe(1);
    expect(clamp01(0.42)).toBe(0.42);
  });

  it("should map NaN to 0", () => {
    expect(clamp01(Number.NaN)).toBe(0);
  });
});

describe("recencySignal", () => {
  const recency = recencySignal();

  it("should score a brand new article at 1", () => {
    expect(recency(createMockArticle(), createMockContext())).toBe(1);
  });

  it("should halve the score after one half-life", () => {
    const article = createMockArticle({ publishedAt: new Date(NOW.getTime() - 48 * HOUR_MS) });
    expect(recency(article, createMockContext())).toBeCloseTo(0.5, 10);
  });

  it("should return 0.5 when the publication date is unknown", () => {
    const article = createMockArticle({ publishedAt: undefined });
    expect(recency(article, createMockContext())).toBe(0.5);
  });

  it("should clamp future-dated articles to 1", () => {
    const article = createMockArticle({ publishedAt: new Date(NOW.getTime() + 5 * HOUR_MS) });
    expect(recency(article, createMockContext())).toBe(1);
  });

  it("should never rise as articles get older", () => {
    const ages = [-3, 0, 1, 6, 24, 48, 96, 240, 1000];
    const scores = ages.map((hours) =>
      recency(createMockArticle({ publishedAt: new Date(NOW.getTime() - hours * HOUR_MS) }), createMockContext())
    );

    for (let i = 1; i < scores.length; i++) {
      expect(scores[i]).toBeLessThanOrEqual(scores[i - 1]);
    }
    expect(scores.every((score) => score >= 0 && score <= 1)).toBe(true);
  });

  it("should honour a custom half-life", () => {
    const article = createMockArticle({ publishedAt: new Date(NOW.getTime() - 24 * HOUR_MS) });
    expect(recencySignal(24)(article, createMockContext())).toBeCloseTo(0.5, 10);
  });
});

describe("sourceSignal", () => {
  it("should pass the source weight through", () => {
    expect(sourceSignal(createMockArticle({ sourceWeight: 0.35 }), createMockContext())).toBe(0.35);
  });

  it("should clamp weights outside [0, 1]", () => {
    expect(sourceSignal(createMockArticle({ sourceWeight: 1.5 }), createMockContext())).toBe(1);
    expect(sourceSignal(createMockArticle({ sourceWeight: -0.2 }), createMockContext())).toBe(0);
  });
});

describe("weightedMatches", () => {
  it("should count title matches twice and body matches once", () => {
    expect(weightedMatches("GPT news: gpt wins", "the gpt model", ["gpt"])).toBe(5);
  });

  it("should only match whole words", () => {
    expect(weightedMatches("chatgpt is GPTs", "", ["gpt"])).toBe(0);
  });

  it("should treat regex characters in keywords literally", () => {
    expect(weightedMatches("a.b and axb", "", ["a.b"])).toBe(2);
  });
});

describe("topicSignal", () => {
  it("should return 0.5 when no keywords are configured", () => {
    const topic = topicSignal([], []);
    expect(topic(createMockArticle({ title: "GPT everywhere" }), createMockContext())).toBe(0.5);
  });

  it("should boost for matched keywords in title and body", () => {
    const topic = topicSignal(["gpt"], []);
    const article = createMockArticle({ title: "GPT news: gpt wins" });
    expect(topic(article, createMockContext({ content: "the gpt model" }))).toBe(0.75);
  });

  it("should stay neutral when keywords only appear inside other words", () => {
    const topic = topicSignal(["gpt"], []);
    expect(topic(createMockArticle({ title: "chatgpt is GPTs" }), createMockContext())).toBe(0.5);
  });

  it("should penalise suppressed keywords", () => {
    const topic = topicSignal([], ["sponsored"]);
    const article = createMockArticle({ title: "Sponsored post" });
    const score = topic(article, createMockContext({ content: "sponsored content, sponsored" }));
    expect(score).toBeCloseTo(0.1, 10);
  });

  it("should cap the boost at 1", () => {
    const topic = topicSignal(["ai"], []);
    const article = createMockArticle({ title: "AI AI AI AI AI AI" });
    expect(topic(article, createMockContext())).toBe(1);
  });

  it("should floor at 0 when suppression saturates", () => {
    const topic = topicSignal([], ["ad"]);
    const article = createMockArticle({ title: "ad ad ad" });
    expect(topic(article, createMockContext())).toBe(0);
  });
});

describe("isSimilar", () => {
  it("should match on identical canonical URL", () => {
    const candidate = createMockArticle({ canonicalUrl: "https://same.com/a", contentHash: "x" });
    expect(isSimilar(candidate, createHistorical({ canonicalUrl: "https://same.com/a" }))).toBe(true);
  });

  it("should match on identical content hash", () => {
    const candidate = createMockArticle({ contentHash: "hash-previous" });
    expect(isSimilar(candidate, createHistorical())).toBe(true);
  });

  it("should not match on two empty hashes", () => {
    const candidate = createMockArticle({ contentHash: "" });
    expect(isSimilar(candidate, createHistorical({ contentHash: "" }))).toBe(false);
  });

  it("should match titles with high word overlap", () => {
    const candidate = createMockArticle({ title: "OpenAI ships new reasoning model today" });
    const previous = createHistorical({ title: "openai ships new reasoning model today" });
    expect(isSimilar(candidate, previous)).toBe(true);
  });

  it("should ignore titles of three words or fewer", () => {
    const candidate = createMockArticle({ title: "Big AI news" });
    expect(isSimilar(candidate, createHistorical({ title: "Big AI news" }))).toBe(false);
  });

  it("should not match when overlap is below the threshold", () => {
    // 3 shared words out of 5 -> 0.6
    const candidate = createMockArticle({ title: "alpha beta gamma delta epsilon" });
    const previous = createHistorical({ title: "alpha beta gamma zeta eta" });
    expect(isSimilar(candidate, previous)).toBe(false);
  });
});

describe("daysSinceFirstSeen", () => {
  it("should floor partial days", () => {
    expect(daysSinceFirstSeen(new Date(NOW.getTime() - 47 * HOUR_MS), NOW)).toBe(1);
  });

  it("should treat an unknown first sighting as today", () => {
    expect(daysSinceFirstSeen(undefined, NOW)).toBe(0);
  });
});

describe("noveltySignal", () => {
  const novelty = noveltySignal();

  it("should return 1.0 with no similar history", () => {
    const context = createMockContext({ recentArticles: [createHistorical()] });
    expect(novelty(createMockArticle(), context)).toBe(1.0);
  });

  it("should return 0.1 for coverage seen within a day", () => {
    const context = createMockContext({
      recentArticles: [createHistorical({ contentHash: "hash-1" })],
    });
    expect(novelty(createMockArticle(), context)).toBe(0.1);
  });

  it("should return 0.3 for coverage seen within three days", () => {
    const context = createMockContext({
      recentArticles: [
        createHistorical({ contentHash: "hash-1", firstSeenAt: new Date(NOW.getTime() - 48 * HOUR_MS) }),
      ],
    });
    expect(novelty(createMockArticle(), context)).toBe(0.3);
  });

  it("should return 0.5 for older coverage", () => {
    const context = createMockContext({
      recentArticles: [
        createHistorical({ contentHash: "hash-1", firstSeenAt: new Date(NOW.getTime() - 10 * 24 * HOUR_MS) }),
      ],
    });
    expect(novelty(createMockArticle(), context)).toBe(0.5);
  });

  it("should skip the article itself", () => {
    const context = createMockContext({
      recentArticles: [createHistorical({ id: 1, contentHash: "hash-1" })],
    });
    expect(novelty(createMockArticle(), context)).toBe(1.0);
  });

  it("should let the first similar article decide", () => {
    const context = createMockContext({
      recentArticles: [
        createHistorical({ id: 2, contentHash: "hash-1", firstSeenAt: new Date(NOW.getTime() - 10 * 24 * HOUR_MS) }),
        createHistorical({ id: 3, contentHash: "hash-1" }),
      ],
    });
    expect(novelty(createMockArticle(), context)).toBe(0.5);
  });
});

describe("preferenceSignal", () => {
  const preference = preferenceSignal(["theverge"], ["research"]);

  it("should return 0.5 with no matches", () => {
    expect(preference(createMockArticle(), createMockContext())).toBe(0.5);
  });

  it("should add 0.25 for a preferred outlet substring", () => {
    const article = createMockArticle({ outlet: "TheVerge.com" });
    expect(preference(article, createMockContext())).toBe(0.75);
  });

  it("should add 0.25 for a preferred category", () => {
    expect(preference(createMockArticle(), createMockContext({ sourceCategory: "Research" }))).toBe(0.75);
  });

  it("should reach 1 when both match", () => {
    const article = createMockArticle({ outlet: "theverge.com" });
    expect(preference(article, createMockContext({ sourceCategory: "research" }))).toBe(1);
  });

  it("should ignore a missing outlet", () => {
    const article = createMockArticle({ outlet: undefined });
    expect(preference(article, createMockContext())).toBe(0.5);
  });
});
