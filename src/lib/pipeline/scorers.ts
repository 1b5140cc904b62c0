/**
 * Scoring signals
 * Each signal maps an article and its context to a value in [0, 1].
 */

import type { Article, HistoricalArticle } from "../model";

export interface ScoringContext {
  now: Date;
  recentArticles: HistoricalArticle[];
  content: string;
  sourceCategory: string;
}

export type Signal = (article: Article, context: ScoringContext) => number;

export interface SignalSet {
  recency: Signal;
  source: Signal;
  topic: Signal;
  novelty: Signal;
  preference: Signal;
}

export const RECENCY_HALF_LIFE_HOURS = 48;
export const TITLE_SIMILARITY_THRESHOLD = 0.85;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

/**
 * exp(-ln2 / halfLife * ageHours); no publication date scores 0.5
 */
export function recencySignal(halfLifeHours: number = RECENCY_HALF_LIFE_HOURS): Signal {
  const decay = Math.LN2 / halfLifeHours;
  return (article, { now }) => {
    if (!article.publishedAt) {
      return 0.5;
    }
    const ageHours = (now.getTime() - article.publishedAt.getTime()) / HOUR_MS;
    return clamp01(Math.exp(-decay * ageHours));
  };
}

export const sourceSignal: Signal = (article) => clamp01(article.sourceWeight);

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function countKeyword(text: string, keyword: string): number {
  if (!text) return 0;
  const re = new RegExp(`\\b${escapeRegExp(keyword)}\\b`, "gi");
  return text.match(re)?.length ?? 0;
}

/**
 * Title matches count twice, body matches once
 */
export function weightedMatches(title: string, body: string, keywords: string[]): number {
  let total = 0;
  for (const keyword of keywords) {
    total += countKeyword(title, keyword) * 2 + countKeyword(body, keyword);
  }
  return total;
}

/**
 * 0.5 + 0.5 * min(1, boost/10) - 0.5 * min(1, suppress/5)
 */
export function topicSignal(boostKeywords: string[], suppressKeywords: string[]): Signal {
  return (article, { content }) => {
    if (boostKeywords.length === 0 && suppressKeywords.length === 0) {
      return 0.5;
    }
    const boostNorm = Math.min(1, weightedMatches(article.title, content, boostKeywords) / 10);
    const suppressNorm = Math.min(1, weightedMatches(article.title, content, suppressKeywords) / 5);
    return clamp01(0.5 + 0.5 * boostNorm - 0.5 * suppressNorm);
  };
}

function titleWords(title: string): Set<string> {
  return new Set(title.toLowerCase().split(/\s+/).filter((w) => w.length > 0));
}

export function isSimilar(
  candidate: Pick<Article, "canonicalUrl" | "contentHash" | "title">,
  other: HistoricalArticle,
  threshold: number = TITLE_SIMILARITY_THRESHOLD
): boolean {
  if (candidate.canonicalUrl && candidate.canonicalUrl === other.canonicalUrl) {
    return true;
  }
  if (candidate.contentHash && candidate.contentHash === other.contentHash) {
    return true;
  }

  const words1 = titleWords(candidate.title);
  const words2 = titleWords(other.title);
  if (words1.size > 3 && words2.size > 3) {
    let overlap = 0;
    for (const word of words1) {
      if (words2.has(word)) overlap++;
    }
    return overlap / Math.min(words1.size, words2.size) >= threshold;
  }
  return false;
}

/**
 * Whole days between first sighting and now; unknown first sighting counts as 0
 */
export function daysSinceFirstSeen(firstSeenAt: Date | undefined, now: Date): number {
  if (!firstSeenAt) return 0;
  return Math.floor((now.getTime() - firstSeenAt.getTime()) / DAY_MS);
}

/**
 * The first similar article in the window decides the tier:
 * seen within 1 day -> 0.1, 3 days -> 0.3, older -> 0.5. No match -> 1.0.
 */
export function noveltySignal(threshold: number = TITLE_SIMILARITY_THRESHOLD): Signal {
  return (article, { recentArticles, now }) => {
    for (const previous of recentArticles) {
      if (previous.id === article.id) continue;
      if (!isSimilar(article, previous, threshold)) continue;

      const days = daysSinceFirstSeen(previous.firstSeenAt, now);
      if (days <= 1) return 0.1;
      if (days <= 3) return 0.3;
      return 0.5;
    }
    return 1.0;
  };
}

export function preferenceSignal(preferredOutlets: string[], preferredCategories: string[]): Signal {
  const outlets = preferredOutlets.map((o) => o.toLowerCase());
  const categories = new Set(preferredCategories.map((c) => c.toLowerCase()));

  return (article, { sourceCategory }) => {
    let score = 0.5;
    const outlet = (article.outlet ?? "").toLowerCase();
    if (outlet && outlets.some((preferred) => outlet.includes(preferred))) {
      score += 0.25;
    }
    if (sourceCategory && categories.has(sourceCategory.toLowerCase())) {
      score += 0.25;
    }
    return clamp01(score);
  };
}

export function createSignals(preferences: {
  boostKeywords: string[];
  suppressKeywords: string[];
  preferredOutlets: string[];
  preferredCategories: string[];
}): SignalSet {
  return {
    recency: recencySignal(),
    source: sourceSignal,
    topic: topicSignal(preferences.boostKeywords, preferences.suppressKeywords),
    novelty: noveltySignal(),
    preference: preferenceSignal(preferences.preferredOutlets, preferences.preferredCategories),
  };
}
