/**
 * Core data models for the daily briefing pipeline
 */

export interface SourceConfig {
  name: string;
  url: string;
  category: string;
  weight: number; // 0–1
  enabled: boolean;
}

/**
 * Parsed feed entry, before the page itself is fetched
 */
export interface FeedItem {
  title: string;
  link: string;
  publishedAt?: Date;
  description?: string;
  sourceName: string;
  sourceId?: number;
}

export interface FeedResult {
  sourceName: string;
  sourceUrl: string;
  success: boolean;
  items: FeedItem[];
  error?: string;
  itemCount: number;
}

/**
 * Extracted page content for one feed item
 */
export interface ArticleContent {
  url: string;
  canonicalUrl: string;
  title: string;
  text: string;
  outlet?: string;
  publishedAt?: Date;
  contentHash: string; // sha256 of normalized text, "" when the fetch failed
  fetchSuccess: boolean;
  error?: string;
  sourceName?: string;
}

/**
 * Stored article as seen by the ranking engine
 */
export interface Article {
  id: number;
  sourceId: number;
  sourceName: string;
  sourceWeight: number;
  sourceCategory: string;
  canonicalUrl: string;
  title: string;
  outlet?: string;
  contentHash: string;
  publishedAt?: Date;
  extractedPath?: string;
  firstSeenAt: Date;
  lastSeenAt: Date;
}

/**
 * Article linked to a run, with any score written by a previous ranking pass
 */
export interface RunArticle extends Article {
  includedInRank: boolean;
  score: ScorePayload | null;
}

/**
 * Minimal projection used for novelty comparisons
 */
export interface HistoricalArticle {
  id: number;
  canonicalUrl: string;
  contentHash: string;
  title: string;
  firstSeenAt?: Date;
}

export interface ScoreBreakdown {
  articleId: number;
  total: number;
  recency: number;
  source: number;
  topic: number;
  novelty: number;
  preference: number;
  reason: string;
  debug: {
    title: string;
    published: string;
    outlet: string;
  };
}

/**
 * Score shape persisted on run_articles.score_json
 */
export interface ScorePayload {
  total: number;
  recency: number;
  source: number;
  topic: number;
  novelty: number;
  preference: number;
  reason: string;
}

export interface RankingConfigSnapshot {
  recencyWeight: number;
  sourceWeight: number;
  topicWeight: number;
  noveltyWeight: number;
  preferenceWeight: number;
  noveltyWindowRuns: number;
  boostKeywords: string[];
  suppressKeywords: string[];
  preferredOutlets: string[];
  preferredCategories: string[];
}

export interface RankingResult {
  runId: number;
  totalArticles: number;
  rankedArticles: ScoreBreakdown[];
  rankedAt: Date;
  configUsed: RankingConfigSnapshot;
}

export type RunStatus = "running" | "success" | "failed";

export interface Run {
  id: number;
  runDate: string; // YYYY-MM-DD
  startedAt: Date;
  finishedAt?: Date;
  status: RunStatus;
  stats: Record<string, unknown> | null;
}

export interface StorageStats {
  total: number;
  new: number;
  duplicates: number;
  failed: number;
  stored: number;
  unmatched: number;
}

export interface ArticleSummary {
  articleId: number;
  title: string;
  url: string;
  outlet: string;
  publishedDate: string;
  bulletPoints: string[];
  category: string;
}

export interface ShowNotesSection {
  title: string;
  articles: ArticleSummary[];
}

export interface ShowNotes {
  runDate: string;
  sections: ShowNotesSection[];
  totalArticles: number;
  generatedAt: Date;
}

export interface Script {
  runDate: string;
  targetMinutes: number;
  content: string;
  estimatedWords: number;
  estimatedMinutes: number;
  generatedAt: Date;
}

export interface GenerationStats {
  articlesProcessed: number;
  tokensUsed: number;
  apiCalls: number;
  costEstimate: number;
  processingTime: number; // seconds
}
