/**
 * Ranking pipeline
 * Combines recency, source, topic, novelty and preference signals into a weighted
 * total, drops articles under the minimum score and keeps the top of the story budget.
 */

import type { Article, HistoricalArticle, RankingConfigSnapshot, RankingResult, ScoreBreakdown } from "../model";
import { type Preferences, type RankingConfig, preferenceWeight } from "../../config/settings";
import { logger } from "../logger";
import { type ContentLoader, loadArticleContent } from "./content";
import { clamp01, createSignals } from "./scorers";

export { preferenceWeight } from "../../config/settings";

/** Articles pulled from storage for novelty comparison */
export const NOVELTY_WINDOW_LIMIT = 200;

export interface RankArticlesInput {
  runId: number;
  articles: Article[];
  historical: HistoricalArticle[];
  config: RankingConfig;
  preferences: Preferences;
  storyBudget: number;
  minScore: number;
  now?: Date;
  loadContent?: ContentLoader;
}

/**
 * Novelty lookback in days; one run per day, a week per window run
 */
export function noveltyLookbackDays(config: Pick<RankingConfig, "noveltyWindowRuns">): number {
  return config.noveltyWindowRuns * 7;
}

function snapshotConfig(config: RankingConfig, preferences: Preferences): RankingConfigSnapshot {
  return {
    recencyWeight: config.recencyWeight,
    sourceWeight: config.sourceWeight,
    topicWeight: config.topicWeight,
    noveltyWeight: config.noveltyWeight,
    preferenceWeight: preferenceWeight(config),
    noveltyWindowRuns: config.noveltyWindowRuns,
    boostKeywords: [...preferences.boostKeywords],
    suppressKeywords: [...preferences.suppressKeywords],
    preferredOutlets: [...preferences.preferredOutlets],
    preferredCategories: [...preferences.preferredCategories],
  };
}

type ComponentScores = Pick<ScoreBreakdown, "recency" | "source" | "topic" | "novelty" | "preference">;

export function combineScores(scores: ComponentScores, config: RankingConfig): number {
  return clamp01(
    scores.recency * config.recencyWeight +
      scores.source * config.sourceWeight +
      scores.topic * config.topicWeight +
      scores.novelty * config.noveltyWeight +
      scores.preference * preferenceWeight(config)
  );
}

/**
 * Human-readable rationale from component thresholds, suffixed with the outlet
 */
export function buildReason(scores: ComponentScores, outlet: string | undefined): string {
  const reasons: string[] = [];

  if (scores.recency >= 0.8) {
    reasons.push("Very recent article");
  } else if (scores.recency <= 0.3) {
    reasons.push("Older article");
  }

  if (scores.source >= 0.9) {
    reasons.push("from high-quality source");
  }

  if (scores.topic >= 0.8) {
    reasons.push("highly relevant to interests");
  } else if (scores.topic <= 0.2) {
    reasons.push("low topic relevance");
  }

  if (scores.novelty <= 0.3) {
    reasons.push("similar to recent coverage");
  }

  if (reasons.length === 0) {
    reasons.push("Balanced scoring across factors");
  }

  return `${reasons.join("; ")} (${outlet || "unknown source"})`;
}

/**
 * Score, filter, sort and truncate a run's articles.
 * Ties keep input order. Persisting the selection is left to the caller.
 */
export async function rankArticles(input: RankArticlesInput): Promise<RankingResult> {
  const { runId, articles, historical, config, preferences, storyBudget, minScore } = input;
  const now = input.now ?? new Date();
  const loadContent = input.loadContent ?? loadArticleContent;
  const configUsed = snapshotConfig(config, preferences);

  if (articles.length === 0) {
    logger.info(`[RANK] No articles to rank for run ${runId}`);
    return { runId, totalArticles: 0, rankedArticles: [], rankedAt: now, configUsed };
  }

  const signals = createSignals(preferences);
  const scored: ScoreBreakdown[] = [];

  for (const article of articles) {
    const content = (await loadContent(article.extractedPath)) ?? "";
    const context = {
      now,
      recentArticles: historical,
      content,
      sourceCategory: article.sourceCategory,
    };

    const components: ComponentScores = {
      recency: signals.recency(article, context),
      source: signals.source(article, context),
      topic: signals.topic(article, context),
      novelty: signals.novelty(article, context),
      preference: signals.preference(article, context),
    };

    scored.push({
      articleId: article.id,
      total: combineScores(components, config),
      ...components,
      reason: buildReason(components, article.outlet),
      debug: {
        title: article.title,
        published: article.publishedAt ? article.publishedAt.toISOString() : "unknown",
        outlet: article.outlet || "unknown",
      },
    });
  }

  // Array.prototype.sort is stable, so equal totals keep input order
  const ranked = scored
    .filter((score) => score.total >= minScore)
    .sort((a, b) => b.total - a.total)
    .slice(0, Math.max(0, storyBudget));

  logger.info(`[RANK] Ranked ${articles.length} articles, selected ${ranked.length}`, {
    runId,
    minScore,
    storyBudget,
    belowThreshold: scored.filter((score) => score.total < minScore).length,
  });

  return {
    runId,
    totalArticles: articles.length,
    rankedArticles: ranked,
    rankedAt: now,
    configUsed,
  };
}

/**
 * Text block with totals and the top 10 selections
 */
export function formatRankingSummary(result: RankingResult): string {
  const lines = [
    "Ranking Summary:",
    `  Total articles: ${result.totalArticles}`,
    `  Selected stories: ${result.rankedArticles.length}`,
  ];

  if (result.rankedArticles.length > 0) {
    lines.push("", "Top Stories:");
    result.rankedArticles.slice(0, 10).forEach((score, index) => {
      lines.push(
        `${index + 1}. ${score.debug.title || "Unknown"}`,
        `   Score: ${score.total.toFixed(3)} - ${score.reason}`,
        `   Breakdown: R:${score.recency.toFixed(2)} S:${score.source.toFixed(2)} ` +
          `T:${score.topic.toFixed(2)} N:${score.novelty.toFixed(2)} P:${score.preference.toFixed(2)}`
      );
    });
  }

  return lines.join("\n");
}
