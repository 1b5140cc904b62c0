/**
 * Pipeline orchestrator
 *
 * Runs the seven stages in order against a shared RunContext, stops at the first
 * failure and records the outcome on the run for the context's date. execute()
 * never throws; every failure ends up as a failed stage or a false return.
 */

import type {
  ArticleContent,
  FeedItem,
  FeedResult,
  HistoricalArticle,
  RankingResult,
  Run,
  RunArticle,
  RunStatus,
  ScoreBreakdown,
  Script,
  ShowNotes,
  SourceConfig,
  StorageStats,
} from "../model";
import type { Preferences, RankingConfig } from "../../config/settings";
import { getEnabledSources } from "../../config/sources";
import { toScorePayload } from "../db/articles";
import { errorMessage, logger } from "../logger";
import type { LLMProvider } from "../llm/provider";
import type { ArtifactStore } from "../storage/local";
import { type ContentLoader, loadArticleContent } from "./content";
import { NOVELTY_WINDOW_LIMIT, formatRankingSummary, noveltyLookbackDays, rankArticles } from "./rank";
import { buildPipelineReport, formatOutcome, formatSummaryTable } from "./report";
import { createTtsFilename, formatForTts, formatScriptFile, generateScript } from "./script";
import { formatShowNotesMarkdown, generateShowNotes } from "./showNotes";
import { type Clock, type PipelineStage, type StageName, type StageStats, createStages, systemClock } from "./stages";

export interface RunStore {
  createOrReuseRun(runDate: string, now: Date): Promise<Run>;
  updateRunStatus(runId: number, status: RunStatus, stats: Record<string, unknown>, now: Date): Promise<void>;
}

export interface ArticleStore {
  syncSources(sources: SourceConfig[], now: Date): Promise<Map<string, number>>;
  processArticles(options: {
    runId: number;
    runDate: string;
    articles: ArticleContent[];
    sourceMap: Map<string, number>;
    now: Date;
  }): Promise<StorageStats>;
  getRunArticles(runId: number, options?: { onlyRanked?: boolean }): Promise<RunArticle[]>;
  getRecentArticles(options: { days: number; limit: number; now: Date }): Promise<HistoricalArticle[]>;
  saveRankSelection(runId: number, scores: ScoreBreakdown[]): Promise<void>;
}

export interface PipelineDependencies {
  loadSources(): Promise<SourceConfig[]>;
  fetchFeeds(sources: SourceConfig[]): Promise<FeedResult[]>;
  fetchArticles(items: FeedItem[]): Promise<ArticleContent[]>;
  store: ArticleStore;
  runs: RunStore;
  llm: LLMProvider;
  artifacts: ArtifactStore;
  loadContent?: ContentLoader;
  clock?: Clock;
}

export interface RunOptions {
  runDate: string;
  targetMinutes: number;
  maxItems: number;
  maxStories: number;
  minScore: number;
  rankingConfig: RankingConfig;
  preferences: Preferences;
}

/**
 * Mutable state handed from stage to stage
 */
export interface RunContext extends RunOptions {
  runId?: number;
  sources: SourceConfig[];
  enabledSources: SourceConfig[];
  sourceMap: Map<string, number>;
  feedItems: FeedItem[];
  articles: ArticleContent[];
  runArticles: RunArticle[];
  rankingResult?: RankingResult;
  selectedArticles: RunArticle[];
  showNotes?: ShowNotes;
  script?: Script;
}

export function createRunContext(options: RunOptions): RunContext {
  return {
    ...options,
    sources: [],
    enabledSources: [],
    sourceMap: new Map(),
    feedItems: [],
    articles: [],
    runArticles: [],
    selectedArticles: [],
  };
}

/**
 * Items each successful feed may contribute
 */
export function itemsPerFeed(maxItems: number, enabledSources: number): number {
  return Math.max(1, Math.floor(maxItems / Math.max(1, enabledSources)));
}

function requireRunId(ctx: RunContext): number {
  if (ctx.runId === undefined) {
    throw new Error("Run has not been created");
  }
  return ctx.runId;
}

type StageHandler = (ctx: RunContext) => Promise<StageStats>;

export class PipelineOrchestrator {
  /** Stages of the latest execute(); replaced on every call */
  stages: PipelineStage[];
  private readonly clock: Clock;
  private readonly loadContent: ContentLoader;
  private readonly handlers: Record<StageName, StageHandler>;

  constructor(private readonly deps: PipelineDependencies) {
    this.clock = deps.clock ?? systemClock;
    this.loadContent = deps.loadContent ?? loadArticleContent;
    this.stages = createStages(this.clock);
    this.handlers = {
      sources: (ctx) => this.syncSources(ctx),
      rss: (ctx) => this.fetchFeeds(ctx),
      articles: (ctx) => this.fetchArticles(ctx),
      storage: (ctx) => this.storeArticles(ctx),
      ranking: (ctx) => this.rankArticles(ctx),
      show_notes: (ctx) => this.generateShowNotes(ctx),
      script: (ctx) => this.generateScript(ctx),
    };
  }

  async execute(ctx: RunContext): Promise<boolean> {
    this.stages = createStages(this.clock);
    const startedAt = this.clock();
    logger.info(`[PIPELINE] Starting run for ${ctx.runDate}`, {
      targetMinutes: ctx.targetMinutes,
      maxItems: ctx.maxItems,
      maxStories: ctx.maxStories,
    });

    let success = false;
    try {
      const run = await this.deps.runs.createOrReuseRun(ctx.runDate, startedAt);
      ctx.runId = run.id;

      success = await this.runStages(ctx);

      const finalStats = {
        targetMinutes: ctx.targetMinutes,
        maxItems: ctx.maxItems,
        maxStories: ctx.maxStories,
        totalDuration: this.elapsedSeconds(startedAt),
        stages: Object.fromEntries(this.stages.map((stage) => [stage.name, stage.status])),
      };
      await this.deps.runs.updateRunStatus(run.id, success ? "success" : "failed", finalStats, this.clock());
    } catch (error) {
      logger.error(`[PIPELINE] Run store error for ${ctx.runDate}`, errorMessage(error));
      success = false;
    }

    await this.report(ctx, startedAt);
    return success;
  }

  private async runStages(ctx: RunContext): Promise<boolean> {
    for (const stage of this.stages) {
      stage.start();
      logger.info(`[PIPELINE] ${stage.description}...`);
      try {
        const stats = await this.handlers[stage.name](ctx);
        stage.complete(stats);
        logger.info(`[PIPELINE] Stage ${stage.name} completed in ${stage.duration.toFixed(1)}s`, stats);
      } catch (error) {
        stage.fail(errorMessage(error));
        logger.error(`[PIPELINE] Stage ${stage.name} failed: ${errorMessage(error)}`);
        return false;
      }
    }
    return true;
  }

  private elapsedSeconds(since: Date): number {
    return (this.clock().getTime() - since.getTime()) / 1000;
  }

  private async report(ctx: RunContext, startedAt: Date): Promise<void> {
    const totalDuration = this.elapsedSeconds(startedAt);
    const runDir = this.deps.artifacts.runDir(ctx.runDate);
    const report = buildPipelineReport(this.stages, {
      runDate: ctx.runDate,
      runId: ctx.runId,
      totalDuration,
      completedAt: this.clock(),
    });

    try {
      await this.deps.artifacts.writeRunFile(ctx.runDate, "pipeline_stats.json", JSON.stringify(report, null, 2));
    } catch (error) {
      logger.error("[PIPELINE] Failed to write pipeline_stats.json", errorMessage(error));
    }

    for (const line of formatSummaryTable(this.stages)) {
      logger.info(line);
    }
    for (const line of formatOutcome(this.stages, { runDate: ctx.runDate, totalDuration, runDir })) {
      logger.info(`[PIPELINE] ${line}`);
    }
  }

  private async syncSources(ctx: RunContext): Promise<StageStats> {
    const sources = await this.deps.loadSources();
    ctx.sources = sources;
    ctx.enabledSources = getEnabledSources(sources);
    ctx.sourceMap = await this.deps.store.syncSources(sources, this.clock());

    if (ctx.enabledSources.length === 0) {
      throw new Error("No enabled sources configured");
    }

    return { totalSources: sources.length, enabledSources: ctx.enabledSources.length };
  }

  private async fetchFeeds(ctx: RunContext): Promise<StageStats> {
    const results = await this.deps.fetchFeeds(ctx.enabledSources);
    const perFeed = itemsPerFeed(ctx.maxItems, ctx.enabledSources.length);

    const items = results
      .filter((result) => result.success)
      .flatMap((result) => result.items.slice(0, perFeed))
      .slice(0, ctx.maxItems);

    if (items.length === 0) {
      throw new Error("No articles found in RSS feeds");
    }

    ctx.feedItems = items.map((item) => ({ ...item, sourceId: ctx.sourceMap.get(item.sourceName) }));

    return {
      totalFeeds: results.length,
      successfulFeeds: results.filter((result) => result.success).length,
      totalItems: items.length,
    };
  }

  private async fetchArticles(ctx: RunContext): Promise<StageStats> {
    ctx.articles = await this.deps.fetchArticles(ctx.feedItems);
    const successful = ctx.articles.filter((article) => article.fetchSuccess).length;
    return {
      totalArticles: ctx.articles.length,
      successful,
      failed: ctx.articles.length - successful,
    };
  }

  private async storeArticles(ctx: RunContext): Promise<StageStats> {
    const stats = await this.deps.store.processArticles({
      runId: requireRunId(ctx),
      runDate: ctx.runDate,
      articles: ctx.articles,
      sourceMap: ctx.sourceMap,
      now: this.clock(),
    });
    return { ...stats };
  }

  private async rankArticles(ctx: RunContext): Promise<StageStats> {
    const runId = requireRunId(ctx);
    const now = this.clock();

    ctx.runArticles = await this.deps.store.getRunArticles(runId);
    const historical = await this.deps.store.getRecentArticles({
      days: noveltyLookbackDays(ctx.rankingConfig),
      limit: NOVELTY_WINDOW_LIMIT,
      now,
    });

    const result = await rankArticles({
      runId,
      articles: ctx.runArticles,
      historical,
      config: ctx.rankingConfig,
      preferences: ctx.preferences,
      storyBudget: ctx.maxStories,
      minScore: ctx.minScore,
      now,
      loadContent: this.loadContent,
    });

    await this.deps.store.saveRankSelection(runId, result.rankedArticles);

    const byId = new Map(ctx.runArticles.map((article) => [article.id, article]));
    ctx.rankingResult = result;
    ctx.selectedArticles = result.rankedArticles.flatMap((score) => {
      const article = byId.get(score.articleId);
      return article ? [{ ...article, includedInRank: true, score: toScorePayload(score) }] : [];
    });

    logger.info(formatRankingSummary(result));
    return { totalArticles: result.totalArticles, selected: result.rankedArticles.length };
  }

  private async generateShowNotes(ctx: RunContext): Promise<StageStats> {
    const { showNotes, stats } = await generateShowNotes({
      provider: this.deps.llm,
      articles: ctx.selectedArticles,
      runDate: ctx.runDate,
      loadContent: this.loadContent,
      now: this.clock(),
    });
    ctx.showNotes = showNotes;

    await this.deps.artifacts.writeRunFile(ctx.runDate, "show_notes.md", formatShowNotesMarkdown(showNotes));

    return {
      articlesProcessed: stats.articlesProcessed,
      sections: showNotes.sections.length,
      tokensUsed: stats.tokensUsed,
      costEstimate: stats.costEstimate,
    };
  }

  private async generateScript(ctx: RunContext): Promise<StageStats> {
    if (!ctx.showNotes) {
      throw new Error("Show notes are required before script generation");
    }

    const now = this.clock();
    const { script, stats } = await generateScript({
      provider: this.deps.llm,
      showNotes: ctx.showNotes,
      targetMinutes: ctx.targetMinutes,
      runDate: ctx.runDate,
      now,
    });
    ctx.script = script;

    await this.deps.artifacts.writeRunFile(ctx.runDate, "script.txt", formatScriptFile(script));
    await this.deps.artifacts.writeRunFile(ctx.runDate, createTtsFilename(now), formatForTts(script.content));

    return {
      estimatedMinutes: script.estimatedMinutes,
      wordCount: script.estimatedWords,
      tokensUsed: stats.tokensUsed,
      costEstimate: stats.costEstimate,
    };
  }
}
