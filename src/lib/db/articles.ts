/**
 * Article storage operations
 *
 * Articles are deduplicated by canonical URL or content hash. A repeat sighting
 * only bumps last_seen_at; the first sighting also writes the extracted text to
 * the run's artifact directory.
 */

import { z } from "zod";
import type {
  ArticleContent,
  HistoricalArticle,
  RunArticle,
  ScoreBreakdown,
  ScorePayload,
  StorageStats,
} from "../model";
import { logger } from "../logger";
import type { ArtifactStore } from "../storage/local";
import type { DatabaseClient, DbRow } from "./driver";
import {
  fromUnixSeconds,
  readBoolean,
  readJsonRecord,
  readNumber,
  readOptionalDate,
  readOptionalString,
  readString,
  toUnixSeconds,
} from "./rows";

const ScorePayloadSchema = z.object({
  total: z.number(),
  recency: z.number(),
  source: z.number(),
  topic: z.number(),
  novelty: z.number(),
  preference: z.number(),
  reason: z.string(),
});

export interface UpsertResult {
  id: number;
  isNew: boolean;
}

/**
 * Insert a fetched article, or bump last_seen_at on the existing row that shares
 * its canonical URL or content hash
 */
export async function upsertArticle(
  client: DatabaseClient,
  content: ArticleContent,
  sourceId: number,
  now: Date = new Date()
): Promise<UpsertResult> {
  const timestamp = toUnixSeconds(now);

  const existing = await client.query(
    `SELECT id FROM articles
     WHERE canonical_url = ? OR (content_hash = ? AND content_hash <> '')
     ORDER BY id ASC
     LIMIT 1`,
    [content.canonicalUrl, content.contentHash]
  );

  if (existing.rows.length > 0) {
    const id = readNumber(existing.rows[0], "id");
    await client.run(`UPDATE articles SET last_seen_at = ? WHERE id = ?`, [timestamp, id]);
    return { id, isNew: false };
  }

  const inserted = await client.query(
    `INSERT INTO articles
     (source_id, canonical_url, title, published_at, outlet, content_hash, first_seen_at, last_seen_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)
     RETURNING id`,
    [
      sourceId,
      content.canonicalUrl,
      content.title,
      content.publishedAt ? toUnixSeconds(content.publishedAt) : null,
      content.outlet || null,
      content.contentHash,
      timestamp,
      timestamp,
    ]
  );

  if (inserted.rows.length === 0) {
    throw new Error(`Failed to insert article ${content.canonicalUrl}`);
  }
  return { id: readNumber(inserted.rows[0], "id"), isNew: true };
}

export async function setExtractedPath(
  client: DatabaseClient,
  articleId: number,
  extractedPath: string
): Promise<void> {
  await client.run(`UPDATE articles SET extracted_path = ? WHERE id = ?`, [extractedPath, articleId]);
}

/**
 * Attach an article to a run, not selected. Returns false if it was already linked.
 */
export async function linkArticleToRun(
  client: DatabaseClient,
  runId: number,
  articleId: number,
  now: Date = new Date()
): Promise<boolean> {
  const result = await client.run(
    `INSERT INTO run_articles (run_id, article_id, included_in_rank, created_at)
     VALUES (?, ?, 0, ?)
     ON CONFLICT (run_id, article_id) DO NOTHING`,
    [runId, articleId, toUnixSeconds(now)]
  );
  return result.changes > 0;
}

/**
 * Source id for an article: exact source name first, then a source whose name
 * contains the article's outlet
 */
export function resolveSourceId(
  content: ArticleContent,
  sourceMap: Map<string, number>
): number | undefined {
  if (content.sourceName) {
    const direct = sourceMap.get(content.sourceName);
    if (direct !== undefined) {
      return direct;
    }
  }

  const outlet = content.outlet?.toLowerCase();
  if (!outlet) {
    return undefined;
  }
  for (const [name, id] of sourceMap) {
    if (name.toLowerCase().includes(outlet)) {
      return id;
    }
  }
  return undefined;
}

export interface ProcessArticlesOptions {
  runId: number;
  runDate: string;
  articles: ArticleContent[];
  sourceMap: Map<string, number>;
  artifacts: ArtifactStore;
  now?: Date;
}

/**
 * Persist fetched articles for a run with deduplication
 */
export async function processArticles(
  client: DatabaseClient,
  options: ProcessArticlesOptions
): Promise<StorageStats> {
  const { runId, runDate, articles, sourceMap, artifacts } = options;
  const now = options.now ?? new Date();
  const stats: StorageStats = {
    total: articles.length,
    new: 0,
    duplicates: 0,
    failed: 0,
    stored: 0,
    unmatched: 0,
  };

  for (const content of articles) {
    if (!content.fetchSuccess) {
      stats.failed++;
      continue;
    }

    const sourceId = resolveSourceId(content, sourceMap);
    if (sourceId === undefined) {
      logger.warn(`[STORAGE] No source matched for article`, {
        url: content.canonicalUrl,
        sourceName: content.sourceName,
        outlet: content.outlet,
      });
      stats.unmatched++;
      continue;
    }

    const { id, isNew } = await upsertArticle(client, content, sourceId, now);
    if (isNew) {
      const extractedPath = await artifacts.writeArticleText(runDate, id, content.text);
      await setExtractedPath(client, id, extractedPath);
      stats.new++;
    } else {
      stats.duplicates++;
    }

    if (await linkArticleToRun(client, runId, id, now)) {
      stats.stored++;
    }
  }

  logger.info(`[STORAGE] Processed ${stats.total} articles for run ${runId}`, { ...stats });
  return stats;
}

function parseScore(row: DbRow): ScorePayload | null {
  const record = readJsonRecord(row, "score_json");
  if (!record) {
    return null;
  }
  const parsed = ScorePayloadSchema.safeParse(record);
  return parsed.success ? parsed.data : null;
}

function toRunArticle(row: DbRow): RunArticle {
  return {
    id: readNumber(row, "id"),
    sourceId: readNumber(row, "source_id"),
    sourceName: readString(row, "source_name"),
    sourceWeight: readNumber(row, "source_weight"),
    sourceCategory: readString(row, "source_category"),
    canonicalUrl: readString(row, "canonical_url"),
    title: readString(row, "title"),
    outlet: readOptionalString(row, "outlet"),
    contentHash: readString(row, "content_hash"),
    publishedAt: readOptionalDate(row, "published_at"),
    extractedPath: readOptionalString(row, "extracted_path"),
    firstSeenAt: fromUnixSeconds(readNumber(row, "first_seen_at")),
    lastSeenAt: fromUnixSeconds(readNumber(row, "last_seen_at")),
    includedInRank: readBoolean(row, "included_in_rank"),
    score: parseScore(row),
  };
}

/**
 * Articles linked to a run, newest publication first (ties by id).
 * With onlyRanked, the selected articles ordered by stored total score.
 */
export async function getRunArticles(
  client: DatabaseClient,
  runId: number,
  options: { onlyRanked?: boolean } = {}
): Promise<RunArticle[]> {
  const result = await client.query(
    `SELECT a.id, a.source_id, a.canonical_url, a.title, a.published_at, a.outlet,
            a.content_hash, a.extracted_path, a.first_seen_at, a.last_seen_at,
            s.name AS source_name, s.weight AS source_weight, s.category AS source_category,
            ra.included_in_rank, ra.score_json
     FROM run_articles ra
     JOIN articles a ON a.id = ra.article_id
     JOIN sources s ON s.id = a.source_id
     WHERE ra.run_id = ?${options.onlyRanked ? " AND ra.included_in_rank = 1" : ""}
     ORDER BY a.published_at DESC NULLS LAST, a.id ASC`,
    [runId]
  );

  const articles = result.rows.map(toRunArticle);
  if (options.onlyRanked) {
    articles.sort((a, b) => (b.score?.total ?? 0) - (a.score?.total ?? 0));
  }
  return articles;
}

/**
 * Articles first seen within the last `days`, most recent first
 */
export async function getRecentArticles(
  client: DatabaseClient,
  options: { days: number; limit?: number; now?: Date }
): Promise<HistoricalArticle[]> {
  const now = options.now ?? new Date();
  const cutoff = toUnixSeconds(now) - options.days * 24 * 60 * 60;

  const result = await client.query(
    `SELECT id, canonical_url, content_hash, title, first_seen_at
     FROM articles
     WHERE first_seen_at >= ?
     ORDER BY first_seen_at DESC, id DESC
     LIMIT ?`,
    [cutoff, options.limit ?? 200]
  );

  return result.rows.map((row) => ({
    id: readNumber(row, "id"),
    canonicalUrl: readString(row, "canonical_url"),
    contentHash: readString(row, "content_hash"),
    title: readString(row, "title"),
    firstSeenAt: readOptionalDate(row, "first_seen_at"),
  }));
}

export function toScorePayload(score: ScoreBreakdown): ScorePayload {
  return {
    total: score.total,
    recency: score.recency,
    source: score.source,
    topic: score.topic,
    novelty: score.novelty,
    preference: score.preference,
    reason: score.reason,
  };
}

/**
 * Replace the run's selection with the given scores
 */
export async function saveRankSelection(
  client: DatabaseClient,
  runId: number,
  scores: ScoreBreakdown[]
): Promise<void> {
  await client.run(
    `UPDATE run_articles SET included_in_rank = 0, score_json = NULL WHERE run_id = ?`,
    [runId]
  );

  for (const score of scores) {
    await client.run(
      `UPDATE run_articles SET included_in_rank = 1, score_json = ?
       WHERE run_id = ? AND article_id = ?`,
      [JSON.stringify(toScorePayload(score)), runId, score.articleId]
    );
  }

  logger.info(`[STORAGE] Saved selection of ${scores.length} articles for run ${runId}`);
}
