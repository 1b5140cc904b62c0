/**
 * Default collaborators: SQL storage, HTTP fetchers, local artifacts, configured LLM
 */

import { type Settings, resolveWorkspaceRoot } from "../../config/settings";
import { loadSources } from "../../config/sources";
import type { DatabaseClient } from "../db/driver";
import { getRecentArticles, getRunArticles, processArticles, saveRankSelection } from "../db/articles";
import { createOrReuseRun, updateRunStatus } from "../db/runs";
import { syncSources } from "../db/sources";
import { fetchArticles } from "../ingest/article";
import { fetchFeeds } from "../ingest/rss";
import { type LLMProvider, createLLMProvider } from "../llm/provider";
import { type ArtifactStore, LocalArtifactStore } from "../storage/local";
import type { ArticleStore, PipelineDependencies, RunStore } from "./orchestrator";

export function createSqlRunStore(client: DatabaseClient): RunStore {
  return {
    createOrReuseRun: (runDate, now) => createOrReuseRun(client, runDate, now),
    updateRunStatus: (runId, status, stats, now) => updateRunStatus(client, runId, status, stats, now),
  };
}

export function createSqlArticleStore(client: DatabaseClient, artifacts: ArtifactStore): ArticleStore {
  return {
    syncSources: (sources, now) => syncSources(client, sources, now),
    processArticles: (options) => processArticles(client, { ...options, artifacts }),
    getRunArticles: (runId, options) => getRunArticles(client, runId, options),
    getRecentArticles: (options) => getRecentArticles(client, options),
    saveRankSelection: (runId, scores) => saveRankSelection(client, runId, scores),
  };
}

export interface DefaultDependencyOptions {
  client: DatabaseClient;
  settings: Settings;
  sourcesPath?: string;
  llm?: LLMProvider;
}

export function createDefaultDependencies(options: DefaultDependencyOptions): PipelineDependencies {
  const { client, settings } = options;
  const artifacts = new LocalArtifactStore(resolveWorkspaceRoot(settings));
  const fetchOptions = {
    timeoutMs: settings.fetch.timeoutMs,
    userAgent: settings.fetch.userAgent,
  };

  return {
    loadSources: async () => loadSources(options.sourcesPath),
    fetchFeeds: (sources) => fetchFeeds(sources, { ...fetchOptions, concurrency: settings.fetch.feedConcurrency }),
    fetchArticles: (items) =>
      fetchArticles(items, { ...fetchOptions, concurrency: settings.fetch.articleConcurrency }),
    store: createSqlArticleStore(client, artifacts),
    runs: createSqlRunStore(client),
    llm: options.llm ?? createLLMProvider(settings),
    artifacts,
  };
}
