/**
 * SQLite schema
 *
 * Timestamps are Unix seconds. Flags are stored as INTEGER 0/1 in both dialects
 * so the same bound parameters work against SQLite and PostgreSQL.
 */

export const SQLITE_SCHEMA = `
CREATE TABLE IF NOT EXISTS sources (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  url TEXT NOT NULL,
  category TEXT NOT NULL,
  weight REAL NOT NULL DEFAULT 1.0,
  enabled INTEGER NOT NULL DEFAULT 1,
  created_at INTEGER DEFAULT (strftime('%s', 'now')),
  updated_at INTEGER DEFAULT (strftime('%s', 'now'))
);

CREATE TABLE IF NOT EXISTS runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_date TEXT NOT NULL UNIQUE,
  started_at INTEGER NOT NULL,
  finished_at INTEGER,
  status TEXT NOT NULL DEFAULT 'running',
  stats_json TEXT,
  created_at INTEGER DEFAULT (strftime('%s', 'now'))
);

CREATE TABLE IF NOT EXISTS articles (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  source_id INTEGER NOT NULL REFERENCES sources(id),
  canonical_url TEXT NOT NULL UNIQUE,
  title TEXT NOT NULL,
  published_at INTEGER,
  outlet TEXT,
  content_hash TEXT NOT NULL,
  extracted_path TEXT,
  first_seen_at INTEGER NOT NULL,
  last_seen_at INTEGER NOT NULL,
  created_at INTEGER DEFAULT (strftime('%s', 'now'))
);

CREATE INDEX IF NOT EXISTS idx_articles_content_hash ON articles(content_hash);
CREATE INDEX IF NOT EXISTS idx_articles_first_seen ON articles(first_seen_at);

CREATE TABLE IF NOT EXISTS run_articles (
  run_id INTEGER NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
  article_id INTEGER NOT NULL REFERENCES articles(id) ON DELETE CASCADE,
  included_in_rank INTEGER NOT NULL DEFAULT 0,
  score_json TEXT,
  created_at INTEGER DEFAULT (strftime('%s', 'now')),
  PRIMARY KEY (run_id, article_id)
);

CREATE INDEX IF NOT EXISTS idx_run_articles_article ON run_articles(article_id);
`;
