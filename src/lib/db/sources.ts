/**
 * Source table operations
 */

import type { SourceConfig } from "../model";
import { logger } from "../logger";
import type { DatabaseClient } from "./driver";
import { readNumber, readString, toUnixSeconds } from "./rows";

/**
 * Upsert configured sources by name and return name -> id
 */
export async function syncSources(
  client: DatabaseClient,
  sources: SourceConfig[],
  now: Date = new Date()
): Promise<Map<string, number>> {
  const timestamp = toUnixSeconds(now);

  for (const source of sources) {
    await client.run(
      `INSERT INTO sources (name, url, category, weight, enabled, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT (name) DO UPDATE SET
         url = excluded.url,
         category = excluded.category,
         weight = excluded.weight,
         enabled = excluded.enabled,
         updated_at = excluded.updated_at`,
      [source.name, source.url, source.category, source.weight, source.enabled ? 1 : 0, timestamp, timestamp]
    );
  }

  const sourceMap = new Map<string, number>();
  if (sources.length === 0) {
    return sourceMap;
  }

  const placeholders = sources.map(() => "?").join(", ");
  const result = await client.query(
    `SELECT id, name FROM sources WHERE name IN (${placeholders})`,
    sources.map((s) => s.name)
  );
  for (const row of result.rows) {
    sourceMap.set(readString(row, "name"), readNumber(row, "id"));
  }

  logger.info(`[STORAGE] Synced ${sourceMap.size} sources`);
  return sourceMap;
}
