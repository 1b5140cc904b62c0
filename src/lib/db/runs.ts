/**
 * Run records, one per logical date
 */

import type { Run, RunStatus } from "../model";
import { logger } from "../logger";
import type { DatabaseClient, DbRow } from "./driver";
import {
  fromUnixSeconds,
  readJsonRecord,
  readNumber,
  readOptionalDate,
  readString,
  toUnixSeconds,
} from "./rows";

function parseStatus(value: string): RunStatus {
  if (value === "running" || value === "success" || value === "failed") {
    return value;
  }
  throw new Error(`Unknown run status: ${value}`);
}

function toRun(row: DbRow): Run {
  return {
    id: readNumber(row, "id"),
    runDate: readString(row, "run_date"),
    startedAt: fromUnixSeconds(readNumber(row, "started_at")),
    finishedAt: readOptionalDate(row, "finished_at"),
    status: parseStatus(readString(row, "status")),
    stats: readJsonRecord(row, "stats_json"),
  };
}

const RUN_COLUMNS = "id, run_date, started_at, finished_at, status, stats_json";

export async function getRun(client: DatabaseClient, runId: number): Promise<Run | null> {
  const result = await client.query(`SELECT ${RUN_COLUMNS} FROM runs WHERE id = ?`, [runId]);
  return result.rows.length > 0 ? toRun(result.rows[0]) : null;
}

export async function getRunByDate(client: DatabaseClient, runDate: string): Promise<Run | null> {
  const result = await client.query(`SELECT ${RUN_COLUMNS} FROM runs WHERE run_date = ?`, [runDate]);
  return result.rows.length > 0 ? toRun(result.rows[0]) : null;
}

/**
 * Find the run for a date and reset it to running, or create it.
 * A reused run keeps its id; start time is overwritten and finish time and stats cleared.
 */
export async function createOrReuseRun(
  client: DatabaseClient,
  runDate: string,
  now: Date = new Date()
): Promise<Run> {
  const startedAt = toUnixSeconds(now);
  const existing = await getRunByDate(client, runDate);

  let runId: number;
  if (existing) {
    await client.run(
      `UPDATE runs SET status = 'running', started_at = ?, finished_at = NULL, stats_json = NULL
       WHERE id = ?`,
      [startedAt, existing.id]
    );
    runId = existing.id;
    logger.info(`[PIPELINE] Reusing run ${runId} for ${runDate}`);
  } else {
    const inserted = await client.query(
      `INSERT INTO runs (run_date, started_at, status) VALUES (?, ?, 'running') RETURNING id`,
      [runDate, startedAt]
    );
    if (inserted.rows.length === 0) {
      throw new Error(`Failed to create run for ${runDate}`);
    }
    runId = readNumber(inserted.rows[0], "id");
    logger.info(`[PIPELINE] Created run ${runId} for ${runDate}`);
  }

  const run = await getRun(client, runId);
  if (!run) {
    throw new Error(`Run ${runId} disappeared after write`);
  }
  return run;
}

/**
 * Set status and stats; terminal statuses also stamp finished_at
 */
export async function updateRunStatus(
  client: DatabaseClient,
  runId: number,
  status: RunStatus,
  stats?: Record<string, unknown>,
  now: Date = new Date()
): Promise<void> {
  const finishedAt = status === "running" ? null : toUnixSeconds(now);
  await client.run(
    `UPDATE runs SET status = ?, finished_at = ?, stats_json = ? WHERE id = ?`,
    [status, finishedAt, stats ? JSON.stringify(stats) : null, runId]
  );
}

export async function getRecentRuns(client: DatabaseClient, limit: number = 10): Promise<Run[]> {
  const result = await client.query(
    `SELECT ${RUN_COLUMNS} FROM runs ORDER BY run_date DESC LIMIT ?`,
    [limit]
  );
  return result.rows.map(toRun);
}
