/**
 * Print recent pipeline runs
 *
 * Usage:
 *   npx tsx scripts/list-runs.ts [--limit=10]
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });

import { closeDbClient, getDbClient, initializeDatabase } from '@/src/lib/db/index';
import { getRecentRuns } from '@/src/lib/db/runs';
import { logger } from '@/src/lib/logger';

async function main() {
  const limitArg = process.argv.slice(2).find((arg) => arg.startsWith('--limit='));
  const limit = limitArg ? parseInt(limitArg.split('=')[1], 10) || 10 : 10;

  try {
    const client = await getDbClient();
    await initializeDatabase(client);
    const runs = await getRecentRuns(client, limit);
    await closeDbClient();

    if (runs.length === 0) {
      console.log('No runs recorded yet.');
      return;
    }

    console.log(`\nRecent runs (${runs.length}):\n`);
    for (const run of runs) {
      const duration =
        run.finishedAt !== undefined
          ? `${((run.finishedAt.getTime() - run.startedAt.getTime()) / 1000).toFixed(0)}s`
          : '-';
      console.log(`  ${run.runDate}  #${run.id}  ${run.status.padEnd(7)}  ${duration}`);
    }
  } catch (error) {
    logger.error('[LIST-RUNS] Failed to list runs', error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
