/**
 * Run the briefing pipeline for one date
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts [--date=YYYY-MM-DD] [--minutes=12] [--max-items=150] [--max-stories=20]
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

// Load .env.local for local development
dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });

import { z } from 'zod';
import { RunDefaultsSchema, formatZodError, loadSettings } from '@/src/config/settings';
import { closeDbClient, getDbClient, initializeDatabase } from '@/src/lib/db/index';
import { logger } from '@/src/lib/logger';
import { createDefaultDependencies } from '@/src/lib/pipeline/dependencies';
import { PipelineOrchestrator, createRunContext } from '@/src/lib/pipeline/orchestrator';

function argValue(name: string): string | undefined {
  const arg = process.argv.slice(2).find((a) => a.startsWith(`--${name}=`));
  return arg ? arg.slice(name.length + 3) : undefined;
}

function intArg(name: string): number | undefined {
  const value = argValue(name);
  return value === undefined ? undefined : Number(value);
}

const RunDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

async function main() {
  try {
    const settings = loadSettings();

    const runDate = RunDateSchema.safeParse(argValue('date') ?? new Date().toISOString().slice(0, 10));
    if (!runDate.success) {
      throw new Error(`Invalid configuration: date: ${formatZodError(runDate.error)}`);
    }

    const overrides = Object.fromEntries(
      Object.entries({
        minutes: intArg('minutes'),
        maxItems: intArg('max-items'),
        maxStories: intArg('max-stories'),
      }).filter(([, value]) => value !== undefined)
    );
    const runOptions = RunDefaultsSchema.safeParse({ ...settings.runDefaults, ...overrides });
    if (!runOptions.success) {
      throw new Error(`Invalid configuration: ${formatZodError(runOptions.error)}`);
    }

    const client = await getDbClient();
    await initializeDatabase(client);

    const orchestrator = new PipelineOrchestrator(createDefaultDependencies({ client, settings }));
    const success = await orchestrator.execute(
      createRunContext({
        runDate: runDate.data,
        targetMinutes: runOptions.data.minutes,
        maxItems: runOptions.data.maxItems,
        maxStories: runOptions.data.maxStories,
        minScore: runOptions.data.minScore,
        rankingConfig: settings.ranking,
        preferences: settings.preferences,
      })
    );

    await closeDbClient();

    if (!success) {
      console.error(`\n✗ Pipeline failed for ${runDate.data}`);
      process.exit(1);
    }
    console.log(`\n✓ Pipeline completed for ${runDate.data}`);
  } catch (error) {
    logger.error('[PIPELINE-SCRIPT] Fatal error', error);
    console.error('\n✗ Fatal error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
