/**
 * Manage feed sources in config/sources.json (or SOURCES_PATH)
 *
 * Usage:
 *   npx tsx scripts/sources.ts --list
 *   npx tsx scripts/sources.ts --add --name="Feed" --url=https://example.com/rss [--category=research] [--weight=0.8]
 *   npx tsx scripts/sources.ts --remove="Feed"
 *   npx tsx scripts/sources.ts --test[="Feed"]
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });

import { loadSettings } from '@/src/config/settings';
import {
  addSource,
  formatSourcesTable,
  loadSources,
  removeSource,
  resolveSourcesPath,
  saveSources,
  selectSources,
} from '@/src/config/sources';
import { checkSources } from '@/src/lib/ingest/rss';
import { logger } from '@/src/lib/logger';
import type { SourceConfig } from '@/src/lib/model';

const args = process.argv.slice(2);

function hasFlag(name: string): boolean {
  return args.some((a) => a === `--${name}` || a.startsWith(`--${name}=`));
}

function argValue(name: string): string | undefined {
  const arg = args.find((a) => a.startsWith(`--${name}=`));
  return arg ? arg.slice(name.length + 3) : undefined;
}

function readSources(sourcesPath: string, allowMissing: boolean): SourceConfig[] {
  if (allowMissing && !fs.existsSync(sourcesPath)) {
    return [];
  }
  return loadSources(sourcesPath);
}

async function main() {
  const sourcesPath = resolveSourcesPath();

  try {
    if (hasFlag('add')) {
      const weight = argValue('weight');
      const sources = addSource(readSources(sourcesPath, true), {
        name: argValue('name'),
        url: argValue('url'),
        category: argValue('category'),
        weight: weight === undefined ? undefined : Number(weight),
        enabled: true,
      });
      saveSources(sources, sourcesPath);
      console.log(`Added source: ${argValue('name')}`);
      return;
    }

    const removeName = argValue('remove');
    if (removeName !== undefined) {
      saveSources(removeSource(readSources(sourcesPath, false), removeName), sourcesPath);
      console.log(`Removed source: ${removeName}`);
      return;
    }

    if (hasFlag('test')) {
      const settings = loadSettings();
      const selected = selectSources(readSources(sourcesPath, false), argValue('test'));
      const checks = await checkSources(selected, {
        concurrency: settings.fetch.feedConcurrency,
        timeoutMs: settings.fetch.timeoutMs,
        userAgent: settings.fetch.userAgent,
      });
      for (const check of checks) {
        console.log(`  ${check.status.toUpperCase().padEnd(8)} ${check.name}: ${check.detail}`);
      }
      if (checks.some((check) => check.status === 'failed')) {
        process.exit(1);
      }
      return;
    }

    const sources = readSources(sourcesPath, false);
    if (sources.length === 0) {
      console.log('No sources configured.');
      return;
    }
    console.log(`\nConfigured sources (${sourcesPath}):\n`);
    for (const line of formatSourcesTable(sources)) {
      console.log(`  ${line}`);
    }
  } catch (error) {
    logger.error('[SOURCES] Command failed', error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
