/**
 * Create the database schema
 *
 * Usage:
 *   npx tsx scripts/init-db.ts
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });

import { closeDbClient, getDbClient, initializeDatabase } from '@/src/lib/db/index';
import { logger } from '@/src/lib/logger';

async function main() {
  try {
    const client = await getDbClient();
    await initializeDatabase(client);
    await closeDbClient();
    console.log(`\n✓ Database schema ready (${client.driver})`);
  } catch (error) {
    logger.error('[INIT-DB] Failed to initialize database', error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
