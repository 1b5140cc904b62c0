/**
 * Database initialization
 *
 * Supports both SQLite (local) and PostgreSQL (hosted); the dialect follows the
 * client's driver.
 */

import { logger } from "../logger";
import type { DatabaseClient } from "./driver";
import { SQLITE_SCHEMA } from "./schema";
import { POSTGRES_SCHEMA } from "./schema-postgres";

export type { DatabaseClient } from "./driver";
export { getDbClient, closeDbClient, createSqliteClient } from "./driver";

/**
 * Create tables if they don't exist
 */
export async function initializeDatabase(client: DatabaseClient): Promise<void> {
  logger.info(`Initializing database with ${client.driver} driver`);

  try {
    await client.exec(client.driver === "postgres" ? POSTGRES_SCHEMA : SQLITE_SCHEMA);
    logger.info(`${client.driver === "postgres" ? "PostgreSQL" : "SQLite"} schema initialized successfully`);
  } catch (error) {
    logger.error("Failed to initialize database schema", error);
    throw error;
  }
}
