/**
 * Picks the reading store for this process.
 */

import { logger } from "@/lib/logger";
import { databaseConfig } from "@/server/config/env";
import { createDatabase } from "@/server/db";
import { MemoryReadingStore } from "./memory";
import { PostgresReadingStore } from "./postgres";
import type { ReadingStore } from "./types";

export type { ArticleUpdate, NewArticle, ReadingStore } from "./types";
export { MemoryReadingStore } from "./memory";
export { PostgresReadingStore } from "./postgres";

/**
 * Postgres when a connection string is given (or DATABASE_URL is set),
 * otherwise an in-memory store that is lost on exit.
 */
export function createReadingStore(
  connectionString: string | undefined = databaseConfig.url
): ReadingStore {
  if (!connectionString) {
    logger.info("No database configured, using in-memory reading store");
    return new MemoryReadingStore();
  }

  const { db } = createDatabase(connectionString);
  logger.info("Using Postgres reading store");
  return new PostgresReadingStore(db);
}
