import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import { Pool } from "pg";
import * as Sentry from "@sentry/node";

import { logger } from "@/lib/logger";
import { databaseConfig } from "@/server/config/env";
import * as schema from "./schema";

/**
 * Any drizzle Postgres database over this schema, whatever the driver.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface DatabaseConnection {
  db: NodePgDatabase<typeof schema>;
  pool: Pool;
}

/**
 * Opens a connection pool and wraps it with drizzle.
 *
 * @throws Error if no connection string is configured
 */
export function createDatabase(
  connectionString: string | undefined = databaseConfig.url,
  poolMax: number = databaseConfig.poolMax
): DatabaseConnection {
  if (!connectionString) {
    throw new Error("DATABASE_URL environment variable is not set");
  }

  const pool = new Pool({
    connectionString,
    max: poolMax,
    idleTimeoutMillis: 30000,
  });

  // Without a handler, an idle client failing crashes the process.
  // The pool drops failed clients and replaces them on demand.
  pool.on("error", (err) => {
    logger.error("Unexpected error on idle database client", {
      message: err.message,
    });
    Sentry.captureException(err, {
      tags: { source: "pg-pool" },
    });
  });

  const db = drizzle(pool, {
    schema,
    logger: {
      logQuery(query: string, params: unknown[]) {
        logger.debug("db.query", {
          statement: query.substring(0, 500),
          paramsCount: params.length,
        });
      },
    },
  });

  return { db, pool };
}
