/**
 * Migration runner for the Postgres reading store.
 *
 * Applies the SQL files in drizzle/ listed by drizzle/meta/_journal.json:
 * - Each migration runs in its own transaction
 * - Applied migrations are verified by hash
 * - Already-applied migrations are skipped
 *
 * Usage: npm run db:migrate
 */

import * as crypto from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";

import * as Sentry from "@sentry/node";
import { Pool, type PoolClient } from "pg";
import { z } from "zod";

import { errorMessage, logger } from "../src/lib/logger";
import { initSentry } from "../src/server/config/sentry";

// ============================================================================
// Types
// ============================================================================

const journalSchema = z.object({
  version: z.string(),
  dialect: z.string(),
  entries: z.array(
    z.object({
      idx: z.number(),
      version: z.string(),
      when: z.number(),
      tag: z.string(),
      breakpoints: z.boolean(),
    })
  ),
});

export type Journal = z.infer<typeof journalSchema>;
export type JournalEntry = Journal["entries"][number];

type AppliedMigration = {
  id: number;
  hash: string;
};

export interface MigrationOptions {
  /** Directory containing migration SQL files and meta/_journal.json */
  migrationsDir?: string;
  /** Schema name for migrations table (default: "drizzle") */
  migrationsSchema?: string;
  /** Table name for migrations tracking (default: "__drizzle_migrations") */
  migrationsTable?: string;
}

interface ResolvedOptions {
  migrationsDir: string;
  migrationsSchema: string;
  migrationsTable: string;
}

export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL("../drizzle", import.meta.url));

// ============================================================================
// Pure Functions (exported for testing)
// ============================================================================

/**
 * SHA-256 of a migration file, used to detect edits after it was applied.
 */
export function computeHash(sql: string): string {
  return crypto.createHash("sha256").update(sql).digest("hex");
}

/**
 * Split a migration SQL file into individual statements.
 * Statements are separated by "--> statement-breakpoint".
 */
export function splitStatements(sql: string): string[] {
  return sql
    .split("--> statement-breakpoint")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Parse a journal JSON string.
 *
 * @throws Error if the JSON is malformed or doesn't describe a journal
 */
export function parseJournal(content: string): Journal {
  return journalSchema.parse(JSON.parse(content));
}

// ============================================================================
// File System Functions
// ============================================================================

function loadJournal(migrationsDir: string): Journal {
  const journalPath = path.join(migrationsDir, "meta", "_journal.json");
  return parseJournal(fs.readFileSync(journalPath, "utf-8"));
}

function loadMigrationSql(migrationsDir: string, tag: string): string {
  return fs.readFileSync(path.join(migrationsDir, `${tag}.sql`), "utf-8");
}

// ============================================================================
// Database Functions
// ============================================================================

async function ensureMigrationsTable(
  client: PoolClient,
  schema: string,
  table: string
): Promise<void> {
  await client.query(`CREATE SCHEMA IF NOT EXISTS "${schema}"`);
  await client.query(`
    CREATE TABLE IF NOT EXISTS "${schema}"."${table}" (
      id SERIAL PRIMARY KEY,
      hash text NOT NULL,
      created_at bigint
    )
  `);
}

async function getAppliedMigrations(
  client: PoolClient,
  schema: string,
  table: string
): Promise<AppliedMigration[]> {
  const result = await client.query<AppliedMigration>(`
    SELECT id, hash
    FROM "${schema}"."${table}"
    ORDER BY id ASC
  `);
  return result.rows;
}

/**
 * Run a single migration in a transaction.
 * The migrations table is updated in the same transaction.
 */
async function runMigration(
  pool: Pool,
  options: ResolvedOptions,
  sql: string,
  entry: JournalEntry
): Promise<void> {
  const client = await pool.connect();

  try {
    await client.query("BEGIN");

    for (const statement of splitStatements(sql)) {
      await client.query(statement);
    }

    await client.query(
      `INSERT INTO "${options.migrationsSchema}"."${options.migrationsTable}" (hash, created_at) VALUES ($1, $2)`,
      [computeHash(sql), entry.when]
    );

    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

// ============================================================================
// Main Migration Runner
// ============================================================================

function resolveOptions(options?: MigrationOptions): ResolvedOptions {
  return {
    migrationsDir: options?.migrationsDir ?? DEFAULT_MIGRATIONS_DIR,
    migrationsSchema: options?.migrationsSchema ?? "drizzle",
    migrationsTable: options?.migrationsTable ?? "__drizzle_migrations",
  };
}

// Advisory lock ID for migrations
const MIGRATION_LOCK_ID = 4201337;

/**
 * Applies pending migrations.
 *
 * @throws Error if an applied migration is missing from the journal or was edited
 */
export async function runMigrations(
  databaseUrl: string,
  options?: MigrationOptions
): Promise<{ applied: string[]; skipped: string[] }> {
  const opts = resolveOptions(options);
  const pool = new Pool({ connectionString: databaseUrl });
  const applied: string[] = [];
  const skipped: string[] = [];

  try {
    const client = await pool.connect();
    try {
      await ensureMigrationsTable(client, opts.migrationsSchema, opts.migrationsTable);

      logger.debug("Acquiring migration lock");
      await client.query("SELECT pg_advisory_lock($1)", [MIGRATION_LOCK_ID]);
      const appliedMigrations = await getAppliedMigrations(
        client,
        opts.migrationsSchema,
        opts.migrationsTable
      );

      const journal = loadJournal(opts.migrationsDir);

      for (let i = 0; i < appliedMigrations.length; i++) {
        const journalEntry = journal.entries[i];
        if (!journalEntry) {
          throw new Error(
            `Migration ${i} exists in database but not in journal. ` +
              `This may indicate a corrupted migration state.`
          );
        }

        const expectedHash = computeHash(loadMigrationSql(opts.migrationsDir, journalEntry.tag));
        if (appliedMigrations[i].hash !== expectedHash) {
          throw new Error(
            `Hash mismatch for migration ${journalEntry.tag}:\n` +
              `  Expected: ${expectedHash}\n` +
              `  Found:    ${appliedMigrations[i].hash}\n` +
              `This may indicate the migration file was modified after being applied.`
          );
        }

        skipped.push(journalEntry.tag);
      }

      const pendingMigrations = journal.entries.slice(appliedMigrations.length);
      if (pendingMigrations.length === 0) {
        logger.info("No pending migrations");
        return { applied, skipped };
      }

      for (const entry of pendingMigrations) {
        logger.info("Running migration", { tag: entry.tag });
        await runMigration(pool, opts, loadMigrationSql(opts.migrationsDir, entry.tag), entry);
        applied.push(entry.tag);
      }
    } finally {
      // Also released automatically on disconnect
      await client.query("SELECT pg_advisory_unlock($1)", [MIGRATION_LOCK_ID]);
      client.release();
    }

    return { applied, skipped };
  } finally {
    await pool.end();
  }
}

// ============================================================================
// CLI Entry Point
// ============================================================================

async function main(): Promise<void> {
  initSentry();

  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    logger.error("DATABASE_URL environment variable is not set");
    process.exitCode = 1;
    return;
  }

  const { applied, skipped } = await runMigrations(databaseUrl);
  logger.info("Migrations complete", { applied: applied.length, skipped: skipped.length });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch(async (error: unknown) => {
    logger.error("Migration failed", { error: errorMessage(error) });
    Sentry.captureException(error, { tags: { source: "migrations" } });
    await Sentry.flush(2000);
    process.exitCode = 1;
  });
}
