import { drizzle, NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "../packages/shared/schema/index";
import { sql } from "drizzle-orm";
import { env } from "./config/env";
import logger from "./logger";

const { Pool } = pg;

type DatabaseSchema = typeof schema;
type Database = NodePgDatabase<DatabaseSchema>;

// Database instance - will be null if not configured
let db: Database | null = null;
let pool: pg.Pool | null = null;

try {
  if (env.DATABASE_URL && env.NODE_ENV !== "test") {
    pool = new Pool({
      connectionString: env.DATABASE_URL,
      max: env.DB_POOL_MAX,
      idleTimeoutMillis: env.DB_POOL_IDLE_TIMEOUT_MS,
      connectionTimeoutMillis: env.DB_POOL_CONNECTION_TIMEOUT_MS,
    });

    // Prevent unhandled rejections from idle clients disconnecting
    pool.on("error", (err) => {
      logger.error("Unexpected error on idle database client", {
        error: err instanceof Error ? err.message : String(err),
      });
    });

    // Apply connection-level settings (e.g. statement_timeout) to every new connection
    pool.on("connect", (client) => {
      client
        .query(`SET statement_timeout = '${env.DB_STATEMENT_TIMEOUT_MS}'`)
        .catch((err: unknown) => {
          logger.error("Failed to set statement_timeout on new connection", {
            error: err instanceof Error ? err.message : String(err),
          });
        });
    });

    db = drizzle(pool, { schema });
    logger.info("Database connection pool created", {
      max: env.DB_POOL_MAX,
      idleTimeoutMillis: env.DB_POOL_IDLE_TIMEOUT_MS,
      connectionTimeoutMillis: env.DB_POOL_CONNECTION_TIMEOUT_MS,
      statementTimeoutMs: env.DB_STATEMENT_TIMEOUT_MS,
    });
  }
} catch (error) {
  logger.warn("Database connection setup failed", {
    error: error instanceof Error ? error.message : String(error),
  });
  db = null;
  pool = null;
}

/**
 * Error thrown when the database is not configured or unavailable.
 * Startup maps this to a fatal log and a non-zero exit.
 */
export class DatabaseUnavailableError extends Error {
  constructor() {
    super("Database not configured");
    this.name = "DatabaseUnavailableError";
  }
}

/**
 * Get database instance with null check.
 * Throws {@link DatabaseUnavailableError} if database is not configured.
 */
export function getDb(): Database {
  if (!db) {
    throw new DatabaseUnavailableError();
  }
  return db;
}

/** Round-trips a trivial query; used by the health endpoint. */
export async function pingDatabase(): Promise<boolean> {
  if (!db) return false;
  try {
    await db.execute(sql`select 1`);
    return true;
  } catch (error) {
    logger.warn("Database ping failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
  }
}

export type { Database };
