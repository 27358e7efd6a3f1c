import { Pool, PoolConfig, QueryResult } from "pg";
import { readEnv } from "../config/env";

// Database Connection Manager
// Single pool instance shared across the application.
// Only created when DATABASE_URL is set; in-memory mode never touches it.

let pool: Pool | undefined;

export function getDatabasePool(): Pool {
  if (!pool) {
    const env = readEnv();
    const config: PoolConfig = {
      connectionString: env.DATABASE_URL,
      max: env.DB_POOL_MAX,
      idleTimeoutMillis: env.DB_IDLE_TIMEOUT,
      connectionTimeoutMillis: env.DB_CONNECT_TIMEOUT,
      ssl: env.DB_SSL ? { rejectUnauthorized: env.DB_SSL_REJECT_UNAUTHORIZED } : false,
    };

    pool = new Pool(config);

    pool.on("error", (err: Error) => {
      console.error("[Banners DB] Unexpected error on idle client:", err.message);
    });

    console.log("[Banners DB] Connection pool created");
  }
  return pool;
}

export async function query<T extends Record<string, unknown> = Record<string, unknown>>(
  text: string,
  params?: unknown[],
): Promise<QueryResult<T>> {
  const p = getDatabasePool();
  const start = Date.now();
  const result = await p.query<T>(text, params);
  const duration = Date.now() - start;

  if (duration > 1000) {
    console.warn(`[Banners DB] Slow query (${duration}ms):`, text.substring(0, 100));
  }

  return result;
}

export async function closeDatabasePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = undefined;
    console.log("[Banners DB] Connection pool closed");
  }
}
