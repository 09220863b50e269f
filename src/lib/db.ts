/**
 * PostgreSQL Pool Singleton
 * Ensures a single connection pool across the application.
 * Uses lazy initialization so the connection string is read when first needed.
 */

import pg from "pg";

const { Pool } = pg;

let pool: pg.Pool | null = null;

/**
 * Get or create the pool for `databaseUrl`.
 *
 * @throws Error if no connection string is given on first use
 */
export function getPool(databaseUrl: string | null): pg.Pool {
  if (pool) {
    return pool;
  }

  if (!databaseUrl) {
    throw new Error("DATABASE_URL environment variable is not set");
  }

  pool = new Pool({
    connectionString: databaseUrl,
    // Managed Postgres providers require TLS
    ssl: databaseUrl.includes("sslmode=require") ? { rejectUnauthorized: false } : undefined,
  });

  pool.on("error", (error: Error) => {
    console.error("[DB] Idle client error:", error.message);
  });

  return pool;
}

/**
 * Run `fn` inside a transaction on a dedicated client.
 * Rolls back and rethrows if `fn` throws.
 */
export async function withTransaction<T>(
  db: pg.Pool,
  fn: (client: pg.PoolClient) => Promise<T>
): Promise<T> {
  const client = await db.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

/** The part of a pool client a snapshot read needs */
export interface SnapshotClient {
  query(text: string): Promise<unknown>;
  release(): void;
}

/**
 * Yield everything `read` yields, with every query it makes on one client
 * inside a REPEATABLE READ, READ ONLY transaction. Concurrent writes are
 * invisible to the read, so paging through a result stays stable.
 * The transaction ends when the consumer finishes, stops early or fails.
 */
export async function* readInSnapshot<C extends SnapshotClient, T>(
  connect: () => Promise<C>,
  read: (client: C) => AsyncIterable<T>
): AsyncIterable<T> {
  const client = await connect();
  let end = "ROLLBACK";
  try {
    await client.query("BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY");
    yield* read(client);
    end = "COMMIT";
  } finally {
    try {
      await client.query(end);
    } finally {
      client.release();
    }
  }
}
