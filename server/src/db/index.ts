import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from "pg";

/**
 * Runs one parameterised statement. Repositories only see this, so the same
 * code serves the shared pool and a client checked out for a transaction.
 */
export type SqlExecutor = <R extends QueryResultRow = QueryResultRow>(
  text: string,
  values?: unknown[]
) => Promise<QueryResult<R>>;

export function createPool(connectionString: string): Pool {
  // One pool shared across the server
  const pool = new Pool({ connectionString, max: 10 });

  pool.on("error", (err) => {
    console.error("[db] Unexpected PG pool error", err);
  });

  return pool;
}

export function poolExecutor(pool: Pool): SqlExecutor {
  return <R extends QueryResultRow>(text: string, values?: unknown[]) =>
    pool.query<R>(text, values);
}

export function clientExecutor(client: PoolClient): SqlExecutor {
  return <R extends QueryResultRow>(text: string, values?: unknown[]) =>
    client.query<R>(text, values);
}

export async function withTransaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      console.error("[db] rollback failed", rollbackErr);
    }
    throw err;
  } finally {
    client.release();
  }
}

/** The slice of the pool the repositories and migrations need. */
export interface Database {
  query: SqlExecutor;
  transaction<T>(fn: (query: SqlExecutor) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export function createDatabase(pool: Pool): Database {
  return {
    query: poolExecutor(pool),
    transaction<T>(fn: (query: SqlExecutor) => Promise<T>): Promise<T> {
      return withTransaction(pool, (client) => fn(clientExecutor(client)));
    },
    close: () => pool.end(),
  };
}
