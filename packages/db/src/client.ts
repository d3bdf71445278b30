import pg from "pg";
import { PersistenceError, errorMessage } from "@salesharvest/shared";

export type SqlResult = {
  rows: Record<string, unknown>[];
  rowCount: number | null;
};

export type SqlClient = {
  query(text: string, params?: unknown[]): Promise<SqlResult>;
  /** Passing an error destroys the connection instead of returning it to the pool. */
  release(err?: Error): void;
};

export type SqlPool = {
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
};

export type SqlPoolOptions = {
  max?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
  onError?: (err: Error) => void;
};

/**
 * Postgres pool for the worker. One run holds at most one connection at a time,
 * so the pool stays small.
 */
export function createSqlPool(connectionString: string, options: SqlPoolOptions = {}): SqlPool {
  const pool = new pg.Pool({
    connectionString,
    max: options.max ?? 2,
    idleTimeoutMillis: options.idleTimeoutMillis ?? 30000,
    connectionTimeoutMillis: options.connectionTimeoutMillis ?? 10000
  });
  // An idle client losing its connection emits here; without a listener the process crashes.
  pool.on("error", options.onError ?? ((err) => console.error("[db] idle client error:", err)));

  return {
    connect: async () => {
      const client = await pool.connect();
      return {
        query: async (text, params) => {
          const result = await client.query(text, params);
          return { rows: result.rows, rowCount: result.rowCount };
        },
        release: (err) => client.release(err)
      };
    },
    end: async () => {
      await pool.end();
    }
  };
}

export function pgErrorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** Checks out a client; failures surface as `PersistenceError`. */
export async function connectClient(pool: SqlPool): Promise<SqlClient> {
  try {
    return await pool.connect();
  } catch (err) {
    throw new PersistenceError(`Database connection failed: ${errorMessage(err)}`, {
      cause: err,
      code: pgErrorCode(err)
    });
  }
}
