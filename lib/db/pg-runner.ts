import { Pool } from "pg";
import type { QueryOptions, SqlRunner, SqlValue } from "./types";

export type PgRunnerOptions = {
  connectionString: string;
  ssl?: boolean;
  maxConnections?: number;
};

/**
 * SqlRunner over a pg Pool. Each statement runs in its own read-only transaction with a
 * local statement_timeout, so a slow query is cancelled on the server as well.
 */
export class PgSqlRunner implements SqlRunner {
  private readonly pool: Pool;

  constructor(options: PgRunnerOptions) {
    this.pool = new Pool({
      connectionString: options.connectionString,
      ssl: options.ssl ? { rejectUnauthorized: false } : undefined,
      max: options.maxConnections ?? 10,
      connectionTimeoutMillis: 10000,
    });
  }

  async query(sql: string, values: SqlValue[], options: QueryOptions): Promise<{ rows: Record<string, unknown>[] }> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN READ ONLY");
      await client.query(`SET LOCAL statement_timeout = ${Math.max(1, Math.floor(options.timeoutMs))}`);
      const res = await client.query<Record<string, unknown>>(sql, values);
      await client.query("COMMIT");
      return { rows: res.rows };
    } catch (err) {
      await client.query("ROLLBACK").catch((rollbackError: unknown) => {
        console.warn("[PgSqlRunner] Rollback failed", rollbackError);
      });
      throw err;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
