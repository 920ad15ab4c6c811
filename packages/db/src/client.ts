import { Pool, type PoolClient, type QueryResultRow } from "pg";
import { createLogger } from "@tierwise/observability";

const log = createLogger({ component: "db" });

const connectionString = process.env.DATABASE_URL;
const useSsl = process.env.PG_SSL === "true";
const allowSelfSigned = process.env.PG_SSL_ALLOW_SELF_SIGNED === "true";

export const pool = new Pool({
  connectionString,
  max: Number(process.env.DB_POOL_MAX ?? 10),
  min: Number(process.env.DB_POOL_MIN ?? 1),
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
  ssl: useSsl
    ? {
        rejectUnauthorized: process.env.NODE_ENV === "production" ? true : !allowSelfSigned
      }
    : undefined
});

pool.on("error", (error) => {
  log.error({ err: error }, "idle postgres client failed");
});

export async function query<T extends QueryResultRow>(text: string, params: unknown[] = []): Promise<T[]> {
  const result = await pool.query<T>(text, params);
  return result.rows;
}

export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    try {
      const result = await fn(client);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    }
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  await pool.end();
}
