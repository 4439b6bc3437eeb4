import { Pool } from "pg";
import { getDatabaseUrl } from "./env.js";

let pool: Pool | null = null;
let poolConnectionString: string | null = null;

export interface PoolStatus {
  totalConnections: number;
  idleConnections: number;
  waitingRequests: number;
}

/**
 * Returns a singleton database pool instance.
 *
 * Ingestion is a single sequential writer, so the pool stays small. SSL is
 * enabled when the connection string asks for it (`sslmode=require`).
 * Asking for a different connection string while the pool is open throws;
 * call `closePool()` first.
 */
export function getPool(connectionString: string = getDatabaseUrl()): Pool {
  if (pool && poolConnectionString !== connectionString) {
    throw new Error(
      "Database pool is already open for a different connection string",
    );
  }
  if (!pool) {
    const needsSsl = connectionString.includes("sslmode=require");
    pool = new Pool({
      connectionString,
      max: 2,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      ...(needsSsl ? { ssl: true } : {}),
    });
    poolConnectionString = connectionString;
  }
  return pool;
}

/**
 * Returns pool connection metrics, or null if the pool has not been created yet.
 */
export function getPoolStatus(): PoolStatus | null {
  if (!pool) return null;
  return {
    totalConnections: pool.totalCount,
    idleConnections: pool.idleCount,
    waitingRequests: pool.waitingCount,
  };
}

/**
 * Closes the database pool. Useful for testing and cleanup.
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    poolConnectionString = null;
  }
}
