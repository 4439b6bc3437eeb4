import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { Pool, PoolClient, QueryResult, QueryResultRow } from "pg";
import { createLogger, errorMessage } from "@civic311/shared";
import {
  DIMENSIONS,
  type DimensionName,
  type DimensionRefs,
  type ServiceRequestRow,
} from "./types.js";

/**
 * The part of `Pool` / `PoolClient` the store needs. Functions take this so
 * the same code runs on the pool or inside a page transaction.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
}

const logger = createLogger({ service: "ingestion-db" });

export const SCHEMA_PATH = fileURLToPath(
  new URL("../sql/schema.sql", import.meta.url),
);

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/**
 * Create any missing tables and indexes. Never drops or alters.
 */
export async function applySchema(
  db: Queryable,
  schemaPath: string = SCHEMA_PATH,
): Promise<void> {
  const ddl = await readFile(schemaPath, "utf-8");
  await db.query(ddl);
}

// ---------------------------------------------------------------------------
// Dimensions
// ---------------------------------------------------------------------------

function assertDimension(dimension: string): asserts dimension is DimensionName {
  if (!(DIMENSIONS as readonly string[]).includes(dimension)) {
    throw new Error(`Unknown dimension table: ${dimension}`);
  }
}

/**
 * Insert the label unless it already exists. Returns true when this call
 * created the row.
 */
export async function insertDimensionLabel(
  db: Queryable,
  dimension: DimensionName,
  label: string,
): Promise<boolean> {
  assertDimension(dimension);
  const result = await db.query(
    `INSERT INTO ${dimension} (name) VALUES ($1) ON CONFLICT (name) DO NOTHING`,
    [label],
  );
  return (result.rowCount ?? 0) > 0;
}

export async function findDimensionId(
  db: Queryable,
  dimension: DimensionName,
  label: string,
): Promise<number | null> {
  assertDimension(dimension);
  const result = await db.query<{ id: number }>(
    `SELECT id FROM ${dimension} WHERE name = $1`,
    [label],
  );
  const id = result.rows[0]?.id;
  return id === undefined ? null : Number(id);
}

export async function countDimensionRows(
  db: Queryable,
  dimension: DimensionName,
): Promise<number> {
  assertDimension(dimension);
  const result = await db.query<{ count: number | string }>(
    `SELECT COUNT(*)::int AS count FROM ${dimension}`,
  );
  return Number(result.rows[0]?.count ?? 0);
}

// ---------------------------------------------------------------------------
// Fact table
// ---------------------------------------------------------------------------

/**
 * Insert the row, or overwrite every mutable column when the natural key is
 * already stored.
 */
export async function upsertServiceRequest(
  db: Queryable,
  row: ServiceRequestRow,
  refs: DimensionRefs,
): Promise<void> {
  await db.query(
    `INSERT INTO service_requests (
       unique_key, created_date, closed_date, resolution_description,
       incident_zip, latitude, longitude,
       agency_id, complaint_type_id, descriptor_id, borough_id
     ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
     ON CONFLICT (unique_key) DO UPDATE SET
       created_date = EXCLUDED.created_date,
       closed_date = EXCLUDED.closed_date,
       resolution_description = EXCLUDED.resolution_description,
       incident_zip = EXCLUDED.incident_zip,
       latitude = EXCLUDED.latitude,
       longitude = EXCLUDED.longitude,
       agency_id = EXCLUDED.agency_id,
       complaint_type_id = EXCLUDED.complaint_type_id,
       descriptor_id = EXCLUDED.descriptor_id,
       borough_id = EXCLUDED.borough_id`,
    [
      row.uniqueKey,
      row.createdDate,
      row.closedDate,
      row.resolutionDescription,
      row.incidentZip,
      row.latitude,
      row.longitude,
      refs.agency,
      refs.complaint_type,
      refs.descriptor,
      refs.borough,
    ],
  );
}

export async function countServiceRequests(db: Queryable): Promise<number> {
  const result = await db.query<{ count: number | string }>(
    "SELECT COUNT(*)::int AS count FROM service_requests",
  );
  return Number(result.rows[0]?.count ?? 0);
}

/**
 * Fact rows per dimension whose non-null foreign key points at no dimension
 * row. All zeros means referential integrity holds.
 */
export async function countOrphanedReferences(
  db: Queryable,
): Promise<Record<DimensionName, number>> {
  const counts: Record<DimensionName, number> = {
    agency: 0,
    complaint_type: 0,
    descriptor: 0,
    borough: 0,
  };
  for (const dimension of DIMENSIONS) {
    const result = await db.query<{ count: number | string }>(
      `SELECT COUNT(*)::int AS count
       FROM service_requests sr
       LEFT JOIN ${dimension} d ON d.id = sr.${dimension}_id
       WHERE sr.${dimension}_id IS NOT NULL AND d.id IS NULL`,
    );
    counts[dimension] = Number(result.rows[0]?.count ?? 0);
  }
  return counts;
}

// ---------------------------------------------------------------------------
// Transactions
// ---------------------------------------------------------------------------

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client. Any error rolls the
 * transaction back and is rethrown as is. If the rollback fails too, that
 * failure is logged and the client is released as broken so the pool
 * discards it.
 */
export async function withTransaction<T>(
  pool: Pick<Pool, "connect">,
  fn: (client: PoolClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  let rollbackError: Error | undefined;
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    try {
      await client.query("ROLLBACK");
    } catch (failure) {
      rollbackError =
        failure instanceof Error ? failure : new Error(errorMessage(failure));
      logger.error(`Rollback failed: ${rollbackError.message}`, {
        error: rollbackError,
        originalError: error,
      });
    }
    throw error;
  } finally {
    client.release(rollbackError);
  }
}
