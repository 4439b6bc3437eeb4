import { randomUUID } from "node:crypto";
import type { Pool } from "pg";
import {
  createLogger,
  errorMessage,
  IngestionError,
  type Logger,
} from "@civic311/shared";
import { windowFilter, type IngestionConfig } from "./config.js";
import {
  applySchema,
  upsertServiceRequest,
  withTransaction,
  type Queryable,
} from "./db.js";
import type { ServiceRequestSource } from "./loaders/socrataClient.js";
import { DimensionResolver } from "./services/dimensionResolver.js";
import { toServiceRequestRow } from "./transformers/serviceRequest.js";
import {
  SKIP_REASONS,
  type IngestionProgress,
  type IngestionSummary,
  type RawServiceRequest,
  type SkipReason,
} from "./types.js";

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export type IngestionRunConfig = Pick<
  IngestionConfig,
  "window" | "pageSize" | "cacheCapacity"
>;

/** A `pg` pool, or anything that queries and hands out clients like one. */
export type IngestionPool = Queryable & Pick<Pool, "connect">;

export interface IngestionDependencies {
  pool: IngestionPool;
  source: ServiceRequestSource;
  /** Defaults to a fresh resolver sized by `config.cacheCapacity`. */
  resolver?: DimensionResolver;
  logger?: Logger;
  onProgress?: (progress: IngestionProgress) => void;
}

interface PageResult {
  upserted: number;
  skipped: Record<SkipReason, number>;
  degradedFields: number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function emptySkipCounts(): Record<SkipReason, number> {
  return { missing_key: 0, invalid_key: 0, missing_created_date: 0 };
}

function percentComplete(fetched: number, total: number): number | null {
  if (total <= 0) return null;
  return Math.min(100, Math.round((fetched / total) * 1000) / 10);
}

/**
 * Transform and store one page inside a single transaction. A record that
 * cannot be transformed is counted and skipped; the rest of the page is
 * unaffected.
 */
async function loadPage(
  pool: IngestionPool,
  records: RawServiceRequest[],
  page: number,
  resolver: DimensionResolver,
  log: Logger,
): Promise<PageResult> {
  return withTransaction(pool, async (client) => {
    const result: PageResult = {
      upserted: 0,
      skipped: emptySkipCounts(),
      degradedFields: 0,
    };

    for (const [index, raw] of records.entries()) {
      const transformed = toServiceRequestRow(raw);
      if (!transformed.ok) {
        result.skipped[transformed.reason]++;
        log.warn(`Skipping record ${index} of page ${page}`, {
          reason: transformed.reason,
          uniqueKey: raw.unique_key,
        });
        continue;
      }

      if (transformed.degradedFields.length > 0) {
        result.degradedFields += transformed.degradedFields.length;
        log.warn("Nulled invalid fields", {
          uniqueKey: transformed.row.uniqueKey,
          fields: transformed.degradedFields,
        });
      }

      const refs = await resolver.resolveRow(transformed.row, client);
      await upsertServiceRequest(client, transformed.row, refs);
      result.upserted++;
    }

    return result;
  });
}

// ---------------------------------------------------------------------------
// Pipeline entry point
// ---------------------------------------------------------------------------

/**
 * Run one ingestion over `config.window`: estimate, then page through the
 * source in `created_date` order, committing each page on its own.
 *
 * The loop ends on the first empty page, or once the fetched count reaches a
 * known estimate. Any fetch or commit failure aborts the run with an
 * `IngestionError`; pages committed before it stay in the store.
 */
export async function runIngestion(
  config: IngestionRunConfig,
  deps: IngestionDependencies,
): Promise<IngestionSummary> {
  const { pool, source, onProgress } = deps;
  const log = (
    deps.logger ?? createLogger({ service: "ingestion-pipeline" })
  ).child({ runId: randomUUID() });
  const resolver =
    deps.resolver ??
    new DimensionResolver({ cacheCapacity: config.cacheCapacity, logger: log });
  const { window, pageSize } = config;
  const where = windowFilter(window);

  let total = 0;
  let fetched = 0;
  let upserted = 0;
  let degradedFields = 0;
  let pages = 0;
  const skipped = emptySkipCounts();

  log.info(
    `Starting ingestion from ${window.startDate} to ${window.endDate}`,
    { pageSize },
  );

  try {
    await applySchema(pool);
    resolver.reset();

    try {
      total = await source.fetchCount(where);
      log.info(`Estimated ${total} records to fetch`, { total });
    } catch (error) {
      log.warn(`Could not get count estimate: ${errorMessage(error)}`, {
        error,
      });
      total = 0;
    }

    let offset = 0;
    for (;;) {
      const records = await source.fetchPage({
        $limit: pageSize,
        $offset: offset,
        $order: "created_date",
        $where: where,
      });
      if (records.length === 0) {
        break;
      }

      const page = pages + 1;
      const result = await loadPage(pool, records, page, resolver, log);

      pages = page;
      offset += pageSize;
      fetched += records.length;
      upserted += result.upserted;
      degradedFields += result.degradedFields;
      for (const reason of SKIP_REASONS) {
        skipped[reason] += result.skipped[reason];
      }

      const progress: IngestionProgress = {
        page,
        fetched,
        total,
        percent: percentComplete(fetched, total),
      };
      log.info(
        progress.percent === null
          ? `Fetched ${fetched} records so far`
          : `Progress ${fetched}/${total} (${progress.percent.toFixed(1)}%)`,
        { page, upserted: result.upserted },
      );
      onProgress?.(progress);

      if (total > 0 && fetched >= total) {
        break;
      }
    }
  } catch (error) {
    // A rolled-back page may have created dimension rows that no longer exist.
    resolver.invalidate();
    const message = errorMessage(error);
    log.error(`Ingestion aborted after ${pages} page(s): ${message}`, {
      error,
      fetched,
      upserted,
    });
    throw new IngestionError(`Ingestion aborted: ${message}`, {
      cause: error,
      context: { window, pages, fetched, upserted },
    });
  }

  const summary: IngestionSummary = {
    window,
    total,
    fetched,
    upserted,
    skipped,
    degradedFields,
    pages,
    dimensions: resolver.stats(),
  };
  log.info(
    `Ingestion complete: ${upserted} upserted, ${fetched} fetched in ${pages} page(s)`,
    { ...summary },
  );
  return summary;
}
