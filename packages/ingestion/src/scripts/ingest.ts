#!/usr/bin/env tsx
/**
 * CLI script for one ingestion run.
 *
 * Usage:
 *   npm run ingest                                    # the last 7 days
 *   npm run ingest -- --start 2024-01-07 --end 2024-01-10
 *   npm run ingest -- --page-size 1000
 *
 * Config (env vars, flags win):
 *   DATABASE_URL       PostgreSQL connection string
 *   SOCRATA_APP_TOKEN  optional API token
 *   START_DATE / END_DATE / PAGE_SIZE
 */

import {
  closePool,
  createLogger,
  errorMessage,
  getPool,
  getPoolStatus,
  IngestionError,
} from "@civic311/shared";
import { loadIngestionConfig, type IngestionConfigOverrides } from "../config.js";
import { countOrphanedReferences, countServiceRequests } from "../db.js";
import { SocrataClient } from "../loaders/socrataClient.js";
import { runIngestion } from "../pipeline.js";

const logger = createLogger({ service: "ingestion-cli" });

// ---------------------------------------------------------------------------
// CLI argument parsing
// ---------------------------------------------------------------------------

export type ParsedArgs = Pick<
  IngestionConfigOverrides,
  "startDate" | "endDate" | "pageSize"
>;

export function parseArgs(argv: string[] = process.argv.slice(2)): ParsedArgs {
  const args: ParsedArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const value = argv[i + 1];
    if (value === undefined) break;
    if (argv[i] === "--start") {
      args.startDate = value;
      i++;
    } else if (argv[i] === "--end") {
      args.endDate = value;
      i++;
    } else if (argv[i] === "--page-size") {
      // Non-numeric input becomes NaN and is rejected by the config loader.
      args.pageSize = Number(value);
      i++;
    }
  }

  return args;
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const config = loadIngestionConfig(parseArgs(argv));
  const pool = getPool(config.databaseUrl);

  try {
    const source = new SocrataClient({
      endpoint: config.endpoint,
      appToken: config.appToken,
      timeoutMs: config.requestTimeoutMs,
      retryPolicy: config.retryPolicy,
      logger: logger.child({ service: "socrata-client" }),
    });

    const summary = await runIngestion(config, {
      pool,
      source,
      logger,
    });

    const stored = await countServiceRequests(pool);
    const orphans = await countOrphanedReferences(pool);
    const orphanCount = Object.values(orphans).reduce((sum, n) => sum + n, 0);

    logger.info(
      `Done: ${summary.upserted} upserted, ${stored} service requests stored`,
      { skipped: summary.skipped, orphans, pool: getPoolStatus() },
    );

    if (orphanCount > 0) {
      throw new IngestionError(
        `Referential integrity check failed: ${orphanCount} orphaned reference(s)`,
        { code: "INTEGRITY_CHECK_FAILED", context: { orphans } },
      );
    }
  } finally {
    await closePool();
  }
}

// Only run main() when executed directly (not when imported by tests)
const isDirectExecution = typeof process.env.VITEST === "undefined";

if (isDirectExecution) {
  main()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error(`Fatal error: ${errorMessage(error)}`, { error });
      process.exit(1);
    });
}
