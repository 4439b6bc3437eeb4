import { createLogger, type Logger } from "@civic311/shared";
import {
  findDimensionId,
  insertDimensionLabel,
  type Queryable,
} from "../db.js";
import {
  DIMENSIONS,
  type DimensionName,
  type DimensionRefs,
  type ServiceRequestRow,
} from "../types.js";
import { DEFAULT_LABEL_CACHE_CAPACITY, LabelCache } from "./labelCache.js";

export interface DimensionResolverStats {
  hits: number;
  misses: number;
  created: number;
}

export interface DimensionResolverOptions {
  /** Per-dimension cache capacity. */
  cacheCapacity?: number;
  logger?: Logger;
}

/**
 * Maps dimension labels to their surrogate ids, creating rows for labels
 * seen for the first time.
 *
 * The caches only accelerate reads; the store stays authoritative. They live
 * for one run: call `reset()` before a run and whenever a transaction that
 * may have created rows is rolled back.
 */
export class DimensionResolver {
  private readonly caches: Record<DimensionName, LabelCache>;
  private readonly logger: Logger;
  private counters: DimensionResolverStats = { hits: 0, misses: 0, created: 0 };

  constructor(options: DimensionResolverOptions = {}) {
    const capacity = options.cacheCapacity ?? DEFAULT_LABEL_CACHE_CAPACITY;
    this.caches = {
      agency: new LabelCache(capacity),
      complaint_type: new LabelCache(capacity),
      descriptor: new LabelCache(capacity),
      borough: new LabelCache(capacity),
    };
    this.logger =
      options.logger ?? createLogger({ service: "dimension-resolver" });
  }

  /**
   * Resolve one label. Absent labels resolve to null without touching the
   * store. A label that cannot be read back after the insert is logged and
   * resolves to null; it is not cached, so a later call tries again.
   */
  async resolve(
    label: string | null | undefined,
    dimension: DimensionName,
    db: Queryable,
  ): Promise<number | null> {
    if (!label) {
      return null;
    }

    const cache = this.caches[dimension];
    const cached = cache.get(label);
    if (cached !== undefined) {
      this.counters.hits++;
      return cached;
    }

    this.counters.misses++;
    if (await insertDimensionLabel(db, dimension, label)) {
      this.counters.created++;
    }
    const id = await findDimensionId(db, dimension, label);
    if (id === null) {
      this.logger.warn("Dimension label missing after insert", {
        dimension,
        label,
      });
      return null;
    }

    cache.set(label, id);
    return id;
  }

  /** Resolve all four labels of a row. */
  async resolveRow(
    row: ServiceRequestRow,
    db: Queryable,
  ): Promise<DimensionRefs> {
    const refs: DimensionRefs = {
      agency: null,
      complaint_type: null,
      descriptor: null,
      borough: null,
    };
    for (const dimension of DIMENSIONS) {
      refs[dimension] = await this.resolve(row.labels[dimension], dimension, db);
    }
    return refs;
  }

  /** Drop every cached id and zero the counters. */
  reset(): void {
    for (const dimension of DIMENSIONS) {
      this.caches[dimension].clear();
    }
    this.counters = { hits: 0, misses: 0, created: 0 };
  }

  /** Drop cached ids but keep the run's counters. */
  invalidate(): void {
    for (const dimension of DIMENSIONS) {
      this.caches[dimension].clear();
    }
  }

  stats(): DimensionResolverStats {
    return { ...this.counters };
  }
}
