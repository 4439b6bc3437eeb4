/**
 * The four lookup tables a service request references. The names are also
 * the table names in the store.
 */
export const DIMENSIONS = [
  "agency",
  "complaint_type",
  "descriptor",
  "borough",
] as const;

export type DimensionName = (typeof DIMENSIONS)[number];

/**
 * One flat record as returned by the Socrata resource. Every field may be
 * absent; values are usually strings but are not trusted to be.
 */
export interface RawServiceRequest {
  unique_key?: unknown;
  created_date?: unknown;
  closed_date?: unknown;
  resolution_description?: unknown;
  incident_zip?: unknown;
  latitude?: unknown;
  longitude?: unknown;
  agency?: unknown;
  complaint_type?: unknown;
  descriptor?: unknown;
  borough?: unknown;
  [field: string]: unknown;
}

/**
 * A record ready for the fact table, with dimension labels still unresolved.
 */
export interface ServiceRequestRow {
  uniqueKey: number;
  createdDate: string;
  closedDate: string | null;
  resolutionDescription: string | null;
  incidentZip: string | null;
  latitude: number | null;
  longitude: number | null;
  labels: Record<DimensionName, string | null>;
}

export type DimensionRefs = Record<DimensionName, number | null>;

/** Why a record was left out of its page. */
export const SKIP_REASONS = [
  "missing_key",
  "invalid_key",
  "missing_created_date",
] as const;

export type SkipReason = (typeof SKIP_REASONS)[number];

export type TransformResult =
  | { ok: true; row: ServiceRequestRow; degradedFields: string[] }
  | { ok: false; reason: SkipReason };

/** Inclusive range of calendar dates (`YYYY-MM-DD`). */
export interface DateWindow {
  readonly startDate: string;
  readonly endDate: string;
}

/** Socrata SoQL query parameters understood by the fetch client. */
export interface SocrataQuery {
  $select?: string;
  $where?: string;
  $order?: string;
  $limit?: number;
  $offset?: number;
}

export interface IngestionProgress {
  page: number;
  fetched: number;
  /** 0 when the estimate was unavailable. */
  total: number;
  /** Percentage complete, or null when the total is unknown. */
  percent: number | null;
}

export interface IngestionSummary {
  window: DateWindow;
  total: number;
  fetched: number;
  upserted: number;
  skipped: Record<SkipReason, number>;
  degradedFields: number;
  pages: number;
  dimensions: {
    hits: number;
    misses: number;
    created: number;
  };
}
