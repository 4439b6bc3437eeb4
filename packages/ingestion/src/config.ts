import { z } from "zod";
import {
  DEFAULT_RETRY_POLICY,
  ValidationError,
  getDatabaseUrl,
  getOptionalEnv,
  parseEnvInt,
  type RetryPolicy,
} from "@civic311/shared";
import { DEFAULT_SOCRATA_URL } from "./loaders/socrataClient.js";
import { DEFAULT_LABEL_CACHE_CAPACITY } from "./services/labelCache.js";
import type { DateWindow } from "./types.js";

export const DEFAULT_PAGE_SIZE = 5000;
export const DEFAULT_WINDOW_DAYS = 7;
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface IngestionConfig {
  readonly window: DateWindow;
  readonly pageSize: number;
  readonly endpoint: string;
  readonly appToken: string | undefined;
  readonly databaseUrl: string;
  readonly requestTimeoutMs: number;
  readonly retryPolicy: RetryPolicy;
  readonly cacheCapacity: number;
}

/** Values that win over the environment, e.g. from CLI flags. */
export type IngestionConfigOverrides = Partial<{
  startDate: string;
  endDate: string;
  pageSize: number;
  endpoint: string;
  appToken: string;
  databaseUrl: string;
  requestTimeoutMs: number;
  retryPolicy: RetryPolicy;
  cacheCapacity: number;
}>;

/**
 * ISO calendar date, optionally followed by a time part which is ignored.
 * The date must exist on the calendar.
 */
const isoDateSchema = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}(?:[T ].*)?$/, "expected an ISO date (YYYY-MM-DD)")
  .transform((value) => value.slice(0, 10))
  .refine((date) => {
    const parsed = new Date(`${date}T00:00:00Z`);
    return (
      !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(date)
    );
  }, "not a calendar date");

function parseDate(key: string, value: string): string {
  const result = isoDateSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      `Invalid ${key}: "${value}" (${result.error.issues[0]?.message ?? "invalid date"})`,
      { code: "INVALID_CONFIG", context: { key, value } },
    );
  }
  return result.data;
}

function toIsoDate(instant: Date): string {
  return instant.toISOString().slice(0, 10);
}

function shiftDays(date: string, days: number): string {
  return toIsoDate(new Date(Date.parse(`${date}T00:00:00Z`) + days * DAY_MS));
}

/**
 * Effective date window. With no end date the window ends today (UTC); with
 * no start date it begins `DEFAULT_WINDOW_DAYS` before the end.
 */
export function resolveWindow(
  startDate: string | undefined,
  endDate: string | undefined,
  now: Date = new Date(),
): DateWindow {
  const end = endDate ? parseDate("END_DATE", endDate) : toIsoDate(now);
  const start = startDate
    ? parseDate("START_DATE", startDate)
    : shiftDays(end, -DEFAULT_WINDOW_DAYS);
  if (start > end) {
    throw new ValidationError(
      `START_DATE ${start} is after END_DATE ${end}`,
      { code: "INVALID_CONFIG", context: { startDate: start, endDate: end } },
    );
  }
  return Object.freeze({ startDate: start, endDate: end });
}

function positiveInt(key: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${key} must be a positive integer, got ${value}`, {
      code: "INVALID_CONFIG",
      context: { key, value },
    });
  }
  return value;
}

function envInt(key: string, fallback: number, env: NodeJS.ProcessEnv): number {
  try {
    return parseEnvInt(key, fallback, env);
  } catch (error) {
    throw new ValidationError(
      error instanceof Error ? error.message : `Invalid ${key}`,
      { code: "INVALID_CONFIG", cause: error, context: { key } },
    );
  }
}

/**
 * Build the run configuration. Precedence per field: `overrides`, then the
 * environment, then the defaults. The result is frozen.
 *
 * | Field            | Env                        | Default             |
 * | ---------------- | -------------------------- | ------------------- |
 * | window.startDate | START_DATE                 | end - 7 days        |
 * | window.endDate   | END_DATE                   | today (UTC)         |
 * | pageSize         | PAGE_SIZE                  | 5000                |
 * | endpoint         | SOCRATA_URL                | NYC 311 resource    |
 * | appToken         | SOCRATA_APP_TOKEN          | none                |
 * | databaseUrl      | DATABASE_URL               | local development   |
 * | requestTimeoutMs | REQUEST_TIMEOUT_MS         | 60000               |
 * | cacheCapacity    | DIMENSION_CACHE_CAPACITY   | 50000               |
 */
export function loadIngestionConfig(
  overrides: IngestionConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  now: Date = new Date(),
): IngestionConfig {
  const window = resolveWindow(
    overrides.startDate ?? getOptionalEnv("START_DATE", undefined, env),
    overrides.endDate ?? getOptionalEnv("END_DATE", undefined, env),
    now,
  );

  const pageSize = positiveInt(
    "PAGE_SIZE",
    overrides.pageSize ?? envInt("PAGE_SIZE", DEFAULT_PAGE_SIZE, env),
  );
  const requestTimeoutMs = positiveInt(
    "REQUEST_TIMEOUT_MS",
    overrides.requestTimeoutMs ??
      envInt("REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS, env),
  );
  const cacheCapacity = positiveInt(
    "DIMENSION_CACHE_CAPACITY",
    overrides.cacheCapacity ??
      envInt("DIMENSION_CACHE_CAPACITY", DEFAULT_LABEL_CACHE_CAPACITY, env),
  );

  return Object.freeze({
    window,
    pageSize,
    endpoint:
      overrides.endpoint ??
      getOptionalEnv("SOCRATA_URL", DEFAULT_SOCRATA_URL, env) ??
      DEFAULT_SOCRATA_URL,
    appToken:
      overrides.appToken ?? getOptionalEnv("SOCRATA_APP_TOKEN", undefined, env),
    databaseUrl: overrides.databaseUrl ?? getDatabaseUrl(env),
    requestTimeoutMs,
    retryPolicy: overrides.retryPolicy ?? DEFAULT_RETRY_POLICY,
    cacheCapacity,
  });
}

/** SoQL filter selecting the whole window, both end dates inclusive. */
export function windowFilter(window: DateWindow): string {
  return `created_date between '${window.startDate}T00:00:00' and '${window.endDate}T23:59:59'`;
}
