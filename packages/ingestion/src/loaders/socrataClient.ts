import { z } from "zod";
import {
  createLogger,
  DEFAULT_RETRY_POLICY,
  ExternalServiceError,
  errorMessage,
  withRetry,
  type Logger,
  type RetryPolicy,
} from "@civic311/shared";
import type { RawServiceRequest, SocrataQuery } from "../types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const DEFAULT_SOCRATA_URL =
  "https://data.cityofnewyork.us/resource/erm2-nwe9.json";

const DEFAULT_TIMEOUT_MS = 60_000;

export interface SocrataClientOptions {
  /** Resource URL (default: NYC 311 service requests) */
  endpoint?: string;
  /** Sent as `X-App-Token` when set */
  appToken?: string | undefined;
  /** Per-attempt request timeout in ms (default: 60000) */
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
}

/**
 * Anything the orchestrator can page through. `SocrataClient` is the real
 * one; tests substitute fixtures.
 */
export interface ServiceRequestSource {
  fetchPage(query: SocrataQuery): Promise<RawServiceRequest[]>;
  fetchCount(where: string): Promise<number>;
}

/**
 * A failed round-trip to the API: non-2xx status, network error, timeout or
 * a body that is not a JSON array of records. Always retried.
 */
export class SocrataFetchError extends ExternalServiceError {
  readonly url: string;
  /** HTTP status of the response, when there was one. */
  readonly httpStatus?: number | undefined;

  constructor(
    message: string,
    options: { url: string; httpStatus?: number; cause?: unknown },
  ) {
    super(message, {
      code: "SOCRATA_FETCH_FAILED",
      cause: options.cause,
      context: {
        url: options.url,
        ...(options.httpStatus !== undefined
          ? { httpStatus: options.httpStatus }
          : {}),
      },
    });
    this.url = options.url;
    this.httpStatus = options.httpStatus;
  }
}

export function isTransientFetchError(
  error: unknown,
): error is SocrataFetchError {
  return error instanceof SocrataFetchError;
}

const pageSchema = z.array(z.record(z.string(), z.unknown()));

const countSchema = z
  .array(z.object({ count_1: z.coerce.number().int().nonnegative() }))
  .min(1);

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class SocrataClient implements ServiceRequestSource {
  private readonly endpoint: string;
  private readonly appToken: string | undefined;
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;

  constructor(options: SocrataClientOptions = {}) {
    this.endpoint = options.endpoint ?? DEFAULT_SOCRATA_URL;
    this.appToken = options.appToken;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.logger = options.logger ?? createLogger({ service: "socrata-client" });
  }

  /**
   * Build the request URL. Throws `TypeError` for a malformed endpoint, which
   * is never retried.
   */
  buildUrl(query: SocrataQuery): string {
    const url = new URL(this.endpoint);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  /**
   * Fetch one page of raw records. Transient failures are retried under the
   * client's policy; the last one propagates.
   */
  async fetchPage(query: SocrataQuery): Promise<RawServiceRequest[]> {
    const url = this.buildUrl(query);
    return withRetry(() => this.request(url), {
      policy: this.retryPolicy,
      isRetryable: isTransientFetchError,
      label: `GET ${url}`,
      logger: this.logger,
    });
  }

  /**
   * Count the records matching `where`. An empty or unrecognized body counts
   * as 0; fetch failures propagate like `fetchPage`.
   */
  async fetchCount(where: string): Promise<number> {
    const rows = await this.fetchPage({ $select: "count(1)", $where: where });
    const parsed = countSchema.safeParse(rows);
    return parsed.success ? (parsed.data[0]?.count_1 ?? 0) : 0;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.appToken) {
      headers["X-App-Token"] = this.appToken;
    }
    return headers;
  }

  /** A single attempt; every failure comes out as `SocrataFetchError`. */
  private async request(url: string): Promise<RawServiceRequest[]> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          headers: this.headers(),
          signal: controller.signal,
        });
      } catch (error) {
        if (error instanceof Error && error.name === "AbortError") {
          throw new SocrataFetchError(
            `Request timed out after ${this.timeoutMs}ms`,
            { url, cause: error },
          );
        }
        throw new SocrataFetchError(
          `Network error: ${errorMessage(error)}`,
          { url, cause: error },
        );
      }

      if (!response.ok) {
        const body = await response
          .text()
          .catch((error: unknown) => `<unreadable body: ${errorMessage(error)}>`);
        throw new SocrataFetchError(
          `HTTP ${response.status}: ${body.slice(0, 200)}`,
          { url, httpStatus: response.status },
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new SocrataFetchError("Invalid JSON response", {
          url,
          httpStatus: response.status,
          cause: error,
        });
      }

      const parsed = pageSchema.safeParse(body);
      if (!parsed.success) {
        throw new SocrataFetchError(
          "Unexpected response shape: expected an array of records",
          { url, httpStatus: response.status, cause: parsed.error },
        );
      }
      return parsed.data;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
