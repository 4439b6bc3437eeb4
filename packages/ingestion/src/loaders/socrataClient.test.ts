import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createRetryPolicy, type Logger } from "@civic311/shared";
import {
  SocrataClient,
  SocrataFetchError,
  isTransientFetchError,
} from "./socrataClient.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ENDPOINT = "https://data.example.test/resource/abcd-1234.json";

function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  } satisfies Logger;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function textResponse(body: string, status: number): Response {
  return new Response(body, { status });
}

const RECORDS = [
  { unique_key: "1", created_date: "2024-01-07T01:00:00.000" },
  { unique_key: "2", created_date: "2024-01-07T02:00:00.000" },
];

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("SocrataClient", () => {
  let mockFetch: ReturnType<typeof vi.fn>;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    vi.useFakeTimers();
    mockFetch = vi.fn();
    vi.stubGlobal("fetch", mockFetch);
    logger = createMockLogger();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
  });

  describe("request construction", () => {
    it("encodes the SoQL parameters into the URL", () => {
      const client = new SocrataClient({ endpoint: ENDPOINT, logger });

      const url = new URL(
        client.buildUrl({
          $limit: 1000,
          $offset: 2000,
          $order: "created_date",
          $where: "created_date between '2024-01-07T00:00:00' and '2024-01-10T23:59:59'",
        }),
      );

      expect(url.origin + url.pathname).toBe(ENDPOINT);
      expect(url.searchParams.get("$limit")).toBe("1000");
      expect(url.searchParams.get("$offset")).toBe("2000");
      expect(url.searchParams.get("$order")).toBe("created_date");
      expect(url.searchParams.get("$where")).toBe(
        "created_date between '2024-01-07T00:00:00' and '2024-01-10T23:59:59'",
      );
    });

    it("sends the app token when configured", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(RECORDS));
      const client = new SocrataClient({
        endpoint: ENDPOINT,
        appToken: "test-token",
        logger,
      });

      await client.fetchPage({ $limit: 2 });

      expect(mockFetch).toHaveBeenCalledWith(
        expect.any(String),
        expect.objectContaining({
          headers: { Accept: "application/json", "X-App-Token": "test-token" },
          signal: expect.any(AbortSignal),
        }),
      );
    });

    it("omits the app token header otherwise", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(RECORDS));
      const client = new SocrataClient({ endpoint: ENDPOINT, logger });

      await client.fetchPage({ $limit: 2 });

      expect(mockFetch).toHaveBeenCalledWith(
        expect.any(String),
        expect.objectContaining({ headers: { Accept: "application/json" } }),
      );
    });

    it("fails a malformed endpoint immediately without fetching", async () => {
      const client = new SocrataClient({ endpoint: "not a url", logger });

      await expect(client.fetchPage({ $limit: 1 })).rejects.toThrow(TypeError);
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe("success", () => {
    it("returns the records of a page", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(RECORDS));
      const client = new SocrataClient({ endpoint: ENDPOINT, logger });

      await expect(client.fetchPage({ $limit: 2 })).resolves.toEqual(RECORDS);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it("makes five attempts when the first four fail transiently", async () => {
      mockFetch
        .mockImplementationOnce(async () => textResponse("busy", 503))
        .mockImplementationOnce(async () => {
          throw new Error("fetch failed");
        })
        .mockImplementationOnce(async () => textResponse("<html>", 200))
        .mockImplementationOnce(async () => jsonResponse({ error: true }))
        .mockImplementationOnce(async () => jsonResponse(RECORDS));
      const client = new SocrataClient({ endpoint: ENDPOINT, logger });

      const promise = client.fetchPage({ $limit: 2 });
      await vi.runAllTimersAsync();

      await expect(promise).resolves.toEqual(RECORDS);
      expect(mockFetch).toHaveBeenCalledTimes(5);
      expect(logger.warn).toHaveBeenCalledTimes(4);
    });
  });

  describe("exhausted retries", () => {
    it("propagates the fifth failure after at least 15s of backoff", async () => {
      mockFetch.mockImplementation(async () => textResponse("unavailable", 503));
      const client = new SocrataClient({ endpoint: ENDPOINT, logger });
      const started = Date.now();

      const promise = client.fetchPage({ $limit: 2 });
      const assertion = expect(promise).rejects.toSatisfy((error: unknown) => {
        expect(error).toBeInstanceOf(SocrataFetchError);
        expect(error).toMatchObject({
          message: "HTTP 503: unavailable",
          httpStatus: 503,
        });
        return true;
      });
      await vi.runAllTimersAsync();
      await assertion;

      expect(mockFetch).toHaveBeenCalledTimes(5);
      expect(Date.now() - started).toBeGreaterThanOrEqual(15_000);
    });

    it("respects a custom retry policy", async () => {
      mockFetch.mockImplementation(async () => {
        throw new Error("ECONNRESET");
      });
      const client = new SocrataClient({
        endpoint: ENDPOINT,
        logger,
        retryPolicy: createRetryPolicy({ maxAttempts: 2, initialDelayMs: 10 }),
      });

      const promise = client.fetchPage({});
      const assertion = expect(promise).rejects.toThrow(
        "Network error: ECONNRESET",
      );
      await vi.runAllTimersAsync();
      await assertion;

      expect(mockFetch).toHaveBeenCalledTimes(2);
    });
  });

  describe("response validation", () => {
    const singleAttempt = createRetryPolicy({ maxAttempts: 1 });

    it("treats a non-JSON body as a transient failure", async () => {
      mockFetch.mockResolvedValueOnce(textResponse("<html>oops</html>", 200));
      const client = new SocrataClient({
        endpoint: ENDPOINT,
        logger,
        retryPolicy: singleAttempt,
      });

      const error = await client.fetchPage({}).catch((e: unknown) => e);

      expect(isTransientFetchError(error)).toBe(true);
      expect(error).toMatchObject({ message: "Invalid JSON response" });
    });

    it("treats a body that is not an array of records as a transient failure", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse([1, 2, 3]));
      const client = new SocrataClient({
        endpoint: ENDPOINT,
        logger,
        retryPolicy: singleAttempt,
      });

      const error = await client.fetchPage({}).catch((e: unknown) => e);

      expect(isTransientFetchError(error)).toBe(true);
      expect(error).toMatchObject({
        message: "Unexpected response shape: expected an array of records",
      });
    });
  });

  describe("timeout handling", () => {
    it("aborts a request that outlives the timeout", async () => {
      mockFetch.mockImplementation(
        (_url: string, init?: RequestInit) =>
          new Promise((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => {
              reject(new DOMException("Aborted", "AbortError"));
            });
          }),
      );
      const client = new SocrataClient({
        endpoint: ENDPOINT,
        logger,
        timeoutMs: 5000,
        retryPolicy: createRetryPolicy({ maxAttempts: 1 }),
      });

      const promise = client.fetchPage({});
      const assertion = expect(promise).rejects.toThrow(
        "Request timed out after 5000ms",
      );
      await vi.advanceTimersByTimeAsync(6000);
      await assertion;
    });
  });

  describe("fetchCount", () => {
    it("reads count_1 from the first row", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse([{ count_1: "1234" }]));
      const client = new SocrataClient({ endpoint: ENDPOINT, logger });

      await expect(
        client.fetchCount("created_date between 'a' and 'b'"),
      ).resolves.toBe(1234);

      const url = new URL(String(mockFetch.mock.calls[0]?.[0]));
      expect(url.searchParams.get("$select")).toBe("count(1)");
      expect(url.searchParams.get("$where")).toBe(
        "created_date between 'a' and 'b'",
      );
    });

    it("returns 0 for an empty or unrecognized body", async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse([]))
        .mockResolvedValueOnce(jsonResponse([{ total: "5" }]));
      const client = new SocrataClient({ endpoint: ENDPOINT, logger });

      await expect(client.fetchCount("x")).resolves.toBe(0);
      await expect(client.fetchCount("x")).resolves.toBe(0);
    });
  });
});
