import type { Logger } from "./logger.js";
import { errorMessage } from "./errors.js";

/**
 * Bounded exponential backoff. Attempt `n` (1-based) that fails is followed by
 * a wait of `min(maxDelayMs, initialDelayMs * multiplier^(n-1))`, plus or
 * minus `jitterRatio` of that value.
 */
export interface RetryPolicy {
  /** Total attempts including the first one. */
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly multiplier: number;
  readonly maxDelayMs: number;
  /** 0 disables jitter; 0.25 means +/- 25%. */
  readonly jitterRatio: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 5,
  initialDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 16000,
  jitterRatio: 0,
});

export function createRetryPolicy(
  overrides: Partial<RetryPolicy> = {},
): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new RangeError(
      `maxAttempts must be a positive integer, got ${policy.maxAttempts}`,
    );
  }
  if (policy.initialDelayMs < 0 || policy.maxDelayMs < 0) {
    throw new RangeError("Retry delays must not be negative");
  }
  if (policy.jitterRatio < 0 || policy.jitterRatio > 1) {
    throw new RangeError(
      `jitterRatio must be within [0, 1], got ${policy.jitterRatio}`,
    );
  }
  return Object.freeze(policy);
}

/**
 * Delay to wait after the failure numbered `retryIndex` (0 for the first
 * failed attempt).
 */
export function backoffDelay(
  policy: RetryPolicy,
  retryIndex: number,
  random: () => number = Math.random,
): number {
  const exponential =
    policy.initialDelayMs * Math.pow(policy.multiplier, retryIndex);
  const capped = Math.min(exponential, policy.maxDelayMs);
  if (policy.jitterRatio === 0) {
    return capped;
  }
  const jitter = capped * policy.jitterRatio * (random() * 2 - 1);
  return Math.max(0, Math.floor(capped + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  policy?: RetryPolicy;
  /** Errors rejected here propagate immediately. */
  isRetryable: (error: unknown) => boolean;
  /** Included in log lines to identify the operation. */
  label?: string;
  logger?: Logger;
}

/**
 * Run `operation` under `policy`. The error of the final attempt propagates
 * unchanged.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const label = options.label ?? "operation";

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await operation(attempt);
      if (attempt > 1) {
        options.logger?.info(`${label} succeeded after ${attempt} attempts`, {
          attempts: attempt,
        });
      }
      return result;
    } catch (error) {
      if (!options.isRetryable(error)) {
        throw error;
      }
      if (attempt >= policy.maxAttempts) {
        options.logger?.error(
          `${label} failed after ${attempt} attempts: ${errorMessage(error)}`,
          { attempts: attempt },
        );
        throw error;
      }
      const delay = backoffDelay(policy, attempt - 1);
      options.logger?.warn(
        `${label} attempt ${attempt}/${policy.maxAttempts} failed, retrying in ${delay}ms`,
        { attempt, delayMs: delay, error: errorMessage(error) },
      );
      await sleep(delay);
    }
  }
}
