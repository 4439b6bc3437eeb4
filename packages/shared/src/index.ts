export {
  type LogLevel,
  type LogContext,
  type Logger,
  createLogger,
} from "./logger.js";

export {
  AppError,
  ValidationError,
  ExternalServiceError,
  IngestionError,
  errorMessage,
  type AppErrorOptions,
  type DerivedErrorOptions,
} from "./errors.js";

export {
  getOptionalEnv,
  getDatabaseUrl,
  isDevelopment,
  parseEnvInt,
} from "./env.js";

export { getPool, getPoolStatus, closePool, type PoolStatus } from "./pool.js";

export {
  DEFAULT_RETRY_POLICY,
  backoffDelay,
  createRetryPolicy,
  withRetry,
  type RetryPolicy,
  type RetryOptions,
} from "./retry.js";
