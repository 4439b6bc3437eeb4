export interface AppErrorOptions {
  code?: string | undefined;
  statusCode?: number | undefined;
  isOperational?: boolean | undefined;
  cause?: unknown;
  context?: Record<string, unknown> | undefined;
}

/** Options accepted by the concrete subclasses; status is fixed per class. */
export type DerivedErrorOptions = Pick<
  AppErrorOptions,
  "code" | "cause" | "context"
>;

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code ?? "INTERNAL_ERROR";
    this.statusCode = options.statusCode ?? 500;
    this.isOperational = options.isOperational ?? true;
    this.context = options.context;

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      ...(this.context ? { context: this.context } : {}),
    };
  }
}

/** Bad configuration or input that no retry will fix. */
export class ValidationError extends AppError {
  constructor(message = "Validation failed", options: DerivedErrorOptions = {}) {
    super(message, {
      code: options.code ?? "VALIDATION_ERROR",
      statusCode: 400,
      isOperational: true,
      cause: options.cause,
      context: options.context,
    });
  }
}

/** A remote dependency answered badly or not at all. */
export class ExternalServiceError extends AppError {
  constructor(
    message = "External service failure",
    options: DerivedErrorOptions = {},
  ) {
    super(message, {
      code: options.code ?? "EXTERNAL_SERVICE_ERROR",
      statusCode: 502,
      isOperational: true,
      cause: options.cause,
      context: options.context,
    });
  }
}

export class IngestionError extends AppError {
  constructor(
    message = "Ingestion run failed",
    options: DerivedErrorOptions = {},
  ) {
    super(message, {
      code: options.code ?? "INGESTION_ERROR",
      statusCode: 500,
      isOperational: true,
      cause: options.cause,
      context: options.context,
    });
  }
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
