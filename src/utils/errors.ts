/**
 * Base application error with a stable code and structured context for logs.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: string;
      context?: Record<string, unknown>;
      cause?: Error;
    } = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code || 'INTERNAL_ERROR';
    this.context = options.context;

    if (options.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Marketplace request failed: network, timeout, non-2xx or a body that does
 * not parse. Never escapes the marketplace client.
 */
export class FetchError extends AppError {
  public readonly url: string;
  public readonly status?: number;

  constructor(url: string, message: string, options: { status?: number; cause?: Error } = {}) {
    super(`Marketplace fetch failed: ${message}`, {
      code: 'FETCH_FAILURE',
      context: { url, status: options.status },
      cause: options.cause,
    });
    this.url = url;
    this.status = options.status;
  }
}

/**
 * A store operation failed and its transaction was rolled back.
 */
export class PersistenceError extends AppError {
  public readonly operation: string;

  constructor(operation: string, seriesId: string, cause?: Error) {
    super(`Persistence ${operation} failed for series ${seriesId}: ${cause?.message ?? 'unknown error'}`, {
      code: 'PERSISTENCE_FAILURE',
      context: { operation, seriesId },
      cause,
    });
    this.operation = operation;
  }
}

/**
 * Startup cannot continue: missing connection settings, bad tracker config.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, options: { context?: Record<string, unknown>; cause?: Error } = {}) {
    super(message, {
      code: 'CONFIGURATION_FAILURE',
      context: options.context,
      cause: options.cause,
    });
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error occurred';
}
