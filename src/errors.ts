/**
 * Error taxonomy for the enrichment pipeline.
 *
 * Per-identifier failures (transport, rate limiting, API-reported, parse) are
 * mapped to outcomes by the worker and never escape a run. Persistence
 * failures on the ledger are fatal for the current run.
 */

export type ErrorContext = Record<string, unknown>;

export class EnricherError extends Error {
  public readonly code: string;
  public readonly context?: ErrorContext;

  constructor(message: string, code: string = 'ENRICHER_ERROR', context?: ErrorContext) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Network failure, timeout, or non-429 HTTP error status.
 */
export class TransportError extends EnricherError {
  public readonly status?: number;

  constructor(message: string, status?: number, context?: ErrorContext) {
    super(message, 'TRANSPORT_ERROR', { status, ...context });
    this.status = status;
  }
}

/**
 * Explicit backpressure from the remote (HTTP 429 or equivalent).
 */
export class RateLimitedError extends EnricherError {
  constructor(message: string = 'Too Many Requests', context?: ErrorContext) {
    super(message, 'RATE_LIMITED', context);
  }
}

/**
 * Well-formed response whose success flag is not set for the identifier.
 */
export class ApiReportedFailureError extends EnricherError {
  public readonly appid: number;

  constructor(appid: number, context?: ErrorContext) {
    super(`API reported failure for appid ${appid}`, 'API_REPORTED_FAILURE', { appid, ...context });
    this.appid = appid;
  }
}

/**
 * Malformed payload on an otherwise successful response.
 */
export class ParseError extends EnricherError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'PARSE_ERROR', context);
  }
}

export class PersistenceError extends EnricherError {
  public readonly operation: string;

  constructor(message: string, operation: string, context?: ErrorContext) {
    super(message, 'PERSISTENCE_ERROR', { operation, ...context });
    this.operation = operation;
  }
}

export class ConfigurationError extends EnricherError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', context);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
