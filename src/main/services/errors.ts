/**
 * Custom Error Classes for the Track Genre Classifier
 *
 * Provides categorized error types for configuration, backend transport,
 * catalog access and export, enabling structured logging and
 * user-friendly error messages.
 */

/**
 * Error categories matching the parts of the workflow.
 */
export type ErrorCategory = 'ConfigurationError' | 'TransportFailure' | 'CatalogError' | 'ExportError';

/** Context accepted by every ClassifierError */
export interface ErrorOptions {
  /** Track being processed when the error occurred (if applicable) */
  trackId?: string;
  /** Workflow step where the error occurred */
  step?: string;
  /** Underlying error */
  cause?: Error;
}

/**
 * Base class for all classifier errors.
 * Extends the native Error class with additional context fields.
 */
export class ClassifierError extends Error {
  /** Error category for classification */
  readonly category: ErrorCategory;
  /** The track being processed when the error occurred (if applicable) */
  readonly trackId: string | null;
  /** The workflow step where the error occurred */
  readonly step: string;
  /** The original error that caused this error (if wrapping) */
  readonly cause: Error | null;

  constructor(message: string, category: ErrorCategory, options?: ErrorOptions) {
    super(message);
    this.name = category;
    this.category = category;
    this.trackId = options?.trackId ?? null;
    this.step = options?.step ?? category;
    this.cause = options?.cause ?? null;

    // Ensure prototype chain works correctly
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Returns a user-friendly error message (no stack traces).
   */
  toUserMessage(): string {
    const trackInfo = this.trackId ? ` [${this.trackId}]` : '';
    return `${this.category}${trackInfo}: ${this.message}`;
  }
}

/**
 * Thrown when the classifier cannot be built: unsupported provider,
 * missing credential, invalid settings. Never retried.
 */
export class ConfigurationError extends ClassifierError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'ConfigurationError', {
      step: 'configuration',
      ...options,
    });
  }
}

/**
 * Thrown when a text-generation backend call fails.
 * Examples: network error, 401, 429, 5xx, reply envelope without text.
 */
export class TransportFailure extends ClassifierError {
  /** HTTP status code (if applicable) */
  readonly statusCode: number | null;
  /** Provider that failed */
  readonly provider: string | null;

  constructor(
    message: string,
    options?: ErrorOptions & {
      statusCode?: number;
      provider?: string;
    },
  ) {
    super(message, 'TransportFailure', {
      step: 'backend_call',
      ...options,
    });
    this.statusCode = options?.statusCode ?? null;
    this.provider = options?.provider ?? null;
  }
}

/**
 * Thrown when the music catalog cannot be read.
 * Examples: expired access token, rate limit, malformed page.
 */
export class CatalogError extends ClassifierError {
  /** HTTP status code (if applicable) */
  readonly statusCode: number | null;

  constructor(message: string, options?: ErrorOptions & { statusCode?: number }) {
    super(message, 'CatalogError', {
      step: 'catalog_fetch',
      ...options,
    });
    this.statusCode = options?.statusCode ?? null;
  }
}

/**
 * Thrown when writing results or playlist files fails.
 */
export class ExportError extends ClassifierError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'ExportError', {
      step: 'export',
      ...options,
    });
  }
}

/**
 * Type guard to check if an error is a ClassifierError.
 */
export function isClassifierError(error: unknown): error is ClassifierError {
  return error instanceof ClassifierError;
}

