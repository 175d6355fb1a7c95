/**
 * Error Types
 *
 * Configuration errors go back to whoever sent the mutation. State store
 * errors are fatal to the monitor. Extraction failures are transient; a
 * failed delivery is reported as a NotificationResult, not thrown.
 */

export class ConfigurationError extends Error {
  readonly code: 'not_found' | 'duplicate' | 'invalid';

  constructor(code: ConfigurationError['code'], message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.code = code;
  }
}

export class NotFoundError extends ConfigurationError {
  constructor(message: string) {
    super('not_found', message);
    this.name = 'NotFoundError';
  }
}

export class DuplicateError extends ConfigurationError {
  constructor(message: string) {
    super('duplicate', message);
    this.name = 'DuplicateError';
  }
}

export class ValidationError extends ConfigurationError {
  constructor(message: string) {
    super('invalid', message);
    this.name = 'ValidationError';
  }
}

/**
 * Durability / IO failure in the persistence layer.
 */
export class StateStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StateStoreError';
  }
}

/**
 * The whole extraction for one movie failed (page unreachable, unreadable
 * document, open circuit).
 */
export class ExtractionFailure extends Error {
  readonly movieId: string;

  constructor(movieId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionFailure';
    this.movieId = movieId;
  }
}

export function isStateStoreError(error: unknown): error is StateStoreError {
  return error instanceof StateStoreError;
}
