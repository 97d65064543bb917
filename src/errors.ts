/**
 * Error taxonomy for the collector. Every error aborts the run.
 */

export type CollectorErrorCode =
  | 'auth_error'
  | 'quota_exceeded'
  | 'network_error'
  | 'write_error'
  | 'config_error'
  | 'lock_error';

export class CollectorError extends Error {
  constructor(
    message: string,
    public readonly code: CollectorErrorCode,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CollectorError';
    Object.setPrototypeOf(this, CollectorError.prototype);
  }
}

/**
 * Missing, invalid or revoked API key
 */
export class AuthError extends CollectorError {
  constructor(message: string, statusCode?: number) {
    super(message, 'auth_error', statusCode);
    this.name = 'AuthError';
    Object.setPrototypeOf(this, AuthError.prototype);
  }
}

/**
 * The API reports the usage quota or rate limit as exhausted
 */
export class QuotaExceeded extends CollectorError {
  constructor(message: string, statusCode?: number) {
    super(message, 'quota_exceeded', statusCode);
    this.name = 'QuotaExceeded';
    Object.setPrototypeOf(this, QuotaExceeded.prototype);
  }
}

/**
 * Connection failure, timeout, or an unusable response
 */
export class NetworkError extends CollectorError {
  constructor(message: string, statusCode?: number, cause?: unknown) {
    super(message, 'network_error', statusCode, { cause });
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Any output sink I/O failure
 */
export class WriteError extends CollectorError {
  constructor(
    public readonly sink: string,
    public readonly path: string,
    cause: unknown
  ) {
    super(
      `Failed to write ${sink} output to ${path}: ${describeError(cause)}`,
      'write_error',
      undefined,
      { cause }
    );
    this.name = 'WriteError';
    Object.setPrototypeOf(this, WriteError.prototype);
  }
}

export class ConfigError extends CollectorError {
  constructor(message: string) {
    super(message, 'config_error');
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Another run holds the output directory
 */
export class LockError extends CollectorError {
  constructor(message: string) {
    super(message, 'lock_error');
    this.name = 'LockError';
    Object.setPrototypeOf(this, LockError.prototype);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
