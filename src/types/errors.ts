/**
 * Error types and utilities for meshlink-runtime.
 *
 * Send-path failures are reported on `TransportResult.errorCode` rather than
 * thrown; the classes here cover construction-time mistakes.
 */

// ============================================================================
// Runtime Error Codes
// ============================================================================

/**
 * String error codes shared by thrown errors and failed transport results.
 */
export const RuntimeErrorCodes = {
  /** Input or configuration validation failed */
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  /** ConnectionManager used before initialize() */
  NOT_INITIALIZED: 'NOT_INITIALIZED',
  /** No transport available or reachable for the target */
  NO_ROUTE: 'NO_ROUTE',
  /** A single transport attempt failed or threw */
  TRANSPORT_FAILURE: 'TRANSPORT_FAILURE',
  /** A single transport attempt exceeded its timeout */
  TRANSPORT_TIMEOUT: 'TRANSPORT_TIMEOUT',
  /** Every selected transport failed */
  ALL_TRANSPORTS_FAILED: 'ALL_TRANSPORTS_FAILED',
  /** Store-and-forward queue evicted its oldest entry */
  QUEUE_FULL: 'QUEUE_FULL',
  /** Queued message outlived its TTL */
  MESSAGE_EXPIRED: 'MESSAGE_EXPIRED',
  /** Loopback call to the local application server failed */
  LOCAL_FORWARD_ERROR: 'LOCAL_FORWARD_ERROR',
  /** Transfer session could not be started */
  TRANSFER_SESSION_ERROR: 'TRANSFER_SESSION_ERROR',
} as const;

/** Union type of all runtime error code values */
export type RuntimeErrorCode = (typeof RuntimeErrorCodes)[keyof typeof RuntimeErrorCodes];

// ============================================================================
// Base Runtime Error
// ============================================================================

/**
 * Base class for all errors thrown by meshlink-runtime.
 *
 * @example
 * ```typescript
 * try {
 *   new ConnectionManager({ queue: { capacity: 0 } });
 * } catch (err) {
 *   if (err instanceof RuntimeError && err.code === RuntimeErrorCodes.VALIDATION_ERROR) {
 *     // ...
 *   }
 * }
 * ```
 */
export class RuntimeError extends Error {
  /** The error code identifying this error type */
  public readonly code: RuntimeErrorCode;

  constructor(message: string, code: RuntimeErrorCode) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
    // Maintain proper stack trace in V8 environments.
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Specific Runtime Error Classes
// ============================================================================

/**
 * Error thrown when an input fails validation.
 */
export class ValidationError extends RuntimeError {
  /** Name of the offending field, when known */
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, RuntimeErrorCodes.VALIDATION_ERROR);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Check whether a value is a RuntimeError, optionally with a specific code.
 */
export function isRuntimeError(error: unknown, code?: RuntimeErrorCode): error is RuntimeError {
  if (!(error instanceof RuntimeError)) return false;
  return code === undefined || error.code === code;
}
