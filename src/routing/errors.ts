/**
 * Error classes for routing strategies.
 *
 * @module
 */

import { RuntimeError, RuntimeErrorCodes } from '../types/errors.js';

/** Thrown when a strategy is constructed with invalid parameters. */
export class RoutingValidationError extends RuntimeError {
  public readonly field: string;
  public readonly reason: string;

  constructor(field: string, reason: string) {
    super(
      `Routing strategy validation failed: ${field}: ${reason}`,
      RuntimeErrorCodes.VALIDATION_ERROR,
    );
    this.name = 'RoutingValidationError';
    this.field = field;
    this.reason = reason;
  }
}
