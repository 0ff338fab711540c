/**
 * Shared type exports.
 *
 * @module
 */

export {
  RuntimeErrorCodes,
  type RuntimeErrorCode,
  RuntimeError,
  ValidationError,
  isRuntimeError,
} from './errors.js';
