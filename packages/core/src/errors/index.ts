/**
 * Chronicle Error System
 *
 * Every failure the gateway reports carries a stable code, a category and
 * a retry hint, so HTTP and stream clients can react without parsing messages.
 *
 * @example
 * ```typescript
 * import { ChronicleError, ValidationError } from '@chronicle/core';
 *
 * try {
 *   await engine.query(descriptor);
 * } catch (error) {
 *   if (ChronicleError.isCategory(error, 'backend')) {
 *     // retryable, the backend is down
 *   } else if (error instanceof ValidationError) {
 *     console.log(error.issues);
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  BackendUnavailableError,
  BufferOverflowError,
  ChronicleError,
  DatastoreError,
  DecodeError,
  InternalError,
  SinkError,
  ValidationError,
  ensureChronicleError,
  toError,
  type ChronicleErrorOptions,
  type SerializedChronicleError,
  type ValidationIssue,
} from './chronicle-error.js';
