/**
 * ChronicleError - structured error with a code, category and retry hint
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a ChronicleError
 */
export interface ChronicleErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a ChronicleError, as sent to HTTP and stream clients
 */
export interface SerializedChronicleError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  retryable: boolean;
  context: Record<string, unknown>;
  cause?: SerializedChronicleError | { name: string; message: string };
}

/**
 * Base error for everything the gateway reports.
 *
 * @example
 * ```typescript
 * throw new ChronicleError({
 *   code: 'CHRONICLE_K601',
 *   context: { namespace: 'ui', id: 'dashboard-1' },
 * });
 *
 * if (ChronicleError.isCategory(error, 'backend')) {
 *   scheduleRetry();
 * }
 * ```
 */
export class ChronicleError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Whether the caller may retry the same request */
  readonly retryable: boolean;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: ChronicleErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'ChronicleError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.retryable = errorInfo.retryable;
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Wrap an existing error with a ChronicleError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): ChronicleError {
    return new ChronicleError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isChronicleError(error: unknown): error is ChronicleError {
    return error instanceof ChronicleError;
  }

  static isCode(error: unknown, code: ErrorCode): boolean {
    return ChronicleError.isChronicleError(error) && error.code === code;
  }

  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return ChronicleError.isChronicleError(error) && error.category === category;
  }

  /**
   * Format the error for log output
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization. Stack traces stay server-side.
   */
  toJSON(): SerializedChronicleError {
    const result: SerializedChronicleError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      retryable: this.retryable,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.cause) {
      result.cause = ChronicleError.isChronicleError(this.cause)
        ? this.cause.toJSON()
        : { name: this.cause.name, message: this.cause.message };
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * A single field-level validation problem
 */
export interface ValidationIssue {
  /** Dotted field path, empty for the root value */
  path: string;
  /** Human-readable error message */
  message: string;
}

/**
 * Malformed inbound message. Dropped and logged by the relay, never surfaced further.
 */
export class DecodeError extends ChronicleError {
  readonly topic: string;

  constructor(topic: string, message?: string, cause?: Error, code: ErrorCode = 'CHRONICLE_D100') {
    super({ code, message, context: { topic }, cause });
    this.name = 'DecodeError';
    this.topic = topic;
  }
}

/**
 * The time-series backend could not be reached or refused the request
 */
export class BackendUnavailableError extends ChronicleError {
  constructor(
    code: ErrorCode = 'CHRONICLE_B200',
    message?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super({ code, message, context, cause });
    this.name = 'BackendUnavailableError';
  }
}

/**
 * Rejected input, with field-level details
 */
export class ValidationError extends ChronicleError {
  readonly issues: ValidationIssue[];

  constructor(
    issues: ValidationIssue[],
    code: ErrorCode = 'CHRONICLE_V300',
    context?: Record<string, unknown>
  ) {
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');

    super({
      code,
      message: `${getErrorInfo(code).message}: ${summary}`,
      context: { ...context, issues },
    });

    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Records dropped from a pending batch that grew past its limit
 */
export class BufferOverflowError extends ChronicleError {
  readonly dropped: number;

  constructor(dropped: number, limit: number) {
    super({
      code: 'CHRONICLE_O400',
      message: `Pending batch exceeded ${limit} records; dropped ${dropped} oldest record(s)`,
      context: { dropped, limit },
    });
    this.name = 'BufferOverflowError';
    this.dropped = dropped;
  }
}

/**
 * A live query sink could not accept a push
 */
export class SinkError extends ChronicleError {
  readonly subscriptionId: string;

  constructor(
    subscriptionId: string,
    code: ErrorCode = 'CHRONICLE_S500',
    message?: string,
    cause?: Error
  ) {
    super({ code, message, context: { subscriptionId }, cause });
    this.name = 'SinkError';
    this.subscriptionId = subscriptionId;
  }
}

/**
 * Key/value store failure
 */
export class DatastoreError extends ChronicleError {
  constructor(
    code: ErrorCode = 'CHRONICLE_K600',
    message?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super({ code, message, context, cause });
    this.name = 'DatastoreError';
  }
}

/**
 * Unexpected failure inside the gateway
 */
export class InternalError extends ChronicleError {
  constructor(
    code: ErrorCode = 'CHRONICLE_X900',
    message?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super({ code, message, context, cause });
    this.name = 'InternalError';
  }
}

/**
 * Normalize anything thrown into a ChronicleError
 */
export function ensureChronicleError(
  error: unknown,
  defaultCode: ErrorCode = 'CHRONICLE_X900'
): ChronicleError {
  if (ChronicleError.isChronicleError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return ChronicleError.wrap(error, defaultCode);
  }

  return new ChronicleError({
    code: defaultCode,
    message: String(error),
  });
}

/**
 * Coerce an unknown thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
