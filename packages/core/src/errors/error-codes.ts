/**
 * Chronicle Error Codes
 *
 * Error codes are structured as CHRONICLE_[CATEGORY][NUMBER]:
 * - D: Decode errors (D100-D199)
 * - B: Backend errors (B200-B299)
 * - V: Validation errors (V300-V399)
 * - O: Buffer overflow errors (O400-O499)
 * - S: Sink errors (S500-S599)
 * - K: Datastore errors (K600-K699)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Decode errors (D100-D199)
  CHRONICLE_D100: {
    code: 'CHRONICLE_D100',
    message: 'Malformed message payload',
    suggestion: 'Publish history events as JSON objects shaped like { "key": string, "data": object }.',
    retryable: false,
  },
  CHRONICLE_D101: {
    code: 'CHRONICLE_D101',
    message: 'Message payload is not valid JSON',
    suggestion: 'Check the publisher serializes the payload with JSON.stringify.',
    retryable: false,
  },
  CHRONICLE_D102: {
    code: 'CHRONICLE_D102',
    message: 'Invalid event timestamp',
    suggestion: 'Use epoch seconds, epoch milliseconds or an ISO-8601 string.',
    retryable: false,
  },

  // Backend errors (B200-B299)
  CHRONICLE_B200: {
    code: 'CHRONICLE_B200',
    message: 'Time-series backend unavailable',
    suggestion: 'Check that the database is running and reachable, then retry.',
    retryable: true,
  },
  CHRONICLE_B201: {
    code: 'CHRONICLE_B201',
    message: 'Time-series backend rejected the write',
    suggestion: 'Pending records are kept and retried on the next flush.',
    retryable: true,
  },
  CHRONICLE_B202: {
    code: 'CHRONICLE_B202',
    message: 'Time-series backend query failed',
    suggestion: 'Retry the query; the backend may be restarting.',
    retryable: true,
  },
  CHRONICLE_B203: {
    code: 'CHRONICLE_B203',
    message: 'Unexpected backend response',
    suggestion: 'Check the backend URL points at a compatible database.',
    retryable: true,
  },

  // Validation errors (V300-V399)
  CHRONICLE_V300: {
    code: 'CHRONICLE_V300',
    message: 'Validation failed',
    suggestion: 'Check the listed issues for the offending fields.',
    retryable: false,
  },
  CHRONICLE_V301: {
    code: 'CHRONICLE_V301',
    message: 'Invalid query',
    suggestion: 'Provide at least one metric, a start before the end and a positive interval.',
    retryable: false,
  },
  CHRONICLE_V302: {
    code: 'CHRONICLE_V302',
    message: 'Invalid configuration',
    suggestion: 'Check the CHRONICLE_* environment variables and command line flags.',
    retryable: false,
  },
  CHRONICLE_V303: {
    code: 'CHRONICLE_V303',
    message: 'Invalid datastore key',
    suggestion: 'Namespaces and ids may contain letters, digits, spaces and - . : ~ _ ( ).',
    retryable: false,
  },
  CHRONICLE_V304: {
    code: 'CHRONICLE_V304',
    message: 'Invalid stream command',
    suggestion: 'Send { "type": "subscribe", "id": string, "query": object } or { "type": "unsubscribe", "id": string }.',
    retryable: false,
  },

  // Buffer errors (O400-O499)
  CHRONICLE_O400: {
    code: 'CHRONICLE_O400',
    message: 'Pending batch exceeded its maximum size; oldest records were dropped',
    suggestion: 'Restore the time-series backend or raise maxPendingRecords.',
    retryable: false,
  },

  // Sink errors (S500-S599)
  CHRONICLE_S500: {
    code: 'CHRONICLE_S500',
    message: 'Live query sink failed',
    suggestion: 'The subscription was closed; the client should resubscribe.',
    retryable: false,
  },
  CHRONICLE_S501: {
    code: 'CHRONICLE_S501',
    message: 'Live query sink is closed',
    suggestion: 'The client disconnected; the subscription was released.',
    retryable: false,
  },
  CHRONICLE_S502: {
    code: 'CHRONICLE_S502',
    message: 'Live query sink is saturated',
    suggestion: 'The client is not reading fast enough; resubscribe with a narrower query.',
    retryable: false,
  },

  // Datastore errors (K600-K699)
  CHRONICLE_K600: {
    code: 'CHRONICLE_K600',
    message: 'Datastore operation failed',
    suggestion: 'Check that the key/value store is running and reachable.',
    retryable: true,
  },
  CHRONICLE_K601: {
    code: 'CHRONICLE_K601',
    message: 'Datastore value not found',
    suggestion: 'Check the namespace and id.',
    retryable: false,
  },

  // Internal errors (X900-X999)
  CHRONICLE_X900: {
    code: 'CHRONICLE_X900',
    message: 'Internal error',
    suggestion: 'This is likely a bug. Please report it with the error context.',
    retryable: false,
  },
  CHRONICLE_X901: {
    code: 'CHRONICLE_X901',
    message: 'Component is not running',
    suggestion: 'Start the component before using it.',
    retryable: false,
  },
  CHRONICLE_X902: {
    code: 'CHRONICLE_X902',
    message: 'Message bus operation failed',
    suggestion: 'Check that the MQTT broker is reachable.',
    retryable: true,
  },
} as const;

/**
 * Valid error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory =
  | 'decode'
  | 'backend'
  | 'validation'
  | 'buffer'
  | 'sink'
  | 'datastore'
  | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt('CHRONICLE_'.length);
  switch (letter) {
    case 'D':
      return 'decode';
    case 'B':
      return 'backend';
    case 'V':
      return 'validation';
    case 'O':
      return 'buffer';
    case 'S':
      return 'sink';
    case 'K':
      return 'datastore';
    default:
      return 'internal';
  }
}

/**
 * Get error info for a code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
