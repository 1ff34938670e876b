import { describe, expect, it } from 'vitest';
import {
  BackendUnavailableError,
  BufferOverflowError,
  ChronicleError,
  DecodeError,
  SinkError,
  ValidationError,
  ensureChronicleError,
  toError,
} from '../errors/chronicle-error.js';
import { ERROR_CODES, getErrorCategory } from '../errors/error-codes.js';

describe('error codes', () => {
  it('should derive the category from the code letter', () => {
    expect(getErrorCategory('CHRONICLE_D100')).toBe('decode');
    expect(getErrorCategory('CHRONICLE_B202')).toBe('backend');
    expect(getErrorCategory('CHRONICLE_V300')).toBe('validation');
    expect(getErrorCategory('CHRONICLE_O400')).toBe('buffer');
    expect(getErrorCategory('CHRONICLE_S501')).toBe('sink');
    expect(getErrorCategory('CHRONICLE_K600')).toBe('datastore');
    expect(getErrorCategory('CHRONICLE_X900')).toBe('internal');
  });

  it('should key every entry by its own code', () => {
    for (const [key, info] of Object.entries(ERROR_CODES)) {
      expect(info.code).toBe(key);
    }
  });
});

describe('ChronicleError', () => {
  it('should fill message and suggestion from the table', () => {
    const error = new ChronicleError({ code: 'CHRONICLE_K601', context: { id: 'x' } });
    expect(error.message).toBe('Datastore value not found');
    expect(error.suggestion).toBe('Check the namespace and id.');
    expect(error.context).toEqual({ id: 'x' });
    expect(error.retryable).toBe(false);
  });

  it('should wrap a cause', () => {
    const cause = new Error('ECONNREFUSED');
    const error = ChronicleError.wrap(cause, 'CHRONICLE_B200');
    expect(error.message).toBe('ECONNREFUSED');
    expect(error.cause).toBe(cause);
    expect(error.retryable).toBe(true);
  });

  it('should serialize without a stack', () => {
    const error = new BackendUnavailableError('CHRONICLE_B202', 'query failed', { status: 502 }, new Error('bad gateway'));
    expect(error.toJSON()).toEqual({
      name: 'BackendUnavailableError',
      code: 'CHRONICLE_B202',
      message: 'query failed',
      suggestion: 'Retry the query; the backend may be restarting.',
      category: 'backend',
      retryable: true,
      context: { status: 502 },
      cause: { name: 'Error', message: 'bad gateway' },
    });
  });

  it('should format code, context and suggestion', () => {
    const error = new DecodeError('a/b', 'Payload is not JSON');
    expect(error.format()).toBe(
      [
        '[CHRONICLE_D100] Payload is not JSON',
        'Context: {"topic":"a/b"}',
        `Suggestion: ${ERROR_CODES.CHRONICLE_D100.suggestion}`,
      ].join('\n')
    );
  });

  it('should check code and category', () => {
    const error = new SinkError('sub-1');
    expect(ChronicleError.isCode(error, 'CHRONICLE_S500')).toBe(true);
    expect(ChronicleError.isCategory(error, 'sink')).toBe(true);
    expect(ChronicleError.isCategory(new Error('x'), 'sink')).toBe(false);
  });
});

describe('subclasses', () => {
  it('should summarize validation issues in the message', () => {
    const error = new ValidationError([
      { path: 'port', message: 'Expected number' },
      { path: '', message: 'Unknown flag' },
    ]);
    expect(error.message).toBe('Validation failed: port: Expected number; Unknown flag');
    expect(error.context['issues']).toEqual(error.issues);
  });

  it('should describe overflow drops', () => {
    const error = new BufferOverflowError(2, 100);
    expect(error.message).toBe('Pending batch exceeded 100 records; dropped 2 oldest record(s)');
    expect(error.dropped).toBe(2);
    expect(error.category).toBe('buffer');
  });
});

describe('ensureChronicleError', () => {
  it('should pass chronicle errors through', () => {
    const error = new SinkError('s');
    expect(ensureChronicleError(error)).toBe(error);
  });

  it('should wrap plain errors and values', () => {
    expect(ensureChronicleError(new Error('x')).code).toBe('CHRONICLE_X900');
    expect(ensureChronicleError('oops', 'CHRONICLE_K600').message).toBe('oops');
  });

  it('should coerce thrown values to errors', () => {
    expect(toError(42).message).toBe('42');
  });
});
