import { describe, expect, test } from 'vitest';

import {
  asCameDomoticError,
  CameDomoticError,
  ensureError,
  errorTraits,
  formatAckError,
  isCameDomoticError
} from '../../src/errors.js';

describe('CameDomoticError', () => {
  test('carries the code, ack code and cause', () => {
    const cause = new Error('socket hang up');
    const error = new CameDomoticError('SERVER_COMMAND', 'rejected', { ackCode: 9, cause, details: { command: 'x' } });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('CameDomoticError');
    expect(error.code).toBe('SERVER_COMMAND');
    expect(error.ackCode).toBe(9);
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual({ command: 'x' });
  });

  test('narrows by code', () => {
    const error = new CameDomoticError('AUTH', 'Bad credentials.');
    expect(isCameDomoticError(error)).toBe(true);
    expect(isCameDomoticError(error, 'AUTH')).toBe(true);
    expect(isCameDomoticError(error, 'PROTOCOL')).toBe(false);
    expect(isCameDomoticError(new Error('plain'))).toBe(false);
  });
});

describe('error helpers', () => {
  test('formats ack failures', () => {
    expect(formatAckError(11, 'Wrong application data.')).toBe('Bad ack code: 11 - Reason: Wrong application data.');
    expect(formatAckError()).toBe('Bad ack code: N/A - Reason: N/A');
  });

  test('normalizes unknown throwables', () => {
    expect(ensureError('boom').message).toBe('boom');
    expect(ensureError({ reason: 1 }).message).toBe('{"reason":1}');

    const abort = new Error('aborted');
    abort.name = 'AbortError';
    expect(asCameDomoticError(abort).code).toBe('ABORTED');
    expect(asCameDomoticError(new TypeError('bad')).code).toBe('INTERNAL');

    const original = new CameDomoticError('PROTOCOL', 'garbled');
    expect(asCameDomoticError(original)).toBe(original);
  });

  test('describes which failures are worth retrying', () => {
    expect(errorTraits('SERVER_UNREACHABLE').retryable).toBe(true);
    expect(errorTraits('AUTH').retryable).toBe(false);
    expect(errorTraits('SERVER_COMMAND').retryable).toBe(false);
  });
});
