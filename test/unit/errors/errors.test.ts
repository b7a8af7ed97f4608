import { describe, test, expect } from '@jest/globals';
import {
  CancelledError,
  ConfigError,
  ConnectionError,
  NotFoundError,
  TimeoutError,
  TransientError,
  ValidationError,
  errorMessage,
  isApplicationError,
  isRetryableError,
  normalizeError,
} from '../../../src/errors/index';

describe('error kinds', () => {
  test('carry a code and their own name', () => {
    const error = new NotFoundError('pod "web" not found', 'pod', 'web');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('NotFoundError');
    expect(error.code).toBe('NOT_FOUND');
    expect(error.context).toEqual({ resourceType: 'pod', resourceId: 'web' });
  });

  test('serialise to JSON with code and context', () => {
    const json = new ConfigError('kubeconfig file not found: /tmp/none', '/tmp/none').toJSON();

    expect(json).toMatchObject({
      name: 'ConfigError',
      code: 'CONFIG_ERROR',
      message: 'kubeconfig file not found: /tmp/none',
      context: { path: '/tmp/none' },
    });
  });

  test('keep the cause', () => {
    const cause = new Error('ECONNREFUSED');
    const error = new ConnectionError('failed to connect to cluster "prod": ECONNREFUSED', 'prod', cause);

    expect(error.cause).toBe(cause);
    expect(error.cluster).toBe('prod');
  });
});

describe('isRetryableError', () => {
  test.each([
    ['NotFoundError', new NotFoundError('gone')],
    ['ValidationError', new ValidationError('bad input')],
    ['ConfigError', new ConfigError('bad kubeconfig')],
    ['CancelledError', new CancelledError('stopped')],
    ['TimeoutError', new TimeoutError('too slow')],
    ['a "not found" message', new Error('the server could not find the requested resource: not found')],
  ])('rejects %s', (_label, error) => {
    expect(isRetryableError(error)).toBe(false);
  });

  test.each([
    ['a plain error', new Error('connection reset')],
    ['a ConnectionError', new ConnectionError('unauthorized')],
    ['a TransientError', new TransientError('read failed', 'read', 1)],
  ])('accepts %s', (_label, error) => {
    expect(isRetryableError(error)).toBe(true);
  });
});

describe('normalizeError', () => {
  test('returns application errors unchanged', () => {
    const error = new ValidationError('bad');
    expect(normalizeError(error)).toBe(error);
  });

  test('classifies plain errors by message', () => {
    expect(normalizeError(new Error('request timed out'))).toBeInstanceOf(TimeoutError);
    expect(normalizeError(new Error('HTTP 404'))).toBeInstanceOf(NotFoundError);
    expect(normalizeError(new Error('connect ECONNREFUSED 127.0.0.1:6443'))).toBeInstanceOf(ConnectionError);
    expect(normalizeError(new Error('boom'))).toBeInstanceOf(TransientError);
  });

  test('wraps non-errors as ValidationError', () => {
    const error = normalizeError('bad thing');
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe('bad thing');
    expect(isApplicationError(error)).toBe(true);
  });
});

describe('errorMessage', () => {
  test('reads messages from errors and strings', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('Unknown error');
  });
});
