/**
 * Tests for the typed error model.
 */

import {
  apiError,
  cacheCorruptError,
  capacityExhaustedError,
  configError,
  createTypedError,
  errorMessage,
  maskSecret,
  maskSecretsInMessage,
  notFoundError,
  syncAbortedError,
  validationError,
} from '../../src/domain/errors';
import { getHttpStatus } from '../../src/api/middleware';

describe('Typed Error Model', () => {
  test('createTypedError fills defaults', () => {
    expect(createTypedError({ code: 'SYSTEM.INTERNAL', message: 'boom' })).toEqual({
      code: 'SYSTEM.INTERNAL',
      message: 'boom',
      serviceId: undefined,
      decisionId: undefined,
      retryable: false,
      details: undefined,
      suggestedFixes: [],
    });
  });

  test('capacityExhaustedError suggests a larger bound', () => {
    const error = capacityExhaustedError('svc1', 'ip:192.0.2.5', 'block-list', 2, 2);
    expect(error.message).toBe('No room for ip:192.0.2.5 in any block-list container (2 x 2)');
    expect(error.suggestedFixes).toEqual([{ type: 'INCREASE_MAX_ITEMS', params: { serviceId: 'svc1', maxItems: 8 } }]);
  });

  test('cacheCorruptError and configError carry their context', () => {
    expect(cacheCorruptError('/tmp/cache.json', 'bad').details).toEqual({ path: '/tmp/cache.json', reason: 'bad' });
    expect(configError('bad field', 'intervalMs').details).toEqual({ field: 'intervalMs' });
    expect(configError('bad document').details).toBeUndefined();
  });

  test('syncAbortedError is retryable', () => {
    expect(syncAbortedError('svc1')).toMatchObject({ code: 'SYNC.ABORTED', serviceId: 'svc1', retryable: true });
  });

  test('apiError wraps the error in the response format', () => {
    const error = validationError('limit must be a positive integer');
    expect(apiError(error)).toEqual({ error });
  });

  test('errorMessage accepts anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});

describe('getHttpStatus', () => {
  test('maps error domains to HTTP statuses', () => {
    const status = (code: string) => getHttpStatus(createTypedError({ code, message: '' }));
    expect(getHttpStatus(notFoundError('Service', 'svc9'))).toBe(404);
    expect(status('VALIDATION.INVALID_INPUT')).toBe(400);
    expect(status('CONFIG.INVALID')).toBe(400);
    expect(status('RATE_LIMIT.EXCEEDED')).toBe(429);
    expect(status('REMOTE.TRANSIENT')).toBe(502);
    expect(status('DECISION_SOURCE.UNAVAILABLE')).toBe(503);
    expect(status('CAPACITY.EXHAUSTED')).toBe(507);
    expect(status('DECISION.MALFORMED')).toBe(422);
    expect(status('SYNC.ABORTED')).toBe(500);
  });
});

describe('maskSecret', () => {
  test('masks all but the last 4 characters', () => {
    expect(maskSecret('test-secret')).toBe('*******cret');
    expect(maskSecret('12345678')).toBe('****5678');
  });

  test('fully masks short secrets', () => {
    expect(maskSecret('short')).toBe('****');
    expect(maskSecret('')).toBe('****');
  });
});

describe('maskSecretsInMessage', () => {
  test('masks every occurrence of every secret', () => {
    expect(maskSecretsInMessage('key test-secret, again test-secret, other placeholder-token', ['test-secret', 'placeholder-token'])).toBe(
      'key *******cret, again *******cret, other *************oken',
    );
  });

  test('secrets with regex characters are matched literally', () => {
    expect(maskSecretsInMessage('failed with key+special.chars?', ['key+special.chars?'])).toBe('failed with **************ars?');
  });

  test('leaves messages without secrets unchanged', () => {
    expect(maskSecretsInMessage('No secrets here', ['notfound'])).toBe('No secrets here');
    expect(maskSecretsInMessage('Some message', [])).toBe('Some message');
  });
});
