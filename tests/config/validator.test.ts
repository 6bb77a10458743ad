import { validateConfig } from '../../src/config/validator';

function minimal(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    accounts: [{ id: 'acct1', token: 'test-secret', services: [{ id: 'svc1' }] }],
    ...overrides,
  };
}

describe('validateConfig', () => {
  test('applies defaults to a minimal document', () => {
    const result = validateConfig(minimal());

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.config).toEqual({
      intervalMs: 10_000,
      fullReconcileIntervalMs: 3_600_000,
      cachePath: './edge-sync-cache.json',
      maxConcurrency: 4,
      namePrefix: 'edgesync',
      statusPort: 8080,
      retry: { maxAttempts: 4, baseDelayMs: 500, maxDelayMs: 30_000 },
      filters: { origins: [], scenariosContaining: [], scenariosNotContaining: [] },
      accounts: [
        {
          id: 'acct1',
          token: 'test-secret',
          minRequestIntervalMs: 0,
          services: [{ id: 'svc1', activate: true, allowInPlaceEdits: false, containerCapacity: 1000, maxItems: 5000 }],
        },
      ],
    });
  });

  test('the validated configuration is frozen', () => {
    const config = validateConfig(minimal()).config;
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config?.accounts[0].services[0])).toBe(true);
  });

  test('captcha settings get a default cookie lifetime', () => {
    const result = validateConfig({
      accounts: [
        {
          id: 'acct1',
          token: 'test-secret',
          services: [{ id: 'svc1', referenceVersion: 7, captcha: { siteKey: 'test-site-key' } }],
        },
      ],
    });

    expect(result.valid).toBe(true);
    expect(result.config?.accounts[0].services[0].referenceVersion).toBe(7);
    expect(result.config?.accounts[0].services[0].captcha).toEqual({ siteKey: 'test-site-key', cookieExpirySeconds: 1800 });
  });

  test('collects every error with its field', () => {
    const result = validateConfig({
      intervalMs: 0,
      namePrefix: '9bad-prefix',
      retry: { baseDelayMs: 100, maxDelayMs: 50 },
      accounts: [{ id: 'acct1', services: [] }],
    });

    expect(result.valid).toBe(false);
    expect(result.config).toBeUndefined();
    expect(result.errors.map((e) => [e.code, e.details?.field])).toEqual([
      ['CONFIG.INVALID', 'intervalMs'],
      ['CONFIG.INVALID', 'namePrefix'],
      ['CONFIG.INVALID', 'accounts[0].services'],
      ['CONFIG.INVALID', 'accounts[0].token'],
      ['CONFIG.INVALID', 'retry.maxDelayMs'],
    ]);
    expect(result.errors[0].message).toBe('intervalMs must be an integer >= 1');
  });

  test('account and service ids must be unique', () => {
    const result = validateConfig({
      accounts: [
        { id: 'acct1', token: 'test-secret', services: [{ id: 'svc1' }] },
        { id: 'acct1', token: 'test-secret', services: [{ id: 'svc1' }] },
      ],
    });

    expect(result.errors.map((e) => e.message)).toEqual([
      'Duplicate account id "acct1"',
      'Service "svc1" is configured more than once',
    ]);
  });

  test('a missing account list is an error', () => {
    const result = validateConfig({});
    expect(result.errors.map((e) => e.message)).toEqual(['accounts must be a non-empty array']);
  });

  test('a non-object document is rejected', () => {
    expect(validateConfig([]).errors[0].message).toBe('Configuration must be a JSON object');
  });

  test('suspicious but valid settings produce warnings', () => {
    const result = validateConfig({
      intervalMs: 60_000,
      fullReconcileIntervalMs: 1000,
      accounts: [{ id: 'acct1', token: 'test-secret', services: [{ id: 'svc1', containerCapacity: 100, maxItems: 10 }] }],
    });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'fullReconcileIntervalMs is shorter than intervalMs; every tick will be a full reconciliation',
      'accounts[0].services[0]: maxItems is smaller than containerCapacity; one container per kind will be used',
    ]);
  });

  test('the token never appears in error messages', () => {
    const result = validateConfig({ accounts: [{ id: 'acct1', token: 'test-secret', services: 'svc1' }] });
    expect(result.errors.some((e) => e.message.includes('test-secret'))).toBe(false);
  });
});
