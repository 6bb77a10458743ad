import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { applyEnvOverrides, loadConfigFile } from '../../src/config/loader';
import { SyncError } from '../../src/domain/errors';
import { resetLogHandler, setLogHandler } from '../../src/logger';

const DOCUMENT = {
  intervalMs: 5000,
  accounts: [{ id: 'acct1', token: 'test-secret', services: [{ id: 'svc1' }] }],
};

describe('applyEnvOverrides', () => {
  test('environment values replace file values, numbers are parsed', () => {
    const result = applyEnvOverrides(DOCUMENT, {
      EDGE_SYNC_CACHE_PATH: '/var/lib/edge-sync/cache.json',
      EDGE_SYNC_INTERVAL_MS: '2500',
      PORT: '',
    });

    expect(result.cachePath).toBe('/var/lib/edge-sync/cache.json');
    expect(result.intervalMs).toBe(2500);
    expect(result.statusPort).toBeUndefined();
    expect(DOCUMENT.intervalMs).toBe(5000);
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeAll(() => setLogHandler(() => undefined));
  afterAll(() => resetLogHandler());

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'edge-sync-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(content: string): string {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, content);
    return file;
  }

  function codeOf(fn: () => unknown): string | undefined {
    try {
      fn();
    } catch (err) {
      return err instanceof SyncError ? err.typedError.code : 'not a SyncError';
    }
    return undefined;
  }

  test('loads, overrides and validates', () => {
    const config = loadConfigFile(write(JSON.stringify(DOCUMENT)), { PORT: '9090' });
    expect(config.intervalMs).toBe(5000);
    expect(config.statusPort).toBe(9090);
    expect(config.accounts[0].services[0].id).toBe('svc1');
  });

  test('an unreadable file is a configuration error', () => {
    expect(codeOf(() => loadConfigFile(path.join(dir, 'missing.json'), {}))).toBe('CONFIG.INVALID');
  });

  test('invalid JSON is a configuration error', () => {
    expect(() => loadConfigFile(write('{ nope'), {})).toThrow(/is not valid JSON/);
  });

  test('a JSON array is a configuration error', () => {
    expect(() => loadConfigFile(write('[]'), {})).toThrow('must contain a JSON object');
  });

  test('an invalid override is reported like a file error', () => {
    expect(() => loadConfigFile(write(JSON.stringify(DOCUMENT)), { EDGE_SYNC_INTERVAL_MS: 'soon' })).toThrow(
      'intervalMs must be an integer >= 1',
    );
  });
});
