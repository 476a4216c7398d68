/**
 * Engine Configuration Tests
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_CONFIG,
  configFromEnv,
  createConfig,
  findConfigFile,
  loadConfig,
  parseConfigFile,
} from '../../../core/config.js';
import { ConfigurationError } from '../../../core/errors.js';

function captureConfigError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('expected ConfigurationError');
}

describe('createConfig', () => {
  it('should return the defaults when no overrides are given', () => {
    const config = createConfig();

    expect(config.polling).toEqual({
      fastIntervalSeconds: 1,
      slowIntervalSeconds: 5,
      quietCyclesBeforeSlowdown: 10,
      adaptive: true,
    });
    expect(config.spatial.toleranceMeters).toBe(10);
    expect(config.sync.removalPolicy).toBe('retain');
    expect(config.http.endpointUrl).toBeUndefined();
  });

  it('should merge nested overrides without dropping sibling fields', () => {
    const config = createConfig({ polling: { slowIntervalSeconds: 30 } });

    expect(config.polling.slowIntervalSeconds).toBe(30);
    expect(config.polling.fastIntervalSeconds).toBe(1);
    expect(config.polling.quietCyclesBeforeSlowdown).toBe(10);
  });

  it('should ignore overrides that are explicitly undefined', () => {
    const config = createConfig({ polling: { adaptive: undefined } });

    expect(config.polling.adaptive).toBe(true);
  });

  it('should reject a slow interval shorter than the fast interval', () => {
    const error = captureConfigError(() =>
      createConfig({ polling: { fastIntervalSeconds: 10, slowIntervalSeconds: 5 } })
    );

    expect(error.issues).toEqual([
      'polling.slowIntervalSeconds: slowIntervalSeconds must be greater than or equal to fastIntervalSeconds',
    ]);
  });

  it('should reject a negative tolerance', () => {
    const error = captureConfigError(() => createConfig({ spatial: { toleranceMeters: -1 } }));

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^spatial\.toleranceMeters: /);
  });

  it('should reject a non-url endpoint', () => {
    const error = captureConfigError(() => createConfig({ http: { endpointUrl: 'not a url' } }));

    expect(error.issues[0]).toMatch(/^http\.endpointUrl: /);
  });

  it('should format issues for logging', () => {
    const error = new ConfigurationError('Invalid engine configuration', ['a: bad', 'b: worse']);

    expect(error.toLogString()).toBe(
      'ConfigurationError: Invalid engine configuration\n  - a: bad\n  - b: worse'
    );
  });
});

describe('parseConfigFile', () => {
  it('should parse YAML sections', () => {
    const parsed = parseConfigFile(
      'polling:\n  fastIntervalSeconds: 2\nsync:\n  removalPolicy: evict\n',
      'test.yaml'
    );

    expect(parsed).toEqual({
      polling: { fastIntervalSeconds: 2 },
      sync: { removalPolicy: 'evict' },
    });
  });

  it('should parse JSON content', () => {
    const parsed = parseConfigFile('{"spatial": {"toleranceMeters": 3}}', 'test.json');

    expect(parsed).toEqual({ spatial: { toleranceMeters: 3 } });
  });

  it('should treat an empty file as no configuration', () => {
    expect(parseConfigFile('', 'empty.yaml')).toEqual({});
  });

  it('should reject unknown keys', () => {
    const error = captureConfigError(() =>
      parseConfigFile('polling:\n  fastInterval: 2\n', 'typo.yaml')
    );

    expect(error.message).toBe('Invalid config file typo.yaml');
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^polling: /);
  });

  it('should reject unparseable YAML', () => {
    const error = captureConfigError(() => parseConfigFile('polling: [1, 2', 'broken.yaml'));

    expect(error.message).toMatch(/^Cannot parse config file broken\.yaml: /);
  });
});

describe('configFromEnv', () => {
  it('should read numeric, boolean and enum variables', () => {
    const partial = configFromEnv({
      BUILDING_SYNC_FAST_INTERVAL_SECONDS: '2',
      BUILDING_SYNC_ADAPTIVE_POLLING: 'false',
      BUILDING_SYNC_REMOVAL_POLICY: 'evict',
      BUILDING_SYNC_ENDPOINT: 'https://buildings.example.com/api',
    });

    expect(partial.polling?.fastIntervalSeconds).toBe(2);
    expect(partial.polling?.slowIntervalSeconds).toBeUndefined();
    expect(partial.polling?.adaptive).toBe(false);
    expect(partial.sync?.removalPolicy).toBe('evict');
    expect(partial.http?.endpointUrl).toBe('https://buildings.example.com/api');
  });

  it('should accept 1 and TRUE as true', () => {
    expect(configFromEnv({ BUILDING_SYNC_ADAPTIVE_POLLING: '1' }).polling?.adaptive).toBe(true);
    expect(configFromEnv({ BUILDING_SYNC_ADAPTIVE_POLLING: 'TRUE' }).polling?.adaptive).toBe(true);
  });

  it('should reject non-numeric values', () => {
    const error = captureConfigError(() => configFromEnv({ BUILDING_SYNC_TOLERANCE_METERS: 'ten' }));

    expect(error.message).toBe('BUILDING_SYNC_TOLERANCE_METERS is not a number: ten');
  });

  it('should reject an unknown removal policy', () => {
    const error = captureConfigError(() => configFromEnv({ BUILDING_SYNC_REMOVAL_POLICY: 'drop' }));

    expect(error.message).toBe('BUILDING_SYNC_REMOVAL_POLICY must be "retain" or "evict", got: drop');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'building-sync-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should use defaults when no file is found', () => {
    const { config, configPath } = loadConfig({ env: { BUILDING_SYNC_CONFIG: join(dir, 'missing.yaml') } });

    expect(configPath).toBeNull();
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('should discover a config file in a parent directory', () => {
    const nested = join(dir, 'a', 'b');
    writeFileSync(join(dir, '.building-syncrc'), 'spatial:\n  toleranceMeters: 4\n');

    expect(findConfigFile(join(dir))).toBe(join(dir, '.building-syncrc'));
    expect(findConfigFile(nested)).toBe(join(dir, '.building-syncrc'));
  });

  it('should layer file, environment and overrides in order', () => {
    const file = join(dir, 'sync.yaml');
    writeFileSync(
      file,
      'polling:\n  fastIntervalSeconds: 2\n  slowIntervalSeconds: 20\nspatial:\n  toleranceMeters: 4\n'
    );

    const { config, configPath } = loadConfig({
      configPath: file,
      env: { BUILDING_SYNC_SLOW_INTERVAL_SECONDS: '40', BUILDING_SYNC_TOLERANCE_METERS: '6' },
      overrides: { spatial: { toleranceMeters: 8 } },
    });

    expect(configPath).toBe(file);
    expect(config.polling.fastIntervalSeconds).toBe(2);
    expect(config.polling.slowIntervalSeconds).toBe(40);
    expect(config.spatial.toleranceMeters).toBe(8);
  });

  it('should fail when an explicit config file does not exist', () => {
    const missing = join(dir, 'nope.yaml');
    const error = captureConfigError(() => loadConfig({ configPath: missing, env: {} }));

    expect(error.message).toBe(`Config file not found: ${missing}`);
  });

  it('should validate the merged result', () => {
    const file = join(dir, 'sync.yaml');
    writeFileSync(file, 'polling:\n  fastIntervalSeconds: 9\n');

    const error = captureConfigError(() => loadConfig({ configPath: file, env: {} }));

    expect(error.issues).toEqual([
      'polling.slowIntervalSeconds: slowIntervalSeconds must be greater than or equal to fastIntervalSeconds',
    ]);
  });
});
