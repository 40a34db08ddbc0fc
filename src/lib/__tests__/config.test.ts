import os from 'os';
import path from 'path';
import { config, loadConfig, resetConfig } from '../config';
import { ConfigError } from '../errors';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      scanTimeoutMinutes: 30,
      adapterTimeoutSeconds: 300,
      enabledScanners: ['inspect', 'syft', 'grype', 'trivy'],
      cleanupImages: true,
      maxTagsPerRepo: 0,
      scannerWorkDir: path.join(os.tmpdir(), 'image-scout'),
      logLevel: 'info',
      defaultRegistry: 'docker.io',
      sizeMinimalMaxMb: 50,
      sizeBalancedMaxMb: 200,
      scanScheduleCron: undefined,
      repositoriesFile: undefined,
      databasePath: './data/images.db',
    });
  });

  it('should read overrides', () => {
    const loaded = loadConfig({
      ENABLED_SCANNERS: 'Syft, grype',
      CLEANUP_IMAGES: 'FALSE',
      LOG_LEVEL: 'DEBUG',
      MAX_TAGS_PER_REPO: '5',
      SCAN_SCHEDULE_CRON: '0 3 * * *',
      REPOSITORIES_FILE: './repositories.txt',
      DATABASE_PATH: '/var/lib/scout/images.db',
    });

    expect(loaded).toMatchObject({
      enabledScanners: ['syft', 'grype'],
      cleanupImages: false,
      logLevel: 'debug',
      maxTagsPerRepo: 5,
      scanScheduleCron: '0 3 * * *',
      repositoriesFile: './repositories.txt',
      databasePath: '/var/lib/scout/images.db',
    });
  });

  it('should report every problem at once', () => {
    let caught: unknown;
    try {
      loadConfig({ SCAN_TIMEOUT_MINUTES: '0', ENABLED_SCANNERS: 'syft,clair', LOG_LEVEL: 'verbose' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError ? caught.problems : []).toEqual([
      'LOG_LEVEL must be one of: debug, info, warn, error',
      'Invalid scanners: clair. Valid options: inspect, syft, grype, trivy, runtime',
      'SCAN_TIMEOUT_MINUTES must be between 1 and 180',
    ]);
  });

  it.each([
    [{ MAX_TAGS_PER_REPO: 'many' }, 'MAX_TAGS_PER_REPO must be zero (unlimited) or a positive integer'],
    [{ ADAPTER_TIMEOUT_SECONDS: '5' }, 'ADAPTER_TIMEOUT_SECONDS must be between 10 and 3600'],
    [{ SIZE_MINIMAL_MAX_MB: '300' }, 'SIZE_BALANCED_MAX_MB must be greater than SIZE_MINIMAL_MAX_MB'],
    [{ SCAN_SCHEDULE_CRON: '0 3 * * *' }, 'REPOSITORIES_FILE is required when SCAN_SCHEDULE_CRON is set'],
  ])('should reject %j', (env, message) => {
    expect(() => loadConfig(env)).toThrow(`Configuration validation failed: ${message}`);
  });
});

describe('config', () => {
  const original = process.env.DEFAULT_REGISTRY;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.DEFAULT_REGISTRY;
    } else {
      process.env.DEFAULT_REGISTRY = original;
    }
    resetConfig();
  });

  it('should re-read the environment after a reset', () => {
    process.env.DEFAULT_REGISTRY = 'registry.example.com';
    resetConfig();

    expect(config.defaultRegistry).toBe('registry.example.com');
  });
});
