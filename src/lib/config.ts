/**
 * Centralized configuration management for the image scout
 * All environment variables are defined and validated here
 */

import os from 'os';
import path from 'path';
import { ConfigError } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const VALID_SCANNERS = ['inspect', 'syft', 'grype', 'trivy', 'runtime'] as const;
export type ScannerName = (typeof VALID_SCANNERS)[number];

// Runtime verification starts containers, so it is opt-in
const DEFAULT_SCANNERS: readonly ScannerName[] = ['inspect', 'syft', 'grype', 'trivy'];
const LOG_LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface AppConfig {
  // Scanner Configuration
  scanTimeoutMinutes: number;
  adapterTimeoutSeconds: number;
  enabledScanners: ScannerName[];
  cleanupImages: boolean;
  maxTagsPerRepo: number;
  scannerWorkDir: string;

  // Logging
  logLevel: LogLevel;

  // Registry
  defaultRegistry: string;

  // Recommendation size categories
  sizeMinimalMaxMb: number;
  sizeBalancedMaxMb: number;

  // Scheduling
  scanScheduleCron?: string;
  repositoriesFile?: string;

  // Database
  databasePath: string;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return Number.parseInt(value, 10);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_NAMES.some(level => level === value);
}

function isScannerName(value: string): value is ScannerName {
  return VALID_SCANNERS.some(scanner => scanner === value);
}

/**
 * Parse environment variables. Unknown values are kept as-is so that
 * validation can report them.
 */
function parseEnvConfig(env: NodeJS.ProcessEnv): { config: AppConfig; invalid: string[] } {
  const invalid: string[] = [];

  const rawLevel = (env.LOG_LEVEL || 'info').toLowerCase();
  if (!isLogLevel(rawLevel)) {
    invalid.push('LOG_LEVEL must be one of: debug, info, warn, error');
  }

  const scannerNames = (env.ENABLED_SCANNERS || DEFAULT_SCANNERS.join(','))
    .split(',')
    .map(s => s.trim().toLowerCase())
    .filter(s => s.length > 0);
  const unknownScanners = scannerNames.filter(s => !isScannerName(s));
  if (unknownScanners.length > 0) {
    invalid.push(`Invalid scanners: ${unknownScanners.join(', ')}. Valid options: ${VALID_SCANNERS.join(', ')}`);
  }

  const config: AppConfig = {
    scanTimeoutMinutes: parseInteger(env.SCAN_TIMEOUT_MINUTES, 30),
    adapterTimeoutSeconds: parseInteger(env.ADAPTER_TIMEOUT_SECONDS, 300),
    enabledScanners: scannerNames.filter(isScannerName),
    cleanupImages: env.CLEANUP_IMAGES?.toLowerCase() !== 'false',
    maxTagsPerRepo: parseInteger(env.MAX_TAGS_PER_REPO, 0),
    scannerWorkDir: env.SCANNER_WORKDIR || path.join(os.tmpdir(), 'image-scout'),

    logLevel: isLogLevel(rawLevel) ? rawLevel : 'info',

    defaultRegistry: env.DEFAULT_REGISTRY || 'docker.io',

    sizeMinimalMaxMb: parseInteger(env.SIZE_MINIMAL_MAX_MB, 50),
    sizeBalancedMaxMb: parseInteger(env.SIZE_BALANCED_MAX_MB, 200),

    scanScheduleCron: env.SCAN_SCHEDULE_CRON || undefined,
    repositoriesFile: env.REPOSITORIES_FILE || undefined,

    databasePath: env.DATABASE_PATH || './data/images.db',
  };

  return { config, invalid };
}

/**
 * Validate configuration values
 */
function validateConfig(config: AppConfig, errors: string[]): void {
  if (!Number.isInteger(config.scanTimeoutMinutes) || config.scanTimeoutMinutes < 1 || config.scanTimeoutMinutes > 180) {
    errors.push('SCAN_TIMEOUT_MINUTES must be between 1 and 180');
  }

  if (!Number.isInteger(config.adapterTimeoutSeconds) || config.adapterTimeoutSeconds < 10 || config.adapterTimeoutSeconds > 3600) {
    errors.push('ADAPTER_TIMEOUT_SECONDS must be between 10 and 3600');
  }

  if (!Number.isInteger(config.maxTagsPerRepo) || config.maxTagsPerRepo < 0) {
    errors.push('MAX_TAGS_PER_REPO must be zero (unlimited) or a positive integer');
  }

  if (config.enabledScanners.length === 0) {
    errors.push('At least one scanner must be enabled');
  }

  if (!Number.isInteger(config.sizeMinimalMaxMb) || config.sizeMinimalMaxMb < 1) {
    errors.push('SIZE_MINIMAL_MAX_MB must be a positive integer');
  }

  if (!Number.isInteger(config.sizeBalancedMaxMb) || config.sizeBalancedMaxMb <= config.sizeMinimalMaxMb) {
    errors.push('SIZE_BALANCED_MAX_MB must be greater than SIZE_MINIMAL_MAX_MB');
  }

  if (config.scanScheduleCron && !config.repositoriesFile) {
    errors.push('REPOSITORIES_FILE is required when SCAN_SCHEDULE_CRON is set');
  }

  if (errors.length > 0) {
    throw new ConfigError(`Configuration validation failed: ${errors.join(', ')}`, errors);
  }
}

/**
 * Build a validated configuration from an environment map.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { config, invalid } = parseEnvConfig(env);
  validateConfig(config, invalid);
  return config;
}

let cachedConfig: AppConfig | undefined;

/**
 * Get configuration singleton - lazy loaded and cached
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}

/**
 * Drop the cached configuration so the next access re-reads the environment.
 */
export function resetConfig(): void {
  cachedConfig = undefined;
}

export const config: AppConfig = new Proxy<AppConfig>(loadConfig({}), {
  get(_target, prop) {
    return Reflect.get(getConfig(), prop);
  },
});
