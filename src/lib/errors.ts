/**
 * Error types shared across the scanner, store and recommendation layers.
 */

export class ScoutError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends ScoutError {
  constructor(message: string, readonly problems: string[] = []) {
    super('CONFIG_INVALID', message);
  }
}

export class NormalizationError extends ScoutError {
  constructor(message: string) {
    super('NORMALIZATION_FAILED', message);
  }
}

export class StoreError extends ScoutError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_FAILED', message, options);
  }
}

export type ScanStage = 'scan' | 'normalize' | 'persist';

export class ImageScanError extends ScoutError {
  constructor(
    readonly reference: string,
    readonly stage: ScanStage,
    message: string,
    options?: { cause?: unknown },
  ) {
    super('IMAGE_SCAN_FAILED', message, options);
  }
}

export class RequirementsError extends ScoutError {
  constructor(readonly issues: string[]) {
    super('REQUIREMENTS_INVALID', `Invalid requirements: ${issues.join('; ')}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Errno-style code check that also works for errors created in another
 * realm, where `instanceof Error` is false.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
