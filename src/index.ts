export * from './types';
export { config, loadConfig, resetConfig, type AppConfig } from './lib/config';
export { logger, Logger } from './lib/logger';
export * from './lib/errors';
export { initializeServices, shutdownServices, setupGracefulShutdown, type ScoutServices } from './lib/init';

export { ImageStore, type UpsertResult, type UpsertStatus, type StoreWarning } from './lib/db/ImageStore';
export { normalize, mapSeverity, detectLanguages, extractCapabilities, extractPackageManagers } from './lib/normalizer';
export * from './lib/recommendation';
export {
  parseImageReference,
  parseRepository,
  filterTags,
  compareTagVersions,
  hasPlatformKeyword,
  InvalidReferenceError,
} from './lib/registry/image-reference';
export { parseRepositoryConfig, loadRepositoryConfig, type RepositoryEntry } from './lib/registry/repository-config';
export {
  ScanOrchestrator,
  type TagEnumerator,
  type BatchScanReport,
  type ImageScanReport,
  type ConfiguredScanReport,
  type ScanFailure,
} from './lib/scanner/ScanOrchestrator';
export * from './lib/scanner/scanners';
export type { AdapterOutcome, AdapterFailure, ScanResult, IScannerAdapter, VerifiedRuntime } from './lib/scanner/types';
export { ScanScheduler } from './lib/scheduler/ScanScheduler';
