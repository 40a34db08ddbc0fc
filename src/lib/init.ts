import { config } from './config';
import { ImageStore } from './db/ImageStore';
import { errorMessage } from './errors';
import { logger } from './logger';
import { RecommendationEngine } from './recommendation/RecommendationEngine';
import { loadRepositoryConfig, type RepositoryEntry } from './registry/repository-config';
import { ScanScheduler } from './scheduler/ScanScheduler';
import { ScanOrchestrator, type TagEnumerator } from './scanner/ScanOrchestrator';
import { getEnabledScanners, getScannerVersions } from './scanner/scanners';

export interface ScoutServices {
  store: ImageStore;
  orchestrator: ScanOrchestrator;
  engine: RecommendationEngine;
  scheduler?: ScanScheduler;
}

export interface InitializeOptions {
  tagEnumerator?: TagEnumerator;
}

let services: Promise<ScoutServices> | undefined;

async function readEntries(filePath: string): Promise<RepositoryEntry[]> {
  const parsed = await loadRepositoryConfig(filePath);
  for (const problem of parsed.errors) {
    logger.warn(`${filePath}:${problem.line}: skipping "${problem.text}": ${problem.message}`);
  }
  return parsed.entries;
}

async function createServices(options: InitializeOptions): Promise<ScoutServices> {
  logger.info('Initializing image scout services...');

  const store = await ImageStore.open(config.databasePath);
  const scanners = getEnabledScanners();
  const orchestrator = new ScanOrchestrator({ store, scanners, tagEnumerator: options.tagEnumerator });
  const engine = new RecommendationEngine(store);

  const versions = await getScannerVersions(scanners);
  logger.info(
    `Enabled scanners: ${Object.entries(versions).map(([name, version]) => `${name} (${version})`).join(', ')}`,
  );

  let scheduler: ScanScheduler | undefined;
  const { scanScheduleCron, repositoriesFile } = config;
  if (scanScheduleCron && repositoriesFile) {
    scheduler = new ScanScheduler(orchestrator, () => readEntries(repositoriesFile), { updateExisting: true });
    scheduler.start(scanScheduleCron);
  }

  logger.info('Image scout services initialized successfully');
  return { store, orchestrator, engine, scheduler };
}

/**
 * Open the store and wire the services once per process.
 */
export function initializeServices(options: InitializeOptions = {}): Promise<ScoutServices> {
  if (!services) {
    services = createServices(options).catch(error => {
      services = undefined;
      logger.error(`Failed to initialize services: ${errorMessage(error)}`);
      throw error;
    });
  }
  return services;
}

export async function shutdownServices(): Promise<void> {
  if (!services) return;
  const current = await services;
  services = undefined;
  // The store stays open until the scan in flight has persisted its image
  await current.scheduler?.stop();
  current.store.close();
  logger.info('Services shut down successfully');
}

// Graceful shutdown handler
export function setupGracefulShutdown(): void {
  const cleanup = (signal: string) => {
    logger.info(`Received ${signal}, shutting down image scout services...`);
    void shutdownServices()
      .catch(error => logger.error(`Error during shutdown: ${errorMessage(error)}`))
      .finally(() => process.exit(0));
  };

  process.on('SIGTERM', () => cleanup('SIGTERM'));
  process.on('SIGINT', () => cleanup('SIGINT'));
}
