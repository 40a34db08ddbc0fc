import {
  formatReference,
  type ImageRecord,
  type ImageReference,
  type SourceStatus,
} from '../../types';
import { config } from '../config';
import type { ImageStore, UpsertResult, UpsertStatus } from '../db/ImageStore';
import { dockerClient, type DockerClient } from '../docker';
import { ImageScanError, NormalizationError, StoreError, errorMessage, type ScanStage } from '../errors';
import { logger } from '../logger';
import { normalize } from '../normalizer';
import { filterTags, parseRepository } from '../registry/image-reference';
import type { RepositoryEntry } from '../registry/repository-config';
import { getEnabledScanners } from './scanners';
import type { AdapterFailure, AdapterOutcome, IScannerAdapter } from './types';

/**
 * Lists the tags of a repository. Implemented by a registry client outside
 * this package.
 */
export interface TagEnumerator {
  listTags(repository: { registry: string; repository: string }): Promise<string[]>;
}

export interface OrchestratorSettings {
  imageBudgetMs: number;
  adapterTimeoutMs: number;
  workDir: string;
  cleanupImages: boolean;
  pullImages: boolean;
  maxTagsPerRepo: number;
}

export interface ScanOrchestratorDeps {
  store: ImageStore;
  scanners?: IScannerAdapter[];
  docker?: DockerClient;
  tagEnumerator?: TagEnumerator;
  settings?: Partial<OrchestratorSettings>;
  now?: () => Date;
}

export interface ScanImageOptions {
  comprehensive?: boolean;
  updateExisting?: boolean;
}

export interface ScanRepositoryOptions extends ScanImageOptions {
  maxTags?: number;
  filterTags?: boolean;
  signal?: AbortSignal;
}

export interface ImageScanReport {
  reference: string;
  record: ImageRecord;
  status: UpsertStatus;
  sources: SourceStatus[];
  durationMs: number;
}

export type BatchStage = ScanStage | 'enumerate';

export interface ScanFailure {
  reference: string;
  stage: BatchStage;
  message: string;
}

export interface BatchItem {
  reference: string;
  status: UpsertStatus | 'failed';
  message?: string;
}

export interface BatchScanReport {
  target: string;
  status: 'success' | 'partial' | 'failure';
  records: ImageRecord[];
  failures: ScanFailure[];
  items: BatchItem[];
  cancelled: boolean;
  startedAt: string;
  finishedAt: string;
}

export interface ConfiguredScanReport {
  status: 'success' | 'partial' | 'failure';
  reports: BatchScanReport[];
  cancelled: boolean;
}

function settingsFromConfig(): OrchestratorSettings {
  return {
    imageBudgetMs: config.scanTimeoutMinutes * 60 * 1000,
    adapterTimeoutMs: config.adapterTimeoutSeconds * 1000,
    workDir: config.scannerWorkDir,
    cleanupImages: config.cleanupImages,
    pullImages: true,
    maxTagsPerRepo: config.maxTagsPerRepo,
  };
}

function batchStatus(records: number, failures: number): BatchScanReport['status'] {
  if (failures === 0) return 'success';
  return records > 0 ? 'partial' : 'failure';
}

/**
 * Drives adapters, the normalizer and the store for single images and for
 * whole repositories.
 */
export class ScanOrchestrator {
  private readonly store: ImageStore;
  private readonly scanners: IScannerAdapter[];
  private readonly docker: DockerClient;
  private readonly tagEnumerator?: TagEnumerator;
  private readonly settings: OrchestratorSettings;
  private readonly now: () => Date;
  private dockerAvailable?: Promise<boolean>;

  constructor(deps: ScanOrchestratorDeps) {
    this.store = deps.store;
    this.scanners = deps.scanners ?? getEnabledScanners();
    this.docker = deps.docker ?? dockerClient;
    this.tagEnumerator = deps.tagEnumerator;
    this.settings = { ...settingsFromConfig(), ...deps.settings };
    this.now = deps.now ?? (() => new Date());
  }

  // Only a successful check is cached; a daemon that was down is asked again next scan
  private hasDocker(): Promise<boolean> {
    if (!this.dockerAvailable) {
      const check = this.docker.checkAccess().then(info => {
        if (!info.hasAccess) {
          logger.warn(`Docker is not available, images will not be pulled: ${info.error ?? 'unknown error'}`);
          if (this.dockerAvailable === check) this.dockerAvailable = undefined;
        }
        return info.hasAccess;
      });
      this.dockerAvailable = check;
    }
    return this.dockerAvailable;
  }

  private async runAdapter(adapter: IScannerAdapter, reference: ImageReference, deadline: number): Promise<AdapterOutcome> {
    const remaining = deadline - this.now().getTime();
    if (remaining <= 0) {
      return {
        ok: false,
        tool: adapter.name,
        kind: 'ToolTimeout',
        timeoutMs: 0,
        message: 'image scan budget exhausted before the tool could run',
      };
    }

    const timeoutMs = Math.min(this.settings.adapterTimeoutMs, remaining);
    let outcome: AdapterOutcome;
    try {
      outcome = await adapter.analyze(reference, { timeoutMs, workDir: this.settings.workDir });
    } catch (error) {
      outcome = {
        ok: false,
        tool: adapter.name,
        kind: 'ToolNonZeroExit',
        code: -1,
        stderr: '',
        message: `${adapter.name} could not run: ${errorMessage(error)}`,
      };
    }

    if (!outcome.ok) {
      logger.warn(`[SCANNER] ${adapter.name} failed for ${formatReference(reference)} (${outcome.kind}): ${outcome.message}`);
    }
    return outcome;
  }

  /**
   * Scan one image and persist the merged record. Adapter failures degrade
   * the record; only a scan with no usable output or a store failure throws.
   */
  async scanImage(reference: ImageReference, options: ScanImageOptions = {}): Promise<ImageScanReport> {
    const comprehensive = options.comprehensive ?? true;
    const updateExisting = options.updateExisting ?? false;
    const label = formatReference(reference);
    const startedAt = this.now().getTime();
    const deadline = startedAt + this.settings.imageBudgetMs;

    logger.scanner(`Scanning ${label}${comprehensive ? '' : ' (SBOM only)'}`);

    let pulled = false;
    try {
      if (this.settings.pullImages && (await this.hasDocker())) {
        try {
          await this.docker.pull(label, Math.max(1, deadline - this.now().getTime()));
          pulled = true;
        } catch (error) {
          logger.warn(`[SCANNER] ${errorMessage(error)}; scanners will fetch ${label} themselves`);
        }
      }

      const firstPass = this.scanners.filter(scanner => scanner.role !== 'vulnerability');
      const secondPass = comprehensive ? this.scanners.filter(scanner => scanner.role === 'vulnerability') : [];

      const outcomes = await Promise.all(firstPass.map(scanner => this.runAdapter(scanner, reference, deadline)));
      outcomes.push(...(await Promise.all(secondPass.map(scanner => this.runAdapter(scanner, reference, deadline)))));

      let record: ImageRecord;
      try {
        record = normalize(reference, outcomes, { now: this.now() });
      } catch (error) {
        if (error instanceof NormalizationError) {
          const reasons = outcomes
            .filter((outcome): outcome is AdapterFailure => !outcome.ok)
            .map(outcome => `${outcome.tool}: ${outcome.kind}`)
            .join(', ');
          throw new ImageScanError(label, 'normalize', `${error.message}${reasons ? ` (${reasons})` : ''}`, { cause: error });
        }
        throw error;
      }

      let result: UpsertResult;
      try {
        result = this.store.upsert(record, updateExisting);
      } catch (error) {
        if (error instanceof StoreError) {
          throw new ImageScanError(label, 'persist', error.message, { cause: error });
        }
        throw error;
      }

      const durationMs = this.now().getTime() - startedAt;
      logger.scanner(
        `${label}: ${result.status}, ${record.packages.length} packages, ` +
          `${record.severityCounts.total} vulnerabilities, digest ${record.digest}`,
      );
      return { reference: label, record: result.record, status: result.status, sources: record.sources, durationMs };
    } finally {
      if (pulled && this.settings.cleanupImages) {
        await this.docker.remove(label);
      }
    }
  }

  private async runBatch(
    target: string,
    references: ImageReference[],
    options: ScanRepositoryOptions,
    failures: ScanFailure[] = [],
  ): Promise<BatchScanReport> {
    const startedAt = this.now().toISOString();
    const records: ImageRecord[] = [];
    const items: BatchItem[] = failures.map(failure => ({ reference: failure.reference, status: 'failed', message: failure.message }));
    let cancelled = false;

    for (const reference of references) {
      if (options.signal?.aborted) {
        cancelled = true;
        logger.scanner(`Batch ${target} cancelled after ${records.length + failures.length} images`);
        break;
      }

      const label = formatReference(reference);
      try {
        const report = await this.scanImage(reference, options);
        records.push(report.record);
        items.push({ reference: label, status: report.status });
      } catch (error) {
        const stage: BatchStage = error instanceof ImageScanError ? error.stage : 'scan';
        const message = errorMessage(error);
        failures.push({ reference: label, stage, message });
        items.push({ reference: label, status: 'failed', message });
        logger.error(`[SCANNER] ${label} failed at ${stage}: ${message}`);
      }
    }

    const status = batchStatus(records.length, failures.length);
    logger.scanner(`Batch ${target}: ${status}, ${records.length} stored, ${failures.length} failed`);

    return {
      target,
      status,
      records,
      failures,
      items,
      cancelled,
      startedAt,
      finishedAt: this.now().toISOString(),
    };
  }

  /**
   * Enumerate, filter and scan the tags of one repository. Never throws;
   * every problem is itemized in the report.
   */
  async scanRepository(
    repository: string | { registry: string; repository: string },
    options: ScanRepositoryOptions = {},
  ): Promise<BatchScanReport> {
    const label = typeof repository === 'string' ? repository : `${repository.registry}/${repository.repository}`;
    const fail = (message: string, stage: BatchStage): Promise<BatchScanReport> =>
      this.runBatch(label, [], options, [{ reference: label, stage, message }]);

    let target: { registry: string; repository: string };
    try {
      target = typeof repository === 'string' ? parseRepository(repository) : repository;
    } catch (error) {
      return fail(errorMessage(error), 'enumerate');
    }

    if (!this.tagEnumerator) {
      return fail('no tag enumerator configured', 'enumerate');
    }

    let tags: string[];
    try {
      tags = await this.tagEnumerator.listTags(target);
    } catch (error) {
      return fail(`tag enumeration failed: ${errorMessage(error)}`, 'enumerate');
    }

    const selected = options.filterTags === false ? [...tags] : filterTags(tags);
    const maxTags = options.maxTags ?? this.settings.maxTagsPerRepo;
    const limited = maxTags > 0 ? selected.slice(0, maxTags) : selected;

    logger.scanner(`${target.registry}/${target.repository}: ${tags.length} tags, scanning ${limited.length}`);

    return this.runBatch(
      `${target.registry}/${target.repository}`,
      limited.map(tag => ({ ...target, tag })),
      options,
    );
  }

  /**
   * Scan every entry of a repository configuration in order: explicit
   * images directly, repositories through the tag enumerator.
   */
  async scanConfiguredRepositories(entries: RepositoryEntry[], options: ScanRepositoryOptions = {}): Promise<ConfiguredScanReport> {
    const reports: BatchScanReport[] = [];
    let cancelled = false;

    for (const entry of entries) {
      if (options.signal?.aborted) {
        cancelled = true;
        break;
      }
      const report =
        entry.kind === 'image'
          ? await this.runBatch(formatReference(entry.reference), [entry.reference], options)
          : await this.scanRepository({ registry: entry.registry, repository: entry.repository }, options);
      reports.push(report);
      cancelled = cancelled || report.cancelled;
    }

    const recordCount = reports.reduce((sum, report) => sum + report.records.length, 0);
    const failureCount = reports.reduce((sum, report) => sum + report.failures.length, 0);
    return { status: batchStatus(recordCount, failureCount), reports, cancelled };
  }
}
