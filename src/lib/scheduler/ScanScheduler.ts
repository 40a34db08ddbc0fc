import * as cron from 'node-cron';
import { ConfigError, errorMessage } from '../errors';
import { logger } from '../logger';
import type { RepositoryEntry } from '../registry/repository-config';
import type { ConfiguredScanReport, ScanOrchestrator, ScanRepositoryOptions } from '../scanner/ScanOrchestrator';

export interface ScheduledRun {
  startedAt: Date;
  finishedAt: Date;
  status: ConfiguredScanReport['status'] | 'error';
  report?: ConfiguredScanReport;
  error?: string;
}

/**
 * Periodic rescans of the configured repositories. A tick that fires while
 * the previous run is still going is skipped.
 */
export class ScanScheduler {
  private task?: cron.ScheduledTask;
  private controller?: AbortController;
  private currentRun?: Promise<ScheduledRun>;
  private lastRunResult?: ScheduledRun;

  constructor(
    private readonly orchestrator: ScanOrchestrator,
    private readonly loadEntries: () => Promise<RepositoryEntry[]>,
    private readonly scanOptions: Omit<ScanRepositoryOptions, 'signal'> = {},
  ) {}

  get isRunning(): boolean {
    return this.currentRun !== undefined;
  }

  get lastRun(): ScheduledRun | undefined {
    return this.lastRunResult;
  }

  start(cronExpression: string): void {
    if (!cron.validate(cronExpression)) {
      throw new ConfigError(`Invalid cron expression: ${cronExpression}`, ['SCAN_SCHEDULE_CRON is not a valid cron expression']);
    }

    this.task?.stop();
    this.task = cron.schedule(cronExpression, async () => {
      await this.runOnce();
    }, {
      timezone: 'UTC',
    });

    logger.scheduler(`Started scheduled scans with cron: ${cronExpression}`);
  }

  /**
   * Run one scan of every configured entry. Resolves to null when a run is
   * already in progress.
   */
  async runOnce(): Promise<ScheduledRun | null> {
    if (this.currentRun) {
      logger.scheduler('Previous scheduled scan still running, skipping this tick');
      return null;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.currentRun = this.execute(controller.signal);
    return this.currentRun;
  }

  // Never rejects; failures become an 'error' run
  private async execute(signal: AbortSignal): Promise<ScheduledRun> {
    const startedAt = new Date();
    let run: ScheduledRun;

    try {
      const entries = await this.loadEntries();
      logger.scheduler(`Executing scheduled scan of ${entries.length} entries`);

      const report = await this.orchestrator.scanConfiguredRepositories(entries, {
        ...this.scanOptions,
        signal,
      });

      run = { startedAt, finishedAt: new Date(), status: report.status, report };
      logger.scheduler(`Scheduled scan finished: ${report.status}`);
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`[SCHEDULER] Scheduled scan failed: ${message}`);
      run = { startedAt, finishedAt: new Date(), status: 'error', error: message };
    } finally {
      this.currentRun = undefined;
      this.controller = undefined;
    }

    this.lastRunResult = run;
    return run;
  }

  /**
   * Stop future ticks, cancel the run in progress between images and wait
   * for it to settle.
   */
  async stop(): Promise<void> {
    if (this.task) {
      this.task.stop();
      this.task = undefined;
      logger.scheduler('Stopped scheduled scans');
    }
    this.controller?.abort();
    if (this.currentRun) {
      await this.currentRun;
    }
  }
}
