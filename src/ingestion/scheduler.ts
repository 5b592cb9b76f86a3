import type { TelemetrySource } from '../adapters/telemetrySource.js';
import type { LoadReport, MetricStore } from '../store/metricStore.js';
import { LoadFailureError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface IngestionSchedulerConfig {
  /** Milliseconds between refreshes; 0 disables the timer */
  refreshIntervalMs: number;
}

export type IngestionOutcome =
  | { status: 'loaded'; report: LoadReport }
  | { status: 'failed'; error: string; report: LoadReport | null }
  | { status: 'skipped' };

/**
 * Pulls a batch from the telemetry source into the store on a fixed interval.
 * A cycle still in flight when the timer fires is not overlapped; that tick
 * is skipped. Failures are logged and the previous snapshot keeps serving.
 */
export class IngestionScheduler {
  private timer?: NodeJS.Timeout;
  private inFlight: Promise<IngestionOutcome> | null = null;
  private lastOutcome: IngestionOutcome | null = null;

  constructor(
    private readonly source: TelemetrySource,
    private readonly store: MetricStore,
    private readonly config: IngestionSchedulerConfig
  ) {}

  /**
   * Run one fetch-and-load cycle now
   */
  runOnce(): Promise<IngestionOutcome> {
    if (this.inFlight) {
      logger.debug('Ingestion cycle already running, skipping');
      return Promise.resolve({ status: 'skipped' });
    }

    this.inFlight = this.cycle().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  start(): void {
    if (this.timer) {
      logger.warn('Ingestion scheduler already started');
      return;
    }
    if (this.config.refreshIntervalMs <= 0) {
      logger.info('Periodic ingestion disabled');
      return;
    }

    this.timer = setInterval(() => {
      this.runOnce().catch(error => {
        logger.error('Unexpected ingestion failure', { error });
      });
    }, this.config.refreshIntervalMs);
    this.timer.unref();

    logger.info('Ingestion scheduler started', { refreshIntervalMs: this.config.refreshIntervalMs });
  }

  /**
   * Stop the timer and wait for a cycle in flight to settle
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      logger.info('Ingestion scheduler stopped');
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  getLastOutcome(): IngestionOutcome | null {
    return this.lastOutcome;
  }

  private async cycle(): Promise<IngestionOutcome> {
    const outcome = await this.fetchAndLoad();
    this.lastOutcome = outcome;
    return outcome;
  }

  private async fetchAndLoad(): Promise<IngestionOutcome> {
    try {
      const batch = await this.source.fetchBatch();
      const report = await this.store.load(batch.service, batch.error);
      logger.info('Ingestion cycle complete', {
        source: this.source.getType(),
        generation: report.generation,
        accepted: report.accepted,
        rejected: report.rejected
      });
      return { status: 'loaded', report };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Ingestion cycle failed, keeping the previous snapshot', {
        source: this.source.getType(),
        error: message
      });
      return {
        status: 'failed',
        error: message,
        report: error instanceof LoadFailureError && isLoadReport(error.report) ? error.report : null
      };
    }
  }
}

function isLoadReport(value: unknown): value is LoadReport {
  return typeof value === 'object' && value !== null && 'reasons' in value && Array.isArray(value.reasons);
}
