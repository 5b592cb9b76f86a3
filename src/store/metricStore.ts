import type {
  ErrorMetricRecord,
  RawRecord,
  ServiceMetricRecord,
  TableName
} from '../types/telemetry.js';
import { LoadFailureError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { MetricSnapshot } from './snapshot.js';
import { parseErrorRecord, parseServiceRecord, ParseOptions } from './recordParser.js';

export interface RejectionReason {
  table: TableName;
  index: number;
  id: string | null;
  reason: string;
}

export interface TableLoadCounts {
  accepted: number;
  rejected: number;
}

export interface LoadReport {
  generation: string | null;
  applied_at: Date | null;
  accepted: number;
  rejected: number;
  service: TableLoadCounts;
  error: TableLoadCounts;
  reasons: RejectionReason[];
}

export interface MetricStoreOptions extends ParseOptions {
  /** Rows parsed between two yields to the event loop */
  parseChunkSize: number;
}

interface ParsedTable<T> {
  rows: T[];
  counts: TableLoadCounts;
}

const yieldToEventLoop = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

function rawId(row: RawRecord): string | null {
  const id = row.id ?? row._id;
  return typeof id === 'string' || typeof id === 'number' ? String(id) : null;
}

/**
 * In-memory holder of the current telemetry snapshot.
 *
 * Readers call `snapshot()` once per computation and work on that immutable
 * view. `load` and `clear` run one at a time and publish by swapping the
 * reference, so a reader never observes a half-applied batch.
 */
export class MetricStore {
  private current: MetricSnapshot = MetricSnapshot.empty();
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly options: MetricStoreOptions) {}

  snapshot(): MetricSnapshot {
    return this.current;
  }

  /**
   * Replace both tables with a new batch
   * @throws LoadFailureError when the batch cannot produce a usable snapshot; the previous snapshot stays active
   */
  load(serviceRows: readonly RawRecord[], errorRows: readonly RawRecord[]): Promise<LoadReport> {
    return this.enqueue(() => this.applyLoad(serviceRows, errorRows));
  }

  clear(): Promise<void> {
    return this.enqueue(async () => {
      this.current = MetricSnapshot.empty();
      logger.info('Metric store cleared', { generation: this.current.generation });
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // Keep the chain alive whatever the outcome; callers see the rejection on `run`
    this.queue = run.catch(error => {
      logger.debug('Queued store task failed', { error });
    });
    return run;
  }

  private async parseTable<T extends { id: string }>(
    table: TableName,
    rows: readonly RawRecord[],
    parse: (row: RawRecord) => T,
    reasons: RejectionReason[]
  ): Promise<ParsedTable<T>> {
    const accepted: T[] = [];
    const seen = new Set<string>();
    let rejected = 0;

    for (let start = 0; start < rows.length; start += this.options.parseChunkSize) {
      if (start > 0) {
        await yieldToEventLoop();
      }
      const end = Math.min(rows.length, start + this.options.parseChunkSize);
      for (let index = start; index < end; index++) {
        try {
          const record = parse(rows[index]);
          if (seen.has(record.id)) {
            throw new ValidationError(`duplicate id ${record.id}`, 'id');
          }
          seen.add(record.id);
          accepted.push(record);
        } catch (error) {
          if (!(error instanceof ValidationError)) {
            throw error;
          }
          rejected++;
          reasons.push({ table, index, id: rawId(rows[index]), reason: error.message });
        }
      }
    }

    return { rows: accepted, counts: { accepted: accepted.length, rejected } };
  }

  private async applyLoad(serviceRows: readonly RawRecord[], errorRows: readonly RawRecord[]): Promise<LoadReport> {
    const reasons: RejectionReason[] = [];
    const service = await this.parseTable<ServiceMetricRecord>(
      'service', serviceRows, row => parseServiceRecord(row, this.options), reasons
    );
    const error = await this.parseTable<ErrorMetricRecord>('error', errorRows, parseErrorRecord, reasons);

    const report: LoadReport = {
      generation: null,
      applied_at: null,
      accepted: service.counts.accepted + error.counts.accepted,
      rejected: service.counts.rejected + error.counts.rejected,
      service: service.counts,
      error: error.counts,
      reasons
    };

    const failure = serviceRows.length === 0
      ? 'service batch is empty'
      : service.counts.accepted === 0
        ? 'no service row could be accepted'
        : errorRows.length > 0 && error.counts.accepted === 0
          ? 'no error row could be accepted'
          : null;

    if (failure) {
      logger.warn('Telemetry batch rejected, keeping previous snapshot', {
        failure,
        generation: this.current.generation,
        rejected: report.rejected
      });
      throw new LoadFailureError<LoadReport>(`Load failed: ${failure}`, report);
    }

    const next = new MetricSnapshot(service.rows, error.rows);
    this.current = next;

    report.generation = next.generation;
    report.applied_at = next.loadedAt;

    logger.info('Telemetry snapshot replaced', {
      generation: next.generation,
      accepted: report.accepted,
      rejected: report.rejected
    });
    if (reasons.length > 0) {
      logger.debug('Rejected telemetry rows', { reasons: reasons.slice(0, 50) });
    }

    return report;
  }
}

