import { OpenSearchCore, OpenSearchCoreOptions } from './core/core.js';
import { TelemetrySource } from '../telemetrySource.js';
import { flattenHits, SearchHit, searchResponseSchema, SearchResponse, totalHits } from '../hits.js';
import type { RawRecord, TelemetryBatch } from '../../types/telemetry.js';
import { logger } from '../../utils/logger.js';

/** Largest page a search request may ask for */
export const MAX_PAGE_SIZE = 10000;
const SCROLL_KEEP_ALIVE = '2m';

export const SERVICE_FIELDS = [
  'service_name',
  'total_count',
  'success_count',
  'error_count',
  'na_error_count',
  'success_rate',
  'error_rate',
  'target_error_slo_perc',
  'target_response_slo_sec',
  'response_target_percent'
] as const;

export const ERROR_FIELDS = [
  'summary',
  'error_details',
  'technical_error_count',
  'business_error_count'
] as const;

export interface OpenSearchSourceOptions extends OpenSearchCoreOptions {
  serviceIndex: string;
  errorIndex: string;
  lookbackHours: number;
  pageSize: number;
  /** Defaults to the wall clock; fixes "now" for the lookback range */
  clock?: () => Date;
}

/**
 * Reads the last `lookbackHours` of both indices, newest first, scrolling
 * when an index holds more than one page.
 */
export class OpenSearchTelemetrySource extends OpenSearchCore implements TelemetrySource {
  private readonly options: OpenSearchSourceOptions;

  constructor(options: OpenSearchSourceOptions) {
    super(options);
    this.options = options;
  }

  getType(): 'opensearch' {
    return 'opensearch';
  }

  async fetchBatch(): Promise<TelemetryBatch> {
    const end = (this.options.clock ?? (() => new Date()))();
    const start = new Date(end.getTime() - this.options.lookbackHours * 3600 * 1000);

    logger.info('Fetching telemetry from OpenSearch', {
      from: start.toISOString(),
      to: end.toISOString()
    });

    const service = await this.queryIndex(this.options.serviceIndex, SERVICE_FIELDS, start, end);
    const error = await this.queryIndex(this.options.errorIndex, ERROR_FIELDS, start, end);

    logger.info('Fetched telemetry from OpenSearch', { service: service.length, error: error.length });
    return { service, error };
  }

  /**
   * Search body for one index over `[start, end]` in epoch milliseconds
   */
  buildQuery(fields: readonly string[], start: Date, end: Date): Record<string, unknown> {
    return {
      size: this.pageSize(),
      query: {
        range: {
          record_time: { gte: start.getTime(), lte: end.getTime() }
        }
      },
      sort: [{ record_time: { order: 'desc' } }],
      fields: [...fields],
      _source: true
    };
  }

  private pageSize(): number {
    if (this.options.pageSize > MAX_PAGE_SIZE) {
      logger.warn(`Page size ${this.options.pageSize} exceeds the OpenSearch limit, using ${MAX_PAGE_SIZE}`);
      return MAX_PAGE_SIZE;
    }
    return this.options.pageSize;
  }

  private async search(url: string, body: unknown): Promise<SearchResponse> {
    return searchResponseSchema.parse(await this.callRequest('POST', url, body));
  }

  private async queryIndex(index: string, fields: readonly string[], start: Date, end: Date): Promise<RawRecord[]> {
    const body = this.buildQuery(fields, start, end);
    const first = await this.search(`/${encodeURIComponent(index)}/_search?scroll=${SCROLL_KEEP_ALIVE}`, body);

    const hits: SearchHit[] = [...first.hits.hits];
    let scrollId = first._scroll_id;
    let page = first;

    // hits.total is only a lower bound past 10000, so scroll until a page comes back empty
    try {
      while (scrollId && page.hits.hits.length > 0) {
        page = await this.search('/_search/scroll', { scroll: SCROLL_KEEP_ALIVE, scroll_id: scrollId });
        hits.push(...page.hits.hits);
        scrollId = page._scroll_id ?? scrollId;
      }
    } finally {
      if (scrollId) {
        await this.clearScroll(scrollId);
      }
    }

    logger.debug(`Retrieved ${hits.length} hits from ${index}`, { reportedTotal: totalHits(first) });
    return flattenHits(hits);
  }

  private async clearScroll(scrollId: string): Promise<void> {
    try {
      await this.callRequest('DELETE', '/_search/scroll', { scroll_id: scrollId });
    } catch (error) {
      // Scroll contexts expire on their own after the keep-alive
      logger.warn('Failed to clear scroll context', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }
}
