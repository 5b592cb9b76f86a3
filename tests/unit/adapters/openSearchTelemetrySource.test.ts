import { describe, it, expect } from 'vitest';
import { AxiosAdapter, AxiosError, AxiosResponse } from 'axios';
import { OpenSearchTelemetrySource, OpenSearchSourceOptions } from '../../../src/adapters/opensearch/telemetrySource.js';
import { OpenSearchRequestError } from '../../../src/adapters/opensearch/core/core.js';

interface StubReply {
  status: number;
  data: unknown;
}

interface RecordedCall {
  method: string;
  url: string;
  requestId: string;
  body: unknown;
}

/**
 * In-process transport answering requests from a queue of canned replies
 */
function stubTransport(replies: StubReply[]): { adapter: AxiosAdapter; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const adapter: AxiosAdapter = async config => {
    const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
    calls.push({
      method: config.method ?? '',
      url: config.url ?? '',
      requestId: String(config.headers.get('X-Request-ID')),
      body
    });

    const reply = replies.shift() ?? { status: 500, data: { error: 'unexpected request' } };
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config
    };
    if (reply.status >= 400) {
      throw new AxiosError(`Request failed with status code ${reply.status}`, undefined, config, undefined, response);
    }
    return response;
  };
  return { adapter, calls };
}

const NOW = new Date('2025-01-15T12:00:00.000Z');

function sourceWith(adapter: AxiosAdapter, overrides: Partial<OpenSearchSourceOptions> = {}): OpenSearchTelemetrySource {
  return new OpenSearchTelemetrySource({
    baseURL: 'http://opensearch.test:9200',
    username: 'reader',
    password: 'test-secret',
    serviceIndex: 'service-metrics',
    errorIndex: 'service-metrics-error',
    lookbackHours: 4,
    pageSize: 2,
    maxRetries: 2,
    retryDelay: 1,
    clock: () => NOW,
    adapter,
    ...overrides
  });
}

const hit = (id: string, service: string) => ({ _id: id, _source: { service_name: service } });

describe('OpenSearchTelemetrySource', () => {
  it('builds a newest-first range query over the lookback', () => {
    const { adapter } = stubTransport([]);
    const query = sourceWith(adapter).buildQuery(['service_name'], new Date('2025-01-15T08:00:00.000Z'), NOW);

    expect(query).toEqual({
      size: 2,
      query: { range: { record_time: { gte: Date.parse('2025-01-15T08:00:00.000Z'), lte: NOW.getTime() } } },
      sort: [{ record_time: { order: 'desc' } }],
      fields: ['service_name'],
      _source: true
    });
  });

  it('caps the page size at the cluster limit', () => {
    const { adapter } = stubTransport([]);
    const query = sourceWith(adapter, { pageSize: 50000 }).buildQuery([], NOW, NOW);
    expect(query.size).toBe(10000);
  });

  it('scrolls through every page and clears the scroll context', async () => {
    const { adapter, calls } = stubTransport([
      { status: 200, data: { _scroll_id: 'scroll-1', hits: { total: { value: 3 }, hits: [hit('a', 'payments'), hit('b', 'orders')] } } },
      { status: 200, data: { _scroll_id: 'scroll-2', hits: { hits: [hit('c', 'search')] } } },
      { status: 200, data: { _scroll_id: 'scroll-2', hits: { hits: [] } } },
      { status: 200, data: { succeeded: true } },
      { status: 200, data: { hits: { total: 1, hits: [{ _id: 'e', _source: { wm_application_name: 'payments' } }] } } }
    ]);

    const batch = await sourceWith(adapter).fetchBatch();

    expect(batch.service).toEqual([
      { service_name: 'payments', id: 'a' },
      { service_name: 'orders', id: 'b' },
      { service_name: 'search', id: 'c' }
    ]);
    expect(batch.error).toEqual([{ wm_application_name: 'payments', id: 'e' }]);
    expect(calls.map(call => `${call.method} ${call.url}`)).toEqual([
      'post /service-metrics/_search?scroll=2m',
      'post /_search/scroll',
      'post /_search/scroll',
      'delete /_search/scroll',
      'post /service-metrics-error/_search?scroll=2m'
    ]);
    expect(calls[1].body).toEqual({ scroll: '2m', scroll_id: 'scroll-1' });
    expect(calls[2].body).toEqual({ scroll: '2m', scroll_id: 'scroll-2' });
    expect(calls[3].body).toEqual({ scroll_id: 'scroll-2' });
  });

  it('keeps scrolling past a total reported as a lower bound', async () => {
    const { adapter, calls } = stubTransport([
      { status: 200, data: { _scroll_id: 'scroll-1', hits: { total: { value: 2, relation: 'gte' }, hits: [hit('a', 'payments'), hit('b', 'orders')] } } },
      { status: 200, data: { _scroll_id: 'scroll-1', hits: { hits: [hit('c', 'search')] } } },
      { status: 200, data: { _scroll_id: 'scroll-1', hits: { hits: [] } } },
      { status: 200, data: { succeeded: true } },
      { status: 200, data: { hits: { total: 0, hits: [] } } }
    ]);

    const batch = await sourceWith(adapter).fetchBatch();

    expect(batch.service.map(row => row.id)).toEqual(['a', 'b', 'c']);
    expect(calls.map(call => `${call.method} ${call.url}`)).toEqual([
      'post /service-metrics/_search?scroll=2m',
      'post /_search/scroll',
      'post /_search/scroll',
      'delete /_search/scroll',
      'post /service-metrics-error/_search?scroll=2m'
    ]);
  });

  it('retries throttled requests under the same request id', async () => {
    const { adapter, calls } = stubTransport([
      { status: 503, data: { error: { reason: 'unavailable' } } },
      { status: 200, data: { hits: { total: 0, hits: [] } } },
      { status: 200, data: { hits: { total: 0, hits: [] } } }
    ]);

    const batch = await sourceWith(adapter).fetchBatch();

    expect(batch).toEqual({ service: [], error: [] });
    expect(calls).toHaveLength(3);
    expect(calls[1].requestId).toBe(calls[0].requestId);
    expect(calls[2].requestId).not.toBe(calls[0].requestId);
  });

  it('gives up after maxRetries and reports the cluster reason', async () => {
    const { adapter, calls } = stubTransport([
      { status: 503, data: { error: { reason: 'cluster busy' } } },
      { status: 503, data: { error: { reason: 'cluster busy' } } }
    ]);

    const failure = sourceWith(adapter, { maxRetries: 1 }).fetchBatch();

    await expect(failure).rejects.toBeInstanceOf(OpenSearchRequestError);
    await expect(failure).rejects.toThrow('cluster busy');
    expect(calls).toHaveLength(2);
  });

  it('does not retry client errors', async () => {
    const { adapter, calls } = stubTransport([
      { status: 404, data: { error: { reason: 'no such index [service-metrics]' } } }
    ]);

    await expect(sourceWith(adapter).fetchBatch()).rejects.toThrow('no such index [service-metrics]');
    expect(calls).toHaveLength(1);
  });
});
