import { describe, it, expect } from 'vitest';
import { AggregateRanker } from '../../../src/analytics/aggregateRanker.js';
import { DegradationDetector } from '../../../src/analytics/degradationDetector.js';
import { SloEvaluator } from '../../../src/analytics/sloEvaluator.js';
import { defaultConfig } from '../../../src/config/defaults.js';
import { errorRow, MINUTE, serviceRow, snapshotOf } from '../helpers/telemetry.js';

const ranker = new AggregateRanker();

describe('AggregateRanker', () => {
  const snapshot = snapshotOf(
    [
      serviceRow({ service: 'bravo', offsetMs: 0, total: 500, errors: 15, responseTime: 0.5 }),
      serviceRow({ service: 'alpha', offsetMs: 0, total: 500, errors: 0, responseTime: 0.5 }),
      serviceRow({ service: 'charlie', offsetMs: 0, total: 200, errors: 20, responseTime: 2 }),
      serviceRow({ service: 'delta', offsetMs: 0, total: 100, errors: 0, responseTime: null })
    ],
    [
      errorRow({ application: 'bravo', offsetMs: 0, codes: ['E2'], errors: 4 }),
      errorRow({ application: 'charlie', offsetMs: 0, codes: ['E1'], errors: 4 }),
      errorRow({ application: 'charlie', offsetMs: -MINUTE, codes: ['E3'], errors: 9 }),
      errorRow({ application: 'charlie', offsetMs: -2 * MINUTE, codes: ['E9'], errors: 0 })
    ]
  );

  it('ranks by volume with ties broken by name', () => {
    expect(ranker.topByVolume(snapshot, 3).map(entry => [entry.service, entry.total_requests])).toEqual([
      ['alpha', 500],
      ['bravo', 500],
      ['charlie', 200]
    ]);
  });

  it('ranks by mean response time and leaves out unknown latency', () => {
    expect(ranker.slowest(snapshot, 10).map(entry => entry.service)).toEqual(['charlie', 'alpha', 'bravo']);
  });

  it('ranks by error rate and leaves out error-free services', () => {
    expect(ranker.errorProne(snapshot, 10).map(entry => [entry.service, entry.avg_error_rate])).toEqual([
      ['charlie', 10],
      ['bravo', 3]
    ]);
  });

  it('builds the error histogram over all error rows', () => {
    const { total_errors, errors } = ranker.topErrors(snapshot, 2);

    expect(total_errors).toBe(17);
    expect(errors.map(bucket => [bucket.error_code, bucket.count])).toEqual([
      ['E3', 9],
      ['E1', 4]
    ]);
  });

  it('counts each service once in the health overview', () => {
    const evaluations = new SloEvaluator(defaultConfig.slo).evaluate(snapshot);
    const degradation = new DegradationDetector(defaultConfig.degradation).detect(snapshot);

    const overview = ranker.overview(snapshot, evaluations, degradation);

    expect(overview).toEqual({
      total_services: 4,
      healthy_services: 2,
      degraded_services: 0,
      violating_services: 2,
      insufficient_data_services: 0,
      health_percentage: 50,
      total_requests: 1300,
      total_errors: 35,
      overall_error_rate: (35 * 100) / 1300,
      violating: ['bravo', 'charlie'],
      degraded: [],
      insufficient_data: []
    });
  });
});
