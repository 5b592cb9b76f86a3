import { describe, it, expect } from 'vitest';
import { TrendPredictor } from '../../../src/analytics/trendPredictor.js';
import { defaultConfig } from '../../../src/config/defaults.js';
import type { RawRecord } from '../../../src/types/telemetry.js';
import { HOUR, MINUTE, serviceRow, snapshotOf } from '../helpers/telemetry.js';

const predictor = new TrendPredictor(defaultConfig.trend, defaultConfig.slo);

/** One row per hourly bucket, oldest first, ending at the snapshot's latest time */
function hourly(service: string, responseTimes: number[]): RawRecord[] {
  return responseTimes.map((responseTime, index) =>
    serviceRow({ service, offsetMs: (index - responseTimes.length + 1) * HOUR, responseTime })
  );
}

describe('TrendPredictor', () => {
  describe('bucketize', () => {
    it('averages rows into hourly buckets ending at the anchor', () => {
      const snapshot = snapshotOf([
        serviceRow({ service: 'a', offsetMs: 0, responseTime: 1 }),
        serviceRow({ service: 'a', offsetMs: -30 * MINUTE, responseTime: 2 }),
        serviceRow({ service: 'a', offsetMs: -HOUR, responseTime: 4 }),
        serviceRow({ service: 'a', offsetMs: -25 * HOUR, responseTime: 8 })
      ]);
      const anchor = snapshot.maxTimestamp('service');
      expect(anchor).not.toBeNull();
      if (!anchor) return;

      const points = predictor.bucketize(snapshot.queryWindow('service'), anchor, row => row.responseTimeAvg);

      expect(points).toEqual([
        { x: 22, y: 4 },
        { x: 23, y: 1.5 }
      ]);
    });
  });

  it('predicts a breach a few buckets ahead for a rising metric', () => {
    const report = predictor.predict(snapshotOf(hourly('search', [0.25, 0.5, 0.75])));

    expect(report.at_risk).toHaveLength(1);
    const [prediction] = report.at_risk;
    expect(prediction.risk_level).toBe('high');
    expect(prediction.metrics.response_time).toMatchObject({
      status: 'ok',
      slope: 0.25,
      intercept: -5,
      latest: 0.75,
      predicted_risk: true,
      buckets_to_breach: 2,
      risk_level: 'high'
    });
    expect(prediction.metrics.response_time.predicted_breach_at?.toISOString()).toBe('2025-01-15T14:00:00.000Z');
    expect(prediction.metrics.response_time.forecast.map(point => point.value)).toEqual([1, 1.25, 1.5, 1.75, 2, 2.25]);
    expect(prediction.metrics.error_rate.predicted_risk).toBe(false);
  });

  it('rates a metric already past target as critical with zero buckets to breach', () => {
    const report = predictor.predict(snapshotOf(hourly('search', [1, 1.25, 1.5])));

    expect(report.at_risk[0].metrics.response_time).toMatchObject({
      buckets_to_breach: 0,
      risk_level: 'critical'
    });
  });

  it('raises a distant breach one level when the latest value is close to target', () => {
    const longHorizon = new TrendPredictor({ ...defaultConfig.trend, horizonBuckets: 8 }, defaultConfig.slo);
    const report = longHorizon.predict(snapshotOf(hourly('search', [0.75, 0.78125, 0.8125])));

    expect(report.at_risk[0].metrics.response_time).toMatchObject({
      slope: 0.03125,
      buckets_to_breach: 7,
      risk_level: 'medium'
    });
  });

  it('caps a requested horizon at the configured one', () => {
    const rows = hourly('search', [0.75, 0.78125, 0.8125]);

    const capped = predictor.predict(snapshotOf(rows), 8);
    const shorter = predictor.predict(snapshotOf(rows), 2);

    expect(capped.horizon_buckets).toBe(6);
    expect(capped.at_risk).toEqual([]);
    expect(shorter.horizon_buckets).toBe(2);
  });

  it('predicts nothing for a flat or falling metric', () => {
    const report = predictor.predict(snapshotOf([
      ...hourly('falling', [0.75, 0.5, 0.25]),
      ...hourly('flat', [0.5, 0.5, 0.5])
    ]));

    expect(report.at_risk).toEqual([]);
    expect(report.services_evaluated).toBe(2);
    expect(report.insufficient_history).toEqual([]);
  });

  it('needs at least three buckets of history', () => {
    const report = predictor.predict(snapshotOf(hourly('young', [0.5, 2])));

    expect(report.insufficient_history).toEqual(['young']);
    expect(report.at_risk).toEqual([]);
  });

  it('orders services by risk level', () => {
    const report = predictor.predict(snapshotOf([
      ...hourly('rising', [0.25, 0.5, 0.75]),
      ...hourly('breached', [1, 1.25, 1.5])
    ]));

    expect(report.at_risk.map(prediction => prediction.service)).toEqual(['breached', 'rising']);
  });

  it('answers an empty report for an empty snapshot', () => {
    const report = predictor.predict(snapshotOf([]));

    expect(report.anchor).toBeNull();
    expect(report.services_evaluated).toBe(0);
  });

  describe('historicalPatterns', () => {
    it('summarizes traffic, hourly profile and slope', () => {
      const snapshot = snapshotOf([
        serviceRow({ service: 'api', offsetMs: -2 * HOUR, total: 100, responseTime: 0.25 }),
        serviceRow({ service: 'api', offsetMs: -HOUR, total: 200, responseTime: 0.5 }),
        serviceRow({ service: 'api', offsetMs: 0, total: 300, responseTime: 0.75 })
      ]);

      const patterns = predictor.historicalPatterns(snapshot, 'api');

      expect(patterns).not.toBeNull();
      if (!patterns) return;
      expect(patterns.data_points).toBe(3);
      expect(patterns.traffic_stats).toEqual({
        total_requests: 600,
        avg_requests_per_period: 200,
        peak_requests: 300,
        min_requests: 100
      });
      expect(patterns.response_time_stats.mean).toBe(0.5);
      expect(patterns.response_time_stats.p50).toBe(0.5);
      expect(patterns.hourly_patterns.map(pattern => pattern.hour)).toEqual([10, 11, 12]);
      expect(patterns.trends.response_time_slope_per_hour).toBe(0.25);
      expect(patterns.trends.error_rate_slope_per_hour).toBe(0);
      expect(patterns.anomalies).toEqual([]);
    });

    it('groups several rows of one hour into a single profile entry', () => {
      const patterns = predictor.historicalPatterns(snapshotOf([
        serviceRow({ service: 'api', offsetMs: -20 * MINUTE, total: 10 }),
        serviceRow({ service: 'api', offsetMs: -10 * MINUTE, total: 20 }),
        serviceRow({ service: 'api', offsetMs: 0, total: 30 })
      ]), 'api');

      expect(patterns?.hourly_patterns.map(({ hour, data_points, total_requests }) => ({ hour, data_points, total_requests })))
        .toEqual([
          { hour: 11, data_points: 2, total_requests: 30 },
          { hour: 12, data_points: 1, total_requests: 30 }
        ]);
    });

    it('flags points far from the mean', () => {
      const rows = Array.from({ length: 10 }, (_, index) =>
        serviceRow({ service: 'api', offsetMs: -index * 10 * MINUTE, responseTime: index === 4 ? 5 : 0.5 })
      );

      const patterns = predictor.historicalPatterns(snapshotOf(rows), 'api');

      expect(patterns?.anomalies).toHaveLength(1);
      expect(patterns?.anomalies[0]).toMatchObject({ metric: 'response_time', value: 5 });
      expect(patterns?.anomalies[0].timestamp.toISOString()).toBe('2025-01-15T11:20:00.000Z');
      expect(patterns?.anomalies[0].z_score).toBeCloseTo(2.846, 3);
    });

    it('returns null for a service without rows', () => {
      expect(predictor.historicalPatterns(snapshotOf([]), 'api')).toBeNull();
    });
  });
});
