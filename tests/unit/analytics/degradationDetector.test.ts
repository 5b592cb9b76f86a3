import { describe, it, expect } from 'vitest';
import { DegradationDetector } from '../../../src/analytics/degradationDetector.js';
import { defaultConfig } from '../../../src/config/defaults.js';
import type { RawRecord } from '../../../src/types/telemetry.js';
import { errorRow, MINUTE, serviceRow, snapshotOf } from '../helpers/telemetry.js';

const detector = new DegradationDetector(defaultConfig.degradation);

/**
 * One row per minute over the last hour: flat 0.5s for the older half, then
 * climbing steadily from 0.5s to 5s.
 */
function risingLatency(service: string): RawRecord[] {
  return Array.from({ length: 60 }, (_, minute) => {
    const responseTime = minute < 30 ? 0.5 : 0.5 + (4.5 * (minute - 30)) / 29;
    return serviceRow({ service, offsetMs: (minute - 59) * MINUTE, total: 100, errors: 0, responseTime });
  });
}

describe('DegradationDetector', () => {
  it('flags rising latency as critical over a 30 minute window', () => {
    const report = detector.detect(snapshotOf(risingLatency('checkout')), 30);

    expect(report.degrading).toHaveLength(1);
    const [entry] = report.degrading;
    expect(entry.service).toBe('checkout');
    expect(entry.severity).toBe('critical');
    expect(entry.degraded_metrics).toEqual(['response_time']);
    expect(entry.metrics.response_time.baseline).toBe(0.5);
    expect(entry.metrics.response_time.recent).toBeCloseTo(2.75, 9);
    expect(entry.metrics.response_time.change_percent).toBeCloseTo(450, 6);
    expect(report.critical_threshold_percent).toBe(40);
  });

  it('has no baseline when the window covers all history', () => {
    const report = detector.detect(snapshotOf(risingLatency('checkout')), 60);

    expect(report.degrading).toEqual([]);
    expect(report.no_baseline).toEqual(['checkout']);
  });

  it('leaves the change undefined when the baseline is zero', () => {
    const snapshot = snapshotOf([
      serviceRow({ service: 'payments', offsetMs: -40 * MINUTE, total: 100, errors: 0 }),
      serviceRow({ service: 'payments', offsetMs: 0, total: 100, errors: 5 })
    ]);

    const report = detector.detect(snapshot, 30);

    expect(report.stable).toEqual(['payments']);
    expect(report.degrading).toEqual([]);
  });

  it('separates warning from critical and orders by the worst change', () => {
    const snapshot = snapshotOf([
      serviceRow({ service: 'mild', offsetMs: -40 * MINUTE, responseTime: 1 }),
      serviceRow({ service: 'mild', offsetMs: 0, responseTime: 1.25 }),
      serviceRow({ service: 'severe', offsetMs: -40 * MINUTE, responseTime: 1 }),
      serviceRow({ service: 'severe', offsetMs: 0, responseTime: 2 }),
      serviceRow({ service: 'steady', offsetMs: -40 * MINUTE, responseTime: 1 }),
      serviceRow({ service: 'steady', offsetMs: 0, responseTime: 1.125 }),
      serviceRow({ service: 'gone', offsetMs: -40 * MINUTE })
    ]);

    const report = detector.detect(snapshot, 30);

    expect(report.degrading.map(entry => [entry.service, entry.severity, entry.max_worsening_change_percent])).toEqual([
      ['severe', 'critical', 100],
      ['mild', 'warning', 25]
    ]);
    expect(report.stable).toEqual(['steady']);
    expect(report.no_recent).toEqual(['gone']);
  });

  it('honours a caller threshold', () => {
    const snapshot = snapshotOf([
      serviceRow({ service: 'mild', offsetMs: -40 * MINUTE, responseTime: 1 }),
      serviceRow({ service: 'mild', offsetMs: 0, responseTime: 1.25 })
    ]);

    const report = detector.detect(snapshot, 30, 30);

    expect(report.stable).toEqual(['mild']);
    expect(report.threshold_percent).toBe(30);
  });

  it('returns an empty report for an empty snapshot', () => {
    const report = detector.detect(snapshotOf([]));

    expect(report.windows).toBeNull();
    expect(report.window_minutes).toBe(30);
    expect(report.degrading).toEqual([]);
  });

  describe('errorCodeDistribution', () => {
    const snapshot = snapshotOf(
      [serviceRow({ service: 'payments', offsetMs: 0, sid: 'txn-7' })],
      [
        errorRow({ application: 'payments', offsetMs: 0, codes: ['E500'], errors: 3 }),
        errorRow({ application: 'payments', offsetMs: -10 * MINUTE, codes: ['E500', 'E404'], errors: 2 }),
        errorRow({ application: 'orders', offsetMs: -5 * MINUTE, codes: [], errors: 1 }),
        errorRow({ application: 'payments', offsetMs: -40 * MINUTE, codes: ['E500'], errors: 7 }),
        errorRow({ application: 'payments', offsetMs: -MINUTE, codes: ['E503'], errors: 0 })
      ]
    );

    it('groups errors in the window by code combination', () => {
      const distribution = detector.errorCodeDistribution(snapshot, 30);

      expect(distribution.total_errors).toBe(6);
      expect(distribution.distribution.map(bucket => [bucket.error_code, bucket.count, bucket.percentage])).toEqual([
        ['E500', 3, 50],
        ['E404,E500', 2, (2 * 100) / 6],
        ['unknown', 1, (1 * 100) / 6]
      ]);
    });

    it('filters by service name', () => {
      const distribution = detector.errorCodeDistribution(snapshot, 30, 'payments');

      expect(distribution.service).toBe('payments');
      expect(distribution.total_errors).toBe(5);
      expect(distribution.distribution.map(bucket => bucket.error_code)).toEqual(['E500', 'E404,E500']);
    });
  });

  describe('volumeTrends', () => {
    const snapshot = snapshotOf([
      serviceRow({ service: 'payments', offsetMs: -50 * MINUTE, total: 100 }),
      serviceRow({ service: 'payments', offsetMs: -40 * MINUTE, total: 100 }),
      serviceRow({ service: 'payments', offsetMs: -10 * MINUTE, total: 150, errors: 3 }),
      serviceRow({ service: 'payments', offsetMs: 0, total: 150 })
    ]);

    it('compares the recent window with the one before it', () => {
      const trends = detector.volumeTrends(snapshot, 'payments', 30);

      expect(trends.status).toBe('ok');
      expect(trends.summary).toEqual({
        total_volume: 300,
        total_errors: 3,
        avg_error_rate: 1,
        avg_response_time: 0.2,
        requests_per_minute: 10
      });
      expect(trends.previous_window).toEqual({ total_volume: 200, volume_change_percent: 50 });
      expect(trends.direction).toBe('increasing');
      expect(trends.time_series.map(point => point.total_requests)).toEqual([150, 150]);
    });

    it('reports insufficient data for an unknown service', () => {
      const trends = detector.volumeTrends(snapshot, 'unknown', 30);

      expect(trends.status).toBe('insufficient_data');
      expect(trends.direction).toBeNull();
    });
  });
});
