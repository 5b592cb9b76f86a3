import type { DegradationConfig } from '../config/types.js';
import type { ServiceMetricRecord } from '../types/telemetry.js';
import type { MetricSnapshot } from '../store/snapshot.js';
import { compareNames, mean, percentChange, sum } from './statistics.js';
import { ErrorCodeBucket, errorCodeHistogram } from './errorCodes.js';

const MINUTE_MS = 60 * 1000;

export type DegradationSeverity = 'warning' | 'critical';

/** Metrics whose increase counts as worsening */
export const TRACKED_METRICS = ['error_rate', 'response_time', 'response_time_p95', 'response_time_p99'] as const;
export type TrackedMetric = typeof TRACKED_METRICS[number];

const METRIC_VALUE: Record<TrackedMetric, (row: ServiceMetricRecord) => number | null> = {
  error_rate: row => row.errorRate,
  response_time: row => row.responseTimeAvg,
  response_time_p95: row => row.responseTimeP95,
  response_time_p99: row => row.responseTimeP99
};

export interface Interval {
  start: Date;
  end: Date;
}

export interface MetricComparison {
  baseline: number | null;
  recent: number | null;
  change_percent: number | null;
}

export interface ServiceComparison {
  service: string;
  is_degrading: boolean;
  severity: DegradationSeverity | null;
  degraded_metrics: TrackedMetric[];
  max_worsening_change_percent: number | null;
  metrics: Record<TrackedMetric, MetricComparison>;
  /** Informational only */
  volume: MetricComparison;
  recent_errors: number;
}

export interface DegradationReport {
  window_minutes: number;
  threshold_percent: number;
  critical_threshold_percent: number;
  windows: { baseline: Interval; recent: Interval } | null;
  degrading: ServiceComparison[];
  stable: string[];
  no_baseline: string[];
  no_recent: string[];
}

export interface ErrorCodeDistribution {
  service: string | null;
  time_window_minutes: number;
  window: Interval | null;
  total_errors: number;
  distribution: ErrorCodeBucket[];
}

export interface VolumePoint {
  timestamp: Date;
  total_requests: number;
  errors: number;
  error_rate: number | null;
  response_time: number | null;
}

export interface VolumeTrends {
  status: 'ok' | 'insufficient_data';
  service: string;
  time_window_minutes: number;
  window: Interval | null;
  summary: {
    total_volume: number;
    total_errors: number;
    avg_error_rate: number | null;
    avg_response_time: number | null;
    requests_per_minute: number;
  };
  previous_window: {
    total_volume: number;
    volume_change_percent: number | null;
  };
  direction: 'increasing' | 'decreasing' | 'stable' | null;
  time_series: VolumePoint[];
}

function compare(
  baseline: readonly ServiceMetricRecord[],
  recent: readonly ServiceMetricRecord[],
  value: (row: ServiceMetricRecord) => number | null
): MetricComparison {
  const before = mean(baseline.map(value));
  const after = mean(recent.map(value));
  return { baseline: before, recent: after, change_percent: percentChange(before, after) };
}

/**
 * Compares each service's recent window with the adjacent window before it.
 */
export class DegradationDetector {
  constructor(private readonly config: DegradationConfig) {}

  /**
   * Baseline `(t_max - 2W, t_max - W]` and recent `(t_max - W, t_max]`
   */
  windows(snapshot: MetricSnapshot, windowMinutes: number): { baseline: Interval; recent: Interval } | null {
    const end = snapshot.maxTimestamp('service');
    if (!end) {
      return null;
    }
    const split = new Date(end.getTime() - windowMinutes * MINUTE_MS);
    const start = new Date(end.getTime() - 2 * windowMinutes * MINUTE_MS);
    return { baseline: { start, end: split }, recent: { start: split, end } };
  }

  detect(
    snapshot: MetricSnapshot,
    windowMinutes = this.config.windowMinutes,
    thresholdPercent = this.config.thresholdPercent
  ): DegradationReport {
    const criticalThreshold = thresholdPercent * this.config.criticalMultiplier;
    const report: DegradationReport = {
      window_minutes: windowMinutes,
      threshold_percent: thresholdPercent,
      critical_threshold_percent: criticalThreshold,
      windows: this.windows(snapshot, windowMinutes),
      degrading: [],
      stable: [],
      no_baseline: [],
      no_recent: []
    };
    if (!report.windows) {
      return report;
    }

    const byService = (row: ServiceMetricRecord): string => row.serviceName;
    const baseline = snapshot.queryWindow('service', report.windows.baseline, byService);
    const recent = snapshot.queryWindow('service', report.windows.recent, byService);

    for (const service of snapshot.serviceNames()) {
      const recentRows = recent.get(service);
      const baselineRows = baseline.get(service);
      if (!recentRows) {
        report.no_recent.push(service);
        continue;
      }
      if (!baselineRows) {
        report.no_baseline.push(service);
        continue;
      }

      const comparison = this.compareService(service, baselineRows, recentRows, thresholdPercent, criticalThreshold);
      if (comparison.is_degrading) {
        report.degrading.push(comparison);
      } else {
        report.stable.push(service);
      }
    }

    report.degrading.sort((a, b) =>
      (b.max_worsening_change_percent ?? 0) - (a.max_worsening_change_percent ?? 0) || compareNames(a.service, b.service)
    );
    return report;
  }

  private compareService(
    service: string,
    baseline: readonly ServiceMetricRecord[],
    recent: readonly ServiceMetricRecord[],
    thresholdPercent: number,
    criticalThreshold: number
  ): ServiceComparison {
    const metrics = {
      error_rate: compare(baseline, recent, METRIC_VALUE.error_rate),
      response_time: compare(baseline, recent, METRIC_VALUE.response_time),
      response_time_p95: compare(baseline, recent, METRIC_VALUE.response_time_p95),
      response_time_p99: compare(baseline, recent, METRIC_VALUE.response_time_p99)
    };

    const degraded = TRACKED_METRICS.filter(metric => {
      const change = metrics[metric].change_percent;
      return change !== null && change > thresholdPercent;
    });

    let maxChange: number | null = null;
    for (const metric of TRACKED_METRICS) {
      const change = metrics[metric].change_percent;
      if (change !== null && change > 0 && (maxChange === null || change > maxChange)) {
        maxChange = change;
      }
    }

    const isDegrading = degraded.length > 0;

    return {
      service,
      is_degrading: isDegrading,
      severity: !isDegrading || maxChange === null ? null : maxChange >= criticalThreshold ? 'critical' : 'warning',
      degraded_metrics: degraded,
      max_worsening_change_percent: maxChange,
      metrics,
      volume: compare(baseline, recent, row => row.totalCount),
      recent_errors: sum(recent.map(row => row.errorCount))
    };
  }

  /**
   * Error-code histogram over `(t_max_err - W, t_max_err]`, optionally for one
   * service: error rows whose transaction id is one of the service's sids or
   * whose application name is the service name.
   */
  errorCodeDistribution(snapshot: MetricSnapshot, windowMinutes: number, service?: string): ErrorCodeDistribution {
    const end = snapshot.maxTimestamp('error');
    if (!end) {
      return { service: service ?? null, time_window_minutes: windowMinutes, window: null, total_errors: 0, distribution: [] };
    }

    const window = { start: new Date(end.getTime() - windowMinutes * MINUTE_MS), end };
    let rows = snapshot.queryWindow('error', window);

    if (service !== undefined) {
      const sids = new Set<string>();
      for (const row of snapshot.queryWindow('service', { service })) {
        if (row.sid !== null) {
          sids.add(row.sid);
        }
      }
      rows = rows.filter(row =>
        (row.wmTransactionId !== null && sids.has(row.wmTransactionId)) || row.wmApplicationName === service
      );
    }

    const histogram = errorCodeHistogram(rows);
    return {
      service: service ?? null,
      time_window_minutes: windowMinutes,
      window,
      total_errors: histogram.total_errors,
      distribution: histogram.buckets
    };
  }

  /**
   * Request volume for one service over `(t_max - W, t_max]` against the window before it
   */
  volumeTrends(snapshot: MetricSnapshot, service: string, windowMinutes: number): VolumeTrends {
    const windows = this.windows(snapshot, windowMinutes);
    const recent = windows ? snapshot.queryWindow('service', { ...windows.recent, service }) : [];
    const previous = windows ? snapshot.queryWindow('service', { ...windows.baseline, service }) : [];

    const totalVolume = sum(recent.map(row => row.totalCount));
    const previousVolume = sum(previous.map(row => row.totalCount));
    const change = previous.length > 0 ? percentChange(previousVolume, totalVolume) : null;

    let direction: VolumeTrends['direction'] = null;
    if (change !== null) {
      direction = change > this.config.thresholdPercent
        ? 'increasing'
        : change < -this.config.thresholdPercent ? 'decreasing' : 'stable';
    }

    return {
      status: recent.length > 0 ? 'ok' : 'insufficient_data',
      service,
      time_window_minutes: windowMinutes,
      window: windows ? windows.recent : null,
      summary: {
        total_volume: totalVolume,
        total_errors: sum(recent.map(row => row.errorCount)),
        avg_error_rate: mean(recent.map(row => row.errorRate)),
        avg_response_time: mean(recent.map(row => row.responseTimeAvg)),
        requests_per_minute: totalVolume / windowMinutes
      },
      previous_window: {
        total_volume: previousVolume,
        volume_change_percent: change
      },
      direction,
      time_series: recent.map(row => ({
        timestamp: row.recordTime,
        total_requests: row.totalCount,
        errors: row.errorCount,
        error_rate: row.errorRate,
        response_time: row.responseTimeAvg
      }))
    };
  }
}
