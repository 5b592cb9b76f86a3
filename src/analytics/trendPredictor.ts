import type { SloConfig, TrendConfig } from '../config/types.js';
import type { ServiceMetricRecord } from '../types/telemetry.js';
import type { MetricSnapshot } from '../store/snapshot.js';
import {
  compareNames,
  linearRegression,
  max,
  mean,
  min,
  percentile,
  stdDev,
  sum
} from './statistics.js';
import { resolveTargets } from './targets.js';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';
const RISK_ORDER: readonly RiskLevel[] = ['low', 'medium', 'high', 'critical'];

export type TrendMetric = 'error_rate' | 'response_time';

const TREND_VALUE: Record<TrendMetric, (row: ServiceMetricRecord) => number | null> = {
  error_rate: row => row.errorRate,
  response_time: row => row.responseTimeAvg
};

export interface ForecastPoint {
  bucket_end: Date;
  value: number;
}

export interface MetricTrend {
  metric: TrendMetric;
  status: 'ok' | 'insufficient_history';
  buckets_observed: number;
  slope: number | null;
  intercept: number | null;
  latest: number | null;
  target: number;
  predicted_risk: boolean;
  /** 0 when the latest bucket is already past target */
  buckets_to_breach: number | null;
  predicted_breach_at: Date | null;
  risk_level: RiskLevel | null;
  forecast: ForecastPoint[];
}

export interface ServicePrediction {
  service: string;
  status: 'ok' | 'insufficient_history';
  predicted_risk: boolean;
  risk_level: RiskLevel | null;
  metrics: Record<TrendMetric, MetricTrend>;
}

export interface PredictionReport {
  anchor: Date | null;
  bucket_minutes: number;
  lookback_hours: number;
  horizon_buckets: number;
  services_evaluated: number;
  at_risk: ServicePrediction[];
  insufficient_history: string[];
}

export interface SummaryStats {
  mean: number | null;
  std: number | null;
  min: number | null;
  max: number | null;
  p50: number | null;
  p95: number | null;
  p99: number | null;
}

export interface HourlyPattern {
  hour: number;
  data_points: number;
  total_requests: number;
  error_rate: number | null;
  response_time: number | null;
}

export interface Anomaly {
  timestamp: Date;
  metric: TrendMetric;
  value: number;
  z_score: number;
}

export interface HistoricalPatterns {
  status: 'ok';
  service: string;
  data_points: number;
  time_range: { start: Date; end: Date };
  error_rate_stats: SummaryStats;
  response_time_stats: SummaryStats & { observed_min: number | null; observed_max: number | null };
  traffic_stats: {
    total_requests: number;
    avg_requests_per_period: number;
    peak_requests: number;
    min_requests: number;
  };
  hourly_patterns: HourlyPattern[];
  /** Fitted change per hour */
  trends: { error_rate_slope_per_hour: number | null; response_time_slope_per_hour: number | null };
  anomalies: Anomaly[];
}

function stats(values: readonly (number | null)[]): SummaryStats {
  return {
    mean: mean(values),
    std: stdDev(values),
    min: min(values),
    max: max(values),
    p50: percentile(values, 0.5),
    p95: percentile(values, 0.95),
    p99: percentile(values, 0.99)
  };
}

/**
 * Fits a least-squares line per service and metric over fixed buckets and
 * extrapolates it a bounded number of buckets ahead.
 */
export class TrendPredictor {
  constructor(
    private readonly config: TrendConfig,
    private readonly slo: SloConfig
  ) {}

  private bucketCount(): number {
    return Math.floor((this.config.lookbackHours * 60) / this.config.bucketMinutes);
  }

  /**
   * Mean value per bucket; bucket `j` covers `(t_max - (n-j)B, t_max - (n-j-1)B]`.
   * Empty buckets are left out.
   */
  bucketize(
    rows: readonly ServiceMetricRecord[],
    anchor: Date,
    value: (row: ServiceMetricRecord) => number | null
  ): { x: number; y: number }[] {
    const n = this.bucketCount();
    const bucketMs = this.config.bucketMinutes * MINUTE_MS;
    const buckets = new Map<number, (number | null)[]>();

    for (const row of rows) {
      const offset = anchor.getTime() - row.recordTime.getTime();
      if (offset < 0) {
        continue;
      }
      const j = n - 1 - Math.floor(offset / bucketMs);
      if (j < 0) {
        continue;
      }
      const bucket = buckets.get(j);
      if (bucket) {
        bucket.push(value(row));
      } else {
        buckets.set(j, [value(row)]);
      }
    }

    const points: { x: number; y: number }[] = [];
    for (const [x, values] of [...buckets.entries()].sort((a, b) => a[0] - b[0])) {
      const y = mean(values);
      if (y !== null) {
        points.push({ x, y });
      }
    }
    return points;
  }

  riskLevel(bucketsToBreach: number, latest: number, target: number): RiskLevel {
    const { riskCutLines, approachFraction } = this.config;
    if (latest > target) {
      return 'critical';
    }

    let level: RiskLevel = bucketsToBreach <= riskCutLines.critical
      ? 'critical'
      : bucketsToBreach <= riskCutLines.high
        ? 'high'
        : bucketsToBreach <= riskCutLines.medium ? 'medium' : 'low';

    if ((level === 'low' || level === 'medium') && latest >= approachFraction * target) {
      level = RISK_ORDER[RISK_ORDER.indexOf(level) + 1];
    }
    return level;
  }

  /**
   * Trend of one metric over already-windowed rows
   */
  metricTrend(
    metric: TrendMetric,
    rows: readonly ServiceMetricRecord[],
    anchor: Date,
    target: number,
    horizonBuckets: number
  ): MetricTrend {
    const points = this.bucketize(rows, anchor, TREND_VALUE[metric]);
    const base: MetricTrend = {
      metric,
      status: 'insufficient_history',
      buckets_observed: points.length,
      slope: null,
      intercept: null,
      latest: points.length > 0 ? points[points.length - 1].y : null,
      target,
      predicted_risk: false,
      buckets_to_breach: null,
      predicted_breach_at: null,
      risk_level: null,
      forecast: []
    };

    const fit = points.length >= this.config.minBuckets ? linearRegression(points) : null;
    if (!fit || base.latest === null) {
      return base;
    }

    const lastIndex = this.bucketCount() - 1;
    const bucketMs = this.config.bucketMinutes * MINUTE_MS;
    const forecast: ForecastPoint[] = [];
    for (let k = 1; k <= horizonBuckets; k++) {
      forecast.push({
        bucket_end: new Date(anchor.getTime() + k * bucketMs),
        value: fit.intercept + fit.slope * (lastIndex + k)
      });
    }

    const result: MetricTrend = { ...base, status: 'ok', slope: fit.slope, intercept: fit.intercept, forecast };
    if (fit.slope <= 0) {
      return result;
    }

    let bucketsToBreach: number | null = base.latest > target ? 0 : null;
    if (bucketsToBreach === null) {
      const crossing = forecast.findIndex(point => point.value > target);
      bucketsToBreach = crossing >= 0 ? crossing + 1 : null;
    }
    if (bucketsToBreach === null) {
      return result;
    }

    return {
      ...result,
      predicted_risk: true,
      buckets_to_breach: bucketsToBreach,
      predicted_breach_at: new Date(anchor.getTime() + bucketsToBreach * bucketMs),
      risk_level: this.riskLevel(bucketsToBreach, base.latest, target)
    };
  }

  predictService(
    service: string,
    rows: readonly ServiceMetricRecord[],
    anchor: Date,
    horizonBuckets: number
  ): ServicePrediction {
    const targets = resolveTargets(rows, this.slo);
    const metrics: Record<TrendMetric, MetricTrend> = {
      error_rate: this.metricTrend('error_rate', rows, anchor, targets.errorRate, horizonBuckets),
      response_time: this.metricTrend('response_time', rows, anchor, targets.responseTime, horizonBuckets)
    };

    let riskLevel: RiskLevel | null = null;
    for (const trend of Object.values(metrics)) {
      if (trend.risk_level && (riskLevel === null || RISK_ORDER.indexOf(trend.risk_level) > RISK_ORDER.indexOf(riskLevel))) {
        riskLevel = trend.risk_level;
      }
    }

    const sufficient = Object.values(metrics).some(trend => trend.status === 'ok');
    return {
      service,
      status: sufficient ? 'ok' : 'insufficient_history',
      predicted_risk: riskLevel !== null,
      risk_level: riskLevel,
      metrics
    };
  }

  /**
   * Services predicted to breach a target within the horizon, worst first
   */
  predict(snapshot: MetricSnapshot, requestedBuckets = this.config.horizonBuckets): PredictionReport {
    // Never extrapolate past the configured horizon
    const horizonBuckets = Math.min(Math.max(1, Math.floor(requestedBuckets)), this.config.horizonBuckets);
    const anchor = snapshot.maxTimestamp('service');
    const report: PredictionReport = {
      anchor,
      bucket_minutes: this.config.bucketMinutes,
      lookback_hours: this.config.lookbackHours,
      horizon_buckets: horizonBuckets,
      services_evaluated: 0,
      at_risk: [],
      insufficient_history: []
    };
    if (!anchor) {
      return report;
    }

    const start = new Date(anchor.getTime() - this.bucketCount() * this.config.bucketMinutes * MINUTE_MS);
    const grouped = snapshot.queryWindow('service', { start, end: anchor }, row => row.serviceName);

    for (const service of snapshot.serviceNames()) {
      const prediction = this.predictService(service, grouped.get(service) ?? [], anchor, horizonBuckets);
      report.services_evaluated++;
      if (prediction.status === 'insufficient_history') {
        report.insufficient_history.push(service);
      } else if (prediction.predicted_risk) {
        report.at_risk.push(prediction);
      }
    }

    report.at_risk.sort((a, b) =>
      RISK_ORDER.indexOf(b.risk_level ?? 'low') - RISK_ORDER.indexOf(a.risk_level ?? 'low') ||
      minBreach(a) - minBreach(b) ||
      compareNames(a.service, b.service)
    );
    return report;
  }

  /**
   * Whole-snapshot statistics, UTC hour-of-day profile, fitted slopes and z-score anomalies for one service
   */
  historicalPatterns(snapshot: MetricSnapshot, service: string): HistoricalPatterns | null {
    const rows = snapshot.queryWindow('service', { service });
    if (rows.length === 0) {
      return null;
    }

    const errorRates = rows.map(row => row.errorRate);
    const responseTimes = rows.map(row => row.responseTimeAvg);
    const volumes = rows.map(row => row.totalCount);
    const first = rows[0].recordTime;
    const last = rows[rows.length - 1].recordTime;

    const hourly = new Map<number, ServiceMetricRecord[]>();
    for (const row of rows) {
      const hour = row.recordTime.getUTCHours();
      const group = hourly.get(hour);
      if (group) {
        group.push(row);
      } else {
        hourly.set(hour, [row]);
      }
    }

    const slopePerHour = (value: (row: ServiceMetricRecord) => number | null): number | null => {
      const points: { x: number; y: number }[] = [];
      for (const row of rows) {
        const y = value(row);
        if (y !== null) {
          points.push({ x: (row.recordTime.getTime() - first.getTime()) / HOUR_MS, y });
        }
      }
      return linearRegression(points)?.slope ?? null;
    };

    return {
      status: 'ok',
      service,
      data_points: rows.length,
      time_range: { start: first, end: last },
      error_rate_stats: stats(errorRates),
      response_time_stats: {
        ...stats(responseTimes),
        observed_min: min(rows.map(row => row.responseTimeMin)),
        observed_max: max(rows.map(row => row.responseTimeMax))
      },
      traffic_stats: {
        total_requests: sum(volumes),
        avg_requests_per_period: sum(volumes) / rows.length,
        peak_requests: max(volumes) ?? 0,
        min_requests: min(volumes) ?? 0
      },
      hourly_patterns: [...hourly.entries()]
        .sort((a, b) => a[0] - b[0])
        .map(([hour, group]) => ({
          hour,
          data_points: group.length,
          total_requests: sum(group.map(row => row.totalCount)),
          error_rate: mean(group.map(row => row.errorRate)),
          response_time: mean(group.map(row => row.responseTimeAvg))
        })),
      trends: {
        error_rate_slope_per_hour: slopePerHour(TREND_VALUE.error_rate),
        response_time_slope_per_hour: slopePerHour(TREND_VALUE.response_time)
      },
      anomalies: this.anomalies(rows)
    };
  }

  private anomalies(rows: readonly ServiceMetricRecord[]): Anomaly[] {
    const anomalies: Anomaly[] = [];

    for (const metric of ['error_rate', 'response_time'] as const) {
      const value = TREND_VALUE[metric];
      const avg = mean(rows.map(value));
      const std = stdDev(rows.map(value));
      if (avg === null || std === null || std === 0) {
        continue;
      }
      for (const row of rows) {
        const v = value(row);
        if (v === null) {
          continue;
        }
        const z = (v - avg) / std;
        if (Math.abs(z) > this.config.anomalyZScore) {
          anomalies.push({ timestamp: row.recordTime, metric, value: v, z_score: z });
        }
      }
    }

    return anomalies.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || compareNames(a.metric, b.metric));
  }
}

function minBreach(prediction: ServicePrediction): number {
  let best = Infinity;
  for (const trend of Object.values(prediction.metrics)) {
    if (trend.buckets_to_breach !== null && trend.buckets_to_breach < best) {
      best = trend.buckets_to_breach;
    }
  }
  return best;
}
