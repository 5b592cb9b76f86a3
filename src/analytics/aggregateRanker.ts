import type { ServiceMetricRecord } from '../types/telemetry.js';
import type { MetricSnapshot } from '../store/snapshot.js';
import { compareNames, max, mean, sum } from './statistics.js';
import { ErrorCodeBucket, errorCodeHistogram } from './errorCodes.js';
import type { ServiceEvaluation } from './sloEvaluator.js';
import type { DegradationReport } from './degradationDetector.js';

export interface ServiceAggregate {
  service: string;
  total_requests: number;
  total_errors: number;
  avg_error_rate: number | null;
  avg_response_time: number | null;
  avg_response_time_p95: number | null;
  avg_response_time_p99: number | null;
  max_response_time: number | null;
  data_points: number;
}

export interface HealthOverview {
  total_services: number;
  healthy_services: number;
  degraded_services: number;
  violating_services: number;
  insufficient_data_services: number;
  /** Healthy share of the services that could be evaluated */
  health_percentage: number | null;
  total_requests: number;
  total_errors: number;
  overall_error_rate: number | null;
  violating: string[];
  degraded: string[];
  insufficient_data: string[];
}

function aggregate(service: string, rows: readonly ServiceMetricRecord[]): ServiceAggregate {
  return {
    service,
    total_requests: sum(rows.map(row => row.totalCount)),
    total_errors: sum(rows.map(row => row.errorCount)),
    avg_error_rate: mean(rows.map(row => row.errorRate)),
    avg_response_time: mean(rows.map(row => row.responseTimeAvg)),
    avg_response_time_p95: mean(rows.map(row => row.responseTimeP95)),
    avg_response_time_p99: mean(rows.map(row => row.responseTimeP99)),
    max_response_time: max(rows.map(row => row.responseTimeMax)),
    data_points: rows.length
  };
}

/**
 * Descending by `value`, ties by service name ascending. Services without a value are dropped.
 */
function rankBy(
  aggregates: readonly ServiceAggregate[],
  value: (aggregate: ServiceAggregate) => number | null,
  limit: number
): ServiceAggregate[] {
  const ranked: { aggregate: ServiceAggregate; value: number }[] = [];
  for (const aggregate of aggregates) {
    const v = value(aggregate);
    if (v !== null) {
      ranked.push({ aggregate, value: v });
    }
  }
  ranked.sort((a, b) => b.value - a.value || compareNames(a.aggregate.service, b.aggregate.service));
  return ranked.slice(0, limit).map(entry => entry.aggregate);
}

/**
 * Whole-snapshot rankings and system health counts.
 */
export class AggregateRanker {
  aggregates(snapshot: MetricSnapshot): ServiceAggregate[] {
    const grouped = snapshot.queryWindow('service', {}, row => row.serviceName);
    return snapshot.serviceNames().map(service => aggregate(service, grouped.get(service) ?? []));
  }

  topByVolume(snapshot: MetricSnapshot, limit: number): ServiceAggregate[] {
    return rankBy(this.aggregates(snapshot), a => a.total_requests, limit);
  }

  /** Services with unknown response time are left out */
  slowest(snapshot: MetricSnapshot, limit: number): ServiceAggregate[] {
    return rankBy(this.aggregates(snapshot), a => a.avg_response_time, limit);
  }

  /** Services with a zero or unknown error rate are left out */
  errorProne(snapshot: MetricSnapshot, limit: number): ServiceAggregate[] {
    return rankBy(
      this.aggregates(snapshot),
      a => (a.avg_error_rate !== null && a.avg_error_rate > 0 ? a.avg_error_rate : null),
      limit
    );
  }

  topErrors(snapshot: MetricSnapshot, limit: number): { total_errors: number; errors: ErrorCodeBucket[] } {
    const histogram = errorCodeHistogram(snapshot.queryWindow('error'));
    return { total_errors: histogram.total_errors, errors: histogram.buckets.slice(0, limit) };
  }

  /**
   * Health counts from existing evaluator and detector results: violating
   * outranks degraded, which outranks healthy.
   */
  overview(snapshot: MetricSnapshot, evaluations: readonly ServiceEvaluation[], degradation: DegradationReport): HealthOverview {
    const degrading = new Set(degradation.degrading.map(entry => entry.service));
    const violating: string[] = [];
    const degraded: string[] = [];
    const insufficient: string[] = [];
    let healthy = 0;

    for (const evaluation of evaluations) {
      if (evaluation.status === 'insufficient_data') {
        insufficient.push(evaluation.service);
      } else if (evaluation.is_violating) {
        violating.push(evaluation.service);
      } else if (degrading.has(evaluation.service)) {
        degraded.push(evaluation.service);
      } else {
        healthy++;
      }
    }

    const rows = snapshot.queryWindow('service');
    const totalRequests = sum(rows.map(row => row.totalCount));
    const totalErrors = sum(rows.map(row => row.errorCount));
    const evaluated = evaluations.length - insufficient.length;

    return {
      total_services: evaluations.length,
      healthy_services: healthy,
      degraded_services: degraded.length,
      violating_services: violating.length,
      insufficient_data_services: insufficient.length,
      health_percentage: evaluated > 0 ? (healthy * 100) / evaluated : null,
      total_requests: totalRequests,
      total_errors: totalErrors,
      overall_error_rate: totalRequests > 0 ? (totalErrors * 100) / totalRequests : null,
      violating,
      degraded,
      insufficient_data: insufficient
    };
  }
}
