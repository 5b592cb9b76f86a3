import type { ServiceMetricRecord } from '../types/telemetry.js';
import type { SloConfig } from '../config/types.js';

export interface ServiceTargets {
  /** Max acceptable error rate, percent */
  errorRate: number;
  /** Max acceptable mean response time, seconds */
  responseTime: number;
  /** Required share of good requests, percent */
  compliancePercent: number;
}

function latest(
  rows: readonly ServiceMetricRecord[],
  pick: (row: ServiceMetricRecord) => number | null
): number | null {
  let value: number | null = null;
  let time = -Infinity;
  for (const row of rows) {
    const candidate = pick(row);
    if (candidate !== null && row.recordTime.getTime() >= time) {
      value = candidate;
      time = row.recordTime.getTime();
    }
  }
  return value;
}

/**
 * Per-service targets: the latest value a row carries, else the configured default.
 */
export function resolveTargets(rows: readonly ServiceMetricRecord[], slo: SloConfig): ServiceTargets {
  return {
    errorRate: latest(rows, row => row.targetErrorSloPerc) ?? slo.defaultErrorRateTarget,
    responseTime: latest(rows, row => row.targetResponseSloSec) ?? slo.defaultResponseTimeTarget,
    compliancePercent: latest(rows, row => row.responseTargetPercent) ?? slo.defaultCompliancePercent
  };
}
