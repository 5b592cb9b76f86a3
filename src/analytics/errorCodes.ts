import type { ErrorMetricRecord } from '../types/telemetry.js';
import { compareNames, mean, sum } from './statistics.js';

export const UNKNOWN_ERROR_CODE = 'unknown';

export interface ErrorCodeBucket {
  error_code: string;
  /** Sum of error counts */
  count: number;
  /** Share of all errors in the histogram */
  percentage: number;
  /** Error rows carrying this code */
  occurrences: number;
  technical_errors: number;
  business_errors: number;
  total_requests: number;
  avg_response_time: number | null;
}

/**
 * Key for a row's code set; rows observing several codes are grouped by the combination.
 */
export function errorCodeKey(row: ErrorMetricRecord): string {
  return row.errorCodes.length > 0 ? [...new Set(row.errorCodes)].sort().join(',') : UNKNOWN_ERROR_CODE;
}

/**
 * Histogram of error rows with a positive error count, most errors first,
 * ties by code ascending.
 */
export function errorCodeHistogram(rows: readonly ErrorMetricRecord[]): { total_errors: number; buckets: ErrorCodeBucket[] } {
  const groups = new Map<string, ErrorMetricRecord[]>();
  for (const row of rows) {
    if (row.errorCount <= 0) {
      continue;
    }
    const key = errorCodeKey(row);
    const group = groups.get(key);
    if (group) {
      group.push(row);
    } else {
      groups.set(key, [row]);
    }
  }

  const totalErrors = sum([...groups.values()].flat().map(row => row.errorCount));
  const buckets: ErrorCodeBucket[] = [];

  for (const [code, group] of groups) {
    const count = sum(group.map(row => row.errorCount));
    buckets.push({
      error_code: code,
      count,
      percentage: totalErrors > 0 ? (count * 100) / totalErrors : 0,
      occurrences: group.length,
      technical_errors: sum(group.map(row => row.technicalErrorCount)),
      business_errors: sum(group.map(row => row.businessErrorCount)),
      total_requests: sum(group.map(row => row.totalCount)),
      avg_response_time: mean(group.map(row => row.responseTimeAvg))
    });
  }

  buckets.sort((a, b) => b.count - a.count || compareNames(a.error_code, b.error_code));
  return { total_errors: totalErrors, buckets };
}
