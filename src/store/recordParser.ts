import type { ErrorMetricRecord, RawRecord, ServiceMetricRecord } from '../types/telemetry.js';
import { ValidationError } from '../utils/errors.js';
import { extract, FieldExtractor, nested, scalar, standard } from './extractors.js';

export interface ParseOptions {
  /** Allowed gap, in percentage points, between a supplied error rate and the one derived from counts */
  errorRateTolerance: number;
}

const PERCENTILES = 'percentiles_response_time_max';

/**
 * Extraction strategies per logical field of the service table.
 */
const SERVICE_FIELDS = {
  id: [scalar('id'), scalar('_id')],
  serviceName: standard('service_name', scalar('serviceName')),
  appId: standard('app_id', scalar('appId')),
  sid: standard('sid'),
  totalCount: standard('total_count'),
  successCount: standard('success_count'),
  errorCount: standard('error_count'),
  naErrorCount: standard('na_error_count'),
  errorRate: standard('error_rate'),
  successRate: standard('success_rate'),
  responseTimeAvg: standard('response_time_avg'),
  responseTimeMin: standard('response_time_min'),
  responseTimeMax: standard('response_time_max'),
  responseTimeP95: [...standard('response_time_p95'), nested(PERCENTILES, '95.0')],
  responseTimeP99: [...standard('response_time_p99'), nested(PERCENTILES, '99.0')],
  targetErrorSloPerc: standard('target_error_slo_perc'),
  targetResponseSloSec: standard('target_response_slo_sec'),
  responseTargetPercent: standard('response_target_percent'),
  recordTime: standard('record_time', scalar('recordTime'))
} satisfies Record<keyof ServiceMetricRecord, FieldExtractor[]>;

const ERROR_FIELDS = {
  id: [scalar('id'), scalar('_id')],
  wmApplicationId: standard('wm_application_id', scalar('wmApplicationId')),
  wmApplicationName: standard('wm_application_name', scalar('wmApplicationName')),
  wmTransactionId: standard('wm_transaction_id', scalar('wmTransactionId')),
  wmTransactionName: standard('wm_transaction_name', ...standard('wmTransactionName')),
  errorCodes: standard('error_codes', scalar('errorCodes')),
  technicalErrorCount: standard('technical_error_count'),
  businessErrorCount: standard('business_error_count'),
  errorCount: standard('error_count'),
  totalCount: standard('total_count'),
  responseTimeAvg: standard('response_time_avg', scalar('responseTime_avg')),
  recordTime: standard('record_time', scalar('recordTime'))
} satisfies Record<keyof ErrorMetricRecord, FieldExtractor[]>;

function toNumber(value: unknown, field: string): number | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'string' && value.trim() === '') {
    return null;
  }
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`${field} is not a finite number`, field);
  }
  return parsed;
}

function toCount(value: unknown, field: string): number {
  const parsed = toNumber(value, field);
  if (parsed === null) {
    return 0;
  }
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ValidationError(`${field} must be a non-negative integer`, field);
  }
  return parsed;
}

function toNonNegative(value: unknown, field: string): number | null {
  const parsed = toNumber(value, field);
  if (parsed !== null && parsed < 0) {
    throw new ValidationError(`${field} cannot be negative`, field);
  }
  return parsed;
}

function toPercent(value: unknown, field: string): number | null {
  const parsed = toNumber(value, field);
  if (parsed !== null && (parsed < 0 || parsed > 100)) {
    throw new ValidationError(`${field} must be within [0, 100]`, field);
  }
  return parsed;
}

function toOptionalString(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

function toId(value: unknown): string {
  const id = toOptionalString(value);
  if (id === null) {
    throw new ValidationError('missing id', 'id');
  }
  return id;
}

/**
 * Epoch milliseconds (number or numeric string), ISO-8601 string or Date.
 */
export function parseTimestamp(value: unknown, field = 'record_time'): Date {
  let time = NaN;
  if (value instanceof Date) {
    time = value.getTime();
  } else if (typeof value === 'number') {
    time = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    const trimmed = value.trim();
    time = /^-?\d+(\.\d+)?$/.test(trimmed) ? Number(trimmed) : Date.parse(trimmed);
  } else if (value === undefined || value === null) {
    throw new ValidationError(`missing ${field}`, field);
  }

  if (!Number.isFinite(time)) {
    throw new ValidationError(`unparsable ${field}`, field);
  }
  return new Date(time);
}

function toErrorCodes(value: unknown): string[] {
  const items = Array.isArray(value) ? value : [value];
  const codes: string[] = [];
  for (const item of items) {
    const code = toOptionalString(item);
    if (code !== null) {
      codes.push(code);
    }
  }
  return codes;
}

function rate(part: number, total: number): number | null {
  return total > 0 ? (part / total) * 100 : null;
}

function checkTarget(value: number | null, field: string, valid: (v: number) => boolean, range: string): number | null {
  if (value !== null && !valid(value)) {
    throw new ValidationError(`${field} must be ${range}`, field);
  }
  return value;
}

/**
 * Normalize one raw service-table row. Throws ValidationError with the reason
 * the row cannot be accepted.
 */
export function parseServiceRecord(row: RawRecord, options: ParseOptions): ServiceMetricRecord {
  const f = SERVICE_FIELDS;

  const id = toId(extract(row, f.id));
  const serviceName = toOptionalString(extract(row, f.serviceName));
  if (serviceName === null) {
    throw new ValidationError('missing service_name', 'service_name');
  }
  const recordTime = parseTimestamp(extract(row, f.recordTime));

  const totalCount = toCount(extract(row, f.totalCount), 'total_count');
  const successCount = toCount(extract(row, f.successCount), 'success_count');
  const errorCount = toCount(extract(row, f.errorCount), 'error_count');
  const naErrorCount = toCount(extract(row, f.naErrorCount), 'na_error_count');
  if (successCount + errorCount > totalCount) {
    throw new ValidationError('success_count + error_count exceeds total_count', 'total_count');
  }

  const derivedErrorRate = rate(errorCount, totalCount);
  const suppliedErrorRate = toPercent(extract(row, f.errorRate), 'error_rate');
  if (
    suppliedErrorRate !== null &&
    derivedErrorRate !== null &&
    Math.abs(suppliedErrorRate - derivedErrorRate) > options.errorRateTolerance
  ) {
    throw new ValidationError(
      `error_rate ${suppliedErrorRate} disagrees with counts (${derivedErrorRate.toFixed(2)})`,
      'error_rate'
    );
  }
  const suppliedSuccessRate = toPercent(extract(row, f.successRate), 'success_rate');

  const record: ServiceMetricRecord = {
    id,
    serviceName,
    appId: toOptionalString(extract(row, f.appId)),
    sid: toOptionalString(extract(row, f.sid)),
    totalCount,
    successCount,
    errorCount,
    naErrorCount,
    errorRate: suppliedErrorRate ?? derivedErrorRate,
    successRate: suppliedSuccessRate ?? rate(successCount, totalCount),
    responseTimeAvg: toNonNegative(extract(row, f.responseTimeAvg), 'response_time_avg'),
    responseTimeMin: toNonNegative(extract(row, f.responseTimeMin), 'response_time_min'),
    responseTimeMax: toNonNegative(extract(row, f.responseTimeMax), 'response_time_max'),
    responseTimeP95: toNonNegative(extract(row, f.responseTimeP95), 'response_time_p95'),
    responseTimeP99: toNonNegative(extract(row, f.responseTimeP99), 'response_time_p99'),
    targetErrorSloPerc: checkTarget(
      toNumber(extract(row, f.targetErrorSloPerc), 'target_error_slo_perc'),
      'target_error_slo_perc', v => v > 0 && v <= 100, 'within (0, 100]'
    ),
    targetResponseSloSec: checkTarget(
      toNumber(extract(row, f.targetResponseSloSec), 'target_response_slo_sec'),
      'target_response_slo_sec', v => v > 0, 'positive'
    ),
    responseTargetPercent: checkTarget(
      toNumber(extract(row, f.responseTargetPercent), 'response_target_percent'),
      'response_target_percent', v => v > 0 && v < 100, 'within (0, 100)'
    ),
    recordTime
  };

  return Object.freeze(record);
}

/**
 * Normalize one raw error-table row.
 */
export function parseErrorRecord(row: RawRecord): ErrorMetricRecord {
  const f = ERROR_FIELDS;

  const record: ErrorMetricRecord = {
    id: toId(extract(row, f.id)),
    wmApplicationId: toOptionalString(extract(row, f.wmApplicationId)),
    wmApplicationName: toOptionalString(extract(row, f.wmApplicationName)),
    wmTransactionId: toOptionalString(extract(row, f.wmTransactionId)),
    wmTransactionName: toOptionalString(extract(row, f.wmTransactionName)),
    errorCodes: Object.freeze(toErrorCodes(extract(row, f.errorCodes))),
    technicalErrorCount: toCount(extract(row, f.technicalErrorCount), 'technical_error_count'),
    businessErrorCount: toCount(extract(row, f.businessErrorCount), 'business_error_count'),
    errorCount: toCount(extract(row, f.errorCount), 'error_count'),
    totalCount: toCount(extract(row, f.totalCount), 'total_count'),
    responseTimeAvg: toNonNegative(extract(row, f.responseTimeAvg), 'response_time_avg'),
    recordTime: parseTimestamp(extract(row, f.recordTime))
  };

  return Object.freeze(record);
}
