import type { RawRecord } from '../../../src/types/telemetry.js';
import { defaultConfig } from '../../../src/config/defaults.js';
import { mergeConfig } from '../../../src/config/loader.js';
import type { Config, ConfigOverrides } from '../../../src/config/types.js';
import { MetricSnapshot } from '../../../src/store/snapshot.js';
import { parseErrorRecord, parseServiceRecord } from '../../../src/store/recordParser.js';

export const BASE_TIME = Date.parse('2025-01-15T12:00:00.000Z');
export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;

let sequence = 0;

export function at(offsetMs: number): string {
  return new Date(BASE_TIME + offsetMs).toISOString();
}

export interface ServiceRowInput {
  service: string;
  offsetMs: number;
  total?: number;
  errors?: number;
  responseTime?: number | null;
  p95?: number | null;
  p99?: number | null;
  errorTarget?: number | null;
  responseTarget?: number | null;
  compliance?: number | null;
  id?: string;
  sid?: string;
}

/**
 * Flat service row; success count is whatever the errors leave
 */
export function serviceRow(input: ServiceRowInput): RawRecord {
  const total = input.total ?? 100;
  const errors = input.errors ?? 0;
  return {
    id: input.id ?? `svc-${++sequence}`,
    service_name: input.service,
    sid: input.sid ?? null,
    record_time: at(input.offsetMs),
    total_count: total,
    success_count: total - errors,
    error_count: errors,
    na_error_count: 0,
    response_time_avg: input.responseTime === undefined ? 0.2 : input.responseTime,
    response_time_p95: input.p95 ?? null,
    response_time_p99: input.p99 ?? null,
    target_error_slo_perc: input.errorTarget ?? null,
    target_response_slo_sec: input.responseTarget ?? null,
    response_target_percent: input.compliance ?? null
  };
}

export interface ErrorRowInput {
  application: string;
  offsetMs: number;
  codes?: string[];
  errors?: number;
  technical?: number;
  business?: number;
  total?: number;
  responseTime?: number | null;
  id?: string;
}

export function errorRow(input: ErrorRowInput): RawRecord {
  const errors = input.errors ?? 1;
  return {
    id: input.id ?? `err-${++sequence}`,
    wm_application_name: input.application,
    wm_application_id: `${input.application}-id`,
    wm_transaction_name: 'checkout',
    error_codes: input.codes ?? [],
    error_count: errors,
    technical_error_count: input.technical ?? errors,
    business_error_count: input.business ?? 0,
    total_count: input.total ?? 100,
    response_time_avg: input.responseTime === undefined ? 0.5 : input.responseTime,
    record_time: at(input.offsetMs)
  };
}

/**
 * Snapshot built straight from raw rows through the parser
 */
export function snapshotOf(service: readonly RawRecord[], error: readonly RawRecord[] = []): MetricSnapshot {
  return new MetricSnapshot(
    service.map(row => parseServiceRecord(row, { errorRateTolerance: 1 })),
    error.map(row => parseErrorRecord(row)),
    new Date(BASE_TIME)
  );
}

export function testConfig(overrides: ConfigOverrides = {}): Config {
  return mergeConfig(defaultConfig, overrides);
}
