import { describe, it, expect } from 'vitest';
import { parseErrorRecord, parseServiceRecord, parseTimestamp } from '../../../src/store/recordParser.js';
import { ValidationError } from '../../../src/utils/errors.js';

const options = { errorRateTolerance: 1 };

describe('parseTimestamp', () => {
  it('accepts epoch milliseconds as a number or a numeric string', () => {
    expect(parseTimestamp(1736942400000).toISOString()).toBe('2025-01-15T12:00:00.000Z');
    expect(parseTimestamp('1736942400000').toISOString()).toBe('2025-01-15T12:00:00.000Z');
  });

  it('accepts ISO-8601 strings', () => {
    expect(parseTimestamp('2025-01-15T12:00:00Z').getTime()).toBe(1736942400000);
  });

  it('rejects missing and unparsable values', () => {
    expect(() => parseTimestamp(undefined)).toThrow('missing record_time');
    expect(() => parseTimestamp('yesterday')).toThrow('unparsable record_time');
  });
});

describe('parseServiceRecord', () => {
  it('reads flat snake_case keys and derives rates from counts', () => {
    const record = parseServiceRecord({
      id: 'a1',
      service_name: 'payments',
      record_time: '2025-01-15T12:00:00Z',
      total_count: 200,
      success_count: 190,
      error_count: 10,
      response_time_avg: 0.4
    }, options);

    expect(record.id).toBe('a1');
    expect(record.serviceName).toBe('payments');
    expect(record.errorRate).toBe(5);
    expect(record.successRate).toBe(95);
    expect(record.naErrorCount).toBe(0);
    expect(record.responseTimeAvg).toBe(0.4);
    expect(record.responseTimeP95).toBeNull();
    expect(record.targetErrorSloPerc).toBeNull();
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('falls back to fields collections and nested percentiles', () => {
    const record = parseServiceRecord({
      id: 'a2',
      record_time: 1736942400000,
      fields: {
        service_name: ['orders'],
        total_count: [50],
        success_count: [50],
        error_count: [0],
        target_error_slo_perc: [2]
      },
      percentiles_response_time_max: { '95.0': 1.5, '99.0': 2.5 }
    }, options);

    expect(record.serviceName).toBe('orders');
    expect(record.totalCount).toBe(50);
    expect(record.targetErrorSloPerc).toBe(2);
    expect(record.responseTimeP95).toBe(1.5);
    expect(record.responseTimeP99).toBe(2.5);
  });

  it('prefers the scalar key over the fields collection', () => {
    const record = parseServiceRecord({
      id: 'a3',
      service_name: 'scalar-name',
      fields: { service_name: ['fields-name'] },
      record_time: '2025-01-15T12:00:00Z'
    }, options);

    expect(record.serviceName).toBe('scalar-name');
    expect(record.totalCount).toBe(0);
    expect(record.errorRate).toBeNull();
  });

  it('rejects counts that do not add up', () => {
    expect(() => parseServiceRecord({
      id: 'b1',
      service_name: 'payments',
      record_time: '2025-01-15T12:00:00Z',
      total_count: 10,
      success_count: 8,
      error_count: 5
    }, options)).toThrow('success_count + error_count exceeds total_count');
  });

  it('rejects a supplied error rate that disagrees with the counts beyond the tolerance', () => {
    const row = {
      id: 'b2',
      service_name: 'payments',
      record_time: '2025-01-15T12:00:00Z',
      total_count: 100,
      success_count: 90,
      error_count: 10
    };

    expect(parseServiceRecord({ ...row, error_rate: 10.5 }, options).errorRate).toBe(10.5);
    expect(() => parseServiceRecord({ ...row, error_rate: 12 }, options)).toThrow(ValidationError);
  });

  it('rejects out-of-range targets and negative response times', () => {
    const row = { id: 'b3', service_name: 'payments', record_time: '2025-01-15T12:00:00Z' };

    expect(() => parseServiceRecord({ ...row, response_target_percent: 100 }, options))
      .toThrow('response_target_percent must be within (0, 100)');
    expect(() => parseServiceRecord({ ...row, target_response_slo_sec: 0 }, options))
      .toThrow('target_response_slo_sec must be positive');
    expect(() => parseServiceRecord({ ...row, response_time_avg: -1 }, options))
      .toThrow('response_time_avg cannot be negative');
  });

  it('names the missing field', () => {
    try {
      parseServiceRecord({ id: 'b4', record_time: '2025-01-15T12:00:00Z' }, options);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: 'service_name', message: 'missing service_name' });
    }
  });
});

describe('parseErrorRecord', () => {
  it('reads snake_case and camelCase variants', () => {
    const record = parseErrorRecord({
      id: 'e1',
      wmApplicationName: 'payments',
      wm_transaction_name: 'charge',
      error_codes: ['E500', ' ', 'E404'],
      error_count: 3,
      technical_error_count: 2,
      business_error_count: 1,
      total_count: 40,
      responseTime_avg: 0.75,
      record_time: '2025-01-15T12:00:00Z'
    });

    expect(record.wmApplicationName).toBe('payments');
    expect(record.wmTransactionName).toBe('charge');
    expect(record.errorCodes).toEqual(['E500', 'E404']);
    expect(record.errorCount).toBe(3);
    expect(record.responseTimeAvg).toBe(0.75);
  });

  it('wraps a single error code into a list', () => {
    const record = parseErrorRecord({ id: 'e2', error_codes: 503, record_time: 1736942400000 });
    expect(record.errorCodes).toEqual(['503']);
    expect(record.errorCount).toBe(0);
  });

  it('rejects fractional counts', () => {
    expect(() => parseErrorRecord({ id: 'e3', error_count: 1.5, record_time: 1736942400000 }))
      .toThrow('error_count must be a non-negative integer');
  });
});
