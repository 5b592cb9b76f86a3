import { describe, it, expect } from 'vitest';
import {
  linearRegression,
  max,
  mean,
  min,
  percentChange,
  percentile,
  round,
  stdDev
} from '../../../src/analytics/statistics.js';

describe('statistics', () => {
  it('finds the extremes of long series', () => {
    const values: (number | null)[] = Array.from({ length: 300000 }, (_, index) => index % 1000);
    values.push(null, -5, 2500);

    expect(min(values)).toBe(-5);
    expect(max(values)).toBe(2500);
    expect(min([null])).toBeNull();
  });

  it('ignores unknown values', () => {
    expect(mean([1, null, 3])).toBe(2);
    expect(mean([null, null])).toBeNull();
    expect(stdDev([4])).toBeNull();
  });

  it('interpolates percentiles between ranks', () => {
    expect(percentile([4, 1, 3, 2], 0.5)).toBe(2.5);
    expect(percentile([10, 20], 0.95)).toBe(19.5);
    expect(percentile([], 0.5)).toBeNull();
  });

  it('fits a least-squares line', () => {
    expect(linearRegression([{ x: 0, y: 1 }, { x: 1, y: 3 }, { x: 2, y: 5 }])).toEqual({
      slope: 2,
      intercept: 1,
      rSquared: 1
    });
    expect(linearRegression([{ x: 1, y: 1 }])).toBeNull();
    expect(linearRegression([{ x: 1, y: 1 }, { x: 1, y: 2 }])).toBeNull();
  });

  it('has no relative change from a zero baseline', () => {
    expect(percentChange(0, 5)).toBeNull();
    expect(percentChange(2, 3)).toBe(50);
    expect(percentChange(null, 3)).toBeNull();
  });

  it('rounds finite numbers only', () => {
    expect(round(1.23456789)).toBe(1.2346);
    expect(round(Number.NaN)).toBeNull();
  });
});
