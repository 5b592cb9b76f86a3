/**
 * Small numeric helpers shared by the analytics components. All of them
 * ignore `null` inputs and answer `null` when nothing is left to compute on.
 */

export function known(values: readonly (number | null)[]): number[] {
  const result: number[] = [];
  for (const value of values) {
    if (value !== null && Number.isFinite(value)) {
      result.push(value);
    }
  }
  return result;
}

export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

export function mean(values: readonly (number | null)[]): number | null {
  const present = known(values);
  return present.length > 0 ? sum(present) / present.length : null;
}

/**
 * Sample standard deviation (n - 1); null below two values.
 */
export function stdDev(values: readonly (number | null)[]): number | null {
  const present = known(values);
  if (present.length < 2) {
    return null;
  }
  const avg = sum(present) / present.length;
  const squared = present.reduce((total, value) => total + (value - avg) ** 2, 0);
  return Math.sqrt(squared / (present.length - 1));
}

export function min(values: readonly (number | null)[]): number | null {
  const present = known(values);
  return present.length > 0 ? present.reduce((lowest, value) => (value < lowest ? value : lowest)) : null;
}

export function max(values: readonly (number | null)[]): number | null {
  const present = known(values);
  return present.length > 0 ? present.reduce((highest, value) => (value > highest ? value : highest)) : null;
}

/**
 * Percentile with linear interpolation between closest ranks.
 * @param p fraction in [0, 1]
 */
export function percentile(values: readonly (number | null)[], p: number): number | null {
  const sorted = known(values).sort((a, b) => a - b);
  if (sorted.length === 0) {
    return null;
  }
  const rank = (sorted.length - 1) * p;
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

export interface LinearFit {
  slope: number;
  intercept: number;
  /** Coefficient of determination; null when the values are constant */
  rSquared: number | null;
}

/**
 * Ordinary least squares over (x, y) pairs. Null when fewer than two points
 * or all x are equal.
 */
export function linearRegression(points: readonly { x: number; y: number }[]): LinearFit | null {
  const n = points.length;
  if (n < 2) {
    return null;
  }

  const sumX = sum(points.map(p => p.x));
  const sumY = sum(points.map(p => p.y));
  const sumXY = sum(points.map(p => p.x * p.y));
  const sumXX = sum(points.map(p => p.x * p.x));

  const denominator = n * sumXX - sumX * sumX;
  if (denominator === 0) {
    return null;
  }

  const slope = (n * sumXY - sumX * sumY) / denominator;
  const intercept = (sumY - slope * sumX) / n;

  const meanY = sumY / n;
  const totalSS = sum(points.map(p => (p.y - meanY) ** 2));
  const residualSS = sum(points.map(p => (p.y - (intercept + slope * p.x)) ** 2));

  return {
    slope,
    intercept,
    rSquared: totalSS === 0 ? null : 1 - residualSS / totalSS
  };
}

/**
 * Relative change from `baseline` to `recent` in percent; null when either
 * side is unknown or the baseline is zero.
 */
export function percentChange(baseline: number | null, recent: number | null): number | null {
  if (baseline === null || recent === null || baseline === 0) {
    return null;
  }
  return ((recent - baseline) / baseline) * 100;
}

export function round(value: number | null, digits = 4): number | null {
  if (value === null || !Number.isFinite(value)) {
    return null;
  }
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
