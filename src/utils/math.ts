/**
 * Mathematical utilities
 * @module utils/math
 */

/**
 * Clamp a value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Linear interpolation between two values
 */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/**
 * Percentile of an ascending array.
 *
 * The i-th of n values (1-based) sits at the 100 * (i - 0.5) / n percentile;
 * values between those points are interpolated linearly and values outside
 * them clamp to the first or last element.
 */
export function percentile(sortedValues: readonly number[], p: number): number {
  const n = sortedValues.length;
  if (n === 0) return 0;

  const index = clamp((p / 100) * n - 0.5, 0, n - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);

  if (lower === upper) return sortedValues[lower];

  return lerp(sortedValues[lower], sortedValues[upper], index - lower);
}

/**
 * Ascending copy of the input
 */
export function sortedCopy(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * Smallest and largest value of a 2D grid, or `undefined` for an empty grid
 */
export function gridExtent(
  grid: readonly (readonly number[])[]
): { min: number; max: number } | undefined {
  let min = Infinity;
  let max = -Infinity;

  for (const row of grid) {
    for (const value of row) {
      if (value < min) min = value;
      if (value > max) max = value;
    }
  }

  return min <= max ? { min, max } : undefined;
}

/**
 * True when `value` is within `tolerance` of an integer
 */
export function isNearInteger(value: number, tolerance = 1e-9): boolean {
  return Number.isFinite(value) && Math.abs(value - Math.round(value)) <= tolerance;
}
