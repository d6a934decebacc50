/**
 * Math utilities tests
 */

import { describe, it, expect } from 'vitest';
import {
  clamp,
  lerp,
  percentile,
  sortedCopy,
  gridExtent,
  isNearInteger,
} from '../../../src/utils/math';

describe('clamp', () => {
  it('should return value if within range', () => {
    expect(clamp(5, 0, 10)).toBe(5);
  });

  it('should return min if value is below', () => {
    expect(clamp(-5, 0, 10)).toBe(0);
  });

  it('should return max if value is above', () => {
    expect(clamp(15, 0, 10)).toBe(10);
  });

  it('should collapse to the bound when min equals max', () => {
    expect(clamp(3, 7, 7)).toBe(7);
  });
});

describe('lerp', () => {
  it('should return a when t=0', () => {
    expect(lerp(0, 10, 0)).toBe(0);
  });

  it('should return b when t=1', () => {
    expect(lerp(0, 10, 1)).toBe(10);
  });

  it('should return midpoint when t=0.5', () => {
    expect(lerp(0, 10, 0.5)).toBe(5);
  });
});

describe('percentile', () => {
  const sorted = [10, 20, 30, 40, 50];

  it('should return minimum for 0th percentile', () => {
    expect(percentile(sorted, 0)).toBe(10);
  });

  it('should return maximum for 100th percentile', () => {
    expect(percentile(sorted, 100)).toBe(50);
  });

  it('should return median for 50th percentile', () => {
    expect(percentile(sorted, 50)).toBe(30);
  });

  it('should place the i-th value at the 100 * (i - 0.5) / n percentile', () => {
    expect(percentile(sorted, 10)).toBe(10);
    expect(percentile(sorted, 30)).toBe(20);
    expect(percentile(sorted, 90)).toBe(50);
  });

  it('should interpolate between those positions', () => {
    // 0.25 * 5 - 0.5 = 0.75 -> 10 + 0.75 * 10
    expect(percentile(sorted, 25)).toBeCloseTo(17.5, 10);
    // 0.4 * 5 - 0.5 = 1.5 -> halfway between 20 and 30
    expect(percentile(sorted, 40)).toBeCloseTo(25, 10);
  });

  it('should clamp below the first and above the last position', () => {
    expect(percentile([1, 2, 3, 4], 10)).toBe(1);
    expect(percentile([1, 2, 3, 4], 90)).toBe(4);
  });

  it('should return the single value of a one-element array', () => {
    expect(percentile([7], 35)).toBe(7);
  });

  it('should return 0 for empty array', () => {
    expect(percentile([], 50)).toBe(0);
  });
});

describe('sortedCopy', () => {
  it('should sort numerically without touching the input', () => {
    const input = [10, 2, 33, 1];
    expect(sortedCopy(input)).toEqual([1, 2, 10, 33]);
    expect(input).toEqual([10, 2, 33, 1]);
  });
});

describe('gridExtent', () => {
  it('should find min and max across rows', () => {
    expect(gridExtent([[3, -1], [8, 0]])).toEqual({ min: -1, max: 8 });
  });

  it('should return undefined for an empty grid', () => {
    expect(gridExtent([])).toBeUndefined();
    expect(gridExtent([[]])).toBeUndefined();
  });
});

describe('isNearInteger', () => {
  it('should accept integers and values within tolerance', () => {
    expect(isNearInteger(3000)).toBe(true);
    expect(isNearInteger(0.1 * 3 * 10)).toBe(true);
  });

  it('should reject fractional and non-finite values', () => {
    expect(isNearInteger(7.5)).toBe(false);
    expect(isNearInteger(Infinity)).toBe(false);
    expect(isNearInteger(NaN)).toBe(false);
  });
});
