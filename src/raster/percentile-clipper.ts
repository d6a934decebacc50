/**
 * Percentile Clipper
 *
 * Bounds outlying samples to a percentile-derived range so a few extreme
 * values do not wash out the contrast of the whole heatmap.
 *
 * @module raster/percentile-clipper
 */

import type { ClipRange } from '../types';
import { clamp, percentile, sortedCopy } from '../utils/math';
import { InvalidRangeError, validatePercentileRange } from '../utils/validation';

/**
 * Compute the clip range for a percentile pair.
 *
 * Percentiles are taken over the whole sequence (see {@link percentile}); a
 * short signal clamps to its minimum and maximum. A very narrow distribution
 * yields `low === high`.
 *
 * @throws InvalidRangeError for malformed bounds or an empty sequence
 */
export function computeClipRange(
  samples: readonly number[],
  percentiles: readonly number[]
): ClipRange {
  const [lowPercentile, highPercentile] = validatePercentileRange(percentiles);

  if (samples.length === 0) {
    throw new InvalidRangeError('Cannot derive a clip range from an empty signal', 'samples', samples.length);
  }

  const sorted = sortedCopy(samples);

  return {
    low: percentile(sorted, lowPercentile),
    high: percentile(sorted, highPercentile),
  };
}

/**
 * Clamp every sample into `range`. Returns a new array.
 * @throws InvalidRangeError when `range.low > range.high`
 */
export function clipSamples(samples: readonly number[], range: ClipRange): number[] {
  if (!(range.low <= range.high)) {
    throw new InvalidRangeError(`Clip range low (${range.low}) exceeds high (${range.high})`, 'range', range);
  }

  return samples.map(value => clamp(value, range.low, range.high));
}

/**
 * Compute the range and clip in one step
 */
export function clipToPercentiles(
  samples: readonly number[],
  percentiles: readonly number[]
): { range: ClipRange; samples: number[] } {
  const range = computeClipRange(samples, percentiles);
  return { range, samples: clipSamples(samples, range) };
}
