/**
 * Raster Builder
 *
 * Lays a flat sample sequence out as rows of one window each, earliest
 * window first. The final row is left-aligned and zero-padded: it never
 * repeats data from another window and the grid stays rectangular.
 *
 * @module raster/raster-builder
 */

import type { Raster } from '../types';
import { isNearInteger } from '../utils/math';
import { InvalidWindowError, validateWindowSize } from '../utils/validation';

/**
 * Build a `rows x cols` raster with `cols = samplesPerWindow`
 * @throws InvalidWindowError when `samplesPerWindow` is not a positive integer
 */
export function buildRaster(samples: readonly number[], samplesPerWindow: number): Raster {
  const cols = validateWindowSize(samplesPerWindow);
  const rows = Math.ceil(samples.length / cols);
  const grid = new Array<number[]>(rows);

  for (let r = 0; r < rows; r++) {
    const row = new Array<number>(cols).fill(0);
    const start = r * cols;
    const end = Math.min(start + cols, samples.length);

    for (let i = start; i < end; i++) {
      row[i - start] = samples[i];
    }

    grid[r] = row;
  }

  return {
    grid,
    rows,
    cols,
    samplesInLastRow: rows === 0 ? 0 : samples.length - (rows - 1) * cols,
  };
}

/**
 * Reassemble the original samples: every full row, then the filled part of
 * the final row
 */
export function flattenRaster(raster: Raster): number[] {
  const samples: number[] = [];

  raster.grid.forEach((row, r) => {
    const count = r === raster.rows - 1 ? raster.samplesInLastRow : raster.cols;
    for (let c = 0; c < count; c++) {
      samples.push(row[c]);
    }
  });

  return samples;
}

/**
 * Number of samples in one window of `durationSeconds`
 *
 * @param samplesPerRecord - Samples the signal stores per data record
 * @param recordDurationSeconds - Duration of one data record
 * @throws InvalidWindowError when the window is not a whole number of samples
 */
export function windowSampleCount(
  durationSeconds: number,
  samplesPerRecord: number,
  recordDurationSeconds: number
): number {
  if (!(recordDurationSeconds > 0)) {
    throw new InvalidWindowError(
      `Record duration must be positive, got ${recordDurationSeconds}`,
      'recordDurationSeconds',
      recordDurationSeconds
    );
  }

  const exact = (durationSeconds * samplesPerRecord) / recordDurationSeconds;

  if (!isNearInteger(exact)) {
    throw new InvalidWindowError(
      `A ${durationSeconds}s window spans ${exact} samples, not a whole number`,
      'samplesPerWindow',
      exact
    );
  }

  return validateWindowSize(Math.round(exact));
}
