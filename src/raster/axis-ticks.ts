/**
 * Axis Tick Mapper
 *
 * Positions are in 1-based cell units: column 1 is the first sample of a
 * row, row 1 the first window of the recording.
 *
 * @module raster/axis-ticks
 */

import type { AxisTicks, DurationEntry, Raster, TickSet } from '../types';
import { InvalidDurationEntryError, validateWindowSize } from '../utils/validation';

const SECONDS_PER_HOUR = 3600;

/**
 * Horizontal ticks (time within a row).
 *
 * The entry's tick values are spread evenly over `[0, cols]`; the first
 * position is then set to 1, the first addressable column.
 *
 * @throws InvalidDurationEntryError when the entry has fewer than 2 ticks
 */
export function xTicks(entry: DurationEntry, cols: number): AxisTicks {
  const n = entry.tickValues.length;

  if (n < 2) {
    throw new InvalidDurationEntryError(
      `Duration entry ${entry.index} needs at least 2 tick values, has ${n}`,
      entry
    );
  }

  validateWindowSize(cols, 'cols');

  const positions = entry.tickValues.map((_, k) => (k === 0 ? 1 : (k * cols) / (n - 1)));
  const labels = entry.tickValues.map(value => String(value));

  return { positions, labels };
}

/**
 * Vertical ticks, one per elapsed hour, labelled "0", "1", ...
 *
 * Rows per hour may be fractional (windows that do not divide an hour) or
 * below 1 (windows longer than an hour).
 */
export function yTicks(durationSeconds: number, rows: number): AxisTicks {
  if (!(durationSeconds > 0) || !Number.isFinite(durationSeconds)) {
    throw new InvalidDurationEntryError(`Window duration must be positive, got ${durationSeconds}`, durationSeconds);
  }

  const rowsPerHour = SECONDS_PER_HOUR / durationSeconds;
  const positions: number[] = [];
  const labels: string[] = [];

  for (let hour = 0; 1 + hour * rowsPerHour <= rows; hour++) {
    positions.push(1 + hour * rowsPerHour);
    labels.push(String(hour));
  }

  return { positions, labels };
}

/**
 * Ticks for both axes of a raster built with `entry`
 */
export function buildTickSet(entry: DurationEntry, raster: Raster): TickSet {
  const x = xTicks(entry, raster.cols);
  const y = yTicks(entry.durationSeconds, raster.rows);

  return {
    xPositions: x.positions,
    xLabels: x.labels,
    yPositions: y.positions,
    yLabels: y.labels,
  };
}
