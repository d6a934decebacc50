/**
 * Raster transform types
 * @module types/raster
 */

/**
 * Unit in which a duration entry's tick values are expressed
 */
export type AxisUnit = 'seconds' | 'minutes' | 'hours';

/**
 * One selectable window duration with its hand-tuned axis ticks
 */
export interface DurationEntry {
  /** 1-based position in the duration table */
  readonly index: number;

  /** Time span of one raster row */
  readonly durationSeconds: number;

  /** Axis gridline values, in `axisUnit` */
  readonly tickValues: readonly number[];

  readonly axisUnit: AxisUnit;
}

/**
 * Value range samples are clipped into; `low <= high`
 */
export interface ClipRange {
  low: number;
  high: number;
}

/**
 * Signal laid out as rows of fixed-duration windows.
 *
 * `rows = ceil(length / cols)`; cells of the final row past
 * `samplesInLastRow` are zero.
 */
export interface Raster {
  grid: number[][];
  rows: number;
  cols: number;
  samplesInLastRow: number;
}

/**
 * Positions and labels along one axis, positions in 1-based cell units
 */
export interface AxisTicks {
  positions: number[];
  labels: string[];
}

export interface TickSet {
  xPositions: number[];
  xLabels: string[];
  yPositions: number[];
  yLabels: string[];
}
