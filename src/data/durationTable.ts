/**
 * Selectable heatmap window durations
 *
 * Durations follow values common in sleep and circadian research:
 * 1 s to 1 min, 2 min to 1 h, then 2 h to 12 h. The tick values are tuned
 * by hand for readability per entry and are not derived from the duration.
 * The last two entries are both 12 h and differ only in their ticks.
 *
 * @module data/durationTable
 */

import type { AxisUnit, DurationEntry } from '../types';
import { IndexOutOfRangeError, InvalidDurationEntryError } from '../utils/validation';

/**
 * X-axis titles per tick unit
 */
export const AXIS_UNIT_LABELS: Readonly<Record<AxisUnit, string>> = {
  seconds: 'Time (sec.)',
  minutes: 'Time (min.)',
  hours: 'Time (hr.)',
};

/**
 * Y-axis title; rows are labelled in elapsed hours
 */
export const Y_AXIS_LABEL = 'Time (Hours)';

const ROWS: ReadonlyArray<readonly [number, AxisUnit, readonly number[]]> = [
  [1, 'seconds', [0, 0.25, 0.5, 0.75, 1]],
  [2, 'seconds', [0, 0.5, 1, 1.5, 2]],
  [5, 'seconds', [0, 1, 2, 3, 4, 5]],
  [10, 'seconds', [0, 2, 4, 6, 8, 10]],
  [15, 'seconds', [0, 3, 6, 9, 12, 15]],
  [20, 'seconds', [0, 5, 10, 15, 20]],
  [30, 'seconds', [0, 10, 20, 30]],
  [60, 'seconds', [0, 15, 30, 45, 60]],
  [2 * 60, 'minutes', [0, 0.5, 1, 1.5, 2]],
  [3 * 60, 'minutes', [0, 1, 2, 3]],
  [5 * 60, 'minutes', [0, 1, 2, 3, 4, 5]],
  [10 * 60, 'minutes', [0, 2, 4, 6, 8, 10]],
  [15 * 60, 'minutes', [0, 3, 6, 9, 12, 15]],
  [20 * 60, 'minutes', [0, 5, 10, 15, 20]],
  [30 * 60, 'minutes', [0, 10, 20, 30]],
  [40 * 60, 'minutes', [0, 10, 20, 40]],
  [45 * 60, 'minutes', [0, 15, 30, 45]],
  [60 * 60, 'minutes', [0, 15, 30, 45, 60]],
  [2 * 3600, 'hours', [0, 0.5, 1, 1.5, 2]],
  [3 * 3600, 'hours', [0, 1, 2, 3]],
  [4 * 3600, 'hours', [0, 1, 2, 3, 4]],
  [6 * 3600, 'hours', [0, 2, 4, 6]],
  [8 * 3600, 'hours', [0, 2, 4, 6, 8]],
  [12 * 3600, 'hours', [0, 3, 6, 9, 12]],
  [12 * 3600, 'hours', [0, 6, 12, 18, 24]],
];

/**
 * The 25 duration entries, ordered by `durationSeconds`
 */
export const DURATION_TABLE: readonly DurationEntry[] = Object.freeze(
  ROWS.map(([durationSeconds, axisUnit, tickValues], i) =>
    Object.freeze({
      index: i + 1,
      durationSeconds,
      tickValues: Object.freeze([...tickValues]),
      axisUnit,
    })
  )
);

/**
 * Check ordering and tick counts of a duration table
 * @throws InvalidDurationEntryError on the first defective entry
 */
export function validateDurationTable(table: readonly DurationEntry[]): void {
  if (table.length === 0) {
    throw new InvalidDurationEntryError('Duration table is empty', table);
  }

  table.forEach((entry, i) => {
    if (!(entry.durationSeconds > 0)) {
      throw new InvalidDurationEntryError(
        `Entry ${i + 1} has non-positive duration ${entry.durationSeconds}`,
        entry
      );
    }

    if (entry.tickValues.length < 2) {
      throw new InvalidDurationEntryError(
        `Entry ${i + 1} needs at least 2 tick values, has ${entry.tickValues.length}`,
        entry
      );
    }

    const previous = table[i - 1];
    if (previous && entry.durationSeconds < previous.durationSeconds) {
      throw new InvalidDurationEntryError(
        `Entry ${i + 1} (${entry.durationSeconds}s) is shorter than entry ${i} (${previous.durationSeconds}s)`,
        entry
      );
    }
  });
}

validateDurationTable(DURATION_TABLE);

/**
 * Look up a duration entry by its 1-based index
 * @throws IndexOutOfRangeError when `index` is not an integer in [1, 25]
 */
export function getDurationEntry(index: number): DurationEntry {
  if (!Number.isInteger(index) || index < 1 || index > DURATION_TABLE.length) {
    throw new IndexOutOfRangeError(index, DURATION_TABLE.length);
  }

  return DURATION_TABLE[index - 1];
}

/**
 * Index of the first entry with the given duration
 */
export function findDurationIndex(durationSeconds: number): number | undefined {
  const entry = DURATION_TABLE.find(e => e.durationSeconds === durationSeconds);
  return entry?.index;
}

export function getAxisUnitLabel(entry: DurationEntry): string {
  return AXIS_UNIT_LABELS[entry.axisUnit];
}
