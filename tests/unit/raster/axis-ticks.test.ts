/**
 * Axis tick mapper tests
 */

import { describe, it, expect } from 'vitest';
import { xTicks, yTicks, buildTickSet } from '../../../src/raster/axis-ticks';
import { buildRaster } from '../../../src/raster/raster-builder';
import { DURATION_TABLE, getDurationEntry } from '../../../src/data/durationTable';
import { InvalidDurationEntryError, InvalidWindowError } from '../../../src/utils/validation';
import type { DurationEntry } from '../../../src/types';

describe('xTicks', () => {
  it('should spread the 30 second ticks over 300 columns', () => {
    expect(xTicks(getDurationEntry(7), 300)).toEqual({
      positions: [1, 100, 200, 300],
      labels: ['0', '10', '20', '30'],
    });
  });

  it('should label fractional tick values as written', () => {
    const ticks = xTicks(getDurationEntry(1), 256);
    expect(ticks.positions).toEqual([1, 64, 128, 192, 256]);
    expect(ticks.labels).toEqual(['0', '0.25', '0.5', '0.75', '1']);
  });

  it('should produce one position per tick value for every entry', () => {
    for (const entry of DURATION_TABLE) {
      const ticks = xTicks(entry, 1000);
      expect(ticks.positions).toHaveLength(entry.tickValues.length);
      expect(ticks.labels).toHaveLength(entry.tickValues.length);
      expect(ticks.positions[0]).toBe(1);
      expect(ticks.positions[ticks.positions.length - 1]).toBe(1000);
    }
  });

  it('should space ticks evenly by index, not by value', () => {
    // 40 minute entry: [0, 10, 20, 40]
    expect(xTicks(getDurationEntry(16), 600).positions).toEqual([1, 200, 400, 600]);
  });

  it('should reject an entry with fewer than two ticks', () => {
    const entry: DurationEntry = { index: 99, durationSeconds: 10, tickValues: [0], axisUnit: 'seconds' };
    expect(() => xTicks(entry, 10)).toThrow(InvalidDurationEntryError);
  });

  it('should reject a column count that is not a positive integer', () => {
    expect(() => xTicks(getDurationEntry(7), 0)).toThrow(InvalidWindowError);
  });
});

describe('yTicks', () => {
  it('should place one tick per hour of 30 second rows', () => {
    expect(yTicks(30, 240)).toEqual({ positions: [1, 121], labels: ['0', '1'] });
    expect(yTicks(30, 241)).toEqual({ positions: [1, 121, 241], labels: ['0', '1', '2'] });
  });

  it('should place ticks between rows when windows exceed an hour', () => {
    expect(yTicks(7200, 3)).toEqual({
      positions: [1, 1.5, 2, 2.5, 3],
      labels: ['0', '1', '2', '3', '4'],
    });
  });

  it('should step one row per hour for hour-long windows', () => {
    expect(yTicks(3600, 4).positions).toEqual([1, 2, 3, 4]);
  });

  it('should return no ticks for an empty raster', () => {
    expect(yTicks(30, 0)).toEqual({ positions: [], labels: [] });
  });

  it('should keep only the first tick when the recording is under an hour', () => {
    expect(yTicks(30, 100)).toEqual({ positions: [1], labels: ['0'] });
  });

  it('should reject a non-positive duration', () => {
    expect(() => yTicks(0, 10)).toThrow(InvalidDurationEntryError);
    expect(() => yTicks(-30, 10)).toThrow(InvalidDurationEntryError);
  });
});

describe('buildTickSet', () => {
  it('should combine both axes for a raster', () => {
    const raster = buildRaster(new Array<number>(300 * 240).fill(1), 300);

    expect(buildTickSet(getDurationEntry(7), raster)).toEqual({
      xPositions: [1, 100, 200, 300],
      xLabels: ['0', '10', '20', '30'],
      yPositions: [1, 121],
      yLabels: ['0', '1'],
    });
  });
});
