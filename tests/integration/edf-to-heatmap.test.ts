/**
 * End-to-end: EDF file on disk -> recording -> heatmaps -> PNG
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PNG } from 'pngjs';
import { createHeatmapPanel, createHeatmapViews } from '../../src/heatmap';
import { renderHeatmapPng, renderPanelPng } from '../../src/renderer';
import { generateRamp, loadEDFFile, toRecording, writeEDF } from '../../src/signal';
import { flattenRaster } from '../../src/raster';
import type { Recording } from '../../src/types';

const TWO_HOURS = 2 * 3600;
const identity = { physicalMin: -32768, physicalMax: 32767 };

describe('EDF to heatmap', () => {
  let dir: string;
  let recording: Recording;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'edf-heatmap-'));
    const path = join(dir, 'night.edf');

    await writeFile(
      path,
      writeEDF(
        [
          { label: 'EEG', samplesPerRecord: 4, samples: generateRamp(TWO_HOURS * 4), ...identity },
          { label: 'EDF Annotations', samplesPerRecord: 1, samples: new Array<number>(TWO_HOURS).fill(0), ...identity },
          { label: 'AIRFLOW', samplesPerRecord: 1, samples: generateRamp(TWO_HOURS - 10), ...identity },
        ],
        { patientId: 'S01' }
      )
    );

    recording = toRecording(await loadEDFFile(path));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load every signal with its record layout', () => {
    expect(recording.header).toEqual({ recordCount: TWO_HOURS, recordDurationSeconds: 1 });
    expect(recording.signals.map(s => s.label)).toEqual(['EEG', 'EDF Annotations', 'AIRFLOW']);
    expect(recording.signals[0].samples).toHaveLength(TWO_HOURS * 4);
  });

  it('should lay out two hours of 30 second windows', () => {
    const [eeg] = createHeatmapViews(recording, ['EEG'], { durationIndex: 7, subjectId: 'S01' });

    expect(eeg.title).toBe('S01 - EEG');
    expect(eeg.raster.rows).toBe(240);
    expect(eeg.raster.cols).toBe(120);
    expect(eeg.ticks.xPositions).toEqual([1, 40, 80, 120]);
    expect(eeg.ticks.yPositions).toEqual([1, 121]);
    expect(eeg.ticks.yLabels).toEqual(['0', '1']);
    expect(eeg.clipRange.low).toBeCloseTo(2880.5, 6);
    expect(eeg.clipRange.high).toBeCloseTo(25920.5, 6);
  });

  it('should skip annotation channels by default', () => {
    const views = createHeatmapViews(recording, undefined, { durationIndex: 7 });
    expect(views.map(v => v.label)).toEqual(['EEG', 'AIRFLOW']);
  });

  it('should carry padded records into the raster as samples', () => {
    const [airflow] = createHeatmapViews(recording, ['AIRFLOW'], { durationIndex: 7, percentileRange: [0, 100] });

    // the writer pads the final record with the physical minimum
    expect(airflow.raster.rows).toBe(240);
    expect(airflow.raster.samplesInLastRow).toBe(30);
    expect(flattenRaster(airflow.raster)).toHaveLength(TWO_HOURS);
    expect(airflow.raster.grid[239][19]).toBe(TWO_HOURS - 10);
    expect(airflow.raster.grid[239][20]).toBe(-32768);
  });

  it('should render views and panels to PNG', () => {
    const views = createHeatmapViews(recording, ['EEG'], { durationIndex: 12, showColorbar: true });
    const single = PNG.sync.read(renderHeatmapPng(views[0]));
    expect([single.width, single.height]).toEqual([360, 855]);

    const panel = createHeatmapPanel(recording, undefined, {
      durationIndex: 12,
      panelTitle: 'S01',
      figureSize: { width: 600, height: 400 },
    });
    const image = PNG.sync.read(renderPanelPng(panel));
    expect(panel.panes).toHaveLength(2);
    expect([image.width, image.height]).toEqual([600, 400]);
  });
});
