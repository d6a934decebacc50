/**
 * Heatmap panel tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createHeatmapPanel } from '../../../src/heatmap/heatmap-panel';
import { generateRecording } from '../../../src/signal/synthetic';
import { configureLogger, resetLoggerConfig, type LogEntry } from '../../../src/utils/logger';
import { LabelNotFoundError } from '../../../src/utils/validation';

const recording = generateRecording({
  durationSeconds: 90,
  signals: [
    { label: 'EEG', sampleRate: 4, shape: 'ramp' },
    { label: 'ECG', sampleRate: 8, shape: 'circadian' },
    { label: 'AIRFLOW', sampleRate: 2, shape: 'flat' },
  ],
});

describe('createHeatmapPanel', () => {
  afterEach(() => {
    resetLoggerConfig();
  });

  it('should build one pane per signal under the panel title', () => {
    const panel = createHeatmapPanel(recording, ['AIRFLOW', 'EEG'], {
      durationIndex: 7,
      panelTitle: 'Night 1',
      subjectId: 'S01',
    });

    expect(panel.title).toBe('Night 1');
    expect(panel.panes.map(p => p.title)).toEqual(['AIRFLOW', 'EEG']);
    expect(panel.panes.map(p => [p.raster.rows, p.raster.cols])).toEqual([
      [3, 60],
      [3, 120],
    ]);
  });

  it('should use the panel defaults', () => {
    const panel = createHeatmapPanel(recording);

    expect(panel.panes).toHaveLength(3);
    expect(panel.fontSize).toBe(8);
    expect(panel.titleFontSize).toBe(20);
    expect(panel.figureSize).toEqual({ width: 360, height: 855 });
  });

  it('should share the duration across panes', () => {
    const panel = createHeatmapPanel(recording, undefined, { durationIndex: 6 });
    expect(panel.panes.every(p => p.durationEntry.durationSeconds === 20)).toBe(true);
  });

  it('should warn but still build panes beyond the recommended count', () => {
    const handler = vi.fn<(entry: LogEntry) => void>();
    configureLogger({ outputHandler: handler });

    const panel = createHeatmapPanel(recording, undefined, { durationIndex: 7, maxSignalsPerPanel: 2 });

    expect(panel.panes).toHaveLength(3);
    const warnings = handler.mock.calls.map(([entry]) => entry).filter(entry => entry.level === 'warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].module).toBe('heatmap:panel');
    expect(warnings[0].context).toEqual({ panes: 3, maxSignalsPerPanel: 2 });
  });

  it('should reject unknown labels', () => {
    expect(() => createHeatmapPanel(recording, ['EEG', 'SpO2'])).toThrow(LabelNotFoundError);
  });
});
