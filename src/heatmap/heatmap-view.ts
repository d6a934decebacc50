/**
 * Heatmap View
 *
 * Runs the raster pipeline for single signals:
 * duration entry -> clip range -> clipped samples -> raster -> ticks.
 *
 * @module heatmap/heatmap-view
 */

import type { HeatmapBundle, HeatmapOptions, Recording, RecordingHeader, SignalTrace } from '../types';
import { resolveHeatmapOptions } from '../config/options';
import { getAxisUnitLabel, getDurationEntry, Y_AXIS_LABEL } from '../data/durationTable';
import { buildTickSet } from '../raster/axis-ticks';
import { clipToPercentiles } from '../raster/percentile-clipper';
import { buildRaster, windowSampleCount } from '../raster/raster-builder';
import { createLogger } from '../utils/logger';
import { resolveSignalIndexes } from './signal-index';

const logger = createLogger('heatmap:view');

/**
 * Display title for a signal, prefixed with the subject id when set
 */
export function formatHeatmapTitle(label: string, subjectId: string): string {
  return subjectId ? `${subjectId} - ${label}` : label;
}

/**
 * Build the heatmap bundle of one signal.
 *
 * Every precondition is checked before any output is produced.
 */
export function createHeatmap(
  signal: SignalTrace,
  header: RecordingHeader,
  options: Partial<HeatmapOptions> = {}
): HeatmapBundle {
  const opts = resolveHeatmapOptions(options);
  const entry = getDurationEntry(opts.durationIndex);
  const cols = windowSampleCount(entry.durationSeconds, signal.samplesPerRecord, header.recordDurationSeconds);

  const clipped = clipToPercentiles(signal.samples, opts.percentileRange);
  const raster = buildRaster(clipped.samples, cols);
  const ticks = buildTickSet(entry, raster);

  logger.debug('Built heatmap raster', {
    label: signal.label,
    durationSeconds: entry.durationSeconds,
    rows: raster.rows,
    cols: raster.cols,
    samplesInLastRow: raster.samplesInLastRow,
    clipRange: clipped.range,
  });

  return {
    label: signal.label,
    title: formatHeatmapTitle(signal.label, opts.subjectId),
    raster,
    clipRange: clipped.range,
    ticks,
    durationEntry: entry,
    xAxisLabel: getAxisUnitLabel(entry),
    yAxisLabel: Y_AXIS_LABEL,
    grayLevels: opts.grayLevels,
    showColorbar: opts.showColorbar,
    figureSize: { ...opts.figureSize },
  };
}

/**
 * Build one bundle per requested signal, in request order.
 * All signals except annotation channels are used when no labels are given.
 *
 * @throws LabelNotFoundError before any raster is built
 */
export function createHeatmapViews(
  recording: Recording,
  signalLabels?: readonly string[],
  options: Partial<HeatmapOptions> = {}
): HeatmapBundle[] {
  const opts = resolveHeatmapOptions(options);
  const indexes = resolveSignalIndexes(
    recording.signals.map(s => s.label),
    signalLabels
  );

  logger.info('Creating heatmap views', {
    signals: indexes.length,
    durationIndex: opts.durationIndex,
  });

  return indexes.map(i => createHeatmap(recording.signals[i], recording.header, opts));
}
