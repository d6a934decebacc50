/**
 * Heatmap Panel
 *
 * Same per-signal pipeline as the single views, collected into one
 * side-by-side panel under a shared title.
 *
 * @module heatmap/heatmap-panel
 */

import type { HeatmapPanel, PanelOptions, Recording } from '../types';
import { resolvePanelOptions } from '../config/options';
import { createLogger } from '../utils/logger';
import { createHeatmap } from './heatmap-view';
import { resolveSignalIndexes } from './signal-index';

const logger = createLogger('heatmap:panel');

export function createHeatmapPanel(
  recording: Recording,
  signalLabels?: readonly string[],
  options: Partial<PanelOptions> = {}
): HeatmapPanel {
  const opts = resolvePanelOptions(options);
  const indexes = resolveSignalIndexes(
    recording.signals.map(s => s.label),
    signalLabels
  );

  if (indexes.length > opts.maxSignalsPerPanel) {
    logger.warn('Panel has more panes than recommended', {
      panes: indexes.length,
      maxSignalsPerPanel: opts.maxSignalsPerPanel,
    });
  }

  // Pane titles carry the bare label; the subject belongs in the panel title.
  const paneOptions = { ...opts, subjectId: '' };
  const panes = indexes.map(i => createHeatmap(recording.signals[i], recording.header, paneOptions));

  return {
    title: opts.panelTitle,
    panes,
    fontSize: opts.panelFontSize,
    titleFontSize: opts.titleFontSize,
    figureSize: { ...opts.figureSize },
  };
}
