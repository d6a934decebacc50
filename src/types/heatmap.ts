/**
 * Output of the heatmap pipeline, consumed by renderers
 * @module types/heatmap
 */

import type { ClipRange, DurationEntry, Raster, TickSet } from './raster';
import type { FigureSize } from './config';

/**
 * Everything a renderer needs to draw one signal's heatmap
 */
export interface HeatmapBundle {
  /** Signal label as stored in the recording */
  label: string;

  /** Title to display; includes the subject id when one is set */
  title: string;

  raster: Raster;

  clipRange: ClipRange;

  ticks: TickSet;

  durationEntry: DurationEntry;

  xAxisLabel: string;

  yAxisLabel: string;

  grayLevels: number;

  showColorbar: boolean;

  figureSize: FigureSize;
}

/**
 * Side-by-side heatmaps of several signals under one title
 */
export interface HeatmapPanel {
  title: string;
  panes: HeatmapBundle[];
  fontSize: number;
  titleFontSize: number;
  figureSize: FigureSize;
}
