/**
 * Default configuration values
 * @module config/defaults
 */

import type { HeatmapOptions, PanelOptions } from '../types';

/**
 * Default heatmap options: 10th/90th percentile clipping, 30 s rows,
 * 32 colormap levels
 */
export const DEFAULT_HEATMAP_OPTIONS: Readonly<HeatmapOptions> = Object.freeze({
  percentileRange: [10, 90] as const,
  durationIndex: 7,
  grayLevels: 32,
  showColorbar: false,
  subjectId: '',
  figureSize: Object.freeze({ width: 360, height: 855 }),
});

/**
 * Default panel options
 */
export const DEFAULT_PANEL_OPTIONS: Readonly<PanelOptions> = Object.freeze({
  ...DEFAULT_HEATMAP_OPTIONS,
  panelTitle: '',
  panelFontSize: 8,
  titleFontSize: 20,
  maxSignalsPerPanel: 10,
});
