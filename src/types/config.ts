/**
 * Configuration types
 * @module types/config
 */

/**
 * `[low, high]` percentiles, each in [0, 100]
 */
export type PercentileRange = readonly [number, number];

/**
 * Figure size in pixels
 */
export interface FigureSize {
  width: number;
  height: number;
}

/**
 * Options for building one heatmap per signal
 */
export interface HeatmapOptions {
  /** Percentiles the signal is clipped to before display */
  percentileRange: PercentileRange;

  /** 1-based index into the duration table */
  durationIndex: number;

  /** Number of colormap levels; rendering hint only */
  grayLevels: number;

  /** Draw a colorbar beside the heatmap */
  showColorbar: boolean;

  /** Prefixed to each single-view title when non-empty */
  subjectId: string;

  figureSize: FigureSize;
}

/**
 * Options for a multi-pane panel
 */
export interface PanelOptions extends HeatmapOptions {
  /** Shared title above all panes */
  panelTitle: string;

  panelFontSize: number;

  titleFontSize: number;

  /** Panes above this count still render, with a warning */
  maxSignalsPerPanel: number;
}
