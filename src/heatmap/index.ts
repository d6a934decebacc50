/**
 * Heatmap orchestration
 * @module heatmap
 */

export { createHeatmap, createHeatmapViews, formatHeatmapTitle } from './heatmap-view';
export { createHeatmapPanel } from './heatmap-panel';
export { buildSignalIndex, resolveSignalIndexes, isAnnotationLabel } from './signal-index';
