/**
 * Configuration exports
 * @module config
 */

// Defaults
export { DEFAULT_HEATMAP_OPTIONS, DEFAULT_PANEL_OPTIONS } from './defaults';

// Resolution
export { resolveHeatmapOptions, resolvePanelOptions } from './options';
