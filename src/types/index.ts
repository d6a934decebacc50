/**
 * Type definitions
 *
 * @module types
 */

export type { RecordingHeader, SignalTrace, Recording } from './recording';

export type { AxisUnit, DurationEntry, ClipRange, Raster, AxisTicks, TickSet } from './raster';

export type { PercentileRange, FigureSize, HeatmapOptions, PanelOptions } from './config';

export type { HeatmapBundle, HeatmapPanel } from './heatmap';
