/**
 * EDF Heatmap - windowed raster views of long physiological recordings
 *
 * Each signal of a multi-hour recording is laid out as a 2D raster, one
 * fixed-duration window per row, so a whole night can be scanned in one
 * image.
 *
 * @packageDocumentation
 */

// Version
export const VERSION = '0.1.0';

// ============================================================================
// Type Exports
// ============================================================================

export type {
  RecordingHeader,
  SignalTrace,
  Recording,
  AxisUnit,
  DurationEntry,
  ClipRange,
  Raster,
  AxisTicks,
  TickSet,
  PercentileRange,
  FigureSize,
  HeatmapOptions,
  PanelOptions,
  HeatmapBundle,
  HeatmapPanel,
} from './types';

// ============================================================================
// Configuration
// ============================================================================

export {
  DEFAULT_HEATMAP_OPTIONS,
  DEFAULT_PANEL_OPTIONS,
  resolveHeatmapOptions,
  resolvePanelOptions,
} from './config';

// ============================================================================
// Duration Table
// ============================================================================

export {
  DURATION_TABLE,
  AXIS_UNIT_LABELS,
  Y_AXIS_LABEL,
  getDurationEntry,
  findDurationIndex,
  getAxisUnitLabel,
  validateDurationTable,
} from './data';

// ============================================================================
// Raster Transform
// ============================================================================

export {
  computeClipRange,
  clipSamples,
  clipToPercentiles,
  buildRaster,
  flattenRaster,
  windowSampleCount,
  xTicks,
  yTicks,
  buildTickSet,
} from './raster';

// ============================================================================
// Heatmap Views and Panels
// ============================================================================

export {
  createHeatmap,
  createHeatmapViews,
  createHeatmapPanel,
  formatHeatmapTitle,
  buildSignalIndex,
  resolveSignalIndexes,
  isAnnotationLabel,
} from './heatmap';

// ============================================================================
// Signal Loading
// ============================================================================

export {
  parseEDF,
  parseEDFHeader,
  loadEDFFile,
  toRecording,
  detectRecordingFormat,
  EDFParseError,
  writeEDF,
  generateRecording,
  generateRamp,
  generateSineWave,
  generateCircadianSignal,
  type EDFHeader,
  type EDFSignalHeader,
  type EDFRecording,
  type EDFWriteSignal,
  type EDFWriteOptions,
  type SyntheticRecordingOptions,
  type SyntheticSignalOptions,
} from './signal';

// ============================================================================
// Errors and Logging
// ============================================================================

export {
  ValidationError,
  InvalidRangeError,
  InvalidWindowError,
  IndexOutOfRangeError,
  InvalidDurationEntryError,
  LabelNotFoundError,
  type HeatmapErrorCode,
  createLogger,
  setLogLevel,
  configureLogger,
  LogLevel,
} from './utils';

// Note: PNG rendering is available from './renderer'
// Example: import { PngHeatmapRenderer } from 'edf-heatmap/renderer';
