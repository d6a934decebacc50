/**
 * Option resolution
 *
 * Callers pass partial options; every transform works from a frozen, fully
 * populated copy, so no configuration is shared or mutated between calls.
 *
 * @module config/options
 */

import type { HeatmapOptions, PanelOptions } from '../types';
import { getDurationEntry } from '../data/durationTable';
import { validatePercentileRange, validatePositiveInteger } from '../utils/validation';
import { DEFAULT_HEATMAP_OPTIONS, DEFAULT_PANEL_OPTIONS } from './defaults';

function validateHeatmapOptions(options: HeatmapOptions): void {
  validatePercentileRange(options.percentileRange);
  getDurationEntry(options.durationIndex);
  validatePositiveInteger(options.grayLevels, 'grayLevels');
  validatePositiveInteger(options.figureSize.width, 'figureSize.width');
  validatePositiveInteger(options.figureSize.height, 'figureSize.height');
}

/**
 * Merge with defaults and validate
 * @throws ValidationError (or a subclass) for the first invalid field
 */
export function resolveHeatmapOptions(options: Partial<HeatmapOptions> = {}): Readonly<HeatmapOptions> {
  const resolved: HeatmapOptions = {
    ...DEFAULT_HEATMAP_OPTIONS,
    ...options,
    figureSize: { ...DEFAULT_HEATMAP_OPTIONS.figureSize, ...options.figureSize },
  };

  validateHeatmapOptions(resolved);

  return Object.freeze(resolved);
}

export function resolvePanelOptions(options: Partial<PanelOptions> = {}): Readonly<PanelOptions> {
  const resolved: PanelOptions = {
    ...DEFAULT_PANEL_OPTIONS,
    ...options,
    figureSize: { ...DEFAULT_PANEL_OPTIONS.figureSize, ...options.figureSize },
  };

  validateHeatmapOptions(resolved);
  validatePositiveInteger(resolved.panelFontSize, 'panelFontSize');
  validatePositiveInteger(resolved.titleFontSize, 'titleFontSize');
  validatePositiveInteger(resolved.maxSignalsPerPanel, 'maxSignalsPerPanel');

  return Object.freeze(resolved);
}
