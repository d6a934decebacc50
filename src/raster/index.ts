/**
 * Signal-to-raster transform
 * @module raster
 */

export { computeClipRange, clipSamples, clipToPercentiles } from './percentile-clipper';
export { buildRaster, flattenRaster, windowSampleCount } from './raster-builder';
export { xTicks, yTicks, buildTickSet } from './axis-ticks';
