/**
 * Renderer exports
 * @module renderer
 */

export {
  PngHeatmapRenderer,
  renderHeatmapPng,
  renderPanelPng,
  type HeatmapRenderer,
  type PngRendererOptions,
  type Margins,
} from './png-renderer';

export {
  boneColormap,
  grayColormap,
  hotColormap,
  colormapIndex,
  toRGB8,
  type RGB,
} from './colormap';
