/**
 * PNG Heatmap Renderer
 *
 * Draws heatmap bundles into PNG images with pngjs. Rows run top to bottom,
 * earliest window first. Tick marks are drawn outside the plot frame; text
 * (titles, tick labels, axis titles) is left to richer renderers.
 *
 * @module renderer/png-renderer
 */

import { PNG } from 'pngjs';
import type { FigureSize, HeatmapBundle, HeatmapPanel } from '../types';
import { gridExtent } from '../utils/math';
import { ValidationError } from '../utils/validation';
import { createLogger } from '../utils/logger';
import { boneColormap, colormapIndex, toRGB8, type RGB } from './colormap';

const logger = createLogger('renderer:png');

/**
 * Renders heatmaps into some output format
 */
export interface HeatmapRenderer<T> {
  render(bundle: HeatmapBundle): T;
  renderPanel(panel: HeatmapPanel): T;
}

export interface Margins {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

/**
 * PNG renderer options
 */
export interface PngRendererOptions {
  /** Space around the plot area in pixels */
  margins?: Partial<Margins>;
  /** Width of the colorbar strip */
  colorbarWidth?: number;
  /** Gap between plot and colorbar */
  colorbarGap?: number;
  /** Length of tick marks */
  tickLength?: number;
  /** Horizontal padding around each pane of a panel */
  panePadding?: number;
  /** Figure background, 8-bit RGB */
  background?: RGB;
  /** Frame and tick color, 8-bit RGB */
  foreground?: RGB;
}

interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

const DEFAULT_MARGINS: Margins = { top: 20, right: 10, bottom: 30, left: 40 };

/**
 * Figure-sized RGBA canvas over a pngjs image
 */
class Canvas {
  readonly png: PNG;

  constructor(size: FigureSize, background: RGB) {
    this.png = new PNG({ width: size.width, height: size.height });
    this.fill({ x: 0, y: 0, width: size.width, height: size.height }, background);
  }

  setPixel(x: number, y: number, color: RGB): void {
    if (x < 0 || y < 0 || x >= this.png.width || y >= this.png.height) return;
    const i = (y * this.png.width + x) * 4;
    this.png.data[i] = color[0];
    this.png.data[i + 1] = color[1];
    this.png.data[i + 2] = color[2];
    this.png.data[i + 3] = 255;
  }

  fill(rect: Rect, color: RGB): void {
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      for (let x = rect.x; x < rect.x + rect.width; x++) {
        this.setPixel(x, y, color);
      }
    }
  }

  /** One-pixel outline just outside `rect` */
  frame(rect: Rect, color: RGB): void {
    for (let x = rect.x - 1; x <= rect.x + rect.width; x++) {
      this.setPixel(x, rect.y - 1, color);
      this.setPixel(x, rect.y + rect.height, color);
    }
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      this.setPixel(rect.x - 1, y, color);
      this.setPixel(rect.x + rect.width, y, color);
    }
  }

  toBuffer(): Buffer {
    return PNG.sync.write(this.png);
  }
}

/**
 * Pixel offset of a 1-based cell position along an axis of `cells` cells
 * drawn over `pixels` pixels
 */
function cellToPixel(position: number, cells: number, pixels: number): number {
  return Math.min(pixels - 1, Math.max(0, Math.floor(((position - 0.5) / cells) * pixels)));
}

export class PngHeatmapRenderer implements HeatmapRenderer<Buffer> {
  private readonly margins: Margins;
  private readonly colorbarWidth: number;
  private readonly colorbarGap: number;
  private readonly tickLength: number;
  private readonly panePadding: number;
  private readonly background: RGB;
  private readonly foreground: RGB;

  constructor(options: PngRendererOptions = {}) {
    this.margins = { ...DEFAULT_MARGINS, ...options.margins };
    this.colorbarWidth = options.colorbarWidth ?? 12;
    this.colorbarGap = options.colorbarGap ?? 6;
    this.tickLength = options.tickLength ?? 4;
    this.panePadding = options.panePadding ?? 4;
    this.background = options.background ?? [255, 255, 255];
    this.foreground = options.foreground ?? [0, 0, 0];
  }

  /**
   * Render one heatmap to a PNG buffer
   */
  render(bundle: HeatmapBundle): Buffer {
    const { width, height } = bundle.figureSize;
    const canvas = new Canvas(bundle.figureSize, this.background);

    const area: Rect = {
      x: this.margins.left,
      y: this.margins.top,
      width: width - this.margins.left - this.margins.right,
      height: height - this.margins.top - this.margins.bottom,
    };

    this.drawPane(canvas, bundle, area, true);

    logger.debug('Rendered heatmap', { label: bundle.label, width, height });
    return canvas.toBuffer();
  }

  /**
   * Render panes side by side under a title band of 1/20 of the height.
   * Only the first pane carries hour ticks.
   */
  renderPanel(panel: HeatmapPanel): Buffer {
    const { width, height } = panel.figureSize;
    const canvas = new Canvas(panel.figureSize, this.background);
    const titleHeight = Math.round(height / 20);
    const count = panel.panes.length;

    if (count > 0) {
      const paneWidth = Math.floor((width - this.margins.left - this.margins.right) / count);
      const top = titleHeight + this.margins.top;

      panel.panes.forEach((pane, i) => {
        const area: Rect = {
          x: this.margins.left + i * paneWidth + this.panePadding,
          y: top,
          width: paneWidth - 2 * this.panePadding,
          height: height - top - this.margins.bottom,
        };
        this.drawPane(canvas, pane, area, i === 0);
      });
    }

    logger.debug('Rendered heatmap panel', { title: panel.title, panes: count, width, height });
    return canvas.toBuffer();
  }

  private drawPane(canvas: Canvas, bundle: HeatmapBundle, area: Rect, withHourTicks: boolean): void {
    const colorbarSpace = bundle.showColorbar ? this.colorbarGap + this.colorbarWidth : 0;
    const plot: Rect = { ...area, width: area.width - colorbarSpace };

    if (plot.width < 1 || plot.height < 1) {
      throw new ValidationError(
        `Figure leaves a ${plot.width}x${plot.height} plot area for "${bundle.label}"`,
        'figureSize',
        bundle.figureSize
      );
    }

    const colors = boneColormap(bundle.grayLevels).map(toRGB8);
    this.drawRaster(canvas, bundle, plot, colors);
    canvas.frame(plot, this.foreground);
    this.drawTicks(canvas, bundle, plot, withHourTicks);

    if (bundle.showColorbar) {
      this.drawColorbar(
        canvas,
        { x: plot.x + plot.width + this.colorbarGap, y: plot.y, width: this.colorbarWidth, height: plot.height },
        colors
      );
    }
  }

  /**
   * Nearest-cell sampling; the colormap spans the grid's own min and max,
   * padding cells included
   */
  private drawRaster(canvas: Canvas, bundle: HeatmapBundle, plot: Rect, colors: RGB[]): void {
    const { grid, rows, cols } = bundle.raster;
    const extent = gridExtent(grid);
    if (!extent) return;

    for (let py = 0; py < plot.height; py++) {
      const row = grid[Math.floor((py * rows) / plot.height)];
      for (let px = 0; px < plot.width; px++) {
        const value = row[Math.floor((px * cols) / plot.width)];
        const level = colormapIndex(value, extent.min, extent.max, colors.length);
        canvas.setPixel(plot.x + px, plot.y + py, colors[level]);
      }
    }
  }

  private drawTicks(canvas: Canvas, bundle: HeatmapBundle, plot: Rect, withHourTicks: boolean): void {
    const { rows, cols } = bundle.raster;
    const { xPositions, yPositions } = bundle.ticks;

    for (const position of xPositions) {
      const x = plot.x + cellToPixel(position, cols, plot.width);
      for (let d = 1; d <= this.tickLength; d++) {
        canvas.setPixel(x, plot.y + plot.height + d, this.foreground);
      }
    }

    if (!withHourTicks || rows === 0) return;

    for (const position of yPositions) {
      const y = plot.y + cellToPixel(position, rows, plot.height);
      for (let d = 2; d <= this.tickLength + 1; d++) {
        canvas.setPixel(plot.x - d, y, this.foreground);
      }
    }
  }

  /** Highest level at the top */
  private drawColorbar(canvas: Canvas, rect: Rect, colors: RGB[]): void {
    const levels = colors.length;
    for (let py = 0; py < rect.height; py++) {
      const level = levels - 1 - Math.floor((py * levels) / rect.height);
      canvas.fill({ x: rect.x, y: rect.y + py, width: rect.width, height: 1 }, colors[level]);
    }
    canvas.frame(rect, this.foreground);
  }
}

/**
 * Render one heatmap with default renderer settings
 */
export function renderHeatmapPng(bundle: HeatmapBundle, options?: PngRendererOptions): Buffer {
  return new PngHeatmapRenderer(options).render(bundle);
}

export function renderPanelPng(panel: HeatmapPanel, options?: PngRendererOptions): Buffer {
  return new PngHeatmapRenderer(options).renderPanel(panel);
}
