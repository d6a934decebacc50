/**
 * Colormaps for heatmap rendering
 *
 * Colors are RGB triples in [0, 1], one per quantisation level, darkest
 * first.
 *
 * @module renderer/colormap
 */

export type RGB = [number, number, number];

/**
 * Evenly spaced grays from black to white
 */
export function grayColormap(levels: number): RGB[] {
  const denominator = Math.max(levels - 1, 1);
  return Array.from({ length: levels }, (_, i): RGB => {
    const v = i / denominator;
    return [v, v, v];
  });
}

/**
 * Black-red-yellow-white: red ramps over the first 3/8 of the levels,
 * green over the next 3/8, blue over the rest
 */
export function hotColormap(levels: number): RGB[] {
  const n = Math.floor((3 / 8) * levels);
  const ramp = (i: number, length: number) => (i + 1) / length;

  return Array.from({ length: levels }, (_, i): RGB => {
    const r = i < n ? ramp(i, n) : 1;
    const g = i < n ? 0 : i < 2 * n ? ramp(i - n, n) : 1;
    const b = i < 2 * n ? 0 : ramp(i - 2 * n, levels - 2 * n);
    return [r, g, b];
  });
}

/**
 * Grayscale with a blue tint: 7/8 gray plus 1/8 of `hot` with its red and
 * blue channels swapped
 */
export function boneColormap(levels: number): RGB[] {
  const gray = grayColormap(levels);
  const hot = hotColormap(levels);

  return gray.map(([v], i): RGB => {
    const [r, g, b] = hot[i];
    return [(7 * v + b) / 8, (7 * v + g) / 8, (7 * v + r) / 8];
  });
}

/**
 * Convert a [0, 1] color to 8-bit channels
 */
export function toRGB8(color: RGB): RGB {
  return [Math.round(color[0] * 255), Math.round(color[1] * 255), Math.round(color[2] * 255)];
}

/**
 * Colormap level for `value` when `[min, max]` spans the whole colormap.
 * A flat image (`max <= min`) maps to level 0.
 */
export function colormapIndex(value: number, min: number, max: number, levels: number): number {
  if (!(max > min)) return 0;
  const index = Math.floor(((value - min) / (max - min)) * levels);
  return Math.min(levels - 1, Math.max(0, index));
}
