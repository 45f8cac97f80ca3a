/**
 * @module checkerboard
 * Transparency checkerboard drawn behind mask-only previews.
 *
 * The tile is built once by whoever owns the display and passed to
 * {@link renderOverCheckerboard}; there is no shared lazily-created instance.
 */

import type { PixelBuffer, RgbColor } from '@maskpaint/types';
import { BYTES_PER_PIXEL, createPixelBuffer } from '@maskpaint/core';

/** Light cell color (light gray). */
const DEFAULT_LIGHT: RgbColor = { r: 211, g: 211, b: 211 };
/** Dark cell color (gray). */
const DEFAULT_DARK: RgbColor = { r: 128, g: 128, b: 128 };

/** Options for {@link createCheckerboard}. */
export interface CheckerboardOptions {
  /** Cell edge in pixels (default 10). */
  cellSize?: number;
  /** Cells per tile edge (default 10). */
  cells?: number;
  light?: RgbColor;
  dark?: RgbColor;
}

/** An immutable square checkerboard tile. */
export interface Checkerboard {
  readonly cellSize: number;
  readonly cells: number;
  readonly light: Readonly<RgbColor>;
  readonly dark: Readonly<RgbColor>;
  /** Opaque tile of `cellSize * cells` pixels per edge. Do not write to it. */
  readonly tile: Readonly<PixelBuffer>;
}

/**
 * Build a checkerboard tile. The top-left cell is light.
 * @throws RangeError for non-positive or fractional sizes.
 */
export function createCheckerboard(options: CheckerboardOptions = {}): Checkerboard {
  const cellSize = options.cellSize ?? 10;
  const cells = options.cells ?? 10;
  if (!Number.isInteger(cellSize) || cellSize < 1 || !Number.isInteger(cells) || cells < 1) {
    throw new RangeError(`Invalid checkerboard ${cells} cells of ${cellSize}px`);
  }
  const light = Object.freeze({ ...(options.light ?? DEFAULT_LIGHT) });
  const dark = Object.freeze({ ...(options.dark ?? DEFAULT_DARK) });

  const edge = cellSize * cells;
  const tile = createPixelBuffer(edge, edge);
  const { data } = tile;
  let i = 0;
  for (let y = 0; y < edge; y++) {
    for (let x = 0; x < edge; x++) {
      const c = (Math.floor(x / cellSize) + Math.floor(y / cellSize)) % 2 === 0 ? light : dark;
      data[i] = c.r;
      data[i + 1] = c.g;
      data[i + 2] = c.b;
      data[i + 3] = 255;
      i += BYTES_PER_PIXEL;
    }
  }

  return Object.freeze({ cellSize, cells, light, dark, tile: Object.freeze(tile) });
}

/**
 * Alpha-composite `source` over the checkerboard, tiled from the top-left,
 * into a new opaque buffer of the same size.
 */
export function renderOverCheckerboard(source: PixelBuffer, checkerboard: Checkerboard): PixelBuffer {
  const out = createPixelBuffer(source.width, source.height);
  const { tile } = checkerboard;
  const src = source.data;
  const bg = tile.data;
  const dst = out.data;

  let i = 0;
  for (let y = 0; y < source.height; y++) {
    const tileRow = (y % tile.height) * tile.width;
    for (let x = 0; x < source.width; x++) {
      const t = (tileRow + (x % tile.width)) * BYTES_PER_PIXEL;
      const a = src[i + 3] / 255;
      dst[i] = Math.round(src[i] * a + bg[t] * (1 - a));
      dst[i + 1] = Math.round(src[i + 1] * a + bg[t + 1] * (1 - a));
      dst[i + 2] = Math.round(src[i + 2] * a + bg[t + 2] * (1 - a));
      dst[i + 3] = 255;
      i += BYTES_PER_PIXEL;
    }
  }
  return out;
}
