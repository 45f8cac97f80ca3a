/**
 * @module pixel-buffer
 * Raster buffer shared by the working image, the mask layer and every
 * preview/display surface.
 */

/**
 * A 2D grid of RGBA pixels, 4 bytes per pixel, row-major.
 *
 * Shaped like the DOM `ImageData` so a browser host can hand one over
 * without copying. Width and height never change after creation; only
 * `data` is mutated.
 */
export interface PixelBuffer {
  /** Width in pixels. */
  readonly width: number;
  /** Height in pixels. */
  readonly height: number;
  /** RGBA bytes, length `width * height * 4`. */
  readonly data: Uint8ClampedArray;
}

/** Whether a brush application adds mask pixels or clears them. */
export type BrushMode = 'paint' | 'erase';
