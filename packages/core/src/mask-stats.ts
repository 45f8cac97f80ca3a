/**
 * @module mask-stats
 * Masked-pixel counts and the status line shown next to the mask output.
 */

import type { MaskSummary, PixelBuffer } from '@maskpaint/types';
import { BYTES_PER_PIXEL } from './pixel-buffer';

/** Number of pixels whose mask alpha is non-zero. */
export function countMaskedPixels(mask: PixelBuffer): number {
  const { data } = mask;
  let count = 0;
  for (let i = 3; i < data.length; i += BYTES_PER_PIXEL) {
    if (data[i] > 0) count++;
  }
  return count;
}

/**
 * Summarize a mask.
 *
 * @example
 * ```ts
 * summarizeMask(mask).message; // "Image: 200x150, Masked: 1,234 pixels (4.11%)"
 * ```
 */
export function summarizeMask(mask: PixelBuffer): MaskSummary {
  const { width, height } = mask;
  const maskedPixels = countMaskedPixels(mask);
  const coverage = (maskedPixels * 100) / (width * height);
  const count = maskedPixels.toLocaleString('en-US');
  return {
    width,
    height,
    maskedPixels,
    coverage,
    message: `Image: ${width}x${height}, Masked: ${count} pixels (${coverage.toFixed(2)}%)`,
  };
}
