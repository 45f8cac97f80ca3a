/**
 * @module resample
 * Resolution changes between the original, working and preview buffers.
 *
 * Masks are always resampled nearest-neighbor so painted pixels keep their
 * exact color and alpha. Only the working image, which is never written back,
 * is filtered.
 */

import type { PixelBuffer, Size } from '@maskpaint/types';
import { BYTES_PER_PIXEL, createPixelBuffer } from './pixel-buffer';

/** Working-image geometry derived from a source size. */
export interface WorkingGeometry {
  /** Size of the working image. */
  size: Size;
  /** Working size divided by original size (1 when not downscaled). */
  scale: number;
}

/**
 * Size of the working image for a source of `size` whose larger side
 * may not exceed `maxDimension`.
 */
export function computeWorkingGeometry(size: Size, maxDimension: number): WorkingGeometry {
  const largest = Math.max(size.width, size.height);
  if (largest <= maxDimension) {
    return { size: { width: size.width, height: size.height }, scale: 1 };
  }
  const scale = maxDimension / largest;
  return {
    size: {
      width: Math.max(1, Math.round(size.width * scale)),
      height: Math.max(1, Math.round(size.height * scale)),
    },
    scale,
  };
}

/** Size of a buffer scaled by `scale`, at least 1×1. */
export function scaledSize(size: Size, scale: number): Size {
  return {
    width: Math.max(1, Math.round(size.width * scale)),
    height: Math.max(1, Math.round(size.height * scale)),
  };
}

/** Source index for each destination index along one axis. */
function nearestLookup(srcLength: number, dstLength: number): Int32Array {
  const lookup = new Int32Array(dstLength);
  const ratio = srcLength / dstLength;
  for (let i = 0; i < dstLength; i++) {
    lookup[i] = Math.min(srcLength - 1, Math.floor(i * ratio));
  }
  return lookup;
}

/**
 * Nearest-neighbor resample of `source` into an existing `target`,
 * whatever their relative sizes.
 */
export function resampleNearestInto(source: PixelBuffer, target: PixelBuffer): void {
  const xs = nearestLookup(source.width, target.width);
  const ys = nearestLookup(source.height, target.height);
  const src = source.data;
  const dst = target.data;
  let d = 0;
  for (let y = 0; y < target.height; y++) {
    const rowBase = ys[y] * source.width;
    for (let x = 0; x < target.width; x++) {
      const s = (rowBase + xs[x]) * BYTES_PER_PIXEL;
      dst[d] = src[s];
      dst[d + 1] = src[s + 1];
      dst[d + 2] = src[s + 2];
      dst[d + 3] = src[s + 3];
      d += BYTES_PER_PIXEL;
    }
  }
}

/** Nearest-neighbor resize into a new buffer. */
export function resizeNearest(source: PixelBuffer, width: number, height: number): PixelBuffer {
  const target = createPixelBuffer(width, height);
  resampleNearestInto(source, target);
  return target;
}

/**
 * Bilinear resize into a new buffer, sampling at pixel centers.
 * Used to build the working image from a large source.
 */
export function resizeBilinear(source: PixelBuffer, width: number, height: number): PixelBuffer {
  const target = createPixelBuffer(width, height);
  const { width: sw, height: sh, data: src } = source;
  const dst = target.data;
  const sx = sw / width;
  const sy = sh / height;

  for (let y = 0; y < height; y++) {
    const fyRaw = (y + 0.5) * sy - 0.5;
    const y0 = Math.max(0, Math.min(sh - 1, Math.floor(fyRaw)));
    const y1 = Math.min(y0 + 1, sh - 1);
    const fy = Math.max(0, fyRaw - y0);
    for (let x = 0; x < width; x++) {
      const fxRaw = (x + 0.5) * sx - 0.5;
      const x0 = Math.max(0, Math.min(sw - 1, Math.floor(fxRaw)));
      const x1 = Math.min(x0 + 1, sw - 1);
      const fx = Math.max(0, fxRaw - x0);

      const i00 = (y0 * sw + x0) * BYTES_PER_PIXEL;
      const i10 = (y0 * sw + x1) * BYTES_PER_PIXEL;
      const i01 = (y1 * sw + x0) * BYTES_PER_PIXEL;
      const i11 = (y1 * sw + x1) * BYTES_PER_PIXEL;
      const d = (y * width + x) * BYTES_PER_PIXEL;

      for (let c = 0; c < 4; c++) {
        const top = src[i00 + c] + (src[i10 + c] - src[i00 + c]) * fx;
        const bottom = src[i01 + c] + (src[i11 + c] - src[i01 + c]) * fx;
        dst[d + c] = Math.round(top + (bottom - top) * fy);
      }
    }
  }
  return target;
}
