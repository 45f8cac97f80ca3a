/**
 * @module pixel-buffer
 * Allocation, copying and comparison of RGBA pixel buffers.
 *
 * Every buffer role in a session (working image, mask layer, preview pair,
 * display) is an independent {@link PixelBuffer}; nothing here shares
 * backing storage between two buffers.
 *
 * @see {@link @maskpaint/types!PixelBuffer} for the shape contract.
 */

import type { PixelBuffer, Rect, RgbColor, Size } from '@maskpaint/types';

/** Bytes per RGBA pixel. */
export const BYTES_PER_PIXEL = 4;

/**
 * Allocate a fully transparent buffer.
 * @throws RangeError when either dimension is not a positive integer.
 */
export function createPixelBuffer(width: number, height: number): PixelBuffer {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new RangeError(`Invalid pixel buffer size ${width}x${height}`);
  }
  return { width, height, data: new Uint8ClampedArray(width * height * BYTES_PER_PIXEL) };
}

/** Deep copy of a buffer. */
export function clonePixelBuffer(source: PixelBuffer): PixelBuffer {
  return { width: source.width, height: source.height, data: new Uint8ClampedArray(source.data) };
}

/**
 * Whether `buffer` has positive integer dimensions and a data array of the
 * matching length.
 */
export function isValidPixelBuffer(buffer: PixelBuffer | null | undefined): buffer is PixelBuffer {
  if (!buffer) return false;
  const { width, height, data } = buffer;
  return (
    Number.isInteger(width) &&
    Number.isInteger(height) &&
    width > 0 &&
    height > 0 &&
    data.length === width * height * BYTES_PER_PIXEL
  );
}

/** Whether two buffers have the same dimensions. */
export function sameSize(a: Size, b: Size): boolean {
  return a.width === b.width && a.height === b.height;
}

/** Byte offset of pixel (x, y). */
export function pixelOffset(buffer: PixelBuffer, x: number, y: number): number {
  return (y * buffer.width + x) * BYTES_PER_PIXEL;
}

/** Read one pixel as `[r, g, b, a]`. */
export function readPixel(buffer: PixelBuffer, x: number, y: number): [number, number, number, number] {
  const i = pixelOffset(buffer, x, y);
  const { data } = buffer;
  return [data[i], data[i + 1], data[i + 2], data[i + 3]];
}

/**
 * Copy the full contents of `source` into `target` in place.
 * @throws RangeError when the sizes differ.
 */
export function copyPixels(source: PixelBuffer, target: PixelBuffer): void {
  if (!sameSize(source, target)) {
    throw new RangeError(
      `Cannot copy ${source.width}x${source.height} pixels into ${target.width}x${target.height}`,
    );
  }
  target.data.set(source.data);
}

/**
 * Copy a rectangular region between two same-sized buffers, row by row.
 * The region must already lie within both buffers.
 */
export function copyRegion(source: PixelBuffer, target: PixelBuffer, region: Rect): void {
  const rowBytes = region.width * BYTES_PER_PIXEL;
  for (let row = 0; row < region.height; row++) {
    const offset = pixelOffset(source, region.x, region.y + row);
    target.data.set(source.data.subarray(offset, offset + rowBytes), offset);
  }
}

/** Set every pixel to fully transparent black. */
export function clearPixels(buffer: PixelBuffer): void {
  buffer.data.fill(0);
}

/** Fill every pixel with an opaque color. */
export function fillPixels(buffer: PixelBuffer, color: RgbColor, alpha = 255): void {
  const { data } = buffer;
  for (let i = 0; i < data.length; i += BYTES_PER_PIXEL) {
    data[i] = color.r;
    data[i + 1] = color.g;
    data[i + 2] = color.b;
    data[i + 3] = alpha;
  }
}

/** Byte-for-byte equality, including dimensions. */
export function pixelBuffersEqual(a: PixelBuffer, b: PixelBuffer): boolean {
  if (!sameSize(a, b) || a.data.length !== b.data.length) return false;
  for (let i = 0; i < a.data.length; i++) {
    if (a.data[i] !== b.data[i]) return false;
  }
  return true;
}
