import { describe, it, expect } from 'vitest';
import {
  clearPixels,
  clonePixelBuffer,
  copyPixels,
  copyRegion,
  createPixelBuffer,
  fillPixels,
  isValidPixelBuffer,
  pixelBuffersEqual,
  readPixel,
} from './pixel-buffer';

describe('createPixelBuffer', () => {
  it('allocates a transparent RGBA buffer', () => {
    const buf = createPixelBuffer(3, 2);
    expect(buf.width).toBe(3);
    expect(buf.height).toBe(2);
    expect(buf.data.length).toBe(24);
    expect(buf.data.every((v) => v === 0)).toBe(true);
  });

  it('rejects zero, negative and fractional sizes', () => {
    expect(() => createPixelBuffer(0, 5)).toThrow(RangeError);
    expect(() => createPixelBuffer(5, -1)).toThrow(RangeError);
    expect(() => createPixelBuffer(2.5, 5)).toThrow(RangeError);
  });
});

describe('clonePixelBuffer', () => {
  it('copies data without sharing storage', () => {
    const buf = createPixelBuffer(2, 2);
    buf.data[0] = 42;
    const copy = clonePixelBuffer(buf);
    buf.data[0] = 7;
    expect(copy.data[0]).toBe(42);
    expect(copy.width).toBe(2);
  });
});

describe('isValidPixelBuffer', () => {
  it('accepts a well-formed buffer', () => {
    expect(isValidPixelBuffer(createPixelBuffer(4, 4))).toBe(true);
  });

  it('rejects null, zero sizes and short data', () => {
    expect(isValidPixelBuffer(null)).toBe(false);
    expect(isValidPixelBuffer(undefined)).toBe(false);
    expect(isValidPixelBuffer({ width: 0, height: 0, data: new Uint8ClampedArray(0) })).toBe(false);
    expect(isValidPixelBuffer({ width: 2, height: 2, data: new Uint8ClampedArray(8) })).toBe(false);
  });
});

describe('fillPixels / clearPixels / readPixel', () => {
  it('fills with an opaque color and clears back to transparent', () => {
    const buf = createPixelBuffer(2, 2);
    fillPixels(buf, { r: 10, g: 20, b: 30 });
    expect(readPixel(buf, 1, 1)).toEqual([10, 20, 30, 255]);
    clearPixels(buf);
    expect(readPixel(buf, 1, 1)).toEqual([0, 0, 0, 0]);
  });
});

describe('copyPixels', () => {
  it('copies into a same-sized buffer', () => {
    const a = createPixelBuffer(2, 2);
    fillPixels(a, { r: 1, g: 2, b: 3 });
    const b = createPixelBuffer(2, 2);
    copyPixels(a, b);
    expect(pixelBuffersEqual(a, b)).toBe(true);
  });

  it('throws on size mismatch', () => {
    expect(() => copyPixels(createPixelBuffer(2, 2), createPixelBuffer(3, 2))).toThrow(RangeError);
  });
});

describe('copyRegion', () => {
  it('copies only the given rows and columns', () => {
    const src = createPixelBuffer(4, 4);
    fillPixels(src, { r: 200, g: 0, b: 0 });
    const dst = createPixelBuffer(4, 4);
    copyRegion(src, dst, { x: 1, y: 1, width: 2, height: 2 });

    expect(readPixel(dst, 1, 1)).toEqual([200, 0, 0, 255]);
    expect(readPixel(dst, 2, 2)).toEqual([200, 0, 0, 255]);
    expect(readPixel(dst, 0, 0)).toEqual([0, 0, 0, 0]);
    expect(readPixel(dst, 3, 1)).toEqual([0, 0, 0, 0]);
  });
});

describe('pixelBuffersEqual', () => {
  it('detects a single differing byte', () => {
    const a = createPixelBuffer(2, 2);
    const b = createPixelBuffer(2, 2);
    expect(pixelBuffersEqual(a, b)).toBe(true);
    b.data[15] = 1;
    expect(pixelBuffersEqual(a, b)).toBe(false);
  });

  it('treats different dimensions as unequal', () => {
    expect(pixelBuffersEqual(createPixelBuffer(2, 3), createPixelBuffer(3, 2))).toBe(false);
  });
});
