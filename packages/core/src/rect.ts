/**
 * @module rect
 * Integer rectangle helpers used for damage regions.
 */

import type { Rect, Size } from '@maskpaint/types';

/** Whether a rect covers no pixels. */
export function isEmptyRect(rect: Rect): boolean {
  return !(rect.width > 0 && rect.height > 0);
}

/** Smallest rect containing both `a` and `b`. */
export function unionRect(a: Rect, b: Rect): Rect {
  const x0 = Math.min(a.x, b.x);
  const y0 = Math.min(a.y, b.y);
  const x1 = Math.max(a.x + a.width, b.x + b.width);
  const y1 = Math.max(a.y + a.height, b.y + b.height);
  return { x: x0, y: y0, width: x1 - x0, height: y1 - y0 };
}

/**
 * Clip a rect to `[0, size)`. Returns null when nothing remains.
 * Fractional edges are expanded outward to whole pixels first.
 */
export function clampRect(rect: Rect, size: Size): Rect | null {
  const x0 = Math.max(0, Math.floor(rect.x));
  const y0 = Math.max(0, Math.floor(rect.y));
  const x1 = Math.min(size.width, Math.ceil(rect.x + rect.width));
  const y1 = Math.min(size.height, Math.ceil(rect.y + rect.height));
  if (x0 >= x1 || y0 >= y1) return null;
  return { x: x0, y: y0, width: x1 - x0, height: y1 - y0 };
}

/** Rect covering a whole buffer. */
export function fullRect(size: Size): Rect {
  return { x: 0, y: 0, width: size.width, height: size.height };
}
