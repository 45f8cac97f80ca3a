/**
 * @module damage-tracker
 * Accumulates the bounding rectangle of pixels touched since the last flush,
 * so recompositing costs scale with the stroke rather than the image.
 */

import type { Rect, Size } from '@maskpaint/types';
import { clampRect, isEmptyRect, unionRect } from './rect';

/**
 * Tracks a single damage rectangle over a buffer of fixed size.
 *
 * Rects are stored unclamped while accumulating; clamping to the buffer
 * bounds happens on flush, before anything reads pixels with them.
 */
export class DamageTracker {
  private rect: Rect | null = null;

  /**
   * @param bounds - Size of the buffer the damage refers to.
   */
  constructor(private readonly bounds: Size) {}

  /** Whether nothing has been accumulated since the last flush. */
  get isEmpty(): boolean {
    return this.rect === null;
  }

  /** Grow the tracked rect to include `rect`. Empty rects are ignored. */
  accumulate(rect: Rect | null): void {
    if (!rect || isEmptyRect(rect)) return;
    this.rect = this.rect ? unionRect(this.rect, rect) : { ...rect };
  }

  /** Current damage clamped to the bounds, without resetting. */
  peek(): Rect | null {
    return this.rect ? clampRect(this.rect, this.bounds) : null;
  }

  /** Return the clamped damage rect (null if none) and reset to empty. */
  flushAndClear(): Rect | null {
    const damage = this.peek();
    this.rect = null;
    return damage;
  }
}
