/**
 * @module compositor
 * Dual-resolution mask compositor.
 *
 * Holds two explicit buffer roles:
 * - Full resolution: the working image, the mask layer, and the opaque
 *   display composite of the two.
 * - Preview: a reduced copy of the image (`previewBase`), a reduced mask,
 *   and a mask-only `overlay` that the display layer draws over the base
 *   while a stroke is in progress.
 *
 * While live, strokes are stamped into the preview mask and only the touched
 * rect is copied to the overlay. Leaving live mode recomposites the damaged
 * region at full resolution. Moving state between the two roles is always
 * explicit: {@link DualResolutionCompositor.syncPreview} copies full to
 * preview, and nothing copies preview back.
 *
 * @see {@link @maskpaint/types!MaskCompositor}
 */

import type { BrushMode, MaskCompositor, PixelBuffer, Point, Rect, RgbColor } from '@maskpaint/types';
import {
  BYTES_PER_PIXEL,
  BrushStampEngine,
  blendMaskRegion,
  clampRect,
  copyRegion,
  createPixelBuffer,
  resampleNearestInto,
  resizeNearest,
  sameSize,
  scaledSize,
  unionRect,
  walkLine,
} from '@maskpaint/core';

/** Default preview resolution relative to the working image. */
const DEFAULT_PREVIEW_SCALE = 0.5;

/** Options for {@link DualResolutionCompositor}. */
export interface CompositorOptions {
  /** Preview resolution relative to the working image, in (0, 1]. */
  previewScale?: number;
}

/**
 * Compositor over a working image and its mask layer.
 *
 * Usage:
 * ```ts
 * const compositor = new DualResolutionCompositor(image, mask);
 * compositor.composite(fullRect(image));
 * compositor.enterLiveMode();
 * compositor.drawLive({ x: 40, y: 30 }, 10, red, 'paint');
 * compositor.exitLiveMode(damage);
 * ```
 */
export class DualResolutionCompositor implements MaskCompositor {
  readonly previewScale: number;

  private image: PixelBuffer | null = null;
  private mask: PixelBuffer | null = null;
  private _display: PixelBuffer | null = null;
  private _previewBase: PixelBuffer | null = null;
  private _previewMask: PixelBuffer | null = null;
  private _overlay: PixelBuffer | null = null;
  private previewBrush: BrushStampEngine | null = null;
  private live = false;

  /**
   * @param image - Working image, or null for an inert compositor.
   * @param mask - Mask layer, same size as `image`.
   * @throws RangeError when `previewScale` lies outside (0, 1].
   */
  constructor(image: PixelBuffer | null, mask: PixelBuffer | null, options: CompositorOptions = {}) {
    const previewScale = options.previewScale ?? DEFAULT_PREVIEW_SCALE;
    if (!(previewScale > 0 && previewScale <= 1)) {
      throw new RangeError(`previewScale must be in (0, 1], got ${previewScale}`);
    }
    this.previewScale = previewScale;
    this.setSources(image, mask);
  }

  /** @inheritdoc */
  get isLive(): boolean {
    return this.live;
  }

  /** @inheritdoc */
  get display(): PixelBuffer | null {
    return this._display;
  }

  /** @inheritdoc */
  get previewBase(): PixelBuffer | null {
    return this._previewBase;
  }

  /** @inheritdoc */
  get overlay(): PixelBuffer | null {
    return this._overlay;
  }

  /** Reduced-resolution mask the live brush paints into. */
  get previewMask(): PixelBuffer | null {
    return this._previewMask;
  }

  /**
   * @inheritdoc
   * @throws RangeError when both buffers are given with different sizes.
   */
  setSources(image: PixelBuffer | null, mask: PixelBuffer | null): void {
    if (image && mask && !sameSize(image, mask)) {
      throw new RangeError(
        `Mask ${mask.width}x${mask.height} does not match image ${image.width}x${image.height}`,
      );
    }
    this.image = image;
    this.mask = image ? mask : null;
    this._display = image ? createPixelBuffer(image.width, image.height) : null;
    this.dropPreview();
    this.live = false;
  }

  /** @inheritdoc */
  release(): void {
    this.setSources(null, null);
  }

  /** @inheritdoc */
  enterLiveMode(): void {
    if (!this.image || !this.mask) return;
    this.syncPreview();
    this.live = true;
  }

  /** @inheritdoc */
  drawLive(point: Point, halfSize: number, color: RgbColor, mode: BrushMode): Rect | null {
    if (!this.live || !this.previewBrush) return null;
    const rect = this.previewBrush.stamp(this.toPreview(point), this.previewRadius(halfSize), color, mode);
    this.copyToOverlay(rect);
    return rect;
  }

  /**
   * @inheritdoc
   *
   * Walks the segment at working resolution and stamps each step at its
   * preview position, skipping steps that land on the same preview pixel.
   */
  drawLiveSegment(from: Point, to: Point, halfSize: number, color: RgbColor, mode: BrushMode): Rect | null {
    const brush = this.previewBrush;
    if (!this.live || !brush) return null;

    const previewRadius = this.previewRadius(halfSize);
    let last: Point | null = null;
    let damage: Rect | null = null;
    walkLine(from, to, (x, y) => {
      const center = this.toPreview({ x, y });
      if (last && last.x === center.x && last.y === center.y) return;
      last = center;
      const rect = brush.stamp(center, previewRadius, color, mode);
      if (rect) damage = damage ? unionRect(damage, rect) : rect;
    });
    this.copyToOverlay(damage);
    return damage;
  }

  /** @inheritdoc */
  exitLiveMode(damage: Rect | null): Rect | null {
    this.live = false;
    return damage ? this.composite(damage) : null;
  }

  /** @inheritdoc */
  composite(rect: Rect): Rect | null {
    if (!this.image || !this.mask || !this._display) return null;
    const region = clampRect(rect, this.image);
    if (!region) return null;
    blendMaskRegion(this.image, this.mask, this._display, region);
    return region;
  }

  /** @inheritdoc */
  syncPreview(): void {
    if (!this.image || !this.mask) return;
    const { previewMask, overlay } = this.ensurePreview(this.image);
    resampleNearestInto(this.mask, previewMask);
    overlay.data.set(previewMask.data);
  }

  /** (Re)build the preview buffers when missing or mis-sized. */
  private ensurePreview(image: PixelBuffer): { previewMask: PixelBuffer; overlay: PixelBuffer } {
    const size = scaledSize(image, this.previewScale);
    if (
      !this._previewBase ||
      !this._previewMask ||
      !this._overlay ||
      !sameSize(this._previewMask, size) ||
      !sameSize(this._overlay, size)
    ) {
      this._previewBase = opaque(resizeNearest(image, size.width, size.height));
      this._previewMask = createPixelBuffer(size.width, size.height);
      this._overlay = createPixelBuffer(size.width, size.height);
      this.previewBrush = new BrushStampEngine(this._previewMask);
    }
    return { previewMask: this._previewMask, overlay: this._overlay };
  }

  private dropPreview(): void {
    this._previewBase = null;
    this._previewMask = null;
    this._overlay = null;
    this.previewBrush = null;
  }

  private toPreview(point: Point): Point {
    return {
      x: Math.round(point.x * this.previewScale),
      y: Math.round(point.y * this.previewScale),
    };
  }

  /** Preview stamp radius; halves round to even so size 18 at 0.5 gives 4. */
  private previewRadius(halfSize: number): number {
    return Math.max(1, roundHalfEven(halfSize * this.previewScale));
  }

  private copyToOverlay(rect: Rect | null): void {
    if (rect && this._previewMask && this._overlay) {
      copyRegion(this._previewMask, this._overlay, rect);
    }
  }
}

/** Force every pixel's alpha to 255, in place. */
function opaque(buffer: PixelBuffer): PixelBuffer {
  const { data } = buffer;
  for (let i = 3; i < data.length; i += BYTES_PER_PIXEL) data[i] = 255;
  return buffer;
}

function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}
