/**
 * @module viewport
 * Zoom/pan transform between screen space and image space.
 *
 * Manages the mapping between screen space (pixels on the display) and
 * image space (pixels of the working image). Supports anchored zoom, a
 * fixed relative wheel step, panning, and fit-to-viewport.
 *
 * @see {@link @maskpaint/types!ViewportTransform} for the interface contract.
 */

import type { Point, Rect, Size, ViewportTransform } from '@maskpaint/types';

/** Default minimum zoom level. */
const DEFAULT_ZOOM_MIN = 0.1;
/** Default maximum zoom level. */
const DEFAULT_ZOOM_MAX = 10;
/** Default relative zoom change per wheel notch. */
const DEFAULT_WHEEL_STEP = 0.08;
/** Zoom changes smaller than this are ignored. */
const ZOOM_EPSILON = 1e-6;

/** Construction options for {@link ViewportTransformImpl}. */
export interface ViewportOptions {
  zoomMin?: number;
  zoomMax?: number;
  /** Relative zoom change per wheel notch, in (0, 1). */
  wheelStep?: number;
  /** Initial viewport size in screen pixels. */
  viewportSize?: Size;
}

/**
 * Clamp a number between min and max (inclusive).
 */
function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Concrete implementation of the ViewportTransform interface.
 *
 * Coordinate system:
 * - Image space: origin at top-left of the working image, 1 unit = 1 image pixel.
 * - Screen space: origin at top-left of the viewport element, 1 unit = 1 screen pixel.
 *
 * Transform: screenPoint = imagePoint * zoom + offset
 * Inverse:   imagePoint  = (screenPoint - offset) / zoom
 */
export class ViewportTransformImpl implements ViewportTransform {
  readonly zoomMin: number;
  readonly zoomMax: number;
  private readonly wheelStep: number;
  private _zoom: number;
  private _offset: Point;
  private _viewportSize: Size;

  /**
   * @throws RangeError when the zoom range or wheel step is unusable.
   */
  constructor(options: ViewportOptions = {}) {
    const zoomMin = options.zoomMin ?? DEFAULT_ZOOM_MIN;
    const zoomMax = options.zoomMax ?? DEFAULT_ZOOM_MAX;
    const wheelStep = options.wheelStep ?? DEFAULT_WHEEL_STEP;
    if (!(zoomMin > 0) || !(zoomMax >= zoomMin)) {
      throw new RangeError(`Invalid zoom range [${zoomMin}, ${zoomMax}]`);
    }
    if (!(wheelStep > 0 && wheelStep < 1)) {
      throw new RangeError(`wheelStep must be in (0, 1), got ${wheelStep}`);
    }
    this.zoomMin = zoomMin;
    this.zoomMax = zoomMax;
    this.wheelStep = wheelStep;
    this._zoom = clamp(1, zoomMin, zoomMax);
    this._offset = { x: 0, y: 0 };
    this._viewportSize = nonNegativeSize(options.viewportSize ?? { width: 800, height: 600 });
  }

  /** Current zoom level, within [zoomMin, zoomMax]. */
  get zoom(): number {
    return this._zoom;
  }

  /** Pan offset in screen pixels. */
  get offset(): Point {
    return { ...this._offset };
  }

  /** Zoom as a whole percentage. */
  get zoomPercent(): number {
    return Math.round(this._zoom * 100);
  }

  /** Visible area in image coordinates. */
  get visibleArea(): Rect {
    const topLeft = this.screenToImage({ x: 0, y: 0 });
    const bottomRight = this.screenToImage({
      x: this._viewportSize.width,
      y: this._viewportSize.height,
    });
    return {
      x: topLeft.x,
      y: topLeft.y,
      width: bottomRight.x - topLeft.x,
      height: bottomRight.y - topLeft.y,
    };
  }

  /**
   * Change the zoom so the image point under `anchor` stays under it.
   * Non-finite targets are ignored, as are changes below 1e-6.
   */
  zoomAtAnchor(targetZoom: number, anchor: Point): void {
    if (!Number.isFinite(targetZoom)) return;
    const newZoom = clamp(targetZoom, this.zoomMin, this.zoomMax);
    const oldZoom = this._zoom;
    if (Math.abs(newZoom - oldZoom) < ZOOM_EPSILON) return;

    // imagePt = (anchor - oldOffset) / oldZoom
    // newOffset = anchor - imagePt * newZoom
    this._offset = {
      x: anchor.x - (newZoom * (anchor.x - this._offset.x)) / oldZoom,
      y: anchor.y - (newZoom * (anchor.y - this._offset.y)) / oldZoom,
    };
    this._zoom = newZoom;
  }

  /** Set the zoom level, anchored at `anchor` or at the viewport center. */
  setZoom(zoom: number, anchor?: Point): void {
    this.zoomAtAnchor(
      zoom,
      anchor ?? { x: this._viewportSize.width / 2, y: this._viewportSize.height / 2 },
    );
  }

  /** One wheel notch: negative `deltaY` zooms in, positive zooms out. */
  wheelZoom(deltaY: number, anchor: Point): void {
    if (deltaY === 0 || Number.isNaN(deltaY)) return;
    const direction = deltaY < 0 ? 1 : -1;
    this.zoomAtAnchor(this._zoom * (1 + direction * this.wheelStep), anchor);
  }

  /** Shift the view by a screen-space delta. */
  pan(delta: Point): void {
    this._offset = { x: this._offset.x + delta.x, y: this._offset.y + delta.y };
  }

  /** Update the viewport size (e.g. when the window resizes). */
  setViewportSize(size: Size): void {
    this._viewportSize = nonNegativeSize(size);
  }

  /** Convert a screen-space point to image space. */
  screenToImage(screenPoint: Point): Point {
    return {
      x: (screenPoint.x - this._offset.x) / this._zoom,
      y: (screenPoint.y - this._offset.y) / this._zoom,
    };
  }

  /** Convert an image-space point to screen space. */
  imageToScreen(imagePoint: Point): Point {
    return {
      x: imagePoint.x * this._zoom + this._offset.x,
      y: imagePoint.y * this._zoom + this._offset.y,
    };
  }

  /** Fit the entire image within the viewport, centered. */
  fitToViewport(viewportSize: Size, imageSize: Size): void {
    const viewport = nonNegativeSize(viewportSize);
    this._viewportSize = viewport;
    let scale = Math.min(viewport.width / imageSize.width, viewport.height / imageSize.height);
    if (!Number.isFinite(scale)) scale = this.zoomMin;
    const newZoom = clamp(scale, this.zoomMin, this.zoomMax);
    this._zoom = newZoom;
    this._offset = {
      x: (viewport.width - imageSize.width * newZoom) / 2,
      y: (viewport.height - imageSize.height * newZoom) / 2,
    };
  }
}

function nonNegativeSize(size: Size): Size {
  return { width: Math.max(0, size.width), height: Math.max(0, size.height) };
}
