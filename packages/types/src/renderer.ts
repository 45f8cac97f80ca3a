/**
 * @module renderer
 * Viewport and compositor contracts for displaying the mask over the image.
 */

import type { Point, Rect, RgbColor, Size } from './common';
import type { BrushMode, PixelBuffer } from './pixel-buffer';

/**
 * ViewportTransform manages the view transform (zoom/pan) between
 * screen coordinates and image coordinates.
 */
export interface ViewportTransform {
  /** Current zoom factor, always within [zoomMin, zoomMax]. */
  readonly zoom: number;
  /** Pan offset in screen pixels. */
  readonly offset: Point;
  /** Lowest allowed zoom. */
  readonly zoomMin: number;
  /** Highest allowed zoom. */
  readonly zoomMax: number;
  /** Zoom as a rounded percentage, for display. */
  readonly zoomPercent: number;
  /** Visible area in image coordinates. */
  readonly visibleArea: Rect;

  /** Zoom so the image point under `anchor` stays under `anchor`. */
  zoomAtAnchor(targetZoom: number, anchor: Point): void;
  /** Set the zoom, anchored at `anchor` or the viewport center. */
  setZoom(zoom: number, anchor?: Point): void;
  /** Fit the whole image within the viewport, centered. */
  fitToViewport(viewportSize: Size, imageSize: Size): void;
  /** Shift the view by a screen-space delta. */
  pan(delta: Point): void;
  /** Apply one wheel notch anchored at a screen point. */
  wheelZoom(deltaY: number, anchor: Point): void;
  /** Update the viewport size (e.g. when the window resizes). */
  setViewportSize(size: Size): void;
  /** Convert a screen-space point to image space. */
  screenToImage(screenPoint: Point): Point;
  /** Convert an image-space point to screen space. */
  imageToScreen(imagePoint: Point): Point;
}

/**
 * Keeps a reduced-resolution preview in step with the full-resolution mask
 * and produces the composited display image.
 */
export interface MaskCompositor {
  /** Whether a stroke is being previewed at reduced resolution. */
  readonly isLive: boolean;
  /** Preview resolution relative to the working image. */
  readonly previewScale: number;
  /** Opaque composite of image and mask at working resolution. */
  readonly display: PixelBuffer | null;
  /** Static reduced-resolution image shown under the overlay while live. */
  readonly previewBase: PixelBuffer | null;
  /** Mask-only pixels at preview resolution, composited by the display layer. */
  readonly overlay: PixelBuffer | null;

  /** Sync the preview from the full mask and switch to preview display. */
  enterLiveMode(): void;
  /**
   * Stamp into the preview mask and overlay. `halfSize` is the brush size
   * halved, not truncated. Returns the preview rect touched.
   */
  drawLive(point: Point, halfSize: number, color: RgbColor, mode: BrushMode): Rect | null;
  /** Stamp a segment into the preview mask and overlay. */
  drawLiveSegment(from: Point, to: Point, halfSize: number, color: RgbColor, mode: BrushMode): Rect | null;
  /**
   * Leave preview display and recomposite the damaged region at full
   * resolution. A null damage composites nothing.
   */
  exitLiveMode(damage: Rect | null): Rect | null;
  /** Blend image and mask into the display for a region. */
  composite(rect: Rect): Rect | null;
  /** Re-downsample the full mask into the preview mask and overlay. */
  syncPreview(): void;
  /** Swap the working image and mask. Preview buffers are rebuilt on demand. */
  setSources(image: PixelBuffer | null, mask: PixelBuffer | null): void;
  /** Drop every buffer. Later calls are no-ops until new sources are set. */
  release(): void;
}
