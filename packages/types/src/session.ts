/**
 * @module session
 * Types describing a mask editing session: what the host supplies,
 * how the editor is configured, the input it consumes and what it hands back.
 */

import type { RgbColor } from './common';
import type { PixelBuffer } from './pixel-buffer';

/** Tunables for a mask editing session. */
export interface MaskEditorConfig {
  /** Larger side of the working image. Bigger sources are downscaled to fit. */
  maxWorkingDimension: number;
  /** Resolution of the preview pair relative to the working image, in (0, 1]. */
  previewScale: number;
  /** Number of undo snapshots kept. */
  undoCapacity: number;
  /** Lowest zoom factor. */
  zoomMin: number;
  /** Highest zoom factor. */
  zoomMax: number;
  /** Relative zoom change per wheel notch (0.08 = 8%). */
  wheelZoomStep: number;
  /** Initial brush diameter in working-image pixels. */
  brushSize: number;
  /** Initial mask color. */
  brushColor: RgbColor;
}

/** What the host provides when a session is opened. */
export interface MaskSessionSource {
  /** Source raster at its original resolution. */
  image: PixelBuffer | null | undefined;
  /**
   * Previously painted mask at the source's original resolution.
   * Discarded when its dimensions differ from the source.
   */
  mask?: PixelBuffer | null;
  /** Brush color override. Alpha is always forced opaque. */
  brushColor?: RgbColor;
  /** Brush size override. */
  brushSize?: number;
}

/** Output of a committed session. */
export interface MaskSessionResult {
  /** Mask at the source's original resolution. */
  mask: PixelBuffer;
  /** Original width. */
  width: number;
  /** Original height. */
  height: number;
}

/** Pointer button as raised by the host's input layer. */
export type PointerButton = 'primary' | 'middle' | 'secondary';

/** A pointer press, move or release in screen coordinates. */
export interface PointerInput {
  /** Button that changed (down/up) or is held (move). */
  button: PointerButton;
  /** Screen X. */
  x: number;
  /** Screen Y. */
  y: number;
}

/** A wheel notch in screen coordinates. Negative `deltaY` zooms in. */
export interface WheelInput {
  x: number;
  y: number;
  deltaY: number;
}

/** The three mutually exclusive interaction states. */
export type InteractionMode = 'idle' | 'drawing' | 'panning';

/** Masked-pixel statistics for a mask layer. */
export interface MaskSummary {
  /** Image width. */
  width: number;
  /** Image height. */
  height: number;
  /** Pixels with non-zero mask alpha. */
  maskedPixels: number;
  /** `maskedPixels` as a percentage of all pixels (0-100). */
  coverage: number;
  /** Human-readable status line. */
  message: string;
}
