/**
 * @module mask-painter
 * Host-side mask painter: keeps the source image and its mask between
 * editing sessions and derives the outputs a host shows.
 */

import type {
  MaskEditorConfig,
  MaskSessionResult,
  MaskSummary,
  PixelBuffer,
  RgbColor,
} from '@maskpaint/types';
import {
  DEFAULT_MASK_EDITOR_CONFIG,
  applyMaskOverlay,
  clonePixelBuffer,
  createPixelBuffer,
  isValidPixelBuffer,
  normalizeColor,
  sameSize,
  summarizeMask,
} from '@maskpaint/core';
import { MaskEditingSession, MaskSessionError } from './mask-session';

/** Inputs the host supplies on each update. */
export interface MaskPainterInput {
  image: PixelBuffer | null | undefined;
  /** Mask color for the next session. Alpha is always opaque. */
  brushColor?: RgbColor;
  /** Brush size for the next session. */
  brushSize?: number;
  /** Start over with an empty mask. */
  reset?: boolean;
}

/**
 * Owns the source image and mask across sessions.
 *
 * Usage:
 * ```ts
 * const painter = new MaskPainter();
 * painter.setInput({ image });
 * const session = painter.openEditor();
 * // ...user paints...
 * painter.applyCommit(session.commit());
 * const overlay = painter.getMaskedImage();
 * ```
 */
export class MaskPainter {
  private inputImage: PixelBuffer | null = null;
  private maskLayer: PixelBuffer | null = null;
  private brushColor: RgbColor = { ...DEFAULT_MASK_EDITOR_CONFIG.brushColor };
  private brushSize = DEFAULT_MASK_EDITOR_CONFIG.brushSize;
  private _message = 'No image loaded';

  /** Status line for the host to display. */
  get message(): string {
    return this._message;
  }

  /** Brush color the next session opens with. */
  get initialBrushColor(): RgbColor {
    return { ...this.brushColor };
  }

  /** Brush size the next session opens with. */
  get initialBrushSize(): number {
    return this.brushSize;
  }

  /**
   * Store a new input. The mask is reset when asked, or when it no longer
   * matches the image's dimensions.
   *
   * @returns The mask summary, or null when no image was supplied.
   * @throws MaskSessionError with code `invalid-input` for a malformed image.
   */
  setInput(input: MaskPainterInput): MaskSummary | null {
    if (!input.image) {
      this._message = 'No image provided';
      return null;
    }
    if (input.brushColor) this.brushColor = normalizeColor(input.brushColor);
    if (input.brushSize !== undefined && Number.isFinite(input.brushSize)) {
      this.brushSize = Math.max(1, Math.trunc(input.brushSize));
    }

    if (!isValidPixelBuffer(input.image)) {
      this._message = 'Invalid image data';
      throw new MaskSessionError('invalid-input', 'Image has no valid pixel data');
    }
    const image = input.image;
    this.inputImage = image;

    if (input.reset || !this.maskLayer || !sameSize(this.maskLayer, image)) {
      this.maskLayer = createPixelBuffer(image.width, image.height);
    }
    return this.refreshSummary();
  }

  getInputImage(): PixelBuffer | null {
    return this.inputImage;
  }

  getMaskLayer(): PixelBuffer | null {
    return this.maskLayer;
  }

  /**
   * Open an editing session seeded with the stored mask.
   * @throws MaskSessionError when no image has been set.
   */
  openEditor(config: Partial<MaskEditorConfig> = {}): MaskEditingSession {
    if (!this.inputImage) {
      throw new MaskSessionError('invalid-input', 'Please provide an input image first.');
    }
    return MaskEditingSession.open(
      {
        image: this.inputImage,
        mask: this.maskLayer,
        brushColor: this.brushColor,
        brushSize: this.brushSize,
      },
      config,
    );
  }

  /**
   * Store a committed mask. A null result (cancelled or already closed
   * session) leaves the stored mask unchanged.
   *
   * @throws RangeError when the mask does not match the input image.
   */
  applyCommit(result: MaskSessionResult | null): MaskSummary | null {
    if (!result) return null;
    const image = this.inputImage;
    if (!image || !sameSize(result.mask, image)) {
      throw new RangeError(`Committed mask ${result.width}x${result.height} does not match the input image`);
    }
    this.maskLayer = result.mask;
    return this.refreshSummary();
  }

  /** The input with the mask overlaid; painted pixels are opaque. */
  getMaskedImage(): PixelBuffer | null {
    if (!this.inputImage || !this.maskLayer) return null;
    return applyMaskOverlay(this.inputImage, this.maskLayer);
  }

  /** A copy of the mask on its own. */
  getMaskOnly(): PixelBuffer | null {
    return this.maskLayer ? clonePixelBuffer(this.maskLayer) : null;
  }

  getSummary(): MaskSummary | null {
    return this.maskLayer ? summarizeMask(this.maskLayer) : null;
  }

  private refreshSummary(): MaskSummary | null {
    const summary = this.getSummary();
    if (summary) this._message = summary.message;
    return summary;
  }
}
