/**
 * @module mask-session
 * One mask editing session, from opening over a source image to commit or cancel.
 *
 * A session owns every buffer it creates: the working image (the source,
 * downscaled when its larger side exceeds `maxWorkingDimension`), the mask
 * layer at working resolution, the compositor's display and preview
 * buffers, and the undo ring. Commit scales the mask back up to the
 * source's original size with nearest-neighbor sampling; cancel discards it.
 * Once closed, every input is ignored.
 */

import type {
  MaskEditorConfig,
  MaskSessionResult,
  MaskSessionSource,
  MaskSummary,
  PixelBuffer,
  PointerInput,
  Rect,
  Size,
  WheelInput,
} from '@maskpaint/types';
import type { StoreApi } from 'zustand/vanilla';
import {
  EventBusImpl,
  UndoManager,
  clonePixelBuffer,
  computeWorkingGeometry,
  createPixelBuffer,
  fullRect,
  isValidPixelBuffer,
  resizeBilinear,
  resizeNearest,
  resolveMaskEditorConfig,
  sameSize,
  summarizeMask,
} from '@maskpaint/core';
import { DualResolutionCompositor, ViewportTransformImpl, renderOverCheckerboard } from '@maskpaint/render';
import type { Checkerboard } from '@maskpaint/render';
import { StrokeOrchestrator } from './stroke-orchestrator';
import { clampBrushSize, createMaskEditorStore } from './mask-editor-store';
import type { MaskEditorStore } from './mask-editor-store';

/** Machine-readable reason for a {@link MaskSessionError}. */
export type MaskSessionErrorCode = 'invalid-input';

/** Raised when a session cannot be opened over the given source. */
export class MaskSessionError extends Error {
  constructor(
    readonly code: MaskSessionErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'MaskSessionError';
  }
}

/** Buffers and collaborators that live only while the session is open. */
interface OpenState {
  image: PixelBuffer;
  mask: PixelBuffer;
  compositor: DualResolutionCompositor;
  history: UndoManager;
  orchestrator: StrokeOrchestrator;
}

/**
 * An open mask editing session.
 *
 * Usage:
 * ```ts
 * const session = MaskEditingSession.open({ image, mask: previous });
 * session.fitToViewport({ width: 1280, height: 800 });
 * session.events.on('display:invalidated', ({ region, target }) => redraw(region, target));
 * session.pointerDown({ button: 'primary', x: 320, y: 200 });
 * session.pointerUp({ button: 'primary', x: 320, y: 200 });
 * const result = session.commit();
 * ```
 */
export class MaskEditingSession {
  /** Session-scoped event bus. */
  readonly events = new EventBusImpl();
  /** Editor UI state. */
  readonly store: StoreApi<MaskEditorStore>;
  /** Zoom/pan over the working image. */
  readonly viewport: ViewportTransformImpl;
  /** Resolved configuration. */
  readonly config: Readonly<MaskEditorConfig>;
  /** Source size. */
  readonly originalSize: Size;
  /** Working image size. */
  readonly workingSize: Size;
  /** `working / original`; 1 when the source was not downscaled. */
  readonly workingScale: number;

  private state: OpenState | null;

  private constructor(
    config: MaskEditorConfig,
    originalSize: Size,
    workingScale: number,
    image: PixelBuffer,
    mask: PixelBuffer,
  ) {
    this.config = config;
    this.originalSize = { ...originalSize };
    this.workingSize = { width: image.width, height: image.height };
    this.workingScale = workingScale;
    this.store = createMaskEditorStore({ brushSize: config.brushSize, brushColor: config.brushColor });
    this.viewport = new ViewportTransformImpl({
      zoomMin: config.zoomMin,
      zoomMax: config.zoomMax,
      wheelStep: config.wheelZoomStep,
    });

    const compositor = new DualResolutionCompositor(image, mask, { previewScale: config.previewScale });
    const history = new UndoManager(config.undoCapacity);
    const orchestrator = new StrokeOrchestrator({
      mask,
      compositor,
      history,
      viewport: this.viewport,
      store: this.store,
      events: this.events,
    });
    this.state = { image, mask, compositor, history, orchestrator };
    compositor.composite(fullRect(image));
    this.store.getState().setZoomPercent(this.viewport.zoomPercent);
  }

  /**
   * Open a session over `source`.
   *
   * A prior mask whose dimensions differ from the source is discarded with
   * a warning and the session starts with an empty mask.
   *
   * @throws MaskSessionError with code `invalid-input` when the source image
   *   is missing, empty or its data does not match its dimensions.
   * @throws RangeError when the configuration is unusable.
   */
  static open(source: MaskSessionSource, config: Partial<MaskEditorConfig> = {}): MaskEditingSession {
    const original = source.image;
    if (!isValidPixelBuffer(original)) {
      throw new MaskSessionError('invalid-input', 'Source image is missing or malformed');
    }

    const resolved = resolveMaskEditorConfig({
      ...config,
      ...(source.brushColor ? { brushColor: source.brushColor } : {}),
      ...(source.brushSize !== undefined ? { brushSize: clampBrushSize(source.brushSize) } : {}),
    });

    const { size, scale } = computeWorkingGeometry(original, resolved.maxWorkingDimension);
    const downscaled = scale < 1;
    const image = downscaled
      ? resizeBilinear(original, size.width, size.height)
      : clonePixelBuffer(original);
    if (downscaled) {
      console.debug(
        `[mask-session] working image ${size.width}x${size.height} ` +
          `from ${original.width}x${original.height} (scale ${scale.toFixed(4)})`,
      );
    }

    let mask: PixelBuffer;
    const prior = source.mask;
    if (prior && isValidPixelBuffer(prior) && sameSize(prior, original)) {
      mask = downscaled ? resizeNearest(prior, size.width, size.height) : clonePixelBuffer(prior);
    } else {
      if (prior) {
        console.warn(
          `[mask-session] discarding ${prior.width}x${prior.height} mask ` +
            `for ${original.width}x${original.height} image`,
        );
      }
      mask = createPixelBuffer(size.width, size.height);
    }

    return new MaskEditingSession(resolved, original, scale, image, mask);
  }

  /** Whether commit or cancel has been called. */
  get isClosed(): boolean {
    return this.state === null;
  }

  /** Opaque composite of image and mask at working resolution. */
  get display(): PixelBuffer | null {
    return this.state?.compositor.display ?? null;
  }

  /** Mask-only preview overlay; meaningful while {@link isLive}. */
  get overlay(): PixelBuffer | null {
    return this.state?.compositor.overlay ?? null;
  }

  /** Reduced image drawn under the overlay while live. */
  get previewBase(): PixelBuffer | null {
    return this.state?.compositor.previewBase ?? null;
  }

  /** Whether the host should show the preview pair instead of the display. */
  get isLive(): boolean {
    return this.state?.compositor.isLive ?? false;
  }

  /** The working-resolution mask layer. Treat as read-only. */
  get mask(): PixelBuffer | null {
    return this.state?.mask ?? null;
  }

  get canUndo(): boolean {
    return this.state?.history.canUndo ?? false;
  }

  pointerDown(input: PointerInput): void {
    this.state?.orchestrator.pointerDown(input);
  }

  pointerMove(input: PointerInput): void {
    this.state?.orchestrator.pointerMove(input);
  }

  pointerUp(input: PointerInput): void {
    this.state?.orchestrator.pointerUp(input);
  }

  /** End any stroke or pan in progress, e.g. on lost pointer capture. */
  cancelInteraction(): void {
    this.state?.orchestrator.cancelInteraction();
  }

  wheel(input: WheelInput): void {
    this.state?.orchestrator.wheel(input);
  }

  /** Clear the mask as one undoable step. */
  clear(): void {
    this.state?.orchestrator.reset();
  }

  /** Undo the newest stroke or clear. Returns false when nothing was undone. */
  undo(): boolean {
    return this.state?.orchestrator.undo() ?? false;
  }

  /** Fit the working image into a viewport of the given size. */
  fitToViewport(viewportSize: Size): void {
    if (!this.state) return;
    this.viewport.fitToViewport(viewportSize, this.workingSize);
    this.store.getState().setZoomPercent(this.viewport.zoomPercent);
    this.events.emit('viewport:changed');
  }

  /**
   * Brush outline for a screen point, in image coordinates. The host draws
   * it through the same transform as the image.
   */
  brushOutline(screenPoint: { x: number; y: number }): Rect | null {
    if (!this.state) return null;
    const center = this.viewport.screenToImage(screenPoint);
    const size = Math.max(1, this.store.getState().brushSize);
    return { x: center.x - size / 2, y: center.y - size / 2, width: size, height: size };
  }

  /** Masked-pixel statistics at working resolution. */
  getSummary(): MaskSummary | null {
    return this.state ? summarizeMask(this.state.mask) : null;
  }

  /** The mask alone over a checkerboard, at working resolution. */
  renderMaskPreview(checkerboard: Checkerboard): PixelBuffer | null {
    return this.state ? renderOverCheckerboard(this.state.mask, checkerboard) : null;
  }

  /**
   * Finish the session and return the mask at the source's original size.
   * Returns null when the session is already closed.
   */
  commit(): MaskSessionResult | null {
    const state = this.state;
    if (!state) return null;
    state.orchestrator.cancelInteraction();

    const { width, height } = this.originalSize;
    const mask =
      this.workingScale < 1 ? resizeNearest(state.mask, width, height) : clonePixelBuffer(state.mask);
    this.close(true);
    return { mask, width, height };
  }

  /** Discard the session. */
  cancel(): void {
    if (!this.state) return;
    this.close(false);
  }

  private close(committed: boolean): void {
    const state = this.state;
    if (!state) return;
    state.compositor.release();
    state.history.clear();
    this.state = null;
    this.events.emit('session:closed', { committed });
    this.events.clear();
  }
}
