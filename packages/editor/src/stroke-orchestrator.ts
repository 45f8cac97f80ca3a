/**
 * @module stroke-orchestrator
 * Turns pointer input into mask edits, preview updates and view changes.
 *
 * Each stroke is painted twice: into the preview pair for immediate feedback
 * and into the full-resolution mask layer, whose damage is accumulated and
 * recomposited once when the stroke ends.
 */

import type {
  BrushMode,
  EventBus,
  InteractionMode,
  MaskCompositor,
  PixelBuffer,
  Point,
  PointerInput,
  Rect,
  RgbColor,
  SnapshotHistory,
  ViewportTransform,
  WheelInput,
} from '@maskpaint/types';
import type { StoreApi } from 'zustand/vanilla';
import {
  BrushStampEngine,
  DamageTracker,
  brushRadius,
  clearPixels,
  copyPixels,
  fullRect,
} from '@maskpaint/core';
import { InteractionStateMachine } from './interaction-state';
import type { InteractionTransition } from './interaction-state';
import type { MaskEditorStore } from './mask-editor-store';

/** Everything a stroke orchestrator drives. */
export interface StrokeOrchestratorDeps {
  /** Full-resolution mask layer, edited in place. */
  mask: PixelBuffer;
  compositor: MaskCompositor;
  history: SnapshotHistory<PixelBuffer>;
  viewport: ViewportTransform;
  store: StoreApi<MaskEditorStore>;
  events: EventBus;
}

/** Per-stroke state, fixed at stroke start. */
interface StrokeState {
  /** Full-resolution stamp radius. */
  radius: number;
  /** `brushSize / 2` before truncation; the preview scales this. */
  halfSize: number;
  color: RgbColor;
  mode: BrushMode;
  /** Image-space samples, in order. */
  points: Point[];
}

export class StrokeOrchestrator {
  private readonly mask: PixelBuffer;
  private readonly compositor: MaskCompositor;
  private readonly history: SnapshotHistory<PixelBuffer>;
  private readonly viewport: ViewportTransform;
  private readonly store: StoreApi<MaskEditorStore>;
  private readonly events: EventBus;
  private readonly brush: BrushStampEngine;
  private readonly damage: DamageTracker;
  private readonly interaction = new InteractionStateMachine();
  private stroke: StrokeState | null = null;
  private lastPanPoint: Point | null = null;

  constructor(deps: StrokeOrchestratorDeps) {
    this.mask = deps.mask;
    this.compositor = deps.compositor;
    this.history = deps.history;
    this.viewport = deps.viewport;
    this.store = deps.store;
    this.events = deps.events;
    this.brush = new BrushStampEngine(deps.mask);
    this.damage = new DamageTracker(deps.mask);
  }

  get mode(): InteractionMode {
    return this.interaction.mode;
  }

  /** Image-space samples of the active stroke; empty when not drawing. */
  get strokePoints(): readonly Point[] {
    return this.stroke ? [...this.stroke.points] : [];
  }

  pointerDown(input: PointerInput): void {
    if (!isFinitePoint(input)) return;
    const transition = this.interaction.press(input.button);
    if (transition === 'stroke-start') {
      this.startStroke(this.viewport.screenToImage(input));
    } else if (transition === 'pan-start') {
      this.lastPanPoint = { x: input.x, y: input.y };
    }
    this.afterTransition(transition);
  }

  pointerMove(input: PointerInput): void {
    if (!isFinitePoint(input)) return;
    const mode = this.interaction.mode;
    if (mode === 'drawing') {
      this.continueStroke(this.viewport.screenToImage(input));
    } else if (mode === 'panning' && this.lastPanPoint) {
      this.viewport.pan({ x: input.x - this.lastPanPoint.x, y: input.y - this.lastPanPoint.y });
      this.lastPanPoint = { x: input.x, y: input.y };
      this.events.emit('viewport:changed');
    }
  }

  pointerUp(input: PointerInput): void {
    this.finish(this.interaction.release(input.button));
  }

  /** End any active stroke or pan, e.g. when pointer capture is lost. */
  cancelInteraction(): void {
    this.finish(this.interaction.cancel());
  }

  wheel(input: WheelInput): void {
    const before = this.viewport.zoom;
    this.viewport.wheelZoom(input.deltaY, { x: input.x, y: input.y });
    if (this.viewport.zoom === before) return;
    this.store.getState().setZoomPercent(this.viewport.zoomPercent);
    this.events.emit('viewport:changed');
  }

  /** Clear the whole mask as one undoable step. */
  reset(): void {
    this.pushUndo();
    clearPixels(this.mask);
    this.refreshAfterRestore();
  }

  /** Restore the newest snapshot. Returns false when there is none. */
  undo(): boolean {
    const snapshot = this.history.undo();
    if (!snapshot) return false;
    copyPixels(snapshot, this.mask);
    this.publishHistory();
    this.refreshAfterRestore();
    return true;
  }

  private startStroke(point: Point): void {
    this.pushUndo();
    const { brushSize, brushColor, brushMode } = this.store.getState();
    const stroke: StrokeState = {
      radius: brushRadius(brushSize),
      halfSize: brushSize / 2,
      color: { ...brushColor },
      mode: brushMode,
      points: [point],
    };
    this.stroke = stroke;

    this.compositor.enterLiveMode();
    this.invalidateOverlay(this.compositor.drawLive(point, stroke.halfSize, stroke.color, stroke.mode));
    this.damage.accumulate(this.brush.stamp(point, stroke.radius, stroke.color, stroke.mode));
    this.events.emit('stroke:started');
  }

  private continueStroke(point: Point): void {
    const stroke = this.stroke;
    if (!stroke) return;
    const last = stroke.points[stroke.points.length - 1];
    this.invalidateOverlay(
      this.compositor.drawLiveSegment(last, point, stroke.halfSize, stroke.color, stroke.mode),
    );
    this.damage.accumulate(this.brush.strokeSegment(last, point, stroke.radius, stroke.color, stroke.mode));
    stroke.points.push(point);
  }

  private finish(transition: InteractionTransition | null): void {
    if (transition === 'stroke-end') {
      const region = this.compositor.exitLiveMode(this.damage.flushAndClear());
      this.stroke = null;
      if (region) this.events.emit('display:invalidated', { region, target: 'display' });
      this.events.emit('stroke:ended', { region });
    } else if (transition === 'pan-end') {
      this.lastPanPoint = null;
    }
    this.afterTransition(transition);
  }

  private afterTransition(transition: InteractionTransition | null): void {
    if (!transition) return;
    const mode = this.interaction.mode;
    this.store.getState().setMode(mode);
    this.events.emit('mode:changed', { mode });
  }

  private pushUndo(): void {
    this.history.snapshot(this.mask);
    this.publishHistory();
  }

  private publishHistory(): void {
    const depth = this.history.size;
    this.store.getState().setUndoDepth(depth);
    this.events.emit('history:changed', { depth });
  }

  /** Recomposite everything and resync the preview if a stroke is live. */
  private refreshAfterRestore(): void {
    const region = this.compositor.composite(fullRect(this.mask));
    if (region) this.events.emit('display:invalidated', { region, target: 'display' });
    if (this.compositor.isLive) {
      this.compositor.syncPreview();
      const overlay = this.compositor.overlay;
      if (overlay) this.invalidateOverlay(fullRect(overlay));
    }
  }

  private invalidateOverlay(region: Rect | null): void {
    if (region) this.events.emit('display:invalidated', { region, target: 'overlay' });
  }
}

function isFinitePoint(point: Point): boolean {
  return Number.isFinite(point.x) && Number.isFinite(point.y);
}
