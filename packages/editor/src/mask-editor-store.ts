/**
 * @module mask-editor-store
 * Zustand store for mask editor UI state.
 *
 * Brush settings are written by the host's controls and read by the stroke
 * orchestrator at the start of each stroke. Interaction mode, zoom and undo
 * depth are written by the session so the host can render them.
 */

import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { BrushMode, InteractionMode, RgbColor } from '@maskpaint/types';
import { normalizeColor } from '@maskpaint/core';

/** Smallest brush diameter. */
export const MIN_BRUSH_SIZE = 1;
/** Largest brush diameter. */
export const MAX_BRUSH_SIZE = 500;

/** Mask editor state shape. */
export interface MaskEditorState {
  /** Brush diameter in working-image pixels. */
  brushSize: number;
  /** Mask color, always opaque. */
  brushColor: RgbColor;
  /** Whether the brush paints or erases. */
  brushMode: BrushMode;
  /** Current zoom as a whole percentage. */
  zoomPercent: number;
  /** Active pointer interaction. */
  mode: InteractionMode;
  /** Number of undo snapshots held. */
  undoDepth: number;
  /** Whether undo is available. */
  canUndo: boolean;
}

/** Mask editor actions. */
export interface MaskEditorActions {
  /** Set the brush diameter, truncated and clamped to [1, 500]. */
  setBrushSize: (size: number) => void;
  /** Set the mask color. Channels are clamped to 0-255. */
  setBrushColor: (color: RgbColor) => void;
  setBrushMode: (mode: BrushMode) => void;
  /** Swap between paint and erase. */
  toggleBrushMode: () => void;
  /** Mirror the history depth. */
  setUndoDepth: (depth: number) => void;
  setZoomPercent: (percent: number) => void;
  setMode: (mode: InteractionMode) => void;
}

export type MaskEditorStore = MaskEditorState & MaskEditorActions;

/** Clamp a brush size to the allowed range. Non-finite sizes become the minimum. */
export function clampBrushSize(size: number): number {
  if (!Number.isFinite(size)) return MIN_BRUSH_SIZE;
  return Math.min(MAX_BRUSH_SIZE, Math.max(MIN_BRUSH_SIZE, Math.trunc(size)));
}

/** Create a store seeded with the session's initial brush. */
export function createMaskEditorStore(
  initial: Pick<MaskEditorState, 'brushSize' | 'brushColor'>,
): StoreApi<MaskEditorStore> {
  return createStore<MaskEditorStore>()((set) => ({
    brushSize: clampBrushSize(initial.brushSize),
    brushColor: normalizeColor(initial.brushColor),
    brushMode: 'paint',
    zoomPercent: 100,
    mode: 'idle',
    undoDepth: 0,
    canUndo: false,

    setBrushSize: (size: number): void => {
      set({ brushSize: clampBrushSize(size) });
    },

    setBrushColor: (color: RgbColor): void => {
      set({ brushColor: normalizeColor(color) });
    },

    setBrushMode: (mode: BrushMode): void => {
      set({ brushMode: mode });
    },

    toggleBrushMode: (): void => {
      set((state) => ({ brushMode: state.brushMode === 'paint' ? 'erase' : 'paint' }));
    },

    setUndoDepth: (depth: number): void => {
      set({ undoDepth: depth, canUndo: depth > 0 });
    },

    setZoomPercent: (percent: number): void => {
      set({ zoomPercent: percent });
    },

    setMode: (mode: InteractionMode): void => {
      set({ mode });
    },
  }));
}
