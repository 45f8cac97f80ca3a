/**
 * @module mask-editor-store.test
 * Unit tests for the mask editor Zustand store.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { StoreApi } from 'zustand/vanilla';
import { clampBrushSize, createMaskEditorStore } from './mask-editor-store';
import type { MaskEditorStore } from './mask-editor-store';

describe('createMaskEditorStore', () => {
  let store: StoreApi<MaskEditorStore>;

  beforeEach(() => {
    store = createMaskEditorStore({ brushSize: 20, brushColor: { r: 255, g: 0, b: 0 } });
  });

  describe('initial state', () => {
    it('should use the seeded brush', () => {
      expect(store.getState().brushSize).toBe(20);
      expect(store.getState().brushColor).toEqual({ r: 255, g: 0, b: 0 });
    });

    it('should paint by default', () => {
      expect(store.getState().brushMode).toBe('paint');
    });

    it('should be idle at 100% with nothing to undo', () => {
      const state = store.getState();
      expect(state.mode).toBe('idle');
      expect(state.zoomPercent).toBe(100);
      expect(state.undoDepth).toBe(0);
      expect(state.canUndo).toBe(false);
    });

    it('should clamp the seed', () => {
      const big = createMaskEditorStore({ brushSize: 9000, brushColor: { r: 0, g: 0, b: 0 } });
      expect(big.getState().brushSize).toBe(500);
    });
  });

  describe('brush settings', () => {
    it('should truncate and clamp the size', () => {
      store.getState().setBrushSize(33.9);
      expect(store.getState().brushSize).toBe(33);
      store.getState().setBrushSize(0);
      expect(store.getState().brushSize).toBe(1);
      store.getState().setBrushSize(501);
      expect(store.getState().brushSize).toBe(500);
    });

    it('should normalize the color', () => {
      store.getState().setBrushColor({ r: 10.4, g: 300, b: -1 });
      expect(store.getState().brushColor).toEqual({ r: 10, g: 255, b: 0 });
    });

    it('should toggle between paint and erase', () => {
      store.getState().toggleBrushMode();
      expect(store.getState().brushMode).toBe('erase');
      store.getState().toggleBrushMode();
      expect(store.getState().brushMode).toBe('paint');
    });
  });

  describe('session mirrors', () => {
    it('should derive canUndo from the depth', () => {
      store.getState().setUndoDepth(3);
      expect(store.getState().canUndo).toBe(true);
      store.getState().setUndoDepth(0);
      expect(store.getState().canUndo).toBe(false);
    });

    it('should notify subscribers', () => {
      const modes: string[] = [];
      const unsubscribe = store.subscribe((state) => modes.push(state.mode));
      store.getState().setMode('drawing');
      store.getState().setMode('idle');
      unsubscribe();
      store.getState().setMode('panning');
      expect(modes).toEqual(['drawing', 'idle']);
    });
  });
});

describe('clampBrushSize', () => {
  it('should map non-finite sizes to the minimum', () => {
    expect(clampBrushSize(Number.NaN)).toBe(1);
    expect(clampBrushSize(Number.POSITIVE_INFINITY)).toBe(1);
  });
});
