/**
 * @module mask-session.test
 * Opening, editing, committing and cancelling mask sessions.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import type { PixelBuffer } from '@maskpaint/types';
import { createPixelBuffer, fillPixels, readPixel } from '@maskpaint/core';
import { createCheckerboard } from '@maskpaint/render';
import { MaskEditingSession, MaskSessionError } from './mask-session';

function solidImage(width: number, height: number): PixelBuffer {
  const image = createPixelBuffer(width, height);
  fillPixels(image, { r: 0, g: 0, b: 255 });
  return image;
}

function dab(session: MaskEditingSession, x: number, y: number): void {
  session.pointerDown({ button: 'primary', x, y });
  session.pointerUp({ button: 'primary', x, y });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('MaskEditingSession', () => {
  describe('open', () => {
    it('rejects a missing image', () => {
      expect(() => MaskEditingSession.open({ image: null })).toThrow(MaskSessionError);
      let error: unknown = null;
      try {
        MaskEditingSession.open({ image: undefined });
      } catch (e) {
        error = e;
      }
      expect(error).toBeInstanceOf(MaskSessionError);
      expect(error instanceof MaskSessionError && error.code).toBe('invalid-input');
    });

    it('rejects an image whose data does not match its size', () => {
      const image = { width: 4, height: 4, data: new Uint8ClampedArray(10) };
      expect(() => MaskEditingSession.open({ image })).toThrow(MaskSessionError);
    });

    it('rejects an empty image', () => {
      const image = { width: 0, height: 0, data: new Uint8ClampedArray(0) };
      expect(() => MaskEditingSession.open({ image })).toThrow(MaskSessionError);
    });

    it('keeps small images at full resolution', () => {
      const session = MaskEditingSession.open({ image: solidImage(200, 150) });
      expect(session.workingSize).toEqual({ width: 200, height: 150 });
      expect(session.workingScale).toBe(1);
      expect(session.mask?.width).toBe(200);
      expect(session.mask?.height).toBe(150);
    });

    it('downscales large images and logs it', () => {
      const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const session = MaskEditingSession.open({ image: solidImage(2000, 1500) });
      expect(session.workingSize).toEqual({ width: 1000, height: 750 });
      expect(session.workingScale).toBe(0.5);
      expect(session.mask?.width).toBe(1000);
      expect(session.mask?.height).toBe(750);
      expect(debug).toHaveBeenCalledTimes(1);
    });

    it('composites the display once on open', () => {
      const session = MaskEditingSession.open({ image: solidImage(20, 10) });
      expect(readPixel(session.display ?? solidImage(1, 1), 19, 9)).toEqual([0, 0, 255, 255]);
    });

    it('seeds the mask from a prior mask of matching size', () => {
      const prior = createPixelBuffer(20, 10);
      prior.data.set([0, 255, 0, 255], (4 * 20 + 3) * 4);
      const session = MaskEditingSession.open({ image: solidImage(20, 10), mask: prior });
      expect(readPixel(session.mask ?? prior, 3, 4)).toEqual([0, 255, 0, 255]);
      expect(session.mask).not.toBe(prior);
    });

    it('downsamples a prior mask with the image', () => {
      vi.spyOn(console, 'debug').mockImplementation(() => {});
      const prior = createPixelBuffer(2000, 1500);
      prior.data.set([0, 255, 0, 255], (20 * 2000 + 40) * 4);
      const session = MaskEditingSession.open({ image: solidImage(2000, 1500), mask: prior });
      expect(readPixel(session.mask ?? prior, 20, 10)).toEqual([0, 255, 0, 255]);
    });

    it('discards a prior mask of a different size with a warning', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const prior = createPixelBuffer(10, 10);
      fillPixels(prior, { r: 255, g: 0, b: 0 });
      const session = MaskEditingSession.open({ image: solidImage(20, 10), mask: prior });
      expect(warn).toHaveBeenCalledTimes(1);
      expect(session.mask?.data.every((v) => v === 0)).toBe(true);
      expect(session.mask?.width).toBe(20);
    });

    it('applies brush overrides from the source', () => {
      const session = MaskEditingSession.open({
        image: solidImage(20, 10),
        brushColor: { r: 0, g: 128, b: 0 },
        brushSize: 6,
      });
      expect(session.store.getState().brushColor).toEqual({ r: 0, g: 128, b: 0 });
      expect(session.store.getState().brushSize).toBe(6);
    });

    it('applies configuration overrides', () => {
      const session = MaskEditingSession.open({ image: solidImage(20, 10) }, { zoomMax: 4, undoCapacity: 2 });
      expect(session.viewport.zoomMax).toBe(4);
      dab(session, 1, 1);
      dab(session, 2, 2);
      dab(session, 3, 3);
      expect(session.undo()).toBe(true);
      expect(session.undo()).toBe(true);
      expect(session.undo()).toBe(false);
    });

    it('clamps an unusable brush size from the source', () => {
      const zero = MaskEditingSession.open({ image: solidImage(20, 10), brushSize: 0 });
      expect(zero.store.getState().brushSize).toBe(1);
      const nan = MaskEditingSession.open({ image: solidImage(20, 10), brushSize: Number.NaN });
      expect(nan.store.getState().brushSize).toBe(1);
    });

    it('rejects unusable configuration', () => {
      expect(() => MaskEditingSession.open({ image: solidImage(4, 4) }, { undoCapacity: 0 })).toThrow(RangeError);
    });
  });

  describe('commit', () => {
    it('upscales the mask to the original size with nearest-neighbor', () => {
      vi.spyOn(console, 'debug').mockImplementation(() => {});
      const session = MaskEditingSession.open({ image: solidImage(2000, 1500) });
      dab(session, 500, 375);

      const result = session.commit();
      expect(result?.width).toBe(2000);
      expect(result?.height).toBe(1500);
      expect(result?.mask.width).toBe(2000);
      expect(result?.mask.height).toBe(1500);

      const mask = result?.mask ?? createPixelBuffer(1, 1);
      expect(readPixel(mask, 1000, 750)).toEqual([255, 0, 0, 255]);
      expect(readPixel(mask, 1021, 750)).toEqual([255, 0, 0, 255]);
      expect(readPixel(mask, 1022, 750)).toEqual([0, 0, 0, 0]);
      for (let x = 0; x < 2000; x++) {
        expect(mask.data[(750 * 2000 + x) * 4 + 3] === 255).toBe(x >= 980 && x <= 1021);
      }
    });

    it('commits a fully painted mask as fully painted at the original size', () => {
      vi.spyOn(console, 'debug').mockImplementation(() => {});
      const prior = createPixelBuffer(2000, 1500);
      fillPixels(prior, { r: 255, g: 0, b: 0 });
      const session = MaskEditingSession.open({ image: solidImage(2000, 1500), mask: prior });
      expect(session.workingScale).toBe(0.5);

      const result = session.commit();
      expect(result?.width).toBe(2000);
      expect(result?.height).toBe(1500);
      const data = result?.mask.data ?? new Uint8ClampedArray(0);
      expect(data.length).toBe(2000 * 1500 * 4);
      let unpainted = 0;
      for (let i = 3; i < data.length; i += 4) {
        if (data[i] !== 255) unpainted++;
      }
      expect(unpainted).toBe(0);
    });

    it('returns a copy when the image was not downscaled', () => {
      const session = MaskEditingSession.open({ image: solidImage(20, 10) });
      const working = session.mask;
      dab(session, 5, 5);
      const result = session.commit();
      expect(result?.mask).not.toBe(working);
      expect(result?.mask.width).toBe(20);
      expect(readPixel(result?.mask ?? solidImage(1, 1), 5, 5)).toEqual([255, 0, 0, 255]);
    });

    it('finishes a stroke still in progress', () => {
      const session = MaskEditingSession.open({ image: solidImage(40, 40) });
      session.pointerDown({ button: 'primary', x: 20, y: 20 });
      const result = session.commit();
      expect(readPixel(result?.mask ?? solidImage(1, 1), 20, 20)[3]).toBe(255);
    });

    it('closes the session and emits once', () => {
      const session = MaskEditingSession.open({ image: solidImage(20, 10) });
      const closed = vi.fn();
      session.events.on('session:closed', closed);

      session.commit();

      expect(closed).toHaveBeenCalledTimes(1);
      expect(closed).toHaveBeenCalledWith({ committed: true });
      expect(session.isClosed).toBe(true);
      expect(session.commit()).toBeNull();
    });
  });

  describe('cancel', () => {
    it('emits committed: false and releases buffers', () => {
      const session = MaskEditingSession.open({ image: solidImage(20, 10) });
      const closed = vi.fn();
      session.events.on('session:closed', closed);

      session.cancel();
      session.cancel();

      expect(closed).toHaveBeenCalledTimes(1);
      expect(closed).toHaveBeenCalledWith({ committed: false });
      expect(session.display).toBeNull();
      expect(session.mask).toBeNull();
    });
  });

  describe('after close', () => {
    it('ignores every input', () => {
      const session = MaskEditingSession.open({ image: solidImage(20, 10) });
      session.cancel();

      session.pointerDown({ button: 'primary', x: 5, y: 5 });
      session.pointerMove({ button: 'primary', x: 6, y: 5 });
      session.pointerUp({ button: 'primary', x: 6, y: 5 });
      session.wheel({ x: 0, y: 0, deltaY: -1 });
      session.clear();
      session.fitToViewport({ width: 100, height: 100 });

      expect(session.undo()).toBe(false);
      expect(session.canUndo).toBe(false);
      expect(session.viewport.zoom).toBe(1);
      expect(session.getSummary()).toBeNull();
      expect(session.brushOutline({ x: 1, y: 1 })).toBeNull();
    });
  });

  describe('editing', () => {
    it('clears and undoes through the session', () => {
      const session = MaskEditingSession.open({ image: solidImage(20, 10) });
      dab(session, 10, 5);
      session.clear();
      expect(session.mask?.data.every((v) => v === 0)).toBe(true);
      expect(session.canUndo).toBe(true);
      expect(session.undo()).toBe(true);
      expect(readPixel(session.mask ?? solidImage(1, 1), 10, 5)[3]).toBe(255);
    });

    it('reports live mode during a stroke', () => {
      const session = MaskEditingSession.open({ image: solidImage(20, 10) });
      session.pointerDown({ button: 'primary', x: 10, y: 5 });
      expect(session.isLive).toBe(true);
      expect(session.previewBase?.width).toBe(10);
      session.pointerUp({ button: 'primary', x: 10, y: 5 });
      expect(session.isLive).toBe(false);
    });

    it('fits the working image to the viewport', () => {
      const session = MaskEditingSession.open({ image: solidImage(200, 150) });
      session.fitToViewport({ width: 800, height: 600 });
      expect(session.viewport.zoom).toBe(4);
      expect(session.store.getState().zoomPercent).toBe(400);
    });

    it('outlines the brush in image coordinates', () => {
      const session = MaskEditingSession.open({ image: solidImage(200, 150) });
      expect(session.brushOutline({ x: 50, y: 50 })).toEqual({ x: 40, y: 40, width: 20, height: 20 });
    });
  });

  describe('summary and preview', () => {
    it('summarizes the working mask', () => {
      const session = MaskEditingSession.open({ image: solidImage(200, 150) });
      dab(session, 100, 75);
      expect(session.getSummary()?.message).toBe('Image: 200x150, Masked: 317 pixels (1.06%)');
    });

    it('renders the mask over a checkerboard', () => {
      const session = MaskEditingSession.open({ image: solidImage(20, 10) });
      dab(session, 15, 5);
      const preview = session.renderMaskPreview(createCheckerboard());
      expect(preview && readPixel(preview, 0, 0)).toEqual([211, 211, 211, 255]);
      expect(preview && readPixel(preview, 15, 5)).toEqual([255, 0, 0, 255]);
    });
  });
});
