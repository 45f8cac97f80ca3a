/**
 * @module config
 * Default editor configuration and validation of host overrides.
 */

import type { MaskEditorConfig, RgbColor } from '@maskpaint/types';

/** Defaults used when the host supplies no override. */
export const DEFAULT_MASK_EDITOR_CONFIG: Readonly<MaskEditorConfig> = Object.freeze({
  maxWorkingDimension: 1000,
  previewScale: 0.5,
  undoCapacity: 20,
  zoomMin: 0.1,
  zoomMax: 10,
  wheelZoomStep: 0.08,
  brushSize: 20,
  brushColor: Object.freeze({ r: 255, g: 0, b: 0 }),
});

/** Clamp each channel to an integer in 0-255. */
export function normalizeColor(color: RgbColor): RgbColor {
  const channel = (v: number): number => (Number.isFinite(v) ? Math.max(0, Math.min(255, Math.round(v))) : 0);
  return { r: channel(color.r), g: channel(color.g), b: channel(color.b) };
}

/**
 * Merge overrides onto the defaults and validate the result.
 * @throws RangeError for values no session could run with.
 */
export function resolveMaskEditorConfig(overrides: Partial<MaskEditorConfig> = {}): MaskEditorConfig {
  const config: MaskEditorConfig = {
    ...DEFAULT_MASK_EDITOR_CONFIG,
    ...overrides,
    brushColor: normalizeColor(overrides.brushColor ?? DEFAULT_MASK_EDITOR_CONFIG.brushColor),
  };

  if (!Number.isInteger(config.maxWorkingDimension) || config.maxWorkingDimension < 1) {
    throw new RangeError('maxWorkingDimension must be a positive integer');
  }
  if (!(config.previewScale > 0 && config.previewScale <= 1)) {
    throw new RangeError('previewScale must be in (0, 1]');
  }
  if (!Number.isInteger(config.undoCapacity) || config.undoCapacity < 1) {
    throw new RangeError('undoCapacity must be an integer of at least 1');
  }
  if (!(config.zoomMin > 0 && config.zoomMin <= config.zoomMax)) {
    throw new RangeError('zoom range must satisfy 0 < zoomMin <= zoomMax');
  }
  if (!(config.wheelZoomStep > 0 && config.wheelZoomStep < 1)) {
    throw new RangeError('wheelZoomStep must be in (0, 1)');
  }
  if (!(config.brushSize >= 1)) {
    throw new RangeError('brushSize must be at least 1');
  }
  return config;
}
