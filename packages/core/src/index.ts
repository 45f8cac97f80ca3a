/**
 * @maskpaint/core
 *
 * Pixel buffers, the mask brush, damage tracking, and snapshot history.
 *
 * @packageDocumentation
 */

// Pixel buffers
export {
  BYTES_PER_PIXEL,
  createPixelBuffer,
  clonePixelBuffer,
  isValidPixelBuffer,
  sameSize,
  pixelOffset,
  readPixel,
  copyPixels,
  copyRegion,
  clearPixels,
  fillPixels,
  pixelBuffersEqual,
} from './pixel-buffer';

// Rect helpers
export { isEmptyRect, unionRect, clampRect, fullRect } from './rect';

// Resampling
export {
  computeWorkingGeometry,
  scaledSize,
  resampleNearestInto,
  resizeNearest,
  resizeBilinear,
} from './resample';
export type { WorkingGeometry } from './resample';

// Brush
export { BrushStampEngine, brushRadius, walkLine } from './brush-stamp';

// Damage tracking
export { DamageTracker } from './damage-tracker';

// Snapshot history
export { UndoManager } from './undo-manager';

// Mask blending and statistics
export { blendMaskRegion, applyMaskOverlay } from './mask-blend';
export { countMaskedPixels, summarizeMask } from './mask-stats';

// Configuration
export { DEFAULT_MASK_EDITOR_CONFIG, normalizeColor, resolveMaskEditorConfig } from './config';

// Event bus
export { EventBusImpl } from './event-bus';
