/**
 * @maskpaint/types
 *
 * Shared type definitions for the mask painter. Types only; every
 * runtime package depends on these contracts.
 *
 * @packageDocumentation
 */

// Common primitives
export type { Point, Rect, RgbColor, Size } from './common';

// Pixel buffers
export type { BrushMode, PixelBuffer } from './pixel-buffer';

// Session, config and input
export type {
  InteractionMode,
  MaskEditorConfig,
  MaskSessionResult,
  MaskSessionSource,
  MaskSummary,
  PointerButton,
  PointerInput,
  WheelInput,
} from './session';

// Undo history
export type { SnapshotHistory } from './history';

// Viewport & compositor
export type { MaskCompositor, ViewportTransform } from './renderer';

// Events
export type { EventBus, EventCallback, EventMap } from './events';
