/**
 * @maskpaint/editor
 *
 * Mask editing sessions: stroke handling, the interaction state machine,
 * editor UI state, and the host-side painter that keeps masks between sessions.
 *
 * @packageDocumentation
 */

// Session
export { MaskEditingSession, MaskSessionError } from './mask-session';
export type { MaskSessionErrorCode } from './mask-session';

// Host component
export { MaskPainter } from './mask-painter';
export type { MaskPainterInput } from './mask-painter';

// Strokes and interaction
export { StrokeOrchestrator } from './stroke-orchestrator';
export type { StrokeOrchestratorDeps } from './stroke-orchestrator';
export { InteractionStateMachine } from './interaction-state';
export type { InteractionTransition } from './interaction-state';

// UI state
export { createMaskEditorStore, clampBrushSize, MIN_BRUSH_SIZE, MAX_BRUSH_SIZE } from './mask-editor-store';
export type { MaskEditorActions, MaskEditorState, MaskEditorStore } from './mask-editor-store';
