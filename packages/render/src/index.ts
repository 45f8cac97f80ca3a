/**
 * @maskpaint/render
 *
 * Mask compositing, the checkerboard backdrop, and viewport management.
 *
 * @packageDocumentation
 */

// Viewport
export { ViewportTransformImpl } from './viewport';
export type { ViewportOptions } from './viewport';

// Compositor
export { DualResolutionCompositor } from './compositor';
export type { CompositorOptions } from './compositor';

// Checkerboard
export { createCheckerboard, renderOverCheckerboard } from './checkerboard';
export type { Checkerboard, CheckerboardOptions } from './checkerboard';
