/**
 * @module events
 * Type-safe event bus definitions for a mask editing session.
 * The host's display layer listens here instead of polling buffers.
 */

import type { Rect } from './common';
import type { InteractionMode } from './session';

/** Map of event names to their payload types. */
export interface EventMap {
  /** Fired when a stroke begins. */
  'stroke:started': undefined;
  /** Fired when a stroke ends, with the full-resolution region it changed. */
  'stroke:ended': { region: Rect | null };
  /** Fired when a buffer region must be redrawn. */
  'display:invalidated': { region: Rect; target: 'display' | 'overlay' };
  /** Fired when the undo depth changes. */
  'history:changed': { depth: number };
  /** Fired when the viewport transform changes (zoom/pan). */
  'viewport:changed': undefined;
  /** Fired when the interaction state machine changes state. */
  'mode:changed': { mode: InteractionMode };
  /** Fired once when the session is committed or cancelled. */
  'session:closed': { committed: boolean };
}

/** Callback function type for event listeners. */
export type EventCallback<K extends keyof EventMap> = EventMap[K] extends undefined
  ? () => void
  : (payload: EventMap[K]) => void;

/** Type-safe event bus for pub/sub communication. */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Subscribe to an event for a single emission. */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Unsubscribe a specific callback from an event. */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void;
  /** Emit an event with an optional payload. */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void;
  /** Remove all listeners for all events. */
  clear(): void;
}
