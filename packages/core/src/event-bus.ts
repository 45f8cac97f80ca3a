/**
 * @module event-bus
 * Type-safe pub/sub emitter connecting an editing session to its host.
 *
 * The session emits; the display layer subscribes to redraw invalidated
 * regions, refresh the zoom readout and close its window.
 *
 * @see {@link @maskpaint/types#EventBus} for the interface contract
 * @see {@link @maskpaint/types#EventMap} for the event catalogue
 */

import type { EventBus, EventCallback, EventMap } from '@maskpaint/types';

/** Generic callback type used internally by the event bus. */
type Callback = (...args: unknown[]) => void;

/** One registered listener; `source` is what the caller passed in. */
interface Listener {
  source: Callback;
  once: boolean;
}

/**
 * Concrete implementation of {@link EventBus}.
 *
 * Listeners are kept per event in subscription order. `once` listeners are
 * flagged rather than wrapped, so `off()` with the original callback removes
 * them whichever way they were added.
 */
export class EventBusImpl implements EventBus {
  private listeners = new Map<keyof EventMap, Listener[]>();

  /** @inheritdoc */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    const listener: Listener = { source: callback as Callback, once: false };
    this.add(event, listener);
    return () => this.remove(event, listener);
  }

  /** @inheritdoc */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    const listener: Listener = { source: callback as Callback, once: true };
    this.add(event, listener);
    return () => this.remove(event, listener);
  }

  /** @inheritdoc */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void {
    const list = this.listeners.get(event);
    if (!list) return;
    const source = callback as Callback;
    // A permanent subscription goes before a pending `once` of the same callback.
    const listener =
      list.find((l) => l.source === source && !l.once) ?? list.find((l) => l.source === source);
    if (listener) this.remove(event, listener);
  }

  /** @inheritdoc */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void {
    const list = this.listeners.get(event);
    if (!list) return;

    // Snapshot: listeners may subscribe or unsubscribe while we iterate.
    for (const listener of [...list]) {
      if (listener.once) {
        this.remove(event, listener);
      }
      listener.source(...args);
    }
  }

  /** @inheritdoc */
  clear(): void {
    this.listeners.clear();
  }

  private remove(event: keyof EventMap, listener: Listener): void {
    const list = this.listeners.get(event);
    if (!list) return;
    const index = list.indexOf(listener);
    if (index === -1) return;
    list.splice(index, 1);
    if (list.length === 0) {
      this.listeners.delete(event);
    }
  }

  private add(event: keyof EventMap, listener: Listener): void {
    const list = this.listeners.get(event);
    if (list) {
      list.push(listener);
    } else {
      this.listeners.set(event, [listener]);
    }
  }
}
