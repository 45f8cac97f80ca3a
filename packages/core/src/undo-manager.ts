/**
 * @module undo-manager
 * Bounded snapshot history for the mask layer.
 *
 * @see {@link @maskpaint/types#SnapshotHistory} for the interface contract
 */

import type { PixelBuffer, SnapshotHistory } from '@maskpaint/types';
import { clonePixelBuffer } from './pixel-buffer';

/** Default number of snapshots retained. */
const DEFAULT_CAPACITY = 20;

/**
 * Concrete implementation of {@link SnapshotHistory} over pixel buffers.
 *
 * Snapshots live in a fixed ring of `capacity` slots. When the ring is
 * full, the oldest slot is released and reused, so eviction never
 * rebuilds the stack. Undo pops from the newest end. There is no redo.
 */
export class UndoManager implements SnapshotHistory<PixelBuffer> {
  /** @inheritdoc */
  readonly capacity: number;

  private readonly slots: Array<PixelBuffer | undefined>;
  /** Index of the oldest snapshot. */
  private head = 0;
  private count = 0;

  /**
   * Create a new UndoManager.
   * @param capacity - Maximum number of snapshots to keep (default 20).
   */
  constructor(capacity: number = DEFAULT_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('capacity must be an integer of at least 1');
    }
    this.capacity = capacity;
    this.slots = new Array<PixelBuffer | undefined>(capacity).fill(undefined);
  }

  /** @inheritdoc */
  get size(): number {
    return this.count;
  }

  /** @inheritdoc */
  get canUndo(): boolean {
    return this.count > 0;
  }

  /** @inheritdoc */
  snapshot(buffer: PixelBuffer): void {
    if (this.count === this.capacity) {
      this.slots[this.head] = undefined;
      this.head = (this.head + 1) % this.capacity;
      this.count--;
    }
    this.slots[(this.head + this.count) % this.capacity] = clonePixelBuffer(buffer);
    this.count++;
  }

  /** @inheritdoc */
  undo(): PixelBuffer | null {
    if (this.count === 0) {
      return null;
    }
    const index = (this.head + this.count - 1) % this.capacity;
    const snapshot = this.slots[index];
    this.slots[index] = undefined;
    this.count--;
    return snapshot ?? null;
  }

  /** @inheritdoc */
  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}
