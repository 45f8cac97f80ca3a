/**
 * @module history
 * Snapshot-based undo history types.
 * Strokes are undone by restoring a full copy of the mask taken before them.
 */

/** A bounded, one-directional stack of snapshots. There is no redo. */
export interface SnapshotHistory<T> {
  /** Maximum number of snapshots kept. */
  readonly capacity: number;
  /** Number of snapshots currently held. */
  readonly size: number;
  /** Whether `undo()` would return a snapshot. */
  readonly canUndo: boolean;

  /** Store a deep copy of `value`, evicting the oldest when full. */
  snapshot(value: T): void;
  /** Remove and return the newest snapshot, or null when empty. */
  undo(): T | null;
  /** Release every snapshot. */
  clear(): void;
}
