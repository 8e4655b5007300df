// src/core/seq/types.ts
// Core types for memoized sequences

import type { SequenceConfig } from "../config/config";

// ─────────────────────────────────────────────────────────────────
// Sequence Events
// ─────────────────────────────────────────────────────────────────

/**
 * SequenceEvent: events logged while a sequence is read and extended.
 */
export type SequenceEvent =
  | { tag: "Seed"; index: number; timestamp: number }
  | { tag: "Hit"; index: number; size: number; timestamp: number }
  | { tag: "Grow"; from: number; to: number; timestamp: number }
  | { tag: "Compute"; index: number; timestamp: number }
  | { tag: "Reserve"; requested: number; capacity: number; timestamp: number }
  | { tag: "Snapshot"; mode: SnapshotMode; size: number; timestamp: number }
  | { tag: "Transfer"; size: number; timestamp: number };

export type SequenceEventTag = SequenceEvent["tag"];

// ─────────────────────────────────────────────────────────────────
// Snapshots
// ─────────────────────────────────────────────────────────────────

/**
 * "copy" leaves the sequence untouched; "move" hands out the backing array
 * and resets the sequence to empty (formula kept, seeds not replayed).
 */
export type SnapshotMode = "copy" | "move";

// ─────────────────────────────────────────────────────────────────
// Construction
// ─────────────────────────────────────────────────────────────────

export type SequenceOptions<T> = {
  /** Initial terms a[0..k), stored as-is */
  seeds?: readonly T[];
  config?: Partial<SequenceConfig>;
};

// ─────────────────────────────────────────────────────────────────
// Introspection
// ─────────────────────────────────────────────────────────────────

export type SequenceStats = {
  size: number;
  capacity: number;
  /** Terms produced by the formula */
  computed: number;
  /** Terms supplied at construction */
  seeded: number;
  hits: number;
  grows: number;
};

/**
 * The part of a sequence the event queries read. Any Sequence<T> fits.
 */
export interface EventSource {
  readonly events: readonly SequenceEvent[];
  size(): number;
  capacity(): number;
}
