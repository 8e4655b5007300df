// src/core/seq/index.ts
// Memoized sequences - Module exports

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

export type {
  SequenceEvent,
  SequenceEventTag,
  SnapshotMode,
  SequenceOptions,
  SequenceStats,
  EventSource,
} from "./types";

// ─────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────

export type { PreconditionViolation } from "./errors";
export {
  SequenceError,
  FormulaShapeError,
  PreconditionError,
  precondition,
  isPreconditionError,
} from "./errors";

// ─────────────────────────────────────────────────────────────────
// Storage & Views
// ─────────────────────────────────────────────────────────────────

export type { ViewSource } from "./store";
export { TermStore } from "./store";
export { SeqView } from "./view";
export { GROWTH_THRESHOLD, bitCeil, nextCapacity } from "./growth";

// ─────────────────────────────────────────────────────────────────
// Formulas
// ─────────────────────────────────────────────────────────────────

export type {
  IndexFn,
  ContextFn,
  IndexedFormula,
  ContextFormula,
  FormulaSpec,
  FormulaInput,
  NormalizedFormula,
} from "./formula";
export { indexed, contextual, normalizeFormula, isFormulaInput } from "./formula";
export { MathContext } from "./context";

// ─────────────────────────────────────────────────────────────────
// Sequence
// ─────────────────────────────────────────────────────────────────

export { Sequence } from "./sequence";

// ─────────────────────────────────────────────────────────────────
// Event Analysis
// ─────────────────────────────────────────────────────────────────

export {
  eventsOfTag,
  countComputes,
  countHits,
  computedIndices,
  findRecomputed,
  growthHistory,
  getSequenceStats,
} from "./events";
