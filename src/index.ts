// src/index.ts
// memoseq - Public API
//
// Lazily-evaluated, self-memoizing recurrence sequences.

// ═══════════════════════════════════════════════════════════════════════════════
// SEQUENCES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  Sequence,
  SeqView,
  MathContext,
  indexed,
  contextual,
  normalizeFormula,
  isFormulaInput,
  type IndexFn,
  type ContextFn,
  type IndexedFormula,
  type ContextFormula,
  type FormulaSpec,
  type FormulaInput,
  type NormalizedFormula,
  type SnapshotMode,
  type SequenceOptions,
} from "./core/seq";

// ═══════════════════════════════════════════════════════════════════════════════
// GROWTH POLICY
// ═══════════════════════════════════════════════════════════════════════════════

export { GROWTH_THRESHOLD, bitCeil, nextCapacity } from "./core/seq";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  SequenceError,
  FormulaShapeError,
  PreconditionError,
  isPreconditionError,
  type PreconditionViolation,
} from "./core/seq";

// ═══════════════════════════════════════════════════════════════════════════════
// EVENTS & INTROSPECTION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  eventsOfTag,
  countComputes,
  countHits,
  computedIndices,
  findRecomputed,
  growthHistory,
  getSequenceStats,
  type SequenceEvent,
  type SequenceEventTag,
  type SequenceStats,
  type EventSource,
} from "./core/seq";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  DEFAULT_SEQUENCE_CONFIG,
  createSequenceConfig,
  configFromEnv,
  configFromFile,
  configFromObject,
  partialConfigFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
  type SequenceConfig,
  type ConfigValidation,
} from "./core/config";
