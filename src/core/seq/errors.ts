// src/core/seq/errors.ts
// Error classes for sequence definition and call-site precondition failures

export class SequenceError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = "SequenceError";
  }
}

/**
 * Thrown while constructing a sequence from a value that is neither an
 * indexed nor a contextual formula.
 */
export class FormulaShapeError extends SequenceError {
  constructor(message: string) {
    super(message, "UNRECOGNIZED_FORMULA");
    this.name = "FormulaShapeError";
  }
}

export type PreconditionViolation =
  | "empty-history"
  | "index-out-of-range"
  | "invalid-index"
  | "inverted-range"
  | "stale-view"
  | "reentrant-extension"
  | "moved-from";

/**
 * A caller broke a documented precondition. These are programming errors,
 * never retried or recovered inside the library.
 */
export class PreconditionError extends SequenceError {
  constructor(
    message: string,
    public readonly violation: PreconditionViolation,
    public readonly context?: Record<string, unknown>
  ) {
    super(message, "PRECONDITION_FAILED");
    this.name = "PreconditionError";
  }
}

export function precondition(
  cond: boolean,
  violation: PreconditionViolation,
  message: string,
  context?: Record<string, unknown>
): asserts cond {
  if (!cond) {
    throw new PreconditionError(`memoseq: ${message}`, violation, context);
  }
}

export function isPreconditionError(e: unknown, violation?: PreconditionViolation): e is PreconditionError {
  return e instanceof PreconditionError && (violation === undefined || e.violation === violation);
}
