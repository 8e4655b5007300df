// src/core/seq/formula.ts
// Formula adapter: normalizes both accepted formula shapes to one closure

import type { SeqView } from "./view";
import { MathContext } from "./context";
import { FormulaShapeError } from "./errors";

/** Shape A: raw index + history. */
export type IndexFn<T> = (index: number, history: SeqView<T>) => T;

/** Shape B: a single MathContext. */
export type ContextFn<T> = (ctx: MathContext<T>) => T;

export type IndexedFormula<T> = { readonly kind: "indexed"; readonly fn: IndexFn<T> };
export type ContextFormula<T> = { readonly kind: "contextual"; readonly fn: ContextFn<T> };

/**
 * FormulaSpec: a formula tagged with its shape.
 */
export type FormulaSpec<T> = IndexedFormula<T> | ContextFormula<T>;

/**
 * What a sequence accepts. A bare function is taken as Shape A; contextual
 * formulas must be tagged with `contextual()`.
 */
export type FormulaInput<T> = FormulaSpec<T> | IndexFn<T>;

/** The one shape the sequence calls. */
export type NormalizedFormula<T> = IndexFn<T>;

export function indexed<T>(fn: IndexFn<T>): IndexedFormula<T> {
  return { kind: "indexed", fn };
}

export function contextual<T>(fn: ContextFn<T>): ContextFormula<T> {
  return { kind: "contextual", fn };
}

function hasFn(v: object): v is { kind?: unknown; fn: (...args: never[]) => unknown } {
  return "fn" in v && typeof v.fn === "function";
}

/**
 * Describe a rejected formula value for the error message.
 */
function describe(v: unknown): string {
  if (v === null) return "null";
  if (typeof v !== "object") return typeof v;
  if ("kind" in v) return `formula tagged ${JSON.stringify(v.kind)}`;
  return "object";
}

/**
 * Normalize a formula to `(index, history) => T`.
 *
 * Shape A is checked first. The returned closure captures the user's
 * function directly; nothing is copied.
 */
export function normalizeFormula<T>(input: FormulaInput<T>): NormalizedFormula<T> {
  const v: unknown = input;

  if (typeof input === "function") {
    return input;
  }

  if (typeof v === "object" && v !== null && hasFn(v)) {
    switch (input.kind) {
      case "indexed": {
        const fn = input.fn;
        return (index, history) => fn(index, history);
      }
      case "contextual": {
        const fn = input.fn;
        return (index, history) => fn(new MathContext(index, history));
      }
    }
  }

  throw new FormulaShapeError(
    `memoseq: unrecognized formula signature (${describe(v)}); ` +
      `expected (index, history) => value, indexed(fn) or contextual(fn)`
  );
}

export function isFormulaInput(v: unknown): v is FormulaInput<unknown> {
  if (typeof v === "function") return true;
  if (typeof v !== "object" || v === null || !hasFn(v)) return false;
  return v.kind === "indexed" || v.kind === "contextual";
}
