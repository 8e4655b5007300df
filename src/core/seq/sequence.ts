// src/core/seq/sequence.ts
// Sequence: lazily-extended, self-memoizing recurrence

import type { SequenceConfig } from "../config/config";
import { createSequenceConfig } from "../config/config";
import type { SequenceEvent, SequenceOptions, SnapshotMode } from "./types";
import type { ContextFn, FormulaInput, IndexFn, NormalizedFormula } from "./formula";
import { contextual, normalizeFormula } from "./formula";
import { TermStore } from "./store";
import { SeqView } from "./view";
import { nextCapacity } from "./growth";
import { precondition } from "./errors";

function checkIndex(n: number, what = "index"): void {
  precondition(
    Number.isSafeInteger(n) && n >= 0,
    "invalid-index",
    `${what} must be a non-negative integer, got ${n}`,
    { [what]: n }
  );
}

/**
 * Sequence<T>: term a[n] is computed on first demand, together with every
 * uncomputed term before it, and cached for good.
 *
 * Sequences are not copyable. Use transfer() to hand one over to a new owner.
 *
 * Views returned by view() and slice() are borrows: any call that grows the
 * store may invalidate them.
 */
export class Sequence<T> implements Iterable<T> {
  private store: TermStore<T>;
  private formula: NormalizedFormula<T> | undefined;
  private config: SequenceConfig;
  private eventLog: SequenceEvent[] = [];
  private extending = false;

  constructor(formula: FormulaInput<T>, ...seeds: T[]) {
    this.formula = normalizeFormula(formula);
    this.config = createSequenceConfig();
    this.store = new TermStore(seeds);
  }

  /**
   * Create a sequence with explicit options.
   */
  static create<T>(formula: FormulaInput<T>, options: SequenceOptions<T> = {}): Sequence<T> {
    const seq = new Sequence<T>(formula);
    seq.config = createSequenceConfig(options.config);
    seq.store = new TermStore(options.seeds ?? []);
    for (let i = 0; i < seq.store.length; i++) {
      seq.record({ tag: "Seed", index: i, timestamp: Date.now() });
    }
    return seq;
  }

  static fromIndexed<T>(fn: IndexFn<T>, ...seeds: T[]): Sequence<T> {
    return new Sequence<T>(fn, ...seeds);
  }

  static fromContext<T>(fn: ContextFn<T>, ...seeds: T[]): Sequence<T> {
    return new Sequence<T>(contextual(fn), ...seeds);
  }

  // ───────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────

  /** a[n], computing up to n if needed. */
  get(n: number): T {
    this.extendTo(n);
    return this.store.termAt(n);
  }

  /** a[n] with a bounds-checked read of the store after extension. */
  at(n: number): T {
    this.extendTo(n);
    precondition(
      n < this.store.length,
      "index-out-of-range",
      `index ${n} out of range for cache of size ${this.store.length}`,
      { index: n, size: this.store.length }
    );
    return this.store.termAt(n);
  }

  prefetchUpTo(n: number): void {
    this.extendTo(n);
  }

  /**
   * Terms `[start, end)`. Computes through end - 1; an empty range
   * computes nothing.
   */
  slice(start: number, end: number): SeqView<T> {
    checkIndex(start, "start");
    checkIndex(end, "end");
    precondition(start <= end, "inverted-range", `invalid range [${start}, ${end})`, { start, end });
    if (start === end) return SeqView.empty<T>();

    this.extendTo(end - 1);
    return this.makeView(start, end - start);
  }

  /** Everything cached so far. Never extends. */
  view(): SeqView<T> {
    return this.makeView(0, this.store.length);
  }

  /**
   * Owned array of the cached terms.
   *
   * "move" empties the sequence. The formula survives but seeds do not,
   * so the next read recomputes a[0] from the formula with an empty history.
   */
  snapshot(mode: SnapshotMode = "copy"): T[] {
    const size = this.store.length;
    let out: T[];
    if (mode === "move") {
      precondition(!this.extending, "reentrant-extension", "snapshot(\"move\") during extension");
      out = this.store.take();
    } else {
      out = this.store.copy();
    }
    this.record({ tag: "Snapshot", mode, size, timestamp: Date.now() });
    return out;
  }

  size(): number {
    return this.store.length;
  }

  capacity(): number {
    return this.store.capacity;
  }

  /** Advisory. Never changes size(). */
  reserve(capacity: number): void {
    checkIndex(capacity, "capacity");
    if (this.store.reserve(capacity)) {
      this.record({ tag: "Reserve", requested: capacity, capacity: this.store.capacity, timestamp: Date.now() });
    }
  }

  /** Iterates the terms cached when iteration begins. */
  [Symbol.iterator](): Iterator<T> {
    return this.view()[Symbol.iterator]();
  }

  // ───────────────────────────────────────────────────────────────
  // Ownership
  // ───────────────────────────────────────────────────────────────

  /**
   * Move the cache, formula, config and event log into a new sequence.
   * This one is left empty and can no longer be extended.
   */
  transfer(): Sequence<T> {
    const formula = this.formula;
    precondition(formula !== undefined, "moved-from", "sequence was already transferred");
    precondition(!this.extending, "reentrant-extension", "transfer() during extension");

    const next = new Sequence<T>(formula);
    next.store = this.store;
    next.config = this.config;
    next.eventLog = this.eventLog;

    this.store = new TermStore<T>();
    this.formula = undefined;
    this.eventLog = [];

    next.record({ tag: "Transfer", size: next.store.length, timestamp: Date.now() });
    return next;
  }

  isTransferred(): boolean {
    return this.formula === undefined;
  }

  // ───────────────────────────────────────────────────────────────
  // Events
  // ───────────────────────────────────────────────────────────────

  get events(): readonly SequenceEvent[] {
    return this.eventLog;
  }

  clearEvents(): void {
    this.eventLog = [];
  }

  getConfig(): Readonly<SequenceConfig> {
    return this.config;
  }

  // ───────────────────────────────────────────────────────────────
  // Extension
  // ───────────────────────────────────────────────────────────────

  private extendTo(target: number): void {
    checkIndex(target);
    const store = this.store;

    if (target < store.length) {
      this.record({ tag: "Hit", index: target, size: store.length, timestamp: Date.now() });
      return;
    }

    const formula = this.formula;
    precondition(formula !== undefined, "moved-from", "cannot extend a transferred sequence", { index: target });
    precondition(
      !this.extending,
      "reentrant-extension",
      `formula requested uncomputed term ${target} while term ${store.length} is being computed`,
      { index: target, size: store.length }
    );

    const needed = target + 1;
    const from = store.capacity;
    const to = nextCapacity(from, needed);
    if (store.reserve(to)) {
      this.record({ tag: "Grow", from, to, timestamp: Date.now() });
    }

    this.extending = true;
    try {
      while (store.length < needed) {
        const index = store.length;
        const value = formula(index, this.makeView(0, index));
        store.push(value);
        this.record({ tag: "Compute", index, timestamp: Date.now() });
      }
    } finally {
      this.extending = false;
    }
  }

  private makeView(offset: number, length: number): SeqView<T> {
    return new SeqView(this.store, offset, length, this.config.checkViews);
  }

  private record(event: SequenceEvent): void {
    if (!this.config.logging) return;
    this.eventLog.push(event);
    const excess = this.eventLog.length - this.config.maxEvents;
    if (excess > 0) {
      this.eventLog.splice(0, excess);
    }
  }
}
