// src/core/seq/context.ts
// MathContext: per-invocation facade handed to contextual formulas

import type { SeqView } from "./view";
import { precondition } from "./errors";

/**
 * MathContext pairs the index about to be computed with a read-only view of
 * every term before it. A fresh one is built for each formula call; it owns
 * nothing and must not be kept past that call.
 */
export class MathContext<T> {
  constructor(
    private readonly indexVal: number,
    readonly history: SeqView<T>
  ) {}

  /** Index n of the term being computed. */
  index(): number {
    return this.indexVal;
  }

  /** Alias for index(). */
  n(): number {
    return this.indexVal;
  }

  /** a[n-1]. */
  previous(): T {
    precondition(
      !this.history.isEmpty(),
      "empty-history",
      "cannot access previous() while computing the first term",
      { index: this.indexVal }
    );
    return this.history.last();
  }

  /** Alias for previous(). */
  last(): T {
    return this.previous();
  }

  /** a[i], for 0 <= i < n. */
  at(i: number): T {
    return this.history.at(i);
  }
}
