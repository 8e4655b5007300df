// src/core/seq/store.ts
// Backing store for cached terms: dense array + logical capacity + generation

/**
 * Anything a view can borrow from.
 */
export interface ViewSource<T> {
  /** Bumped on every reallocation or reset; views carry the value they were issued under */
  readonly generation: number;
  termAt(index: number): T;
}

/**
 * TermStore: the append-only backing store of a sequence.
 *
 * JS arrays have no capacity of their own, so capacity is tracked here as
 * the amount of room the store has committed to. Raising it counts as a
 * reallocation and invalidates outstanding views.
 */
export class TermStore<T> implements ViewSource<T> {
  private terms: T[];
  private cap: number;
  private gen = 0;

  constructor(initial: readonly T[] = []) {
    this.terms = [...initial];
    this.cap = initial.length;
  }

  get length(): number {
    return this.terms.length;
  }

  get capacity(): number {
    return this.cap;
  }

  get generation(): number {
    return this.gen;
  }

  termAt(index: number): T {
    return this.terms[index];
  }

  /** Callers reserve first; push never reallocates. */
  push(value: T): void {
    this.terms.push(value);
  }

  /**
   * Raise capacity to at least `capacity`. Returns true if it reallocated.
   */
  reserve(capacity: number): boolean {
    if (capacity <= this.cap) return false;
    this.cap = capacity;
    this.gen++;
    return true;
  }

  copy(): T[] {
    return this.terms.slice();
  }

  /**
   * Hand out the backing array and leave the store empty with no capacity.
   */
  take(): T[] {
    const taken = this.terms;
    this.terms = [];
    this.cap = 0;
    this.gen++;
    return taken;
  }
}
