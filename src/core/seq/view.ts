// src/core/seq/view.ts
// Read-only borrowed window into a term store

import type { ViewSource } from "./store";
import { precondition } from "./errors";

const EMPTY_SOURCE: ViewSource<never> = {
  generation: 0,
  termAt(index: number): never {
    throw new RangeError(`empty view has no term ${index}`);
  },
};

/**
 * SeqView: zero-copy, read-only view over `[offset, offset + length)` of a store.
 *
 * A view is only valid until its store reallocates or is reset. With
 * `checked` on, reading through a stale view fails with `stale-view`.
 */
export class SeqView<T> implements Iterable<T> {
  private readonly issuedAt: number;

  constructor(
    private readonly source: ViewSource<T>,
    private readonly offset: number,
    readonly length: number,
    private readonly checked: boolean = true
  ) {
    this.issuedAt = source.generation;
  }

  static empty<T>(): SeqView<T> {
    return new SeqView<T>(EMPTY_SOURCE, 0, 0, false);
  }

  /** True while no reallocation or reset happened since the view was issued. */
  isValid(): boolean {
    return this.source.generation === this.issuedAt;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  at(i: number): T {
    this.assertValid();
    precondition(
      Number.isInteger(i) && i >= 0 && i < this.length,
      "index-out-of-range",
      `index ${i} out of range for view of length ${this.length}`,
      { index: i, length: this.length }
    );
    return this.source.termAt(this.offset + i);
  }

  first(): T {
    precondition(this.length > 0, "empty-history", "first() on empty view");
    return this.at(0);
  }

  last(): T {
    precondition(this.length > 0, "empty-history", "last() on empty view");
    return this.at(this.length - 1);
  }

  /** Half-open sub-window `[start, end)` sharing the same store. */
  subview(start: number, end: number = this.length): SeqView<T> {
    this.assertValid();
    precondition(start <= end, "inverted-range", `invalid range [${start}, ${end})`, { start, end });
    precondition(
      Number.isInteger(start) && start >= 0 && Number.isInteger(end) && end <= this.length,
      "index-out-of-range",
      `range [${start}, ${end}) outside view of length ${this.length}`,
      { start, end, length: this.length }
    );
    if (start === end) return SeqView.empty<T>();
    return new SeqView(this.source, this.offset + start, end - start, this.checked);
  }

  toArray(): T[] {
    this.assertValid();
    const out: T[] = [];
    for (let i = 0; i < this.length; i++) {
      out.push(this.source.termAt(this.offset + i));
    }
    return out;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.length; i++) {
      this.assertValid();
      yield this.source.termAt(this.offset + i);
    }
  }

  private assertValid(): void {
    if (!this.checked) return;
    precondition(
      this.isValid(),
      "stale-view",
      "view used after its sequence reallocated or was reset",
      { issuedAt: this.issuedAt, generation: this.source.generation }
    );
  }
}
