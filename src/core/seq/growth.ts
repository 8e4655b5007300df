// src/core/seq/growth.ts
// Capacity growth policy for the term store

/** Below this capacity, growth rounds up to a power of two. */
export const GROWTH_THRESHOLD = 1024;

/**
 * Smallest power of two >= n. bitCeil(0) is 1.
 */
export function bitCeil(n: number): number {
  if (n <= 1) return 1;
  let p = 1;
  while (p < n) p *= 2;
  return p;
}

/**
 * Capacity to reserve when `needed` terms must fit in a store of `current`
 * capacity. Returns `current` when it already fits.
 *
 * 1.5x amortized growth, clamped up to `needed`; results under
 * GROWTH_THRESHOLD are rounded to the next power of two.
 */
export function nextCapacity(current: number, needed: number): number {
  if (needed <= current) return current;

  let next = current + Math.floor(current / 2);
  if (next < needed) next = needed;
  if (next < GROWTH_THRESHOLD) next = bitCeil(next);
  return next;
}
