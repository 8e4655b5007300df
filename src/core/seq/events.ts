// src/core/seq/events.ts
// Event log queries and statistics

import type { EventSource, SequenceEvent, SequenceEventTag, SequenceStats } from "./types";

type EventOf<K extends SequenceEventTag> = Extract<SequenceEvent, { tag: K }>;

/**
 * Events of a single tag, in order.
 */
export function eventsOfTag<K extends SequenceEventTag>(
  events: readonly SequenceEvent[],
  tag: K
): EventOf<K>[] {
  return events.filter((e): e is EventOf<K> => e.tag === tag);
}

/**
 * Count formula invocations.
 */
export function countComputes(seq: EventSource): number {
  return eventsOfTag(seq.events, "Compute").length;
}

/**
 * Count reads served from the cache.
 */
export function countHits(seq: EventSource): number {
  return eventsOfTag(seq.events, "Hit").length;
}

/**
 * Indices the formula was invoked for, in invocation order.
 */
export function computedIndices(seq: EventSource): number[] {
  return eventsOfTag(seq.events, "Compute").map(e => e.index);
}

/**
 * Indices computed more than once (should be empty).
 *
 * A move snapshot legitimately restarts from index 0, so only computes
 * after the last move are considered.
 */
export function findRecomputed(seq: EventSource): number[] {
  const counts = new Map<number, number>();

  for (const event of seq.events) {
    if (event.tag === "Snapshot" && event.mode === "move") {
      counts.clear();
    } else if (event.tag === "Compute") {
      counts.set(event.index, (counts.get(event.index) ?? 0) + 1);
    }
  }

  const recomputed: number[] = [];
  for (const [index, count] of counts) {
    if (count > 1) {
      recomputed.push(index);
    }
  }
  return recomputed;
}

/**
 * Capacity transitions, oldest first.
 */
export function growthHistory(seq: EventSource): Array<{ from: number; to: number }> {
  return eventsOfTag(seq.events, "Grow").map(e => ({ from: e.from, to: e.to }));
}

/**
 * Get statistics about a sequence.
 *
 * Event-derived counts are only meaningful with logging on.
 */
export function getSequenceStats(seq: EventSource): SequenceStats {
  let computed = 0;
  let seeded = 0;
  let hits = 0;
  let grows = 0;

  for (const event of seq.events) {
    switch (event.tag) {
      case "Compute":
        computed++;
        break;
      case "Seed":
        seeded++;
        break;
      case "Hit":
        hits++;
        break;
      case "Grow":
        grows++;
        break;
    }
  }

  return {
    size: seq.size(),
    capacity: seq.capacity(),
    computed,
    seeded,
    hits,
    grows,
  };
}
