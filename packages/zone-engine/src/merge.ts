/**
 * @fileoverview Proximity merging of same-kind zones.
 *
 * Merging is a reduction over an arena of zone slots. Every slot starts
 * on the worklist; a merge writes a new zone value into the lower of the
 * two slots, empties the other and puts the surviving slot back on the
 * worklist. When the worklist drains, no two surviving zones satisfy the
 * merge predicate.
 *
 * @module @zonescope/zone-engine/merge
 */

import type { Zone } from '@zonescope/contracts';
import { DEFAULT_MERGE_THRESHOLD_PCT, type MergeOptions } from './types.js';

/**
 * Merge predicate: same kind, and either overlapping ranges or a gap
 * smaller than `thresholdPct` of the pair's average width.
 */
export function shouldMerge(
  a: Zone,
  b: Zone,
  thresholdPct: number = DEFAULT_MERGE_THRESHOLD_PCT
): boolean {
  if (a.kind !== b.kind) return false;

  if (a.low <= b.high && b.low <= a.high) {
    return true;
  }

  const averageWidth = (a.high - a.low + (b.high - b.low)) / 2;
  const gap = Math.max(a.low, b.low) - Math.min(a.high, b.high);
  return gap < averageWidth * thresholdPct;
}

/**
 * Combines two zones into a new value.
 *
 * The zone with the smaller originTime keeps its identity (`a` on a
 * tie). Bounds become the union, strength sums and pivotIndex takes the
 * earlier pivot.
 */
export function combineZones(a: Zone, b: Zone): Zone {
  const base = a.originTime <= b.originTime ? a : b;

  return {
    ...base,
    low: Math.min(a.low, b.low),
    high: Math.max(a.high, b.high),
    strength: a.strength + b.strength,
    pivotIndex: Math.min(a.pivotIndex, b.pivotIndex),
  };
}

/**
 * Clusters overlapping or nearby zones of the same kind until no pair
 * remains mergeable.
 *
 * @returns Surviving zones in order of their first appearance
 *
 * @example
 * ```typescript
 * mergeZones([r(100, 102), r(102.005, 102.5)]);
 * // [{ low: 100, high: 102.5, strength: 2, ... }]
 * ```
 */
export function mergeZones(zones: readonly Zone[], options: MergeOptions = {}): Zone[] {
  const thresholdPct = options.thresholdPct ?? DEFAULT_MERGE_THRESHOLD_PCT;

  const arena: Array<Zone | null> = [...zones];
  const worklist: number[] = arena.map((_, index) => index);
  const queued = new Set<number>(worklist);

  let slot = worklist.shift();
  while (slot !== undefined) {
    queued.delete(slot);
    const current = arena[slot];

    if (current) {
      for (let other = 0; other < arena.length; other++) {
        const candidate = arena[other];
        if (other === slot || !candidate) continue;
        if (!shouldMerge(current, candidate, thresholdPct)) continue;

        const keep = Math.min(slot, other);
        const drop = Math.max(slot, other);
        arena[keep] =
          slot < other ? combineZones(current, candidate) : combineZones(candidate, current);
        arena[drop] = null;

        if (!queued.has(keep)) {
          worklist.push(keep);
          queued.add(keep);
        }
        break;
      }
    }

    slot = worklist.shift();
  }

  return arena.filter((zone): zone is Zone => zone !== null);
}
