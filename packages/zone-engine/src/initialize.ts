/**
 * @fileoverview Candidate zone construction from a pivot bar.
 *
 * @module @zonescope/zone-engine/initialize
 */

import type { Bar, Zone } from '@zonescope/contracts';
import { bodyBottom, bodyTop } from './zone.js';
import { FRACTAL_WING, zoneKindForPivot, type Pivot } from './types.js';

/**
 * Neighbour offsets examined when tightening the inner bound.
 */
const NEIGHBOR_OFFSETS = [-1, -FRACTAL_WING, 1, FRACTAL_WING] as const;

/**
 * Builds a candidate zone from a pivot.
 *
 * The outer bound is the pivot's wick (high for a pivot-high, low for a
 * pivot-low) and the inner bound its body edge. A neighbour whose body
 * edge sits strictly between the two pulls the inner bound toward the
 * outer one so the zone never overlaps that neighbour's body.
 *
 * @returns The candidate, or null when the inner bound does not sit
 *   strictly inside the outer bound
 */
export function initZoneFromPivot(pivot: Pivot, bars: readonly Bar[]): Zone | null {
  const bar = bars[pivot.index];
  if (!bar) return null;

  const isResistance = pivot.kind === 'high';
  const outer = isResistance ? bar.high : bar.low;
  let inner = isResistance ? bodyTop(bar) : bodyBottom(bar);

  if (!isInside(inner, outer, isResistance)) {
    return null;
  }

  for (const offset of NEIGHBOR_OFFSETS) {
    const neighbor = bars[clampIndex(pivot.index + offset, bars.length)];
    if (!neighbor) continue;

    const edge = isResistance ? bodyTop(neighbor) : bodyBottom(neighbor);
    if (isBetween(edge, inner, outer)) {
      inner = edge;
    }
  }

  if (!isInside(inner, outer, isResistance)) {
    return null;
  }

  return {
    kind: zoneKindForPivot(pivot.kind),
    low: isResistance ? inner : outer,
    high: isResistance ? outer : inner,
    originTime: bar.openTime,
    strength: 1,
    touches: 0,
    status: 'active',
    pivotIndex: pivot.index,
  };
}

function isInside(inner: number, outer: number, isResistance: boolean): boolean {
  return isResistance ? inner < outer : inner > outer;
}

/** Strictly between two values, in either order */
function isBetween(value: number, a: number, b: number): boolean {
  return value > Math.min(a, b) && value < Math.max(a, b);
}

function clampIndex(index: number, length: number): number {
  return Math.min(Math.max(index, 0), length - 1);
}
