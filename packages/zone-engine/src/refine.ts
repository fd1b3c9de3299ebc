/**
 * @fileoverview Close-based refinement of a zone's inner bound.
 *
 * @module @zonescope/zone-engine/refine
 */

import type { Bar, Zone } from '@zonescope/contracts';
import { innerBound, outerBound, withInnerBound } from './zone.js';

/**
 * Narrows the inner bound to the extreme close reached after the pivot.
 *
 * Walks forward from the pivot bar keeping the highest close (resistance)
 * or lowest close (support), seeded with the current inner bound. The
 * walk stops before the first bar whose wick makes a new extreme beyond
 * the outer bound or whose close breaches it. The result is applied only
 * when it stays strictly inside the outer bound.
 *
 * @returns A new zone; the input is not modified
 */
export function refineZone(zone: Zone, bars: readonly Bar[]): Zone {
  const isResistance = zone.kind === 'resistance';
  const outer = outerBound(zone);
  let extreme = innerBound(zone);

  for (let i = Math.max(zone.pivotIndex, 0); i < bars.length; i++) {
    const bar = bars[i];
    if (!bar) continue;

    if (isResistance) {
      if (bar.high > outer || bar.close > outer) break;
      extreme = Math.max(extreme, bar.close);
    } else {
      if (bar.low < outer || bar.close < outer) break;
      extreme = Math.min(extreme, bar.close);
    }
  }

  const staysInside = isResistance ? extreme < outer : extreme > outer;
  return staysInside ? withInnerBound(zone, extreme) : zone;
}
