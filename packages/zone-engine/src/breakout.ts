/**
 * @fileoverview Breakout invalidation.
 *
 * @module @zonescope/zone-engine/breakout
 */

import type { Bar, Zone } from '@zonescope/contracts';
import { outerBound } from './zone.js';

/**
 * True when any close from the zone's pivot to the end of the series
 * lies strictly beyond the zone's outer bound (above it for resistance,
 * below it for support).
 *
 * Must be evaluated on the zone as initialised, before refinement.
 */
export function isBroken(zone: Zone, bars: readonly Bar[]): boolean {
  const outer = outerBound(zone);

  for (let i = Math.max(zone.pivotIndex, 0); i < bars.length; i++) {
    const bar = bars[i];
    if (!bar) continue;

    if (zone.kind === 'resistance' ? bar.close > outer : bar.close < outer) {
      return true;
    }
  }

  return false;
}
