/**
 * @fileoverview Fractal pivot detection.
 *
 * A bar is a pivot-high when its high is strictly above the highs of the
 * two bars on each side, and a pivot-low when its low is strictly below
 * their lows. Equal extremes never qualify, so the result depends only
 * on the input series.
 *
 * @module @zonescope/zone-engine/pivots
 */

import type { Bar } from '@zonescope/contracts';
import { FRACTAL_WING, MIN_BARS, type Pivot } from './types.js';

/**
 * Scans a bar series for 5-bar fractal pivots.
 *
 * Both a pivot-high and a pivot-low may be reported for the same index;
 * the high is listed first.
 *
 * @param bars - Series ordered ascending by openTime
 * @returns Pivots in index order (empty for fewer than 5 bars)
 *
 * @example
 * ```typescript
 * findPivots(bars); // [{ index: 2, kind: 'high' }, { index: 7, kind: 'low' }]
 * ```
 */
export function findPivots(bars: readonly Bar[]): Pivot[] {
  const pivots: Pivot[] = [];
  if (bars.length < MIN_BARS) {
    return pivots;
  }

  for (let i = FRACTAL_WING; i < bars.length - FRACTAL_WING; i++) {
    const bar = bars[i];
    if (!bar) continue;

    let isHigh = true;
    let isLow = true;

    for (let offset = 1; offset <= FRACTAL_WING; offset++) {
      const left = bars[i - offset];
      const right = bars[i + offset];
      if (!left || !right) {
        isHigh = false;
        isLow = false;
        break;
      }
      if (bar.high <= left.high || bar.high <= right.high) isHigh = false;
      if (bar.low >= left.low || bar.low >= right.low) isLow = false;
    }

    if (isHigh) pivots.push({ index: i, kind: 'high' });
    if (isLow) pivots.push({ index: i, kind: 'low' });
  }

  return pivots;
}
