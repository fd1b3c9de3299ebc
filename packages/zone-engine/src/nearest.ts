/**
 * @fileoverview Nearest zone selection around a reference price.
 *
 * @module @zonescope/zone-engine/nearest
 */

import type { NearestZones, TimeframeZone, Zone } from '@zonescope/contracts';
import {
  DEFAULT_MAX_RESISTANCE,
  DEFAULT_MAX_SUPPORT,
  type NearestZonesOptions,
} from './types.js';

/**
 * Classifies pooled zones against a price and keeps the closest ones.
 *
 * - Resistance: resistance zones whose low is at or above price, or that
 *   contain price strictly inside; ascending by low.
 * - Support: support zones whose high is at or below price, or that
 *   contain price strictly inside; descending by high.
 *
 * Each side is truncated to its cap; ties keep pool order.
 *
 * @example
 * ```typescript
 * const { resistance, support } = selectNearestZones(pooled, 50, { maxResistance: 3 });
 * ```
 */
export function selectNearestZones(
  zones: readonly TimeframeZone[],
  price: number,
  options: NearestZonesOptions = {}
): NearestZones {
  const maxResistance = Math.max(0, options.maxResistance ?? DEFAULT_MAX_RESISTANCE);
  const maxSupport = Math.max(0, options.maxSupport ?? DEFAULT_MAX_SUPPORT);

  const resistance: TimeframeZone[] = [];
  const support: TimeframeZone[] = [];

  for (const zone of zones) {
    if (zone.kind === 'resistance' && (zone.low >= price || isStrictlyInside(zone, price))) {
      resistance.push(zone);
    } else if (zone.kind === 'support' && (zone.high <= price || isStrictlyInside(zone, price))) {
      support.push(zone);
    }
  }

  resistance.sort((a, b) => a.low - b.low);
  support.sort((a, b) => b.high - a.high);

  return {
    resistance: resistance.slice(0, maxResistance),
    support: support.slice(0, maxSupport),
  };
}

function isStrictlyInside(zone: Zone, price: number): boolean {
  return zone.low < price && price < zone.high;
}
