/**
 * @fileoverview Zone geometry helpers.
 *
 * Resistance zones keep their outer (wick) bound in `high` and their
 * inner (body) bound in `low`; support zones the other way round.
 *
 * @module @zonescope/zone-engine/zone
 */

import type { Bar, Zone } from '@zonescope/contracts';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function bodyTop(bar: Bar): number {
  return Math.max(bar.open, bar.close);
}

export function bodyBottom(bar: Bar): number {
  return Math.min(bar.open, bar.close);
}

/** Wick-side bound whose close-through invalidates the zone */
export function outerBound(zone: Zone): number {
  return zone.kind === 'resistance' ? zone.high : zone.low;
}

/** Body-side bound, narrowed by refinement */
export function innerBound(zone: Zone): number {
  return zone.kind === 'resistance' ? zone.low : zone.high;
}

/**
 * Returns a copy of the zone with a new inner bound.
 */
export function withInnerBound(zone: Zone, inner: number): Zone {
  return zone.kind === 'resistance' ? { ...zone, low: inner } : { ...zone, high: inner };
}

export function hasValidGeometry(zone: Zone): boolean {
  return zone.low < zone.high;
}

/**
 * Signed distance from price to the zone's near edge, in percent of price.
 *
 * Resistance measures from `low`, support from `high`; a resistance
 * above price is positive, a support below price negative.
 *
 * @example
 * ```typescript
 * distancePct({ kind: 'resistance', low: 52, high: 53, ... }, 50) // 4
 * ```
 */
export function distancePct(zone: Zone, price: number): number {
  const edge = zone.kind === 'resistance' ? zone.low : zone.high;
  return ((edge - price) / price) * 100;
}

/**
 * Age of the zone's oldest pivot relative to an explicit reference time.
 *
 * @param asOf - Reference timestamp in epoch milliseconds
 */
export function zoneAgeMs(zone: Zone, asOf: number): number {
  return asOf - zone.originTime;
}

export function zoneAgeDays(zone: Zone, asOf: number): number {
  return zoneAgeMs(zone, asOf) / MS_PER_DAY;
}

/**
 * True when price lies inside the zone widened by `thresholdPct` of the
 * zone's width on each side.
 */
export function containsPrice(zone: Zone, price: number, thresholdPct = 0.005): boolean {
  const margin = (zone.high - zone.low) * thresholdPct;
  return zone.low - margin <= price && price <= zone.high + margin;
}
