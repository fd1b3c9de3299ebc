/**
 * @fileoverview Zone detection pipeline.
 *
 * bars -> pivots -> candidate zones -> breakout filter -> refinement
 * -> merging -> final geometry filter.
 *
 * Synchronous and pure: the same series always yields the same zones.
 *
 * @module @zonescope/zone-engine/detect
 */

import {
  getAllTimeframes,
  type Bar,
  type BarsByTimeframe,
  type Timeframe,
  type TimeframeZone,
  type Zone,
} from '@zonescope/contracts';
import { findPivots } from './pivots.js';
import { initZoneFromPivot } from './initialize.js';
import { isBroken } from './breakout.js';
import { refineZone } from './refine.js';
import { mergeZones } from './merge.js';
import { hasValidGeometry } from './zone.js';
import { MIN_BARS, type DetectZonesOptions } from './types.js';

/**
 * Detects active support and resistance zones in a bar series.
 *
 * Never throws for well-formed input: a series shorter than five bars
 * yields no zones, and candidates with degenerate geometry or a close
 * beyond their outer bound are discarded.
 *
 * @param bars - Series ordered ascending by openTime, no duplicates
 * @returns Zones with `low < high` and status `active`
 *
 * @example
 * ```typescript
 * const zones = detectZones(bars, { timeframe: Timeframe.H4 });
 * ```
 */
export function detectZones(bars: readonly Bar[], options: DetectZonesOptions = {}): Zone[] {
  if (bars.length < MIN_BARS) {
    return [];
  }

  const candidates: Zone[] = [];
  for (const pivot of findPivots(bars)) {
    const zone = initZoneFromPivot(pivot, bars);
    if (!zone || isBroken(zone, bars)) continue;

    candidates.push(refineZone(zone, bars));
  }

  const merged = mergeZones(candidates, { thresholdPct: options.mergeThresholdPct });
  const active = merged.filter((zone) => hasValidGeometry(zone) && zone.status === 'active');

  const { timeframe } = options;
  return timeframe ? tagZones(active, timeframe) : active;
}

/**
 * Runs detection independently for every timeframe present in the input.
 * Empty series produce an empty zone list for their timeframe.
 */
export function detectZonesMultiTimeframe(
  barsByTimeframe: BarsByTimeframe,
  options: Omit<DetectZonesOptions, 'timeframe'> = {}
): Partial<Record<Timeframe, TimeframeZone[]>> {
  const result: Partial<Record<Timeframe, TimeframeZone[]>> = {};

  for (const timeframe of getAllTimeframes()) {
    const bars = barsByTimeframe[timeframe];
    if (bars === undefined) continue;

    result[timeframe] = tagZones(detectZones(bars, options), timeframe);
  }

  return result;
}

/**
 * Flattens per-timeframe zones into one pool, smallest timeframe first.
 */
export function poolZones(
  zonesByTimeframe: Partial<Record<Timeframe, readonly TimeframeZone[]>>
): TimeframeZone[] {
  return getAllTimeframes().flatMap((timeframe) => zonesByTimeframe[timeframe] ?? []);
}

export function tagZones(zones: readonly Zone[], timeframe: Timeframe): TimeframeZone[] {
  return zones.map((zone) => ({ ...zone, timeframe }));
}
