/**
 * @fileoverview Support/resistance zone types.
 *
 * @module @zonescope/contracts/zones
 */

import type { Timeframe } from './timeframes.js';

export type ZoneKind = 'support' | 'resistance';

/**
 * `broken` is part of the lifecycle vocabulary but never leaves the
 * engine: broken candidates are dropped rather than flagged.
 */
export type ZoneStatus = 'active' | 'broken';

/**
 * A horizontal price band derived from one or more pivots.
 *
 * Zones are immutable values; every pipeline stage returns a new one.
 *
 * @invariant low < high
 * @invariant kind never changes after creation
 */
export interface Zone {
  readonly kind: ZoneKind;

  /** Lower bound (outer bound for support, inner bound for resistance) */
  readonly low: number;

  /** Upper bound (outer bound for resistance, inner bound for support) */
  readonly high: number;

  /** openTime of the oldest pivot bar absorbed into the zone (ms) */
  readonly originTime: number;

  /** Number of pivots merged into this zone */
  readonly strength: number;

  /** Reserved: price revisits are not counted yet */
  readonly touches: number;

  readonly status: ZoneStatus;

  /** Index of the founding pivot in the series the zone was built from */
  readonly pivotIndex: number;

  /** Timeframe of the series the zone was built from, when known */
  readonly timeframe?: Timeframe;
}

/**
 * Zone tagged with its source timeframe. This is the shape exposed to
 * formatters and front-ends once zones from several timeframes are pooled.
 */
export interface TimeframeZone extends Zone {
  readonly timeframe: Timeframe;
}

/**
 * Nearest zones on each side of a reference price, closest first.
 */
export interface NearestZones {
  resistance: TimeframeZone[];
  support: TimeframeZone[];
}

/**
 * Result of one zone analysis run for a symbol.
 */
export interface ZoneReport {
  symbol: string;

  /** Timeframe the user asked about */
  timeframe: Timeframe;

  currentPrice: number;

  /** Reference time for zone ages (ms) */
  asOf: number;

  zonesByTimeframe: Partial<Record<Timeframe, TimeframeZone[]>>;

  nearest: NearestZones;
}

/**
 * Zone analysis request as received from a front-end.
 */
export interface ZoneRequest {
  /** Raw user input; normalised by the analysis service (`vet` -> `VETUSDT`) */
  symbol: string;

  /** Defaults to the configured analysis timeframe */
  timeframe?: Timeframe;

  /** Reference time in ms; defaults to now */
  asOf?: number;
}
