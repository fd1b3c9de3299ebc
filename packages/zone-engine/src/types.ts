/**
 * @fileoverview Engine-local types for zone detection.
 *
 * @module @zonescope/zone-engine/types
 */

import type { Timeframe, ZoneKind } from '@zonescope/contracts';

export type PivotKind = 'high' | 'low';

/**
 * A fractal extreme found in a bar series.
 */
export interface Pivot {
  /** Position of the pivot bar in the series */
  readonly index: number;
  readonly kind: PivotKind;
}

/** Bars on each side of a pivot that must be strictly exceeded */
export const FRACTAL_WING = 2;

/** Minimum series length that can contain a pivot */
export const MIN_BARS = FRACTAL_WING * 2 + 1;

/** Default proximity threshold for merging, as a fraction of average width */
export const DEFAULT_MERGE_THRESHOLD_PCT = 0.005;

export const DEFAULT_MAX_RESISTANCE = 3;
export const DEFAULT_MAX_SUPPORT = 4;

export interface MergeOptions {
  /**
   * Zones closer than this fraction of their average width are merged.
   * @default 0.005
   */
  thresholdPct?: number;
}

export interface DetectZonesOptions {
  /** Tag every detected zone with this timeframe */
  timeframe?: Timeframe;

  /** @see MergeOptions.thresholdPct */
  mergeThresholdPct?: number;
}

export interface NearestZonesOptions {
  /** @default 3 */
  maxResistance?: number;

  /** @default 4 */
  maxSupport?: number;
}

export function zoneKindForPivot(kind: PivotKind): ZoneKind {
  return kind === 'high' ? 'resistance' : 'support';
}
