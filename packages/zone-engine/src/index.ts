/**
 * @fileoverview Main entry point for @zonescope/zone-engine package.
 *
 * Support/resistance zone detection from OHLC bar series.
 *
 * @module @zonescope/zone-engine
 */

// Pipeline stages
export { findPivots } from './pivots.js';
export { initZoneFromPivot } from './initialize.js';
export { isBroken } from './breakout.js';
export { refineZone } from './refine.js';
export { mergeZones, shouldMerge, combineZones } from './merge.js';

// Entry points
export { detectZones, detectZonesMultiTimeframe, poolZones, tagZones } from './detect.js';
export { selectNearestZones } from './nearest.js';

// Zone helpers
export {
  bodyTop,
  bodyBottom,
  outerBound,
  innerBound,
  distancePct,
  zoneAgeMs,
  zoneAgeDays,
  containsPrice,
} from './zone.js';

export {
  FRACTAL_WING,
  MIN_BARS,
  DEFAULT_MERGE_THRESHOLD_PCT,
  DEFAULT_MAX_RESISTANCE,
  DEFAULT_MAX_SUPPORT,
  zoneKindForPivot,
} from './types.js';
export type {
  Pivot,
  PivotKind,
  MergeOptions,
  DetectZonesOptions,
  NearestZonesOptions,
} from './types.js';
