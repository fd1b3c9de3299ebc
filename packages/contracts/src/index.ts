/**
 * @fileoverview Main entry point for @zonescope/contracts package.
 *
 * Shared types, enums and error classes for every zonescope package.
 *
 * @module @zonescope/contracts
 */

// Timeframes
export {
  Timeframe,
  isValidTimeframe,
  timeframeToMs,
  getTimeframeLabel,
  compareTimeframes,
  parseTimeframe,
  getAllTimeframes,
} from './timeframes.js';

// Market data types
export type { Bar, GetBarsParams, BarsByTimeframe, MarketDataSource } from './market.js';

// Zone types
export type {
  ZoneKind,
  ZoneStatus,
  Zone,
  TimeframeZone,
  NearestZones,
  ZoneReport,
  ZoneRequest,
} from './zones.js';

// Error classes and guards
export {
  ZoneScopeError,
  ProviderRateLimitError,
  InsufficientBarsError,
  SymbolResolutionError,
  isZoneScopeError,
  isProviderRateLimitError,
  isInsufficientBarsError,
  isSymbolResolutionError,
} from './errors.js';
