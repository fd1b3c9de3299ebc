/**
 * @fileoverview Market data types and provider contracts.
 *
 * Provider-agnostic description of OHLCV bars and of the data source the
 * zone analysis reads from. Pure data structures, no I/O.
 *
 * @module @zonescope/contracts/market
 */

import type { Timeframe } from './timeframes.js';

/**
 * A single OHLCV bar.
 *
 * Series handed to the zone engine are ordered ascending by `openTime`
 * with no duplicate timestamps; the data source guarantees this.
 *
 * @invariant high >= max(open, close)
 * @invariant low <= min(open, close)
 *
 * @example
 * ```typescript
 * const bar: Bar = {
 *   openTime: 1735689600000,
 *   open: 0.0412,
 *   high: 0.0419,
 *   low: 0.0408,
 *   close: 0.0415,
 *   volume: 1250000
 * };
 * ```
 */
export interface Bar {
  /** Bar open time, Unix epoch milliseconds (UTC) */
  readonly openTime: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/**
 * Parameters for requesting recent bars from a data source.
 */
export interface GetBarsParams {
  /** Exchange symbol, already normalised (e.g. 'BTCUSDT') */
  symbol: string;

  timeframe: Timeframe;

  /** Number of most recent bars to return */
  limit: number;
}

/**
 * Bars keyed by timeframe. A timeframe whose fetch failed is present
 * with an empty series.
 */
export type BarsByTimeframe = Partial<Record<Timeframe, readonly Bar[]>>;

/**
 * Read side of a market-data collaborator.
 *
 * Implemented by the Binance provider and by the fixture source used in
 * dry runs and tests.
 */
export interface MarketDataSource {
  /** Provider identifier used in logs and errors */
  readonly id: string;

  getBars(params: GetBarsParams): Promise<Bar[]>;

  /** Latest traded price for the symbol */
  getCurrentPrice(symbol: string): Promise<number>;

  /** True when the symbol is listed on the venue */
  validateSymbol(symbol: string): Promise<boolean>;

  /**
   * Fetches several timeframes at once. Limits map each timeframe to
   * the number of bars requested.
   */
  getBarsForTimeframes(
    symbol: string,
    limits: Partial<Record<Timeframe, number>>
  ): Promise<BarsByTimeframe>;
}
