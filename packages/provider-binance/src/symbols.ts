/**
 * Symbol and timeframe mapping for Binance futures.
 */

import { Timeframe } from '@zonescope/contracts';
import type { BinanceInterval } from './types.js';

export const QUOTE_ASSET = 'USDT';

/**
 * Canonical instrument name for user input.
 *
 * @example
 * ```typescript
 * normalizeSymbol(' vet ');    // 'VETUSDT'
 * normalizeSymbol('BTCUSDT');  // 'BTCUSDT'
 * ```
 */
export function normalizeSymbol(raw: string): string {
  const symbol = raw.trim().toUpperCase();
  return symbol.endsWith(QUOTE_ASSET) ? symbol : `${symbol}${QUOTE_ASSET}`;
}

const INTERVALS: Record<Timeframe, BinanceInterval> = {
  [Timeframe.M15]: '15m',
  [Timeframe.H1]: '1h',
  [Timeframe.H4]: '4h',
  [Timeframe.H12]: '12h',
  [Timeframe.D1]: '1d',
};

export function toBinanceInterval(timeframe: Timeframe): BinanceInterval {
  return INTERVALS[timeframe];
}

/**
 * Bars requested per timeframe when the caller gives no limit.
 */
export const DEFAULT_BAR_LIMITS: Readonly<Record<Timeframe, number>> = {
  [Timeframe.M15]: 500,
  [Timeframe.H1]: 500,
  [Timeframe.H4]: 300,
  [Timeframe.H12]: 200,
  [Timeframe.D1]: 200,
};
