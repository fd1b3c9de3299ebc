/**
 * Free-text zone queries (`VET 4h`, `btc`)
 */

import { parseTimeframe, type Timeframe } from '@zonescope/contracts';

export interface ZoneQuery {
  symbol: string;
  timeframe: Timeframe;
}

/**
 * Parses `<symbol> [timeframe]`. Tokens after the timeframe are ignored.
 *
 * @throws Error when the text is empty or the timeframe is unknown
 *
 * @example
 * ```typescript
 * parseZoneQuery('vet 1H', Timeframe.H4) // { symbol: 'vet', timeframe: '1h' }
 * ```
 */
export function parseZoneQuery(text: string, defaultTimeframe: Timeframe): ZoneQuery {
  const [symbol, timeframe] = text.trim().split(/\s+/).filter((token) => token.length > 0);

  if (symbol === undefined) {
    throw new Error('Usage: <symbol> [timeframe], e.g. "VET 4h"');
  }

  return {
    symbol,
    timeframe: timeframe === undefined ? defaultTimeframe : parseTimeframe(timeframe),
  };
}
