/**
 * Tests for free-text zone queries
 */

import { describe, it, expect } from 'vitest';
import { Timeframe } from '@zonescope/contracts';
import { parseZoneQuery } from '../src/services/zone-query.js';

describe('parseZoneQuery', () => {
  it('should read symbol and timeframe', () => {
    expect(parseZoneQuery('VET 4h', Timeframe.H1)).toEqual({ symbol: 'VET', timeframe: Timeframe.H4 });
  });

  it('should fall back to the default timeframe', () => {
    expect(parseZoneQuery('btc', Timeframe.H4)).toEqual({ symbol: 'btc', timeframe: Timeframe.H4 });
  });

  it('should accept upper-case timeframes and ignore extra tokens', () => {
    expect(parseZoneQuery('  eth   1H later ', Timeframe.H4)).toEqual({
      symbol: 'eth',
      timeframe: Timeframe.H1,
    });
  });

  it('should name the allowed timeframes when one is unknown', () => {
    expect(() => parseZoneQuery('vet 3h', Timeframe.H4)).toThrow(
      'Invalid timeframe: 3h. Must be one of: 15m, 1h, 4h, 12h, 1d'
    );
  });

  it('should reject empty input', () => {
    expect(() => parseZoneQuery('   ', Timeframe.H4)).toThrow('Usage: <symbol> [timeframe]');
  });
});
