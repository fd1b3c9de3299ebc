/**
 * Tests for FixtureMarketData
 */

import { describe, it, expect } from 'vitest';
import { Timeframe } from '@zonescope/contracts';
import { FixtureMarketData } from '../src/services/providers/fixture-market-data.js';

const NOW = Date.parse('2025-01-10T12:34:56Z');
const HOUR = 60 * 60 * 1000;

describe('FixtureMarketData', () => {
  const source = new FixtureMarketData({ now: () => NOW });

  it('should return the requested number of hourly bars ending at the current hour', async () => {
    const bars = await source.getBars({ symbol: 'BTCUSDT', timeframe: Timeframe.H1, limit: 50 });

    expect(bars).toHaveLength(50);
    expect(bars[49]?.openTime).toBe(Date.parse('2025-01-10T12:00:00Z'));
    expect(bars[0]?.openTime).toBe(Date.parse('2025-01-10T12:00:00Z') - 49 * HOUR);
  });

  it('should close the series at the reference price', async () => {
    const bars = await source.getBars({ symbol: 'BTCUSDT', timeframe: Timeframe.H4, limit: 300 });

    expect(bars[bars.length - 1]?.close).toBeCloseTo(64250, 6);
    await expect(source.getCurrentPrice('BTCUSDT')).resolves.toBe(64250);
  });

  it('should produce well-formed bars', async () => {
    const bars = await source.getBars({ symbol: 'VETUSDT', timeframe: Timeframe.H12, limit: 200 });

    for (const bar of bars) {
      expect(bar.high).toBeGreaterThanOrEqual(Math.max(bar.open, bar.close));
      expect(bar.low).toBeLessThanOrEqual(Math.min(bar.open, bar.close));
      expect(bar.low).toBeGreaterThan(0);
    }
  });

  it('should be deterministic', async () => {
    const params = { symbol: 'ETHUSDT', timeframe: Timeframe.H1, limit: 100 };

    expect(await source.getBars(params)).toEqual(await new FixtureMarketData({ now: () => NOW }).getBars(params));
  });

  it('should vary by timeframe', async () => {
    const hourly = await source.getBars({ symbol: 'ETHUSDT', timeframe: Timeframe.H1, limit: 10 });
    const fourHourly = await source.getBars({ symbol: 'ETHUSDT', timeframe: Timeframe.H4, limit: 10 });

    expect(hourly.map((bar) => bar.open)).not.toEqual(fourHourly.map((bar) => bar.open));
  });

  it('should return an empty series for a zero limit', async () => {
    await expect(source.getBars({ symbol: 'BTCUSDT', timeframe: Timeframe.H1, limit: 0 })).resolves.toEqual([]);
  });

  it('should list only fixture symbols', async () => {
    await expect(source.validateSymbol('BTCUSDT')).resolves.toBe(true);
    await expect(source.validateSymbol('FOOUSDT')).resolves.toBe(false);
    await expect(source.getCurrentPrice('FOOUSDT')).rejects.toThrow('No fixture price for FOOUSDT');
  });

  it('should fetch only the timeframes given limits', async () => {
    const result = await source.getBarsForTimeframes('SOLUSDT', { '1h': 10, '4h': 5 });

    expect(Object.keys(result)).toEqual(['1h', '4h']);
    expect(result['1h']).toHaveLength(10);
    expect(result['4h']).toHaveLength(5);
  });
});
