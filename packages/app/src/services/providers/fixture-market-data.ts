/**
 * Fixture-based market data for dry runs and tests
 *
 * Bars are a seeded random walk per symbol and timeframe, rescaled so
 * every series closes at the symbol's reference price. The same symbol,
 * timeframe, limit and clock always give the same bars.
 */

import {
  getAllTimeframes,
  timeframeToMs,
  type Bar,
  type BarsByTimeframe,
  type GetBarsParams,
  type MarketDataSource,
  type Timeframe,
} from '@zonescope/contracts';
import type { Logger } from '@zonescope/logger';

/** Reference prices of the listed fixture symbols */
export const FIXTURE_PRICES: Readonly<Record<string, number>> = {
  BTCUSDT: 64250,
  ETHUSDT: 3150,
  SOLUSDT: 145.5,
  VETUSDT: 0.0412,
  DOGEUSDT: 0.1235,
};

export interface FixtureMarketDataConfig {
  logger?: Logger;
  prices?: Readonly<Record<string, number>>;
  now?: () => number;
}

export class FixtureMarketData implements MarketDataSource {
  readonly id = 'fixture';

  private readonly logger?: Logger;
  private readonly prices: Readonly<Record<string, number>>;
  private readonly now: () => number;

  constructor(config: FixtureMarketDataConfig = {}) {
    this.logger = config.logger;
    this.prices = config.prices ?? FIXTURE_PRICES;
    this.now = config.now ?? Date.now;
  }

  async getBars(params: GetBarsParams): Promise<Bar[]> {
    const bars = this.generateBars(params);
    this.logger?.debug('Fixture bars generated', {
      symbol: params.symbol,
      timeframe: params.timeframe,
      bar_count: bars.length,
    });
    return bars;
  }

  async getCurrentPrice(symbol: string): Promise<number> {
    return this.referencePrice(symbol);
  }

  async validateSymbol(symbol: string): Promise<boolean> {
    return symbol in this.prices;
  }

  async getBarsForTimeframes(
    symbol: string,
    limits: Partial<Record<Timeframe, number>>
  ): Promise<BarsByTimeframe> {
    const result: BarsByTimeframe = {};
    for (const timeframe of getAllTimeframes()) {
      const limit = limits[timeframe];
      if (limit === undefined) continue;
      result[timeframe] = await this.getBars({ symbol, timeframe, limit });
    }
    return result;
  }

  private referencePrice(symbol: string): number {
    const price = this.prices[symbol];
    if (price === undefined) {
      throw new Error(`No fixture price for ${symbol}`);
    }
    return price;
  }

  private generateBars({ symbol, timeframe, limit }: GetBarsParams): Bar[] {
    const target = this.referencePrice(symbol);
    const count = Math.max(0, Math.floor(limit));
    const random = createRandom(hashSeed(`${symbol}:${timeframe}`));
    const intervalMs = timeframeToMs(timeframe);
    const lastOpen = Math.floor(this.now() / intervalMs) * intervalMs;

    const raw: Array<Omit<Bar, 'openTime'>> = [];
    let price = 100;
    for (let i = 0; i < count; i++) {
      const open = price;
      const changePct = Math.sin(i / 12) * 0.6 + (random() - 0.5) * 3;
      const close = open * (1 + changePct / 100);
      const high = Math.max(open, close) * (1 + random() * 0.015);
      const low = Math.min(open, close) * (1 - random() * 0.015);
      raw.push({ open, high, low, close, volume: Math.floor(1000 + random() * 9000) });
      price = close;
    }

    const last = raw[raw.length - 1];
    const scale = last ? target / last.close : 1;

    return raw.map((bar, i) => ({
      openTime: lastOpen - (count - 1 - i) * intervalMs,
      open: bar.open * scale,
      high: bar.high * scale,
      low: bar.low * scale,
      close: bar.close * scale,
      volume: bar.volume,
    }));
  }
}

function hashSeed(text: string): number {
  let hash = 2166136261;
  for (let i = 0; i < text.length; i++) {
    hash = Math.imul(hash ^ text.charCodeAt(i), 16777619) >>> 0;
  }
  return hash;
}

function createRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}
