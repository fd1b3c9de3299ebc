/**
 * MarketDataSource backed by Binance USDⓈ-M perpetual futures.
 */

import {
  getAllTimeframes,
  type Bar,
  type BarsByTimeframe,
  type GetBarsParams,
  type MarketDataSource,
  type Timeframe,
} from '@zonescope/contracts';
import { startTimer, type Logger } from '@zonescope/logger';
import { BinanceClient } from './client.js';
import { toBinanceInterval } from './symbols.js';
import type { BinanceProviderOptions } from './types.js';

export const DEFAULT_SYMBOL_CACHE_TTL_MS = 60 * 60 * 1000;

/**
 * Binance futures market data.
 *
 * Symbols are expected in canonical form (`VETUSDT`); see normalizeSymbol.
 *
 * @example
 * ```typescript
 * const provider = new BinanceProvider({ logger });
 * if (await provider.validateSymbol('VETUSDT')) {
 *   const series = await provider.getBarsForTimeframes('VETUSDT', { '1h': 500, '4h': 300 });
 * }
 * ```
 */
export class BinanceProvider implements MarketDataSource {
  readonly id = 'binance';

  private readonly client: BinanceClient;
  private readonly logger?: Logger;
  private readonly symbolCacheTtlMs: number;
  private readonly now: () => number;

  private symbolCache: { symbols: ReadonlySet<string>; fetchedAt: number } | null = null;
  private symbolRequest: Promise<ReadonlySet<string>> | null = null;

  constructor(options: BinanceProviderOptions = {}) {
    this.logger = options.logger?.child({ component: 'provider', provider: 'binance' });
    this.client = new BinanceClient({ ...options, logger: this.logger });
    this.symbolCacheTtlMs = options.symbolCacheTtlMs ?? DEFAULT_SYMBOL_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  async getBars(params: GetBarsParams): Promise<Bar[]> {
    const timer = startTimer();
    const bars = await this.client.getKlines(params.symbol, toBinanceInterval(params.timeframe), params.limit);

    this.logger?.debug('Bars fetched', {
      symbol: params.symbol,
      timeframe: params.timeframe,
      bar_count: bars.length,
      duration_ms: timer.stop(),
    });
    return bars;
  }

  async getCurrentPrice(symbol: string): Promise<number> {
    return this.client.getTickerPrice(symbol);
  }

  /**
   * True when the exchange lists `symbol`. The symbol list is cached
   * for `symbolCacheTtlMs`; concurrent callers share one request.
   */
  async validateSymbol(symbol: string): Promise<boolean> {
    const symbols = await this.getListedSymbols();
    return symbols.has(symbol);
  }

  /**
   * Fetches every timeframe in `limits` concurrently.
   *
   * A timeframe whose request fails is logged and returned as an empty
   * series so the remaining timeframes can still be analysed.
   */
  async getBarsForTimeframes(
    symbol: string,
    limits: Partial<Record<Timeframe, number>>
  ): Promise<BarsByTimeframe> {
    const requested = getAllTimeframes().flatMap((timeframe) => {
      const limit = limits[timeframe];
      return limit === undefined ? [] : [{ timeframe, limit }];
    });

    const series = await Promise.all(
      requested.map(async ({ timeframe, limit }) => {
        try {
          return { timeframe, bars: await this.getBars({ symbol, timeframe, limit }) };
        } catch (error) {
          this.logger?.warn('Timeframe fetch failed, continuing without it', {
            symbol,
            timeframe,
            error: error instanceof Error ? error.message : String(error),
          });
          return { timeframe, bars: [] };
        }
      })
    );

    const result: BarsByTimeframe = {};
    for (const { timeframe, bars } of series) {
      result[timeframe] = bars;
    }
    return result;
  }

  private async getListedSymbols(): Promise<ReadonlySet<string>> {
    const cached = this.symbolCache;
    if (cached && this.now() - cached.fetchedAt < this.symbolCacheTtlMs) {
      return cached.symbols;
    }

    const request =
      this.symbolRequest ??
      this.fetchListedSymbols().finally(() => {
        this.symbolRequest = null;
      });
    this.symbolRequest = request;
    return request;
  }

  private async fetchListedSymbols(): Promise<ReadonlySet<string>> {
    const info = await this.client.getExchangeInfo();
    const symbols = new Set(info.map((entry) => entry.symbol));

    this.symbolCache = { symbols, fetchedAt: this.now() };
    this.logger?.debug('Exchange symbols refreshed', { count: symbols.size });
    return symbols;
  }
}
