/**
 * HTTP client for the Binance USDⓈ-M futures REST API.
 */

import axios, { type AxiosInstance } from 'axios';
import type { Bar } from '@zonescope/contracts';
import type { Logger } from '@zonescope/logger';
import { toProviderError } from './errors.js';
import { parseKlines, parseTickerPrice, parseExchangeSymbols } from './parse.js';
import type { BinanceInterval, BinanceSymbolInfo, ClientConfig } from './types.js';

export const BINANCE_FUTURES_BASE_URL = 'https://fapi.binance.com';
export const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Largest `limit` accepted by the klines endpoint.
 */
export const MAX_KLINES_LIMIT = 1500;

/**
 * Thin wrapper over the three public endpoints the analysis needs.
 * Every method either resolves with parsed data or rejects with a
 * RateLimitError, ApiError or ParseError.
 *
 * @example
 * ```typescript
 * const client = new BinanceClient();
 * const bars = await client.getKlines('VETUSDT', '4h', 300);
 * ```
 */
export class BinanceClient {
  private readonly http: AxiosInstance;
  private readonly logger?: Logger;

  constructor(config: ClientConfig = {}) {
    this.http =
      config.httpClient ??
      axios.create({
        baseURL: config.baseUrl ?? BINANCE_FUTURES_BASE_URL,
        timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      });
    this.logger = config.logger;
  }

  /**
   * Most recent `limit` klines, oldest first. The last one may still be open.
   */
  async getKlines(symbol: string, interval: BinanceInterval, limit: number): Promise<Bar[]> {
    const boundedLimit = Math.min(Math.max(Math.floor(limit), 1), MAX_KLINES_LIMIT);
    const payload = await this.request('/fapi/v1/klines', { symbol, interval, limit: boundedLimit });
    return parseKlines(payload);
  }

  async getTickerPrice(symbol: string): Promise<number> {
    const payload = await this.request('/fapi/v1/ticker/price', { symbol });
    return parseTickerPrice(payload);
  }

  async getExchangeInfo(): Promise<BinanceSymbolInfo[]> {
    const payload = await this.request('/fapi/v1/exchangeInfo');
    return parseExchangeSymbols(payload);
  }

  private async request(path: string, params?: Record<string, string | number>): Promise<unknown> {
    this.logger?.debug('Binance API request', { path, params });

    try {
      const response = await this.http.get<unknown>(path, { params });
      return response.data;
    } catch (error) {
      const mapped = toProviderError(error, path);
      this.logger?.warn('Binance API request failed', {
        path,
        error_code: mapped.code,
        error: mapped.message,
      });
      throw mapped;
    }
  }
}
