/**
 * Binance USDⓈ-M futures payload and configuration types.
 */

import type { AxiosInstance } from 'axios';
import type { Logger } from '@zonescope/logger';

/**
 * Kline interval codes accepted by `/fapi/v1/klines`.
 */
export type BinanceInterval = '15m' | '1h' | '4h' | '12h' | '1d';

/**
 * Entry of the `symbols` array in `/fapi/v1/exchangeInfo`.
 * Only the fields the provider reads are listed.
 */
export interface BinanceSymbolInfo {
  symbol: string;
  status?: string;
  quoteAsset?: string;
}

export interface ClientConfig {
  /** @default https://fapi.binance.com */
  baseUrl?: string;

  /** @default 10000 */
  timeoutMs?: number;

  /** Pre-configured axios instance; replaces baseUrl and timeoutMs. */
  httpClient?: AxiosInstance;

  logger?: Logger;
}

export interface BinanceProviderOptions extends ClientConfig {
  /**
   * How long the exchange symbol list is reused by validateSymbol.
   * @default 3600000 (one hour)
   */
  symbolCacheTtlMs?: number;

  /** Clock used for the symbol cache. @default Date.now */
  now?: () => number;
}
