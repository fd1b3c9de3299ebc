/**
 * @zonescope/provider-binance
 *
 * Binance USDⓈ-M futures market data for zone analysis.
 */

export { BinanceProvider, DEFAULT_SYMBOL_CACHE_TTL_MS } from './provider.js';
export { BinanceClient, BINANCE_FUTURES_BASE_URL, DEFAULT_TIMEOUT_MS, MAX_KLINES_LIMIT } from './client.js';
export { parseKlines, parseTickerPrice, parseExchangeSymbols } from './parse.js';
export { normalizeSymbol, toBinanceInterval, DEFAULT_BAR_LIMITS, QUOTE_ASSET } from './symbols.js';
export {
  RateLimitError,
  ApiError,
  ParseError,
  isRateLimitError,
  isApiError,
  isParseError,
  toProviderError,
} from './errors.js';
export type { BinanceInterval, BinanceSymbolInfo, ClientConfig, BinanceProviderOptions } from './types.js';
