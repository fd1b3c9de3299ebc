/**
 * Parsing of Binance futures responses into canonical values.
 *
 * Binance encodes prices and volumes as decimal strings; these are
 * converted to numbers and rejected when they are not finite.
 */

import { z } from 'zod';
import type { Bar } from '@zonescope/contracts';
import { ParseError } from './errors.js';
import type { BinanceSymbolInfo } from './types.js';

const decimal = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const parsed = typeof value === 'number' ? value : Number(value);
  if ((typeof value === 'string' && value.trim() === '') || !Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a decimal, got ${JSON.stringify(value)}` });
    return z.NEVER;
  }
  return parsed;
});

/**
 * `[openTime, open, high, low, close, volume, closeTime, ...]`
 */
const klineSchema = z
  .tuple([z.number().int().nonnegative(), decimal, decimal, decimal, decimal, decimal])
  .rest(z.unknown());

const klinesSchema = z.array(klineSchema);

const tickerPriceSchema = z.object({
  symbol: z.string(),
  price: decimal,
});

const exchangeInfoSchema = z.object({
  symbols: z.array(
    z.object({
      symbol: z.string(),
      status: z.string().optional(),
      quoteAsset: z.string().optional(),
    })
  ),
});

function toParseError(what: string, error: z.ZodError): ParseError {
  const [issue] = error.issues;
  const field = issue ? issue.path.join('.') : '';
  const detail = issue ? `${field || '(root)'}: ${issue.message}` : error.message;

  return new ParseError(`Malformed ${what} response (${detail})`, {
    field,
    issueCount: error.issues.length,
  });
}

/**
 * Parses a `/fapi/v1/klines` payload.
 *
 * The result is ordered by openTime ascending with duplicate openTimes
 * removed (the last one wins).
 *
 * @throws ParseError if the payload is not an array of kline tuples
 *
 * @example
 * ```typescript
 * parseKlines([[1736121600000, '0.0451', '0.0460', '0.0448', '0.0455', '1200345', 1736125199999]]);
 * // [{ openTime: 1736121600000, open: 0.0451, high: 0.046, low: 0.0448, close: 0.0455, volume: 1200345 }]
 * ```
 */
export function parseKlines(payload: unknown): Bar[] {
  const result = klinesSchema.safeParse(payload);
  if (!result.success) {
    throw toParseError('klines', result.error);
  }

  const byOpenTime = new Map<number, Bar>();
  for (const [openTime, open, high, low, close, volume] of result.data) {
    byOpenTime.set(openTime, { openTime, open, high, low, close, volume });
  }

  return [...byOpenTime.values()].sort((a, b) => a.openTime - b.openTime);
}

/**
 * Parses a `/fapi/v1/ticker/price` payload for a single symbol.
 */
export function parseTickerPrice(payload: unknown): number {
  const result = tickerPriceSchema.safeParse(payload);
  if (!result.success) {
    throw toParseError('ticker price', result.error);
  }
  return result.data.price;
}

/**
 * Parses the symbol list of a `/fapi/v1/exchangeInfo` payload.
 */
export function parseExchangeSymbols(payload: unknown): BinanceSymbolInfo[] {
  const result = exchangeInfoSchema.safeParse(payload);
  if (!result.success) {
    throw toParseError('exchange info', result.error);
  }
  return result.data.symbols;
}
