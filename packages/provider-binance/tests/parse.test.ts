import { describe, it, expect } from 'vitest';
import { parseKlines, parseTickerPrice, parseExchangeSymbols } from '../src/parse.js';
import { ParseError } from '../src/errors.js';
import { kline } from './stub-http.js';

describe('parseKlines', () => {
  it('should convert decimal strings to numbers', () => {
    const bars = parseKlines([kline(1_736_121_600_000, '0.04510', '0.0460', '0.0448', '0.0455', '1200345')]);

    expect(bars).toEqual([
      { openTime: 1_736_121_600_000, open: 0.0451, high: 0.046, low: 0.0448, close: 0.0455, volume: 1_200_345 },
    ]);
  });

  it('should order by open time and keep the last duplicate', () => {
    const bars = parseKlines([
      kline(2000, '1.5', '2', '1', '1.8', '10'),
      kline(1000, '1', '1.6', '0.9', '1.5', '20'),
      kline(2000, '1.5', '2.1', '1', '1.9', '11'),
    ]);

    expect(bars).toEqual([
      { openTime: 1000, open: 1, high: 1.6, low: 0.9, close: 1.5, volume: 20 },
      { openTime: 2000, open: 1.5, high: 2.1, low: 1, close: 1.9, volume: 11 },
    ]);
  });

  it('should accept an empty array', () => {
    expect(parseKlines([])).toEqual([]);
  });

  it('should reject an error body', () => {
    expect(() => parseKlines({ code: -1121, msg: 'Invalid symbol.' })).toThrow(ParseError);
  });

  it('should name the offending field for a non-numeric price', () => {
    try {
      parseKlines([kline(1000, 'abc', '1', '1', '1')]);
      expect.unreachable('parseKlines should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      expect(error).toMatchObject({
        code: 'BINANCE_PARSE_ERROR',
        message: 'Malformed klines response (0.1: expected a decimal, got "abc")',
        data: { field: '0.1' },
      });
    }
  });

  it('should reject empty strings and truncated tuples', () => {
    expect(() => parseKlines([kline(1000, '', '1', '1', '1')])).toThrow(ParseError);
    expect(() => parseKlines([[1000, '1', '1']])).toThrow(ParseError);
  });
});

describe('parseTickerPrice', () => {
  it('should return the price as a number', () => {
    expect(parseTickerPrice({ symbol: 'VETUSDT', price: '0.04512', time: 1_736_121_600_000 })).toBe(0.04512);
  });

  it('should reject a payload without price', () => {
    expect(() => parseTickerPrice({ symbol: 'VETUSDT' })).toThrow(ParseError);
  });
});

describe('parseExchangeSymbols', () => {
  it('should keep only the fields the provider reads', () => {
    const symbols = parseExchangeSymbols({
      timezone: 'UTC',
      symbols: [
        { symbol: 'BTCUSDT', status: 'TRADING', quoteAsset: 'USDT', contractType: 'PERPETUAL' },
        { symbol: 'VETUSDT' },
      ],
    });

    expect(symbols).toEqual([
      { symbol: 'BTCUSDT', status: 'TRADING', quoteAsset: 'USDT' },
      { symbol: 'VETUSDT' },
    ]);
  });

  it('should reject a payload without a symbol list', () => {
    expect(() => parseExchangeSymbols({ timezone: 'UTC' })).toThrow(ParseError);
  });
});
