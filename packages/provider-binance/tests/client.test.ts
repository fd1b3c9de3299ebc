import { describe, it, expect } from 'vitest';
import { AxiosError } from 'axios';
import { BinanceClient } from '../src/client.js';
import { ApiError, ParseError, RateLimitError } from '../src/errors.js';
import { createStubHttp, kline } from './stub-http.js';

describe('BinanceClient', () => {
  it('should request klines with symbol, interval and limit', async () => {
    const { http, calls } = createStubHttp(() => ({
      data: [kline(1000, '1', '2', '0.5', '1.5'), kline(2000, '1.5', '2.5', '1', '2')],
    }));
    const client = new BinanceClient({ httpClient: http });

    const bars = await client.getKlines('VETUSDT', '4h', 300);

    expect(calls).toEqual([{ url: '/fapi/v1/klines', params: { symbol: 'VETUSDT', interval: '4h', limit: 300 } }]);
    expect(bars.map((bar) => bar.close)).toEqual([1.5, 2]);
  });

  it('should clamp the limit to what the endpoint accepts', async () => {
    const { http, calls } = createStubHttp(() => ({ data: [] }));
    const client = new BinanceClient({ httpClient: http });

    await client.getKlines('VETUSDT', '1h', 5000);
    await client.getKlines('VETUSDT', '1h', 0);

    expect(calls.map((call) => call.params)).toEqual([
      { symbol: 'VETUSDT', interval: '1h', limit: 1500 },
      { symbol: 'VETUSDT', interval: '1h', limit: 1 },
    ]);
  });

  it('should fetch the ticker price', async () => {
    const { http, calls } = createStubHttp(() => ({ data: { symbol: 'BTCUSDT', price: '64250.10' } }));
    const client = new BinanceClient({ httpClient: http });

    await expect(client.getTickerPrice('BTCUSDT')).resolves.toBe(64250.1);
    expect(calls[0]).toEqual({ url: '/fapi/v1/ticker/price', params: { symbol: 'BTCUSDT' } });
  });

  it('should list exchange symbols', async () => {
    const { http, calls } = createStubHttp(() => ({
      data: { symbols: [{ symbol: 'BTCUSDT' }, { symbol: 'VETUSDT' }] },
    }));
    const client = new BinanceClient({ httpClient: http });

    const symbols = await client.getExchangeInfo();

    expect(symbols.map((entry) => entry.symbol)).toEqual(['BTCUSDT', 'VETUSDT']);
    expect(calls[0]?.url).toBe('/fapi/v1/exchangeInfo');
  });

  it('should raise RateLimitError with Retry-After on 429', async () => {
    const { http } = createStubHttp(() => ({
      status: 429,
      data: { code: -1003, msg: 'Too many requests.' },
      headers: { 'retry-after': '30' },
    }));
    const client = new BinanceClient({ httpClient: http });

    const error = await client.getTickerPrice('VETUSDT').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({
      code: 'PROVIDER_RATE_LIMIT',
      retryAfter: 30,
      data: { provider: 'binance', statusCode: 429, requestUrl: '/fapi/v1/ticker/price' },
    });
  });

  it('should raise ApiError with the Binance message on other statuses', async () => {
    const { http } = createStubHttp(() => ({ status: 400, data: { code: -1121, msg: 'Invalid symbol.' } }));
    const client = new BinanceClient({ httpClient: http });

    const error = await client.getKlines('NOPEUSDT', '4h', 300).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      code: 'BINANCE_API_ERROR',
      message: 'Binance API error 400: Invalid symbol.',
      statusCode: 400,
      data: { binanceCode: -1121 },
    });
  });

  it('should raise ApiError for timeouts', async () => {
    const { http } = createStubHttp(
      (config) => new AxiosError('timeout of 10000ms exceeded', AxiosError.ECONNABORTED, config)
    );
    const client = new BinanceClient({ httpClient: http });

    const error = await client.getExchangeInfo().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      message: 'Binance request failed: timeout of 10000ms exceeded',
      statusCode: undefined,
    });
  });

  it('should raise ParseError for an unexpected body', async () => {
    const { http } = createStubHttp(() => ({ data: { unexpected: true } }));
    const client = new BinanceClient({ httpClient: http });

    await expect(client.getKlines('VETUSDT', '1h', 10)).rejects.toBeInstanceOf(ParseError);
  });
});
