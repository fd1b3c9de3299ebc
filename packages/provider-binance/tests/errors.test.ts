import { describe, it, expect } from 'vitest';
import { AxiosError, AxiosHeaders, type AxiosResponse } from 'axios';
import { ZoneScopeError, isProviderRateLimitError } from '@zonescope/contracts';
import { toProviderError, RateLimitError, ApiError, isRateLimitError, isApiError } from '../src/errors.js';

function responseError(status: number, statusText: string, data: unknown, headers: Record<string, string> = {}): AxiosError {
  const config = { headers: new AxiosHeaders() };
  const response: AxiosResponse<unknown> = { data, status, statusText, headers, config };
  return new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, undefined, response);
}

describe('toProviderError', () => {
  it('should map 418 to an IP ban rate limit', () => {
    const error = toProviderError(responseError(418, "I'm a teapot", {}, { 'retry-after': '120' }), '/fapi/v1/klines');

    expect(isRateLimitError(error)).toBe(true);
    expect(isProviderRateLimitError(error)).toBe(true);
    expect(error.message).toBe('Binance IP ban in effect');
    expect(error.data).toMatchObject({ limitType: 'ip_ban', retryAfter: 120 });
  });

  it('should ignore an unusable Retry-After header', () => {
    const error = toProviderError(responseError(429, 'Too Many Requests', {}, { 'retry-after': 'soon' }), '/fapi/v1/klines');

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfter: undefined });
  });

  it('should fall back to the status text without a Binance body', () => {
    const error = toProviderError(responseError(500, 'Internal Server Error', ''), '/fapi/v1/ticker/price');

    expect(isApiError(error)).toBe(true);
    expect(error.message).toBe('Binance API error 500: Internal Server Error');
  });

  it('should wrap non-axios failures', () => {
    const error = toProviderError(new TypeError('socket closed'), '/fapi/v1/klines');

    expect(error).toBeInstanceOf(ApiError);
    expect(error.message).toBe('Binance request failed: socket closed');
  });

  it('should pass structured errors through', () => {
    const original = new ZoneScopeError('CUSTOM', 'already mapped');

    expect(toProviderError(original, '/fapi/v1/klines')).toBe(original);
  });
});
