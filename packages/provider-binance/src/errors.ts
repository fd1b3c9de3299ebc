/**
 * Error classes for the Binance provider.
 */

import axios from 'axios';
import { ZoneScopeError, ProviderRateLimitError } from '@zonescope/contracts';

/**
 * Thrown on HTTP 429, or 418 once Binance has banned the caller's IP.
 *
 * @example
 * ```typescript
 * catch (err) {
 *   if (isRateLimitError(err) && err.retryAfter !== undefined) {
 *     await sleep(err.retryAfter * 1000);
 *   }
 * }
 * ```
 */
export class RateLimitError extends ProviderRateLimitError {
  /** Seconds from the Retry-After header */
  readonly retryAfter?: number;

  constructor(data: { statusCode: number; retryAfter?: number; requestUrl?: string }) {
    super(
      data.statusCode === 418 ? 'Binance IP ban in effect' : 'Binance rate limit exceeded',
      {
        provider: 'binance',
        limitType: data.statusCode === 418 ? 'ip_ban' : 'request_weight',
        ...data,
      }
    );
    this.name = 'RateLimitError';
    this.retryAfter = data.retryAfter;
  }
}

/**
 * Non-2xx response, network failure or timeout.
 */
export class ApiError extends ZoneScopeError {
  /** Absent for network failures and timeouts */
  readonly statusCode?: number;

  constructor(
    message: string,
    data: {
      statusCode?: number;
      statusText?: string;
      requestUrl?: string;
      /** Binance error code from the response body, e.g. -1121 */
      binanceCode?: number;
      [key: string]: unknown;
    }
  ) {
    super('BINANCE_API_ERROR', message, data);
    this.name = 'ApiError';
    this.statusCode = data.statusCode;
  }
}

/**
 * Response body did not have the expected shape.
 */
export class ParseError extends ZoneScopeError {
  constructor(message: string, data?: { field?: string; [key: string]: unknown }) {
    super('BINANCE_PARSE_ERROR', message, data);
    this.name = 'ParseError';
  }
}

export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError;
}

function parseRetryAfter(value: unknown): number | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * Reads `{ code, msg }` from a Binance error body.
 */
function readErrorBody(body: unknown): { code?: number; msg?: string } {
  if (body === null || typeof body !== 'object') {
    return {};
  }
  const code: unknown = Reflect.get(body, 'code');
  const msg: unknown = Reflect.get(body, 'msg');
  return {
    code: typeof code === 'number' ? code : undefined,
    msg: typeof msg === 'string' ? msg : undefined,
  };
}

/**
 * Maps a failed request to RateLimitError or ApiError.
 * Errors already raised by this package pass through.
 */
export function toProviderError(error: unknown, requestUrl: string): ZoneScopeError {
  if (error instanceof ZoneScopeError) {
    return error;
  }

  if (!axios.isAxiosError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return new ApiError(`Binance request failed: ${message}`, { requestUrl });
  }

  const response = error.response;
  if (!response) {
    return new ApiError(`Binance request failed: ${error.message}`, {
      requestUrl,
      errorCode: error.code,
    });
  }

  const statusCode = response.status;
  if (statusCode === 429 || statusCode === 418) {
    return new RateLimitError({
      statusCode,
      retryAfter: parseRetryAfter(response.headers['retry-after']),
      requestUrl,
    });
  }

  const body = readErrorBody(response.data);
  return new ApiError(`Binance API error ${statusCode}: ${body.msg ?? response.statusText}`, {
    statusCode,
    statusText: response.statusText,
    requestUrl,
    binanceCode: body.code,
  });
}
