/**
 * @fileoverview Error taxonomy for zonescope.
 *
 * Structured error classes with machine-readable codes and contextual
 * data. All errors extend ZoneScopeError.
 *
 * @module @zonescope/contracts/errors
 */

import type { Timeframe } from './timeframes.js';

/**
 * Base error class for all zonescope errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new ZoneScopeError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class ZoneScopeError extends Error {
  /** Machine-readable error code (e.g. 'PROVIDER_RATE_LIMIT') */
  readonly code: string;

  /** Structured context for debugging and retry logic */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'ZoneScopeError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
  }

  /**
   * Serializes error to JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when a data provider's rate limit is exceeded.
 *
 * Indicates temporary throttling; caller should back off for
 * `data.retryAfter` seconds when present.
 */
export class ProviderRateLimitError extends ZoneScopeError {
  constructor(
    message: string,
    data: {
      provider: string;
      retryAfter?: number;
      limitType?: string;
      [key: string]: unknown;
    }
  ) {
    super('PROVIDER_RATE_LIMIT', message, data);
    this.name = 'ProviderRateLimitError';
  }
}

/**
 * Thrown when no bars are available for the timeframe being analysed.
 *
 * @example
 * ```typescript
 * throw new InsufficientBarsError('No 4h bars for VETUSDT', {
 *   required: 5,
 *   received: 0,
 *   symbol: 'VETUSDT',
 *   timeframe: Timeframe.H4
 * });
 * ```
 */
export class InsufficientBarsError extends ZoneScopeError {
  constructor(
    message: string,
    data: {
      required: number;
      received: number;
      symbol: string;
      timeframe: Timeframe;
      [key: string]: unknown;
    }
  ) {
    super('INSUFFICIENT_BARS', message, data);
    this.name = 'InsufficientBarsError';
  }
}

/**
 * Thrown when a symbol is not listed by the provider.
 */
export class SymbolResolutionError extends ZoneScopeError {
  constructor(
    message: string,
    data: {
      symbol: string;
      provider: string;
      suggestion?: string;
      [key: string]: unknown;
    }
  ) {
    super('SYMBOL_RESOLUTION', message, data);
    this.name = 'SymbolResolutionError';
  }
}

export function isZoneScopeError(error: unknown): error is ZoneScopeError {
  return error instanceof ZoneScopeError;
}

export function isProviderRateLimitError(error: unknown): error is ProviderRateLimitError {
  return error instanceof ProviderRateLimitError;
}

export function isInsufficientBarsError(error: unknown): error is InsufficientBarsError {
  return error instanceof InsufficientBarsError;
}

export function isSymbolResolutionError(error: unknown): error is SymbolResolutionError {
  return error instanceof SymbolResolutionError;
}
