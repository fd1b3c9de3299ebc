/**
 * @fileoverview Timeframe enumeration and utilities for zonescope.
 *
 * Values match the Binance kline interval strings so a timeframe can be
 * passed to the exchange API without translation.
 *
 * @module @zonescope/contracts/timeframes
 */

/**
 * Supported bar timeframes, ordered from smallest to largest duration.
 */
export enum Timeframe {
  /** 15-minute bars */
  M15 = '15m',
  /** 1-hour bars */
  H1 = '1h',
  /** 4-hour bars - default analysis timeframe */
  H4 = '4h',
  /** 12-hour bars */
  H12 = '12h',
  /** Daily bars */
  D1 = '1d',
}

const MINUTE_MS = 60_000;

const TIMEFRAME_MS: Record<Timeframe, number> = {
  [Timeframe.M15]: 15 * MINUTE_MS,
  [Timeframe.H1]: 60 * MINUTE_MS,
  [Timeframe.H4]: 240 * MINUTE_MS,
  [Timeframe.H12]: 720 * MINUTE_MS,
  [Timeframe.D1]: 1440 * MINUTE_MS,
};

const TIMEFRAME_LABELS: Record<Timeframe, string> = {
  [Timeframe.M15]: '15 Minutes',
  [Timeframe.H1]: '1 Hour',
  [Timeframe.H4]: '4 Hours',
  [Timeframe.H12]: '12 Hours',
  [Timeframe.D1]: 'Daily',
};

const TIMEFRAME_ORDER: readonly Timeframe[] = [
  Timeframe.M15,
  Timeframe.H1,
  Timeframe.H4,
  Timeframe.H12,
  Timeframe.D1,
];

/**
 * Validates whether a string is a valid Timeframe enum value.
 *
 * @example
 * ```typescript
 * isValidTimeframe('4h')   // true
 * isValidTimeframe('3h')   // false
 * ```
 */
export function isValidTimeframe(value: string): value is Timeframe {
  return TIMEFRAME_ORDER.some((timeframe) => timeframe === value);
}

/**
 * Duration of one bar in milliseconds.
 */
export function timeframeToMs(timeframe: Timeframe): number {
  return TIMEFRAME_MS[timeframe];
}

/**
 * Gets human-readable label for a timeframe.
 *
 * @example
 * ```typescript
 * getTimeframeLabel(Timeframe.H12)  // '12 Hours'
 * ```
 */
export function getTimeframeLabel(timeframe: Timeframe): string {
  return TIMEFRAME_LABELS[timeframe];
}

/**
 * Compares two timeframes by duration.
 *
 * @returns Negative if a < b, positive if a > b, zero if equal
 */
export function compareTimeframes(a: Timeframe, b: Timeframe): number {
  return TIMEFRAME_ORDER.indexOf(a) - TIMEFRAME_ORDER.indexOf(b);
}

/**
 * Parses a string into a Timeframe, throwing if invalid.
 * Matching is case-insensitive (`'4H'` parses as `Timeframe.H4`).
 *
 * @throws {Error} If value is not a valid timeframe
 */
export function parseTimeframe(value: string): Timeframe {
  const normalized = value.trim().toLowerCase();
  if (!isValidTimeframe(normalized)) {
    throw new Error(
      `Invalid timeframe: ${value}. Must be one of: ${TIMEFRAME_ORDER.join(', ')}`
    );
  }
  return normalized;
}

/**
 * Returns all supported timeframes in ascending order.
 */
export function getAllTimeframes(): Timeframe[] {
  return [...TIMEFRAME_ORDER];
}
