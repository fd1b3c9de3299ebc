/**
 * @fileoverview Millisecond timers for `duration_ms` log fields.
 */

export interface PerfTimer {
  readonly startTime: number;

  /** Milliseconds since start, rounded; frozen once stopped. */
  elapsed(): number;

  /** Stops the timer. Repeated calls return the same duration. */
  stop(): number;

  isRunning(): boolean;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * const bars = await source.getBars(params);
 * logger.info('Bars fetched', { bar_count: bars.length, duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,
    elapsed: () => Math.round((endTime ?? performance.now()) - startTime),
    stop: () => {
      endTime ??= performance.now();
      return Math.round(endTime - startTime);
    },
    isRunning: () => endTime === null,
  };
}

/**
 * Awaits `fn` and reports how long it took. A rejection propagates unchanged.
 */
export async function measureAsync<T>(fn: () => Promise<T>): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
