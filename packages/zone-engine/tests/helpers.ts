/**
 * Shared bar and zone fixtures for zone-engine tests
 */

import type { Bar, Zone } from '@zonescope/contracts';

export const T0 = Date.parse('2025-01-06T00:00:00Z');
export const HOUR = 60 * 60 * 1000;

/**
 * Bar at position `index` of an hourly series
 */
export function createBar(index: number, open: number, high: number, low: number, close: number): Bar {
  return {
    openTime: T0 + index * HOUR,
    open,
    high,
    low,
    close,
    volume: 1000,
  };
}

/**
 * Series from [open, high, low, close] tuples
 */
export function createSeries(rows: Array<[number, number, number, number]>): Bar[] {
  return rows.map(([open, high, low, close], index) => createBar(index, open, high, low, close));
}

export function createZone(overrides: Partial<Zone> & Pick<Zone, 'kind' | 'low' | 'high'>): Zone {
  return {
    originTime: T0,
    strength: 1,
    touches: 0,
    status: 'active',
    pivotIndex: 0,
    ...overrides,
  };
}

/**
 * Deterministic random-walk series for property checks
 */
export function generateSeries(count: number, seed: number): Bar[] {
  let state = seed;
  const random = (): number => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };

  const bars: Bar[] = [];
  let price = 100;
  for (let i = 0; i < count; i++) {
    const open = price;
    const close = open + (random() - 0.5) * 4;
    const high = Math.max(open, close) + random() * 2;
    const low = Math.min(open, close) - random() * 2;
    bars.push(createBar(i, open, high, low, close));
    price = close;
  }
  return bars;
}

/**
 * Twelve hourly bars with a pivot-high at index 2 and a pivot-low at index 7
 */
export const TWO_PIVOT_ROWS: Array<[number, number, number, number]> = [
  [100, 101, 99, 100.5],
  [100.5, 102, 100, 101.5],
  [103, 107, 100.5, 101],
  [101, 104, 99.5, 100],
  [100, 102, 98, 99],
  [99, 100, 96, 97],
  [97, 98, 95, 96],
  [96, 97, 90, 95],
  [95, 99, 94, 98],
  [98, 102, 97, 101],
  [101, 104, 100, 103],
  [103, 105, 102, 104],
];
