/**
 * Nearest zone selection tests
 */

import { describe, it, expect } from 'vitest';
import { Timeframe, type TimeframeZone, type ZoneKind } from '@zonescope/contracts';
import { selectNearestZones } from '../src/nearest.js';
import { createZone } from './helpers.js';

function zone(kind: ZoneKind, low: number, high: number, timeframe = Timeframe.H4): TimeframeZone {
  return { ...createZone({ kind, low, high }), timeframe };
}

describe('selectNearestZones', () => {
  it('should keep the three closest resistance zones above price', () => {
    const zones = [
      zone('resistance', 60, 61),
      zone('resistance', 52, 53),
      zone('resistance', 70, 71),
      zone('resistance', 55, 56),
    ];

    const { resistance } = selectNearestZones(zones, 50, { maxResistance: 3 });

    expect(resistance.map((z) => z.low)).toEqual([52, 55, 60]);
  });

  it('should order support by descending high and cap at four by default', () => {
    const zones = [
      zone('support', 47, 48),
      zone('support', 44, 45),
      zone('support', 48.5, 49),
      zone('support', 39, 40),
      zone('support', 29, 30),
    ];

    const { support } = selectNearestZones(zones, 50);

    expect(support.map((z) => z.high)).toEqual([49, 48, 45, 40]);
  });

  it('should include zones that contain the price on their own side', () => {
    const zones = [
      zone('resistance', 49, 51),
      zone('resistance', 53, 54),
      zone('support', 49.5, 50.5),
      zone('support', 45, 46),
    ];

    const { resistance, support } = selectNearestZones(zones, 50);

    expect(resistance.map((z) => z.low)).toEqual([49, 53]);
    expect(support.map((z) => z.high)).toEqual([50.5, 46]);
  });

  it('should include a zone whose near edge equals the price', () => {
    const zones = [zone('resistance', 50, 51), zone('support', 49, 50)];

    const { resistance, support } = selectNearestZones(zones, 50);

    expect(resistance).toHaveLength(1);
    expect(support).toHaveLength(1);
  });

  it('should exclude zones on the wrong side of price', () => {
    const zones = [zone('resistance', 40, 45), zone('support', 55, 60)];

    expect(selectNearestZones(zones, 50)).toEqual({ resistance: [], support: [] });
  });

  it('should treat zero and negative caps as empty', () => {
    const zones = [zone('resistance', 52, 53), zone('support', 45, 46)];

    expect(selectNearestZones(zones, 50, { maxResistance: 0, maxSupport: -1 })).toEqual({
      resistance: [],
      support: [],
    });
  });

  it('should keep the timeframe tag on pooled zones', () => {
    const zones = [zone('resistance', 55, 56, Timeframe.H12), zone('resistance', 52, 53, Timeframe.H1)];

    const { resistance } = selectNearestZones(zones, 50);

    expect(resistance.map((z) => z.timeframe)).toEqual([Timeframe.H1, Timeframe.H12]);
  });
});
