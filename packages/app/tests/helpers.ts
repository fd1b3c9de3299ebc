/**
 * Shared fixtures for app tests
 */

import { vi } from 'vitest';
import {
  Timeframe,
  getAllTimeframes,
  type Bar,
  type BarsByTimeframe,
  type GetBarsParams,
  type MarketDataSource,
  type TimeframeZone,
  type ZoneReport,
} from '@zonescope/contracts';
import type { CommandInteraction, ReplyPayload } from '@zonescope/discord-bot-core';
import { createLogger, type Logger } from '@zonescope/logger';

export const T0 = Date.parse('2025-01-06T00:00:00Z');
export const HOUR = 60 * 60 * 1000;

export function silentLogger(): Logger {
  return createLogger({ level: 'error', console: false });
}

/**
 * Twelve hourly bars; zone detection yields resistance 104-107 and support 90-95
 */
const TWO_ZONE_ROWS: Array<[number, number, number, number]> = [
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

export const TWO_ZONE_BARS: Bar[] = TWO_ZONE_ROWS.map(([open, high, low, close], index) => ({
  openTime: T0 + index * HOUR,
  open,
  high,
  low,
  close,
  volume: 1000,
}));

export interface InMemoryMarketDataInit {
  price?: number;
  symbols?: string[];
  bars?: Partial<Record<Timeframe, Bar[]>>;
}

/**
 * In-process market data; every timeframe without explicit bars gets TWO_ZONE_BARS
 */
export class InMemoryMarketData implements MarketDataSource {
  readonly id = 'memory';
  readonly limitRequests: Array<Partial<Record<Timeframe, number>>> = [];

  private readonly price: number;
  private readonly symbols: Set<string>;
  private readonly bars: Partial<Record<Timeframe, Bar[]>>;

  constructor(init: InMemoryMarketDataInit = {}) {
    this.price = init.price ?? 100;
    this.symbols = new Set(init.symbols ?? ['VETUSDT', 'BTCUSDT']);
    this.bars = init.bars ?? {};
  }

  async getBars(params: GetBarsParams): Promise<Bar[]> {
    return (this.bars[params.timeframe] ?? TWO_ZONE_BARS).slice(-params.limit);
  }

  async getCurrentPrice(): Promise<number> {
    return this.price;
  }

  async validateSymbol(symbol: string): Promise<boolean> {
    return this.symbols.has(symbol);
  }

  async getBarsForTimeframes(
    symbol: string,
    limits: Partial<Record<Timeframe, number>>
  ): Promise<BarsByTimeframe> {
    this.limitRequests.push(limits);
    const result: BarsByTimeframe = {};
    for (const timeframe of getAllTimeframes()) {
      const limit = limits[timeframe];
      if (limit !== undefined) {
        result[timeframe] = await this.getBars({ symbol, timeframe, limit });
      }
    }
    return result;
  }
}

export function createZone(
  overrides: Partial<TimeframeZone> & Pick<TimeframeZone, 'kind' | 'low' | 'high' | 'timeframe'>
): TimeframeZone {
  return {
    originTime: T0,
    strength: 1,
    touches: 0,
    status: 'active',
    pivotIndex: 0,
    ...overrides,
  };
}

export function createReport(overrides: Partial<ZoneReport> = {}): ZoneReport {
  return {
    symbol: 'BTCUSDT',
    timeframe: Timeframe.H4,
    currentPrice: 100,
    asOf: Date.parse('2025-01-10T12:00:00Z'),
    zonesByTimeframe: {},
    nearest: { resistance: [], support: [] },
    ...overrides,
  };
}

export function createInteraction(commandName: string, id = 'interaction-1') {
  const state = { replied: false, deferred: false };

  const reply = vi.fn(async (_payload: string | ReplyPayload): Promise<unknown> => {
    state.replied = true;
    return undefined;
  });
  const followUp = vi.fn(async (_payload: string | ReplyPayload): Promise<unknown> => undefined);

  const interaction: CommandInteraction = {
    id,
    commandName,
    get replied() {
      return state.replied;
    },
    get deferred() {
      return state.deferred;
    },
    options: {
      getString: () => null,
      getBoolean: () => null,
    },
    isChatInputCommand: () => true,
    deferReply: async () => {
      state.deferred = true;
      return undefined;
    },
    reply,
    editReply: async () => undefined,
    followUp,
  };

  return { interaction, reply, followUp };
}
