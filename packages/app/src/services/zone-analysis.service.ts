/**
 * Zone analysis service
 *
 * Runs zone detection over several timeframes for one symbol and keeps
 * the zones nearest to the current price.
 */

import {
  InsufficientBarsError,
  SymbolResolutionError,
  getAllTimeframes,
  type MarketDataSource,
  type Timeframe,
  type ZoneReport,
  type ZoneRequest,
} from '@zonescope/contracts';
import { detectZonesMultiTimeframe, poolZones, selectNearestZones } from '@zonescope/zone-engine';
import { DEFAULT_BAR_LIMITS, normalizeSymbol } from '@zonescope/provider-binance';
import { createChildLogger, startTimer, type Logger } from '@zonescope/logger';
import type { AnalysisConfig } from '../config/index.js';

export interface ZoneAnalysisServiceConfig {
  source: MarketDataSource;
  analysis: AnalysisConfig;
  logger: Logger;
  /** Clock for `asOf` when the request gives none */
  now?: () => number;
}

export class ZoneAnalysisService {
  private readonly source: MarketDataSource;
  private readonly analysis: AnalysisConfig;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(config: ZoneAnalysisServiceConfig) {
    this.source = config.source;
    this.analysis = config.analysis;
    this.logger = createChildLogger(config.logger, { component: 'zone-analysis' });
    this.now = config.now ?? Date.now;
  }

  /**
   * @throws SymbolResolutionError when the symbol is empty or not listed
   * @throws InsufficientBarsError when the requested timeframe has no bars
   */
  async analyze(request: ZoneRequest): Promise<ZoneReport> {
    const timer = startTimer();
    const timeframe = request.timeframe ?? this.analysis.defaultTimeframe;

    if (request.symbol.trim() === '') {
      throw new SymbolResolutionError('Symbol is required', {
        symbol: request.symbol,
        provider: this.source.id,
      });
    }
    const symbol = normalizeSymbol(request.symbol);

    if (!(await this.source.validateSymbol(symbol))) {
      throw new SymbolResolutionError(`Symbol ${symbol} is not listed on ${this.source.id}`, {
        symbol,
        provider: this.source.id,
      });
    }

    const [currentPrice, barsByTimeframe] = await Promise.all([
      this.source.getCurrentPrice(symbol),
      this.source.getBarsForTimeframes(symbol, this.barLimits(timeframe)),
    ]);

    const received = barsByTimeframe[timeframe]?.length ?? 0;
    if (received === 0) {
      throw new InsufficientBarsError(`No ${timeframe} bars available for ${symbol}`, {
        required: 1,
        received,
        symbol,
        timeframe,
      });
    }

    const zonesByTimeframe = detectZonesMultiTimeframe(barsByTimeframe, {
      mergeThresholdPct: this.analysis.mergeThresholdPct,
    });
    const pooled = poolZones(zonesByTimeframe);
    const nearest = selectNearestZones(pooled, currentPrice, {
      maxResistance: this.analysis.maxResistanceZones,
      maxSupport: this.analysis.maxSupportZones,
    });

    this.logger.info('Zone analysis complete', {
      symbol,
      timeframe,
      zone_count: pooled.length,
      resistance_count: nearest.resistance.length,
      support_count: nearest.support.length,
      duration_ms: timer.stop(),
    });

    return {
      symbol,
      timeframe,
      currentPrice,
      asOf: request.asOf ?? this.now(),
      zonesByTimeframe,
      nearest,
    };
  }

  /**
   * Bar counts for the configured timeframes plus the requested one
   */
  private barLimits(requested: Timeframe): Partial<Record<Timeframe, number>> {
    const wanted = new Set<Timeframe>([...this.analysis.timeframes, requested]);
    const limits: Partial<Record<Timeframe, number>> = {};

    for (const timeframe of getAllTimeframes()) {
      if (wanted.has(timeframe)) {
        limits[timeframe] = this.analysis.barLimits[timeframe] ?? DEFAULT_BAR_LIMITS[timeframe];
      }
    }

    return limits;
  }
}
