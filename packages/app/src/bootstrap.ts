/**
 * Service wiring shared by the bot and the CLI
 */

import type { MarketDataSource } from '@zonescope/contracts';
import { BinanceProvider, normalizeSymbol } from '@zonescope/provider-binance';
import {
  createHealthCommand,
  createHelpCommand,
  createZonesCommand,
  type Command,
} from '@zonescope/discord-bot-core';
import type { Logger } from '@zonescope/logger';
import type { Config } from './config/index.js';
import { ZoneAnalysisService } from './services/zone-analysis.service.js';
import { FixtureMarketData } from './services/providers/fixture-market-data.js';
import { ZoneFormatter } from './formatters/zone-formatter.js';

/** Symbol the health command validates against market data */
export const HEALTH_CHECK_SYMBOL = 'BTC';

export interface AppServices {
  source: MarketDataSource;
  analysis: ZoneAnalysisService;
  formatter: ZoneFormatter;
  commands: Command[];
}

/**
 * Fixture data in dry runs or when configured, Binance otherwise
 */
export function createMarketDataSource(config: Config, logger: Logger): MarketDataSource {
  if (config.app.dryRun || config.provider.type === 'fixture') {
    return new FixtureMarketData({ logger: logger.child({ component: 'provider', provider: 'fixture' }) });
  }

  return new BinanceProvider({
    baseUrl: config.provider.baseUrl,
    timeoutMs: config.provider.timeoutMs,
    symbolCacheTtlMs: config.provider.symbolCacheTtlMs,
    logger,
  });
}

export function createServices(
  config: Config,
  logger: Logger,
  source: MarketDataSource = createMarketDataSource(config, logger)
): AppServices {
  const analysis = new ZoneAnalysisService({ source, analysis: config.analysis, logger });
  const formatter = new ZoneFormatter();

  const commands: Command[] = [
    createZonesCommand({
      analyze: (request) => analysis.analyze(request),
      renderer: formatter,
    }),
    createHelpCommand({ timeframes: config.analysis.timeframes }),
    createHealthCommand({
      version: config.app.version,
      checkMarketData: () => source.validateSymbol(normalizeSymbol(HEALTH_CHECK_SYMBOL)),
    }),
  ];

  return { source, analysis, formatter, commands };
}
