/**
 * Main exports for @zonescope/app package
 */

// Configuration exports
export { loadConfig, getConfigSummary, ConfigError, configSchema, envMapping } from './config/index.js';
export type { Config, AnalysisConfig, EnvBinding, Env } from './config/index.js';

// Services
export { ZoneAnalysisService, type ZoneAnalysisServiceConfig } from './services/zone-analysis.service.js';
export { parseZoneQuery, type ZoneQuery } from './services/zone-query.js';
export {
  FixtureMarketData,
  FIXTURE_PRICES,
  type FixtureMarketDataConfig,
} from './services/providers/fixture-market-data.js';
export {
  DiscordBot,
  type DiscordBotConfig,
  type DiscordStatus,
  type CommandRegistrar,
} from './services/discord/discord-bot.js';

// Formatting
export {
  ZoneFormatter,
  OUTPUT_FORMATS,
  isOutputFormat,
  type OutputFormat,
  type FormattedZone,
} from './formatters/zone-formatter.js';

// Wiring
export { createServices, createMarketDataSource, HEALTH_CHECK_SYMBOL, type AppServices } from './bootstrap.js';
export { startBot } from './start.js';
export { createProgram, type ProgramDeps } from './program.js';
