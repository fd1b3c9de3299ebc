/**
 * Command line definition for the zonescope binary
 */

import { Command, Option } from 'commander';
import type { MarketDataSource } from '@zonescope/contracts';
import { createLogger, withRequestContext, type Logger } from '@zonescope/logger';
import { loadConfig, type Config, type Env } from './config/index.js';
import { createMarketDataSource, createServices } from './bootstrap.js';
import { OUTPUT_FORMATS, type OutputFormat } from './formatters/zone-formatter.js';
import { parseZoneQuery } from './services/zone-query.js';
import { startBot } from './start.js';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
const PROVIDERS = ['binance', 'fixture'] as const;

export interface ProgramDeps {
  env?: Env;
  /** Receives command output; logs never go here */
  write?: (text: string) => void;
  /** Replaces the stderr logger built from configuration */
  logger?: Logger;
  /** Replaces the configured market data source */
  source?: MarketDataSource;
  serve?: (config: Config, logger: Logger) => Promise<unknown>;
}

interface GlobalOptions {
  dryRun?: boolean;
  logLevel?: (typeof LOG_LEVELS)[number];
}

interface ZonesOptions {
  format: OutputFormat;
  provider?: (typeof PROVIDERS)[number];
}

/**
 * @example
 * ```typescript
 * await createProgram().parseAsync(process.argv);
 * ```
 */
export function createProgram(deps: ProgramDeps = {}): Command {
  const write = deps.write ?? ((text: string) => process.stdout.write(`${text}\n`));
  const program = new Command();

  program
    .name('zonescope')
    .description('Support and resistance zones for Binance futures symbols')
    .version('0.1.0')
    .option('--dry-run', 'Use deterministic fixture data instead of Binance')
    .addOption(new Option('--log-level <level>', 'Log verbosity').choices(LOG_LEVELS));

  const setup = (overrides: Record<string, Record<string, unknown>>): { config: Config; logger: Logger } => {
    const globals = program.opts<GlobalOptions>();
    const config = loadConfig(deps.env, {
      ...overrides,
      app: { ...(globals.dryRun ? { dryRun: true } : {}) },
      logging: { ...(globals.logLevel ? { level: globals.logLevel } : {}) },
    });
    const logger =
      deps.logger ??
      createLogger({
        level: config.logging.level,
        json: config.logging.format === 'json',
        filePath: config.logging.filePath,
        stderr: true,
      });
    return { config, logger };
  };

  program
    .command('zones')
    .description('Print the nearest zones around the current price')
    .argument('<symbol>', 'Symbol, with or without the USDT suffix (e.g. VET)')
    .argument('[timeframe]', 'Timeframe to analyse (15m, 1h, 4h, 12h, 1d)')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('text'))
    .addOption(new Option('-p, --provider <provider>', 'Market data provider').choices(PROVIDERS))
    .action(async (symbol: string, timeframe: string | undefined, options: ZonesOptions) => {
      const { config, logger } = setup({
        provider: options.provider ? { type: options.provider } : {},
      });

      const query = parseZoneQuery([symbol, timeframe ?? ''].join(' '), config.analysis.defaultTimeframe);
      const source = deps.source ?? createMarketDataSource(config, logger);
      const { analysis, formatter } = createServices(config, logger, source);

      const report = await withRequestContext(() => analysis.analyze(query), undefined, {
        command: 'zones',
      });
      write(formatter.format(report, options.format));
    });

  program
    .command('serve')
    .description('Run the Discord bot')
    .action(async () => {
      const { config, logger } = setup({ discord: { enabled: true } });
      await (deps.serve ?? startBot)(config, logger);
    });

  return program;
}
