/**
 * Discord bot start-up
 * Wires the services into the bot and keeps it running until a signal arrives
 */

import {
  attachGlobalHandlers,
  createChildLogger,
  describeError,
  startTimer,
  type Logger,
} from '@zonescope/logger';
import { ConfigError, getConfigSummary, type Config } from './config/index.js';
import { createServices, type AppServices } from './bootstrap.js';
import { DiscordBot } from './services/discord/discord-bot.js';

export async function startBot(
  config: Config,
  logger: Logger,
  services: AppServices = createServices(config, logger)
): Promise<DiscordBot> {
  const timer = startTimer();
  attachGlobalHandlers(logger);

  const { token, clientId, guildId } = config.discord;

  if (!token || !clientId) {
    throw new ConfigError([
      'discord: DISCORD_TOKEN and DISCORD_CLIENT_ID are required to start the bot',
    ]);
  }

  logger.info('Starting zonescope', { ...getConfigSummary(config), operation: 'app_startup' });

  const bot = new DiscordBot({
    logger,
    token,
    clientId,
    guildId,
    commands: services.commands,
  });
  await bot.start();

  const shutdownLogger = createChildLogger(logger, { operation: 'app_shutdown' });
  const shutdown = (signal: NodeJS.Signals): void => {
    shutdownLogger.info('Received shutdown signal', { signal });
    bot.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        shutdownLogger.error('Error during shutdown', { error: describeError(error) });
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  logger.info('zonescope startup complete', {
    operation: 'app_startup',
    duration_ms: timer.stop(),
    result: 'success',
  });

  return bot;
}
