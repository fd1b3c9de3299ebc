/**
 * @zonescope/discord-bot-core
 * Slash command schemas, handlers and dispatch for the zone bot
 */

export * from './types/index.js';

export * from './schemas/index.js';

export { CommandHandler, type CommandHandlerOptions } from './handlers/CommandHandler.js';

export * from './commands/index.js';
