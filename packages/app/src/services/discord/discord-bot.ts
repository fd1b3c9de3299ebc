/**
 * Discord bot implementation using discord.js
 */

import { Client, GatewayIntentBits, Events, Routes, type Interaction } from 'discord.js';
import { REST } from '@discordjs/rest';
import { createChildLogger, describeError, withRequestContext, type Logger } from '@zonescope/logger';
import { CommandHandler, type Command, type CommandInteraction } from '@zonescope/discord-bot-core';

const READY_TIMEOUT_MS = 30_000;

/**
 * The part of the REST client used for command registration
 */
export type CommandRegistrar = Pick<REST, 'put'>;

export interface DiscordBotConfig {
  logger: Logger;
  token: string;
  clientId: string;
  /** Register commands in this guild instead of globally */
  guildId?: string;
  commands: Command[];
  rest?: CommandRegistrar;
}

export interface DiscordStatus {
  connected: boolean;
  uptime: number;
  guilds: number;
}

/**
 * Discord bot service powered by discord.js
 */
export class DiscordBot {
  private readonly logger: Logger;
  private readonly client: Client;
  private readonly commandHandler: CommandHandler;
  private readonly rest: CommandRegistrar;
  private readonly config: DiscordBotConfig;
  private readonly startTime = Date.now();
  private ready = false;

  constructor(config: DiscordBotConfig) {
    this.config = config;
    this.logger = createChildLogger(config.logger, { component: 'discord' });

    // Slash commands only need the Guilds intent
    this.client = new Client({ intents: [GatewayIntentBits.Guilds] });

    this.commandHandler = new CommandHandler({ logger: this.logger });
    this.commandHandler.registerCommands(config.commands);

    this.rest = config.rest ?? new REST({ version: '10' }).setToken(config.token);

    this.setupEventHandlers();
  }

  /**
   * Log in, wait for the gateway and publish the slash commands
   */
  async start(): Promise<void> {
    this.logger.info('Discord bot starting', {
      clientId: this.config.clientId,
      scope: this.config.guildId ? 'guild' : 'global',
      commands: this.commandHandler.getAllCommands().map((command) => command.schema.name),
    });

    try {
      await this.client.login(this.config.token);
      await this.waitForReady(READY_TIMEOUT_MS);
      await this.registerSlashCommands();

      this.logger.info('Discord bot connected successfully');
    } catch (error) {
      this.logger.error('Failed to start Discord bot', { error: describeError(error) });
      throw error;
    }
  }

  async shutdown(): Promise<void> {
    this.logger.info('Discord bot shutting down');
    this.ready = false;
    await this.client.destroy();
  }

  getStatus(): DiscordStatus {
    return {
      connected: this.ready,
      uptime: Date.now() - this.startTime,
      guilds: this.client.guilds.cache.size,
    };
  }

  /**
   * Dispatches one slash command inside its own request context,
   * keyed by the interaction id
   */
  async handleInteraction(interaction: CommandInteraction): Promise<void> {
    await withRequestContext(
      async () => {
        this.logger.info('Command received', { command: interaction.commandName });

        try {
          await this.commandHandler.handleInteraction(interaction);
        } catch (error) {
          this.logger.error('Error handling interaction', {
            command: interaction.commandName,
            error: describeError(error),
          });
        }
      },
      interaction.id,
      { command: interaction.commandName }
    );
  }

  /**
   * Publishes the command definitions through the REST API
   */
  async registerSlashCommands(): Promise<void> {
    const body = this.commandHandler.toJSON();
    const { clientId, guildId } = this.config;

    this.logger.info('Registering slash commands', {
      count: body.length,
      commands: body.map((command) => command.name),
      scope: guildId ? 'guild' : 'global',
    });

    if (guildId) {
      // Guild commands propagate instantly, global ones take up to an hour
      await this.rest.put(Routes.applicationGuildCommands(clientId, guildId), { body });
    } else {
      await this.rest.put(Routes.applicationCommands(clientId), { body });
    }
  }

  private setupEventHandlers(): void {
    this.client.on(Events.ClientReady, () => {
      this.ready = true;
      this.logger.info('Discord bot ready', {
        username: this.client.user?.tag,
        guilds: this.client.guilds.cache.size,
      });
    });

    this.client.on(Events.InteractionCreate, (interaction: Interaction) => {
      if (!interaction.isChatInputCommand()) return;
      void this.handleInteraction(interaction);
    });

    this.client.on(Events.Error, (error) => {
      this.logger.error('Discord client error', { error: describeError(error) });
    });

    this.client.on(Events.Warn, (info) => {
      this.logger.warn('Discord client warning', { info });
    });

    this.client.on(Events.ShardDisconnect, () => {
      this.ready = false;
      this.logger.warn('Discord client disconnected');
    });

    this.client.on(Events.ShardResume, () => {
      this.ready = true;
      this.logger.info('Discord client resumed');
    });
  }

  /**
   * Resolves on the gateway ready event; the listener is removed on timeout
   */
  async waitForReady(timeoutMs: number): Promise<void> {
    if (this.ready) return;

    await new Promise<void>((resolve, reject) => {
      const onReady = (): void => {
        clearTimeout(timeout);
        resolve();
      };

      const timeout = setTimeout(() => {
        this.client.off(Events.ClientReady, onReady);
        reject(new Error('Discord bot ready timeout'));
      }, timeoutMs);

      this.client.once(Events.ClientReady, onReady);
    });
  }

  /** Listeners currently waiting for the gateway ready event */
  readyListenerCount(): number {
    return this.client.listenerCount(Events.ClientReady);
  }
}
