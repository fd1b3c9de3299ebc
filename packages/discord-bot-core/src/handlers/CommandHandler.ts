/**
 * CommandHandler - Central command processing system
 */

import { Collection, SlashCommandBuilder, type RESTPostAPIChatInputApplicationCommandsJSONBody } from 'discord.js';
import type { Logger } from '@zonescope/logger';
import { CommandOptionType, type Command, type CommandInteraction, type CommandSchema } from '../types/index.js';

export interface CommandHandlerOptions {
  logger?: Logger;
}

/**
 * Registry and dispatcher for slash commands
 */
export class CommandHandler {
  private readonly commands = new Collection<string, Command>();
  private readonly logger?: Logger;

  constructor(options: CommandHandlerOptions = {}) {
    this.logger = options.logger;
  }

  public registerCommand(command: Command): void {
    if (!command.schema.name) {
      throw new Error('Command must have a name');
    }

    this.commands.set(command.schema.name, command);
  }

  public registerCommands(commands: Command[]): void {
    commands.forEach((command) => this.registerCommand(command));
  }

  public getCommand(name: string): Command | undefined {
    return this.commands.get(name);
  }

  public getAllCommands(): Command[] {
    return Array.from(this.commands.values());
  }

  /**
   * Dispatches a slash command to its handler.
   *
   * Errors escaping a handler are logged and answered with an ephemeral
   * message, as a follow-up when the interaction was already acknowledged.
   */
  public async handleInteraction(interaction: CommandInteraction): Promise<void> {
    if (!interaction.isChatInputCommand()) return;

    const command = this.commands.get(interaction.commandName);

    if (!command) {
      await interaction.reply({
        content: `Command ${interaction.commandName} not found`,
        ephemeral: true,
      });
      return;
    }

    try {
      await command.handler(interaction);
    } catch (error) {
      this.logger?.error('Command failed', {
        command: interaction.commandName,
        interaction_id: interaction.id,
        error: error instanceof Error ? { message: error.message, stack: error.stack } : String(error),
      });

      const errorMessage = error instanceof Error ? error.message : 'An unknown error occurred';
      const payload = { content: `❌ Error: ${errorMessage}`, ephemeral: true };

      if (interaction.replied || interaction.deferred) {
        await interaction.followUp(payload);
      } else {
        await interaction.reply(payload);
      }
    }
  }

  /**
   * Build command for registration
   */
  public buildCommand(schema: CommandSchema): SlashCommandBuilder {
    const builder = new SlashCommandBuilder().setName(schema.name).setDescription(schema.description);

    if (schema.dmPermission !== undefined) {
      builder.setDMPermission(schema.dmPermission);
    }

    for (const option of schema.options ?? []) {
      switch (option.type) {
        case CommandOptionType.STRING:
          builder.addStringOption((opt) => {
            opt.setName(option.name).setDescription(option.description);
            if (option.required) opt.setRequired(true);
            if (option.choices) {
              opt.addChoices(...option.choices);
            }
            if (option.minLength !== undefined) opt.setMinLength(option.minLength);
            if (option.maxLength !== undefined) opt.setMaxLength(option.maxLength);
            return opt;
          });
          break;
        case CommandOptionType.BOOLEAN:
          builder.addBooleanOption((opt) => {
            opt.setName(option.name).setDescription(option.description);
            if (option.required) opt.setRequired(true);
            return opt;
          });
          break;
      }
    }

    return builder;
  }

  /**
   * Registration bodies for the Discord REST API
   */
  public toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
    return this.getAllCommands().map((command) => this.buildCommand(command.schema).toJSON());
  }
}
