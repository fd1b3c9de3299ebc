/**
 * Core types for Discord bot commands
 */

/**
 * Slash command definition as registered with Discord
 */
export interface CommandSchema {
  /** Command name (lowercase, no spaces) */
  name: string;

  description: string;

  options?: CommandOption[];

  /** Whether command is available in DMs */
  dmPermission?: boolean;
}

/**
 * Option types matching the Discord API
 */
export enum CommandOptionType {
  STRING = 3,
  BOOLEAN = 5,
}

export interface CommandOption {
  type: CommandOptionType;
  name: string;
  description: string;
  required?: boolean;
  /** String options only */
  choices?: CommandChoice[];
  minLength?: number;
  maxLength?: number;
}

export interface CommandChoice {
  name: string;
  value: string;
}

export interface EmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

/**
 * Embed payload; structurally compatible with discord.js' APIEmbed
 */
export interface EmbedPayload {
  title?: string;
  description?: string;
  color?: number;
  fields?: EmbedField[];
  footer?: { text: string };
  /** ISO 8601 */
  timestamp?: string;
}

export interface ReplyPayload {
  content?: string;
  embeds?: EmbedPayload[];
  ephemeral?: boolean;
}

/**
 * The part of a discord.js ChatInputCommandInteraction that commands use.
 * Real interactions satisfy it structurally.
 */
export interface CommandInteraction {
  readonly id: string;
  readonly commandName: string;
  readonly replied: boolean;
  readonly deferred: boolean;
  readonly options: {
    getString(name: string, required?: boolean): string | null;
    getBoolean(name: string, required?: boolean): boolean | null;
  };
  isChatInputCommand(): boolean;
  deferReply(options?: { ephemeral?: boolean }): Promise<unknown>;
  editReply(payload: string | ReplyPayload): Promise<unknown>;
  reply(payload: string | ReplyPayload): Promise<unknown>;
  followUp(payload: string | ReplyPayload): Promise<unknown>;
}

/**
 * Complete command definition
 */
export interface Command {
  schema: CommandSchema;
  handler(interaction: CommandInteraction): Promise<void>;
}
