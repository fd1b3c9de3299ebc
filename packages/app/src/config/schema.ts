/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { Timeframe } from '@zonescope/contracts';

const timeframe = z.nativeEnum(Timeframe);

/**
 * Application configuration schema
 */
export const configSchema = z
  .object({
    app: z
      .object({
        env: z.enum(['development', 'staging', 'production']).default('development'),
        dryRun: z.boolean().default(false),
        name: z.string().default('zonescope'),
        version: z.string().default('0.1.0'),
      })
      .default({}),

    logging: z
      .object({
        level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
        format: z.enum(['json', 'pretty']).default('pretty'),
        filePath: z.string().optional(),
      })
      .default({}),

    discord: z
      .object({
        enabled: z.boolean().default(false),
        token: z.string().min(1).optional(),
        clientId: z.string().min(1).optional(),
        /** Register commands in one guild (instant) instead of globally */
        guildId: z.string().min(1).optional(),
      })
      .default({}),

    provider: z
      .object({
        type: z.enum(['binance', 'fixture']).default('binance'),
        baseUrl: z.string().url().default('https://fapi.binance.com'),
        timeoutMs: z.number().int().positive().default(10_000),
        symbolCacheTtlMs: z.number().int().nonnegative().default(60 * 60 * 1000),
      })
      .default({}),

    analysis: z
      .object({
        timeframes: z.array(timeframe).min(1).default([Timeframe.H1, Timeframe.H4, Timeframe.H12]),
        defaultTimeframe: timeframe.default(Timeframe.H4),
        maxResistanceZones: z.number().int().nonnegative().default(3),
        maxSupportZones: z.number().int().nonnegative().default(4),
        mergeThresholdPct: z.number().nonnegative().default(0.005),
        /** Overrides of the provider's default bar count per timeframe */
        barLimits: z.record(timeframe, z.number().int().positive()).default({}),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    if (!config.discord.enabled) return;

    if (!config.discord.token) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['discord', 'token'],
        message: 'DISCORD_TOKEN is required when the Discord bot is enabled',
      });
    }
    if (!config.discord.clientId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['discord', 'clientId'],
        message: 'DISCORD_CLIENT_ID is required when the Discord bot is enabled',
      });
    }
  });

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

export type AnalysisConfig = Config['analysis'];

type EnvValueKind = 'string' | 'boolean' | 'number' | 'list';

export interface EnvBinding {
  /** Dot path into the configuration object */
  path: string;
  kind: EnvValueKind;
}

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, EnvBinding> = {
  NODE_ENV: { path: 'app.env', kind: 'string' },
  DRY_RUN: { path: 'app.dryRun', kind: 'boolean' },
  LOG_LEVEL: { path: 'logging.level', kind: 'string' },
  LOG_FORMAT: { path: 'logging.format', kind: 'string' },
  LOG_FILE: { path: 'logging.filePath', kind: 'string' },
  DISCORD_ENABLED: { path: 'discord.enabled', kind: 'boolean' },
  DISCORD_TOKEN: { path: 'discord.token', kind: 'string' },
  DISCORD_CLIENT_ID: { path: 'discord.clientId', kind: 'string' },
  DISCORD_GUILD_ID: { path: 'discord.guildId', kind: 'string' },
  PROVIDER_TYPE: { path: 'provider.type', kind: 'string' },
  BINANCE_BASE_URL: { path: 'provider.baseUrl', kind: 'string' },
  PROVIDER_TIMEOUT_MS: { path: 'provider.timeoutMs', kind: 'number' },
  SYMBOL_CACHE_TTL_MS: { path: 'provider.symbolCacheTtlMs', kind: 'number' },
  ANALYSIS_TIMEFRAMES: { path: 'analysis.timeframes', kind: 'list' },
  ANALYSIS_DEFAULT_TIMEFRAME: { path: 'analysis.defaultTimeframe', kind: 'string' },
  MAX_RESISTANCE_ZONES: { path: 'analysis.maxResistanceZones', kind: 'number' },
  MAX_SUPPORT_ZONES: { path: 'analysis.maxSupportZones', kind: 'number' },
  MERGE_THRESHOLD_PCT: { path: 'analysis.mergeThresholdPct', kind: 'number' },
};
