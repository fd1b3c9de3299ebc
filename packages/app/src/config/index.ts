/**
 * Configuration loading and management
 */

import { ZoneScopeError } from '@zonescope/contracts';
import type { Logger } from '@zonescope/logger';
import { configSchema, envMapping, type Config, type EnvBinding } from './schema.js';

export type Env = Record<string, string | undefined>;

/**
 * Thrown when the environment does not describe a valid configuration.
 * `data.issues` lists every problem, one `path: message` per entry.
 */
export class ConfigError extends ZoneScopeError {
  constructor(issues: string[]) {
    super('CONFIG_INVALID', `Configuration validation failed:\n${issues.join('\n')}`, { issues });
    this.name = 'ConfigError';
  }
}

/**
 * Load configuration from environment variables and defaults.
 *
 * @param env - Variables to read, `process.env` by default
 * @param overrides - Values that win over the environment (CLI flags)
 * @throws ConfigError listing every invalid setting
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env, { app: { dryRun: true } });
 * ```
 */
export function loadConfig(
  env: Env = process.env,
  overrides: Record<string, Record<string, unknown>> = {},
  logger?: Logger
): Config {
  const rawConfig: Record<string, unknown> = {};

  for (const [envKey, binding] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') {
      setNestedProperty(rawConfig, binding.path, parseEnvValue(value.trim(), binding));
    }
  }

  for (const [section, values] of Object.entries(overrides)) {
    for (const [key, value] of Object.entries(values)) {
      setNestedProperty(rawConfig, `${section}.${key}`, value);
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigError(result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }

  logger?.info('Configuration loaded', getConfigSummary(result.data));

  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setNestedProperty(target: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Converts a raw variable to the type its binding declares. Values that do
 * not convert are passed through so the schema reports them.
 */
function parseEnvValue(value: string, binding: EnvBinding): unknown {
  switch (binding.kind) {
    case 'boolean':
      if (value === 'true' || value === '1') return true;
      if (value === 'false' || value === '0') return false;
      return value;
    case 'number': {
      const num = Number(value);
      return Number.isNaN(num) ? value : num;
    }
    case 'list':
      return value
        .split(',')
        .map((item) => item.trim().toLowerCase())
        .filter((item) => item.length > 0);
    case 'string':
      return binding.path === 'analysis.defaultTimeframe' ? value.toLowerCase() : value;
  }
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    dryRun: config.app.dryRun,
    provider: config.app.dryRun ? 'fixture' : config.provider.type,
    discord: config.discord.enabled ? 'enabled' : 'disabled',
    timeframes: config.analysis.timeframes,
    defaultTimeframe: config.analysis.defaultTimeframe,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
    },
  };
}

export { configSchema, envMapping } from './schema.js';
export type { Config, AnalysisConfig, EnvBinding } from './schema.js';
