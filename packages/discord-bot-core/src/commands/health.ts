/**
 * Health command handler
 */

import type { Command, CommandInteraction, EmbedPayload } from '../types/index.js';
import { healthSchema, type HealthResponse } from '../schemas/health.js';

export interface HealthCommandDeps {
  version?: string;

  /** Resolves true when the market data source answers */
  checkMarketData?: () => Promise<boolean>;
}

const STATUS_COLOR: Record<HealthResponse['status'], number> = {
  healthy: 0x00ff00,
  degraded: 0xffff00,
};

async function runCheck(check: (() => Promise<boolean>) | undefined): Promise<boolean | undefined> {
  if (!check) return undefined;
  try {
    return await check();
  } catch {
    return false;
  }
}

async function getHealthMetrics(deps: HealthCommandDeps): Promise<HealthResponse> {
  const memUsage = process.memoryUsage();
  const marketData = await runCheck(deps.checkMarketData);

  return {
    status: marketData === false ? 'degraded' : 'healthy',
    uptime: Math.floor(process.uptime()),
    memory: {
      used: Math.round(memUsage.heapUsed / 1024 / 1024),
      total: Math.round(memUsage.heapTotal / 1024 / 1024),
      percentage: Math.round((memUsage.heapUsed / memUsage.heapTotal) * 100),
    },
    timestamp: new Date().toISOString(),
    version: deps.version ?? '0.1.0',
    marketData,
  };
}

/**
 * Human readable uptime, e.g. `1d 2h 5s`
 */
export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (secs > 0 || parts.length === 0) parts.push(`${secs}s`);

  return parts.join(' ');
}

export function createHealthCommand(deps: HealthCommandDeps = {}): Command {
  async function healthHandler(interaction: CommandInteraction): Promise<void> {
    await interaction.deferReply({ ephemeral: true });

    const detailed = interaction.options.getBoolean('detailed') ?? false;
    const health = await getHealthMetrics(deps);
    const icon = health.status === 'healthy' ? '✅' : '⚠️';

    if (!detailed) {
      await interaction.editReply({
        content: `${icon} Bot is **${health.status}** | Uptime: ${formatUptime(health.uptime)} | Memory: ${health.memory.percentage}%`,
      });
      return;
    }

    const embed: EmbedPayload = {
      title: '🏥 Health Report',
      color: STATUS_COLOR[health.status],
      fields: [
        { name: 'Status', value: health.status.toUpperCase(), inline: true },
        { name: 'Uptime', value: formatUptime(health.uptime), inline: true },
        { name: 'Version', value: health.version, inline: true },
        {
          name: 'Memory Usage',
          value: `${health.memory.used}MB / ${health.memory.total}MB (${health.memory.percentage}%)`,
          inline: false,
        },
      ],
      timestamp: health.timestamp,
      footer: { text: 'zonescope' },
    };

    if (health.marketData !== undefined) {
      embed.fields?.push({
        name: 'Market Data',
        value: health.marketData ? 'reachable' : 'unreachable',
        inline: false,
      });
    }

    await interaction.editReply({ embeds: [embed] });
  }

  return {
    schema: healthSchema,
    handler: healthHandler,
  };
}

/**
 * Health command without dependency checks
 */
export const healthCommand: Command = createHealthCommand();
