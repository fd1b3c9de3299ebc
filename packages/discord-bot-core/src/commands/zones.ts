/**
 * Zones command handler
 */

import {
  isInsufficientBarsError,
  isProviderRateLimitError,
  isSymbolResolutionError,
  isValidTimeframe,
  getAllTimeframes,
  type Timeframe,
  type TimeframeZone,
  type ZoneReport,
  type ZoneRequest,
} from '@zonescope/contracts';
import type { Command, CommandInteraction, EmbedPayload } from '../types/index.js';
import { zonesSchema } from '../schemas/zones.js';

/**
 * Text rendering used inside the embed
 */
export interface ZoneRenderer {
  formatPrice(price: number): string;
  formatZoneLine(zone: TimeframeZone, report: ZoneReport): string;
}

export interface ZonesCommandDeps {
  analyze(request: ZoneRequest): Promise<ZoneReport>;
  renderer: ZoneRenderer;
}

const EMPTY_SIDE = 'no zones found';
const EMBED_COLOR = 0x5865f2;

export function buildZonesEmbed(report: ZoneReport, renderer: ZoneRenderer): EmbedPayload {
  const side = (zones: TimeframeZone[]): string =>
    zones.length === 0 ? EMPTY_SIDE : zones.map((zone) => renderer.formatZoneLine(zone, report)).join('\n');

  return {
    title: `📊 Key Levels for #${report.symbol} (${report.timeframe})`,
    description: `Current price: **${renderer.formatPrice(report.currentPrice)}**`,
    color: EMBED_COLOR,
    fields: [
      { name: '🔴 Resistance', value: side(report.nearest.resistance), inline: false },
      { name: '🟢 Support', value: side(report.nearest.support), inline: false },
    ],
    footer: { text: 'zonescope · Binance Futures' },
    timestamp: new Date(report.asOf).toISOString(),
  };
}

/**
 * User-facing text for expected analysis failures; null for anything else
 */
export function describeAnalysisError(error: unknown): string | null {
  if (isSymbolResolutionError(error) || isInsufficientBarsError(error)) {
    return `❌ ${error.message}`;
  }
  if (isProviderRateLimitError(error)) {
    return '⏳ Market data rate limit reached, try again in a minute.';
  }
  return null;
}

/**
 * Creates the /zones command around an analysis function.
 *
 * @example
 * ```typescript
 * const zonesCommand = createZonesCommand({
 *   analyze: (request) => service.analyze(request),
 *   renderer: formatter,
 * });
 * handler.registerCommand(zonesCommand);
 * ```
 */
export function createZonesCommand(deps: ZonesCommandDeps): Command {
  async function zonesHandler(interaction: CommandInteraction): Promise<void> {
    await interaction.deferReply();

    const symbol = interaction.options.getString('symbol', true) ?? '';
    const rawTimeframe = interaction.options.getString('timeframe');

    let timeframe: Timeframe | undefined;
    if (rawTimeframe !== null) {
      if (!isValidTimeframe(rawTimeframe)) {
        await interaction.editReply({
          content: `❌ Unknown timeframe ${rawTimeframe}. Use one of: ${getAllTimeframes().join(', ')}`,
        });
        return;
      }
      timeframe = rawTimeframe;
    }

    let report: ZoneReport;
    try {
      report = await deps.analyze({ symbol, timeframe });
    } catch (error) {
      const message = describeAnalysisError(error);
      if (message === null) throw error;

      await interaction.editReply({ content: message });
      return;
    }

    await interaction.editReply({ embeds: [buildZonesEmbed(report, deps.renderer)] });
  }

  return {
    schema: zonesSchema,
    handler: zonesHandler,
  };
}
