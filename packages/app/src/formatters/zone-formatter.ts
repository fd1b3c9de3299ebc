/**
 * Zone report formatter
 * Supports multiple output formats with deterministic output
 */

import type { TimeframeZone, ZoneReport } from '@zonescope/contracts';
import type { ZoneRenderer } from '@zonescope/discord-bot-core';
import { distancePct, zoneAgeDays } from '@zonescope/zone-engine';

export type OutputFormat = 'text' | 'json' | 'markdown';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json', 'markdown'];

const EMPTY_SIDE = 'no zones found';
const PRICE_PRECISION = 5;

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * JSON shape of one zone line
 */
export interface FormattedZone {
  kind: TimeframeZone['kind'];
  low: number;
  high: number;
  distancePct: number;
  strength: number;
  ageDays: number;
  timeframe: string;
}

/**
 * Formatter for zone reports. Also renders the lines of the Discord embed.
 */
export class ZoneFormatter implements ZoneRenderer {
  format(report: ZoneReport, format: OutputFormat = 'text'): string {
    switch (format) {
      case 'json':
        return this.formatAsJSON(report);
      case 'markdown':
        return this.formatAsMarkdown(report);
      case 'text':
      default:
        return this.formatAsText(report);
    }
  }

  /**
   * Five significant digits without trailing zeros
   *
   * @example
   * ```typescript
   * formatter.formatPrice(0.0412345) // '0.041235'
   * formatter.formatPrice(104)       // '104'
   * ```
   */
  formatPrice(price: number): string {
    return String(Number(price.toPrecision(PRICE_PRECISION)));
  }

  formatDistance(zone: TimeframeZone, price: number): string {
    const distance = distancePct(zone, price);
    return `${distance >= 0 ? '+' : ''}${distance.toFixed(2)}%`;
  }

  formatZoneLine(zone: TimeframeZone, report: ZoneReport): string {
    return [
      `Zone: ${this.formatPrice(zone.low)} - ${this.formatPrice(zone.high)}`,
      `Distance: ${this.formatDistance(zone, report.currentPrice)}`,
      `Strength: ${zone.strength}`,
      `Age: ${Math.floor(zoneAgeDays(zone, report.asOf))}d`,
      `TF: ${zone.timeframe}`,
    ].join(' | ');
  }

  private header(report: ZoneReport): string {
    return `Key Levels for #${report.symbol} (${report.timeframe})`;
  }

  private formatAsText(report: ZoneReport): string {
    const lines: string[] = [];

    lines.push(this.header(report));
    lines.push(`Current price: ${this.formatPrice(report.currentPrice)}`);
    lines.push('');

    const sides: Array<[string, TimeframeZone[]]> = [
      ['Resistance', report.nearest.resistance],
      ['Support', report.nearest.support],
    ];
    for (const [label, zones] of sides) {
      lines.push(`${label}:`);
      if (zones.length === 0) {
        lines.push(`  ${EMPTY_SIDE}`);
      }
      for (const zone of zones) {
        lines.push(`  ${this.formatZoneLine(zone, report)}`);
      }
    }

    return lines.join('\n');
  }

  private formatAsMarkdown(report: ZoneReport): string {
    const lines: string[] = [];

    lines.push(`## ${this.header(report)}`);
    lines.push('');
    lines.push(`Current price: \`${this.formatPrice(report.currentPrice)}\``);

    const sides: Array<[string, TimeframeZone[]]> = [
      ['🔴 Resistance', report.nearest.resistance],
      ['🟢 Support', report.nearest.support],
    ];
    for (const [label, zones] of sides) {
      lines.push('');
      lines.push(`### ${label}`);
      lines.push('');
      if (zones.length === 0) {
        lines.push(`_${EMPTY_SIDE}_`);
      }
      for (const zone of zones) {
        lines.push(`- ${this.formatZoneLine(zone, report)}`);
      }
    }

    return lines.join('\n');
  }

  private formatAsJSON(report: ZoneReport): string {
    const toJson = (zone: TimeframeZone): FormattedZone => ({
      kind: zone.kind,
      low: zone.low,
      high: zone.high,
      distancePct: Number(distancePct(zone, report.currentPrice).toFixed(2)),
      strength: zone.strength,
      ageDays: Math.floor(zoneAgeDays(zone, report.asOf)),
      timeframe: zone.timeframe,
    });

    return JSON.stringify(
      {
        symbol: report.symbol,
        timeframe: report.timeframe,
        currentPrice: report.currentPrice,
        asOf: new Date(report.asOf).toISOString(),
        resistance: report.nearest.resistance.map(toJson),
        support: report.nearest.support.map(toJson),
      },
      null,
      2
    );
  }
}
