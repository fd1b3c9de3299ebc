/**
 * Help command handler
 */

import type { Timeframe } from '@zonescope/contracts';
import type { Command, CommandInteraction } from '../types/index.js';
import { helpSchema } from '../schemas/help.js';

export interface HelpCommandDeps {
  /** Analysis timeframes named in the method text */
  timeframes?: readonly Timeframe[];
}

const USAGE = [
  '`/zones symbol:VET` nearest zones on the default timeframe',
  '`/zones symbol:BTC timeframe:1h` nearest zones for BTCUSDT on 1h',
  '`/health` bot status',
].join('\n');

function describeMethod(timeframes: readonly Timeframe[] | undefined): string {
  const scope =
    timeframes && timeframes.length > 0 ? timeframes.join(', ') : 'each configured analysis timeframe';

  return [
    `Zones come from fractal pivots (two bars on each side) on ${scope}.`,
    'A zone closed through after its pivot is discarded; overlapping zones merge.',
    'Strength counts the pivots merged into a zone.',
  ].join('\n');
}

export function createHelpCommand(deps: HelpCommandDeps = {}): Command {
  const method = describeMethod(deps.timeframes);

  async function helpHandler(interaction: CommandInteraction): Promise<void> {
    await interaction.reply({
      embeds: [
        {
          title: '📖 Support & Resistance Zones',
          color: 0x5865f2,
          fields: [
            { name: 'Usage', value: USAGE, inline: false },
            { name: 'Method', value: method, inline: false },
          ],
        },
      ],
      ephemeral: true,
    });
  }

  return {
    schema: helpSchema,
    handler: helpHandler,
  };
}

/**
 * Help command without a timeframe list
 */
export const helpCommand: Command = createHelpCommand();
