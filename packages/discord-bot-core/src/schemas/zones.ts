/**
 * Zones command schema
 */

import { getAllTimeframes, getTimeframeLabel } from '@zonescope/contracts';
import { CommandOptionType, type CommandSchema } from '../types/index.js';

export const zonesSchema: CommandSchema = {
  name: 'zones',
  description: 'Show the nearest support and resistance zones for a futures symbol',
  dmPermission: true,
  options: [
    {
      type: CommandOptionType.STRING,
      name: 'symbol',
      description: 'Coin or pair, e.g. VET or VETUSDT',
      required: true,
      minLength: 1,
      maxLength: 20,
    },
    {
      type: CommandOptionType.STRING,
      name: 'timeframe',
      description: 'Timeframe to report on',
      required: false,
      choices: getAllTimeframes().map((timeframe) => ({
        name: getTimeframeLabel(timeframe),
        value: timeframe,
      })),
    },
  ],
};
