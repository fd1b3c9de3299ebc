import type { CommandSchema } from '../types/index.js';

export const helpSchema: CommandSchema = {
  name: 'help',
  description: 'How to use the zone bot',
  dmPermission: true,
};
