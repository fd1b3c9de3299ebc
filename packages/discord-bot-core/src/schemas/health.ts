/**
 * Health check command schema
 */

import { CommandOptionType, type CommandSchema } from '../types/index.js';

export const healthSchema: CommandSchema = {
  name: 'health',
  description: 'Check bot health and status',
  dmPermission: true,
  options: [
    {
      type: CommandOptionType.BOOLEAN,
      name: 'detailed',
      description: 'Show detailed health information',
      required: false,
    },
  ],
};

export interface HealthResponse {
  /** degraded when the market data check fails */
  status: 'healthy' | 'degraded';
  /** Seconds */
  uptime: number;
  memory: {
    used: number;
    total: number;
    percentage: number;
  };
  timestamp: string;
  version: string;
  /** Market data check result; absent without a check */
  marketData?: boolean;
}
