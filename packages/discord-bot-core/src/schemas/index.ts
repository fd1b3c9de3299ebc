/**
 * Export all command schemas
 */

export { zonesSchema } from './zones.js';
export { helpSchema } from './help.js';
export { healthSchema, type HealthResponse } from './health.js';

import { zonesSchema } from './zones.js';
import { helpSchema } from './help.js';
import { healthSchema } from './health.js';
import type { CommandSchema } from '../types/index.js';

export const schemas: CommandSchema[] = [zonesSchema, helpSchema, healthSchema];

export function getSchema(name: string): CommandSchema | undefined {
  return schemas.find((schema) => schema.name === name);
}
