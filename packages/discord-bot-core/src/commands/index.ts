/**
 * Export all commands
 */

export {
  healthCommand,
  createHealthCommand,
  formatUptime,
  type HealthCommandDeps,
} from './health.js';
export { helpCommand, createHelpCommand, type HelpCommandDeps } from './help.js';
export {
  createZonesCommand,
  buildZonesEmbed,
  describeAnalysisError,
  type ZoneRenderer,
  type ZonesCommandDeps,
} from './zones.js';
