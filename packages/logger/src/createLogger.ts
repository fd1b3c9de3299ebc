/**
 * @fileoverview Logger factory.
 * Builds Winston loggers with redaction, standard fields and
 * console, file or stream transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

const ALL_LEVELS = ['error', 'warn', 'info', 'debug'];

/**
 * Creates a configured logger.
 *
 * Redaction runs first, then standard fields, then the JSON or pretty
 * layout. File and stream transports always receive JSON lines.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Zones detected', { symbol: 'VETUSDT', timeframe: '4h', zone_count: 5 });
 * ```
 *
 * @example
 * ```typescript
 * // CLI: keep stdout for the report
 * const logger = createLogger({ level: 'warn', stderr: true });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stderr = false,
    stream,
  } = config;

  const base = format.combine(redactPII(), standardFields);
  const jsonFormat = format.combine(base, format.json());

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: json ? jsonFormat : format.combine(base, prettyPrint),
        stderrLevels: stderr ? ALL_LEVELS : ['error'],
      })
    );
  }

  if (filePath) {
    transports.push(new winston.transports.File({ filename: filePath, level, format: jsonFormat }));
  }

  if (stream) {
    transports.push(new winston.transports.Stream({ stream, level, format: jsonFormat }));
  }

  return winston.createLogger({
    level,
    transports,
    // process exit is owned by attachGlobalHandlers
    exitOnError: false,
    // a logger with every transport disabled must not warn on each write
    silent: transports.length === 0,
  });
}

/**
 * Child logger that stamps `context` on every entry.
 *
 * @example
 * ```typescript
 * const botLogger = createChildLogger(logger, { component: 'discord-bot' });
 * ```
 */
export function createChildLogger(logger: Logger, context: Record<string, unknown>): Logger {
  return logger.child(context);
}
