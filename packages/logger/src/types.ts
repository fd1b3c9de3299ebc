/**
 * @fileoverview Type definitions for the zonescope logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity that reaches the transports.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Options accepted by {@link createLogger}.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   stderr: true,
 * };
 * ```
 */
export interface LoggerConfig {
  /** @default 'info' */
  level: LogLevel;

  /**
   * JSON lines when true, colorized single-line output otherwise.
   * @default true in production
   */
  json?: boolean;

  /** Also append entries to this file. */
  filePath?: string;

  /** @default true */
  console?: boolean;

  /**
   * Route every console level to stderr so stdout stays free for command output.
   * @default false
   */
  stderr?: boolean;

  /** Extra destination for formatted entries, one per line. */
  stream?: NodeJS.WritableStream;
}

export type Logger = WinstonLogger;
