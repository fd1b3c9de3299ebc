/**
 * In-memory destination for logger output
 */

import { Writable } from 'node:stream';
import { createLogger } from '../src/createLogger.js';
import type { Logger, LogLevel } from '../src/types.js';

export interface CapturedLogger {
  logger: Logger;
  /** Parsed JSON entries written so far */
  entries(): Array<Record<string, unknown>>;
}

export function createCapturedLogger(level: LogLevel = 'debug'): CapturedLogger {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(...String(chunk).split('\n').filter((line) => line.length > 0));
      callback();
    },
  });

  const logger = createLogger({ level, console: false, stream });

  return {
    logger,
    entries: () =>
      lines.map((line) => {
        const entry: Record<string, unknown> = JSON.parse(line);
        return entry;
      }),
  };
}

/**
 * Lets piped transports drain
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 20));
}
