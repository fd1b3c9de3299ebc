/**
 * @fileoverview Winston formats: secret redaction, standard fields and
 * the human-readable console layout.
 */

import { format } from 'winston';
import { getRequestId } from './request-context.js';

/**
 * Field names whose values never reach a transport.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
  /cookie/i,
];

const REDACTED = '[REDACTED]';

/**
 * Winston-owned fields left untouched by redaction.
 */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveFieldName(name: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(name));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Returns a copy of `value` with sensitive keys replaced at any depth.
 * Class instances (errors, dates) pass through as they are.
 *
 * @example
 * ```typescript
 * redactValue({ user: 'trader', discordToken: 'test-secret' });
 * // { user: 'trader', discordToken: '[REDACTED]' }
 * ```
 */
export function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactValue(item));
  }
  if (!isPlainObject(value)) {
    return value;
  }

  const copy: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    copy[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(nested);
  }
  return copy;
}

/**
 * Redacts sensitive metadata. Must run before any output format.
 *
 * @example
 * ```typescript
 * logger.info('Bot login', { token: 'test-secret' });
 * // {"level":"info","message":"Bot login","token":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) continue;
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * ISO timestamp, error stacks, and the ambient request id.
 */
export const standardFields = format.combine(
  format.timestamp(),
  format.errors({ stack: true }),
  format((info) => {
    const requestId = getRequestId();
    if (requestId && info['request_id'] === undefined) {
      info['request_id'] = requestId;
    }
    return info;
  })()
);

/**
 * Fields printed first, in this order, by {@link prettyPrint}.
 */
const LEADING_FIELDS = ['component', 'provider', 'symbol', 'timeframe', 'request_id'] as const;

const SKIPPED_FIELDS = new Set<string>(['level', 'message', 'timestamp', 'stack', ...LEADING_FIELDS]);

/**
 * Renders one entry as `key=value` pairs after the message.
 */
export function renderContext(info: Record<string, unknown>): string {
  const parts: string[] = [];

  for (const field of LEADING_FIELDS) {
    const value = info[field];
    if (value !== undefined && value !== '') {
      parts.push(`${field}=${String(value)}`);
    }
  }

  for (const [key, value] of Object.entries(info)) {
    if (SKIPPED_FIELDS.has(key)) continue;
    parts.push(`${key}=${JSON.stringify(value)}`);
  }

  return parts.join(' ');
}

/**
 * Development console layout:
 * `[2025-01-06T12:00:00.000Z] info: Zones detected provider=binance symbol=VETUSDT zone_count=5`
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const context = renderContext(info);
    const line = `[${String(info['timestamp'])}] ${info.level}: ${String(info.message)}${context ? ` ${context}` : ''}`;

    const stack = info['stack'];
    return typeof stack === 'string' ? `${line}\n${stack}` : line;
  })
);
