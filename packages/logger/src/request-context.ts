/**
 * @fileoverview Request context propagated through async calls with
 * AsyncLocalStorage. Each Discord interaction and CLI invocation runs
 * in its own context so every log line carries its request_id.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  /** UUID v4 unless the caller supplied one */
  request_id: string;

  [key: string]: unknown;
}

const storage = new AsyncLocalStorage<RequestContext>();

export function generateRequestId(): string {
  return randomUUID();
}

export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}

export function getRequestId(): string | undefined {
  return storage.getStore()?.request_id;
}

/**
 * Runs `fn` inside a fresh request context.
 *
 * @param fn - Work to run
 * @param requestId - Reuse an id (e.g. a Discord interaction id) instead of generating one
 * @param fields - Extra context, such as the command name
 *
 * @example
 * ```typescript
 * await withRequestContext(() => handler.handleInteraction(interaction), interaction.id, {
 *   command: interaction.commandName,
 * });
 * ```
 */
export async function withRequestContext<T>(
  fn: () => Promise<T> | T,
  requestId?: string,
  fields?: Record<string, unknown>
): Promise<T> {
  const context: RequestContext = {
    ...fields,
    request_id: requestId ?? generateRequestId(),
  };

  return storage.run(context, fn);
}

/**
 * Merges fields into the active context.
 * @returns false outside of a request context
 */
export function setRequestContext(fields: Record<string, unknown>): boolean {
  const context = storage.getStore();
  if (!context) {
    return false;
  }

  Object.assign(context, fields);
  return true;
}
