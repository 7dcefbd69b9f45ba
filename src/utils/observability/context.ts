import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types.js';

const logContextStorage = new AsyncLocalStorage<LogContext>();

/** Run `fn` with `context` merged over the enclosing one. */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  const parent = logContextStorage.getStore() ?? {};
  return logContextStorage.run({ ...parent, ...context }, fn);
}

/**
 * Tag every line written by a credential operation with its realm. The
 * enclosing request id is kept; the HTTP operation name is replaced.
 */
export function withRealmContext<T>(realmId: string, operation: string, fn: () => T): T {
  return withLogContext({ realmId, operation }, fn);
}

export function getLogContext(): LogContext {
  return logContextStorage.getStore() ?? {};
}

/** Id for one inbound request, e.g. `req_3f2a9c1b7d4e`. */
export function createRequestId(prefix = 'req'): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}
