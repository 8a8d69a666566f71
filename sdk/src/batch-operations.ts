/**
 * Batch Dispatch Helper
 * Starts one async operation per distinct filter, with a cap on how many run
 * at once, and wires each outcome into that filter's AdminFuture.
 * Failures stay on their own future; they never block the other filters.
 */

import { type AclBindingFilter, aclFilterKey, describeAclBindingFilter } from './acl.js';
import { validateConcurrency } from './config.js';
import { TimeoutError, toError } from './errors.js';
import { AdminFuture } from './future.js';
import { type Logger, silentLogger } from './logger.js';

export interface DispatchOptions {
  /** Maximum operations in flight at once, an integer from 1 to 100 */
  concurrency: number;
  /** Per-operation deadline; the filter's future fails with TimeoutError once it passes */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Returns the futures right away, keyed by the first occurrence of each
 * distinct filter; a filter passed twice is dispatched once.
 * Throws InvalidRequestError for a concurrency outside 1..100.
 */
export function dispatchPerFilter<R>(
  filters: AclBindingFilter[],
  operation: (filter: AclBindingFilter) => Promise<R>,
  options: DispatchOptions
): Map<AclBindingFilter, AdminFuture<R>> {
  const concurrency = validateConcurrency(options.concurrency);
  const log = options.logger ?? silentLogger;
  const futures = new Map<AclBindingFilter, AdminFuture<R>>();
  const seen = new Set<string>();

  for (const filter of filters) {
    const key = aclFilterKey(filter);
    if (seen.has(key)) {
      log.debug('Skipping duplicate filter', { filter: describeAclBindingFilter(filter) });
      continue;
    }
    seen.add(key);
    futures.set(filter, new AdminFuture<R>());
  }

  const pending = [...futures.entries()];
  if (pending.length === 0) {
    return futures;
  }

  log.info('Batch dispatch starting', { totalFilters: pending.length, concurrency });

  let cursor = 0;
  let remaining = pending.length;
  let succeeded = 0;

  const settle = (filter: AclBindingFilter, apply: () => void): void => {
    try {
      apply();
    } catch (err) {
      log.error('Result listener threw', {
        filter: describeAclBindingFilter(filter),
        error: toError(err).message,
      });
    }
  };

  const runOne = async (filter: AclBindingFilter, future: AdminFuture<R>): Promise<void> => {
    const description = describeAclBindingFilter(filter);
    log.debug('Dispatching filter', { filter: description });
    try {
      const value = await withTimeout(operation(filter), options.timeoutMs);
      succeeded++;
      log.debug('Filter completed', { filter: description });
      settle(filter, () => future.complete(value));
    } catch (err) {
      const error = toError(err);
      log.warn('Filter failed', { filter: description, error: error.message });
      settle(filter, () => future.completeExceptionally(error));
    } finally {
      remaining--;
      if (remaining === 0) {
        log.info('Batch dispatch completed', {
          totalFilters: pending.length,
          succeeded,
          failed: pending.length - succeeded,
        });
      }
      startNext();
    }
  };

  const startNext = (): void => {
    const next = pending[cursor];
    if (next === undefined) {
      return;
    }
    cursor++;
    // Deferred so every future is handed back before any operation runs
    void Promise.resolve().then(() => runOne(next[0], next[1]));
  };

  for (let i = 0; i < Math.min(concurrency, pending.length); i++) {
    startNext();
  }

  return futures;
}

async function withTimeout<R>(promise: Promise<R>, timeoutMs: number | undefined): Promise<R> {
  if (timeoutMs === undefined) {
    return promise;
  }
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`Request timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
