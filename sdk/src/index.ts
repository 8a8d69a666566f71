/**
 * ACL Admin SDK
 *
 * Deletes ACL bindings by filter through a pluggable backend and hands back
 * a DeleteAclsResult: one future per filter plus a combined `all()` future.
 * Emits lifecycle events for each filter as it completes.
 */

import { EventEmitter } from 'node:events';
import { type AclBindingFilter, validateAclBindingFilter } from './acl.js';
import { dispatchPerFilter } from './batch-operations.js';
import { type ResolvedAdminClientConfig, validateAdminClientConfig } from './config.js';
import { DeleteAclsResult, FilterResult, type FilterResults, isDeleted } from './delete-acls-result.js';
import { errorForCode, InvalidRequestError } from './errors.js';
import type { AclAdminEvents, AclAdminEventType, AclDeleteResponse, AdminClientConfig } from './types.js';

// ---------------------------------------------------------------------------
// AclAdminClient
// ---------------------------------------------------------------------------

export class AclAdminClient extends EventEmitter {
  private readonly config: ResolvedAdminClientConfig;

  constructor(config: AdminClientConfig) {
    super();
    this.config = validateAdminClientConfig(config);
  }

  /**
   * Delete every ACL binding matched by each filter.
   * - Filters are deduplicated by value; each distinct filter gets one future
   * - Invalid filters fail their own future without reaching the backend
   * - Emits 'deleting', then 'filterDeleted' or 'filterFailed' per filter
   */
  deleteAcls(filters: AclBindingFilter[]): DeleteAclsResult {
    const { logger } = this.config;
    logger.info('Starting ACL deletion', { filterCount: filters.length });
    this.emitEvent('deleting', { filterCount: filters.length });

    const futures = dispatchPerFilter<FilterResults>(
      filters,
      (filter) => this.deleteForFilter(filter),
      {
        concurrency: this.config.concurrency,
        timeoutMs: this.config.requestTimeoutMs,
        logger,
      }
    );

    for (const [filter, future] of futures) {
      future.onSettled((settlement) => {
        if (settlement.status === 'fulfilled') {
          const deleted = settlement.value.results.filter(isDeleted).length;
          this.emitEvent('filterDeleted', {
            filter,
            deleted,
            failed: settlement.value.results.length - deleted,
          });
        } else {
          // the dispatcher already logged the failure
          this.emitEvent('filterFailed', { filter, error: settlement.reason });
        }
      });
    }

    return new DeleteAclsResult(futures);
  }

  private emitEvent<K extends AclAdminEventType>(type: K, event: AclAdminEvents[K]): void {
    this.emit(type, event);
  }

  private async deleteForFilter(filter: AclBindingFilter): Promise<FilterResults> {
    const validation = validateAclBindingFilter(filter);
    if (!validation.isValid) {
      const firstError = Object.values(validation.errors)[0];
      throw new InvalidRequestError(firstError);
    }

    const response = await this.config.backend.deleteAcls(filter);
    return toFilterResults(response);
  }
}

/**
 * Converts a backend reply into per-binding outcomes.
 * Throws the filter-level error when the reply carries one.
 */
export function toFilterResults(response: AclDeleteResponse): FilterResults {
  const filterError = errorForCode(response.errorCode, response.errorMessage);
  if (filterError) {
    throw filterError;
  }

  return {
    results: response.matches.map((match) => {
      const error = errorForCode(match.errorCode, match.errorMessage);
      return error ? FilterResult.failed(error) : FilterResult.deleted(match.binding);
    }),
  };
}

export function createAclAdminClient(config: AdminClientConfig): AclAdminClient {
  return new AclAdminClient(config);
}

export * from './acl.js';
export * from './errors.js';
export { AdminFuture, type Settlement, type SettlementListener } from './future.js';
export { allOf, CountdownLatch, type Settleable } from './join.js';
export {
  DeleteAclsResult,
  FilterResult,
  isDeleted,
  type FilterResults,
  type FilterSummary,
  type DeleteAclsSummary,
} from './delete-acls-result.js';
export { dispatchPerFilter, type DispatchOptions } from './batch-operations.js';
export {
  validateAdminClientConfig,
  DEFAULT_CONCURRENCY,
  DEFAULT_REQUEST_TIMEOUT_MS,
  type ResolvedAdminClientConfig,
} from './config.js';
export { InMemoryAclBackend } from './memory-backend.js';
export { silentLogger, createConsoleLogger, createCompositeLogger, type ConsoleLoggerOptions } from './logger.js';
export type * from './types.js';
