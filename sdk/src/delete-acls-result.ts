/**
 * Result of a batched ACL delete.
 *
 * One future per distinct filter, plus `all()`, which joins them and
 * collapses everything into "every matched binding deleted, or the first
 * failure". Callers that need every error walk `resultsByFilter()`.
 */

import { type AclBinding, type AclBindingFilter, aclFilterKey, describeAclBindingFilter } from './acl.js';
import { type ApiError, InternalAdminError, InvalidRequestError } from './errors.js';
import { AdminFuture } from './future.js';
import { allOf } from './join.js';

/**
 * Outcome for one binding matched by a filter: deleted, or failed with the
 * broker's reason. Never both.
 */
export type FilterResult =
  | { readonly kind: 'deleted'; readonly binding: AclBinding }
  | { readonly kind: 'failed'; readonly error: ApiError };

export const FilterResult = {
  deleted(binding: AclBinding): FilterResult {
    const result: FilterResult = { kind: 'deleted', binding };
    return Object.freeze(result);
  },
  failed(error: ApiError): FilterResult {
    const result: FilterResult = { kind: 'failed', error };
    return Object.freeze(result);
  },
};

export function isDeleted(
  result: FilterResult
): result is Extract<FilterResult, { kind: 'deleted' }> {
  return result.kind === 'deleted';
}

/** Every outcome for one filter, in the order the broker returned them. */
export interface FilterResults {
  readonly results: readonly FilterResult[];
}

export interface FilterSummary {
  filter: AclBindingFilter;
  deleted: number;
  failed: number;
  /** Set when the whole filter failed; counts are then zero. */
  error?: Error;
}

export interface DeleteAclsSummary {
  filters: FilterSummary[];
  totalDeleted: number;
  totalFailed: number;
  failedFilters: number;
}

export class DeleteAclsResult {
  private readonly futures: ReadonlyMap<AclBindingFilter, AdminFuture<FilterResults>>;
  private readonly byKey: ReadonlyMap<string, AclBindingFilter>;

  constructor(entries: Iterable<readonly [AclBindingFilter, AdminFuture<FilterResults>]>) {
    const futures = new Map<AclBindingFilter, AdminFuture<FilterResults>>();
    const byKey = new Map<string, AclBindingFilter>();

    for (const [filter, future] of entries) {
      const key = aclFilterKey(filter);
      if (byKey.has(key)) {
        throw new InvalidRequestError(
          `Duplicate filter in delete result: ${describeAclBindingFilter(filter)}`
        );
      }
      byKey.set(key, filter);
      futures.set(filter, future);
    }

    this.futures = futures;
    this.byKey = byKey;
  }

  /**
   * Futures keyed by filter, for checking each filter's deletions separately.
   * Each call returns a fresh copy; the result's own key set never changes.
   */
  resultsByFilter(): ReadonlyMap<AclBindingFilter, AdminFuture<FilterResults>> {
    return new Map(this.futures);
  }

  /**
   * Looks up a filter by value, so a structurally equal filter finds the same future.
   */
  resultFor(filter: AclBindingFilter): AdminFuture<FilterResults> | undefined {
    const known = this.byKey.get(aclFilterKey(filter));
    return known === undefined ? undefined : this.futures.get(known);
  }

  filters(): AclBindingFilter[] {
    return [...this.futures.keys()];
  }

  /**
   * Succeeds with every deleted binding once all filters have completed and
   * none reported a failed binding. A filter matching nothing is not an error.
   *
   * Fails with the first failed binding's error (filter order, then broker
   * order within a filter), or with the filter-level failure the join reports.
   */
  all(): AdminFuture<AclBinding[]> {
    return allOf([...this.futures.values()]).thenApply(() => {
      const deleted: AclBinding[] = [];
      for (const [filter, future] of this.futures) {
        const settlement = future.peek();
        if (settlement === undefined || settlement.status === 'rejected') {
          // allOf only succeeds once every input succeeded
          const cause =
            settlement?.status === 'rejected'
              ? settlement.reason
              : new Error(`Result for ${describeAclBindingFilter(filter)} is still pending`);
          throw new InternalAdminError('DeleteAclsResult.all: internal error', cause);
        }
        for (const result of settlement.value.results) {
          if (result.kind === 'failed') {
            throw result.error;
          }
          deleted.push(result.binding);
        }
      }
      return deleted;
    });
  }

  /**
   * Per-filter counts once every filter has completed. Never fails.
   */
  summary(): AdminFuture<DeleteAclsSummary> {
    const summary = new AdminFuture<DeleteAclsSummary>();
    const filters: FilterSummary[] = [];

    allOf([...this.futures.values()]).onSettled(() => {
      for (const [filter, future] of this.futures) {
        const settlement = future.peek();
        if (settlement?.status === 'fulfilled') {
          const deleted = settlement.value.results.filter(isDeleted).length;
          filters.push({ filter, deleted, failed: settlement.value.results.length - deleted });
        } else if (settlement?.status === 'rejected') {
          filters.push({ filter, deleted: 0, failed: 0, error: settlement.reason });
        }
      }
      summary.complete({
        filters,
        totalDeleted: filters.reduce((sum, f) => sum + f.deleted, 0),
        totalFailed: filters.reduce((sum, f) => sum + f.failed, 0),
        failedFilters: filters.filter((f) => f.error !== undefined).length,
      });
    });

    return summary;
  }
}
