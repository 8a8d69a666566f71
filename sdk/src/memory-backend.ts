/**
 * In-process ACL store implementing the backend port.
 * Used by the tests and for local development without a broker.
 */

import {
  type AclBinding,
  type AclBindingFilter,
  aclBindingKey,
  aclFilterKey,
  matchesAclBinding,
} from './acl.js';
import { ErrorCode, type ErrorCodeValue } from './errors.js';
import type { AclBackend, AclDeleteResponse } from './types.js';

type FailureCode = Exclude<ErrorCodeValue, typeof ErrorCode.NONE>;

export class InMemoryAclBackend implements AclBackend {
  private readonly bindings = new Map<string, AclBinding>();
  private readonly deniedDeletions = new Map<string, { code: FailureCode; message?: string }>();
  private readonly failedFilters = new Map<string, { code: FailureCode; message?: string }>();

  constructor(initial: AclBinding[] = []) {
    this.addAcls(initial);
  }

  /**
   * Adds bindings; re-adding an existing binding is a no-op.
   */
  addAcls(bindings: AclBinding[]): void {
    for (const binding of bindings) {
      const key = aclBindingKey(binding);
      if (!this.bindings.has(key)) {
        this.bindings.set(key, binding);
      }
    }
  }

  listAcls(filter?: AclBindingFilter): AclBinding[] {
    const all = [...this.bindings.values()];
    return filter ? all.filter((binding) => matchesAclBinding(filter, binding)) : all;
  }

  /**
   * Makes deletion of this one binding fail with the given code. The binding stays.
   */
  denyDeletion(binding: AclBinding, code: FailureCode, message?: string): void {
    this.deniedDeletions.set(aclBindingKey(binding), { code, message });
  }

  /**
   * Makes the whole request for this filter fail with the given code.
   */
  failFilter(filter: AclBindingFilter, code: FailureCode, message?: string): void {
    this.failedFilters.set(aclFilterKey(filter), { code, message });
  }

  async deleteAcls(filter: AclBindingFilter): Promise<AclDeleteResponse> {
    const failure = this.failedFilters.get(aclFilterKey(filter));
    if (failure) {
      return { errorCode: failure.code, errorMessage: failure.message, matches: [] };
    }

    const matches: AclDeleteResponse['matches'] = [];
    for (const [key, binding] of this.bindings) {
      if (!matchesAclBinding(filter, binding)) {
        continue;
      }
      const denied = this.deniedDeletions.get(key);
      if (denied) {
        matches.push({ binding, errorCode: denied.code, errorMessage: denied.message });
        continue;
      }
      this.bindings.delete(key);
      matches.push({ binding, errorCode: ErrorCode.NONE });
    }

    return { errorCode: ErrorCode.NONE, matches };
  }
}
