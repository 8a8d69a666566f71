import type { AclBinding, AclBindingFilter } from './acl.js';
import type { Logger, LogLevel } from './logger.js';

/**
 * Broker reply for one filter. `errorCode` other than 0 means the whole
 * filter failed; each match carries its own code for the binding it names.
 */
export interface AclDeleteResponse {
  errorCode: number;
  errorMessage?: string;
  matches: Array<{
    binding: AclBinding;
    errorCode: number;
    errorMessage?: string;
  }>;
}

/**
 * Performs the remote delete for a single filter.
 * Request building, transport and retries live behind this port.
 */
export interface AclBackend {
  deleteAcls(filter: AclBindingFilter): Promise<AclDeleteResponse>;
}

/**
 * ACL admin client configuration
 */
export interface AdminClientConfig {
  /** Backend that executes the per-filter deletes (required) */
  backend: AclBackend;
  /** Structured logger (default: silent) */
  logger?: Logger;
  /** Log to the console when no logger is given (default: false) */
  enableLogging?: boolean;
  /** Lowest level the console logger writes (default: 'info') */
  logLevel?: LogLevel;
  /** Maximum filters in flight at once (default: 5) */
  concurrency?: number;
  /** Deadline for each filter's delete in milliseconds (default: 30000) */
  requestTimeoutMs?: number;
}

export interface DeletingEvent {
  filterCount: number;
}

export interface FilterDeletedEvent {
  filter: AclBindingFilter;
  deleted: number;
  failed: number;
}

export interface FilterFailedEvent {
  filter: AclBindingFilter;
  error: Error;
}

/** Payload carried by each client event */
export interface AclAdminEvents {
  deleting: DeletingEvent;
  filterDeleted: FilterDeletedEvent;
  filterFailed: FilterFailedEvent;
}

export type AclAdminEventType = keyof AclAdminEvents;

export type { Logger, LogLevel } from './logger.js';
