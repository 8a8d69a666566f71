import { InvalidRequestError } from './errors.js';
import { createConsoleLogger, type Logger, silentLogger } from './logger.js';
import type { AclBackend, AdminClientConfig } from './types.js';

export interface ResolvedAdminClientConfig {
  backend: AclBackend;
  logger: Logger;
  concurrency: number;
  requestTimeoutMs: number;
}

export const DEFAULT_CONCURRENCY = 5;
export const MIN_CONCURRENCY = 1;
export const MAX_CONCURRENCY = 100;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export function validateConcurrency(concurrency: number): number {
  if (!Number.isInteger(concurrency) || concurrency < MIN_CONCURRENCY || concurrency > MAX_CONCURRENCY) {
    throw new InvalidRequestError(
      `Invalid concurrency value "${concurrency}". Must be an integer between ${MIN_CONCURRENCY} and ${MAX_CONCURRENCY}.`
    );
  }
  return concurrency;
}

export function validateAdminClientConfig(config: AdminClientConfig): ResolvedAdminClientConfig {
  if (!config || typeof config.backend?.deleteAcls !== 'function') {
    throw new InvalidRequestError(
      'Invalid ACL admin client config: backend must implement deleteAcls(filter).'
    );
  }

  const concurrency = validateConcurrency(config.concurrency ?? DEFAULT_CONCURRENCY);

  const requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  if (!Number.isFinite(requestTimeoutMs) || requestTimeoutMs <= 0) {
    throw new InvalidRequestError(
      `Invalid requestTimeoutMs value "${requestTimeoutMs}". Must be a positive number of milliseconds.`
    );
  }

  const logger =
    config.logger ??
    (config.enableLogging ? createConsoleLogger({ prefix: 'acl-admin', level: config.logLevel }) : silentLogger);

  return { backend: config.backend, logger, concurrency, requestTimeoutMs };
}
