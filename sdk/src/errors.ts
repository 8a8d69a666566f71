/**
 * Error types surfaced by the ACL admin SDK.
 *
 * ApiError covers failures the broker reported (with its numeric code);
 * InternalAdminError marks an invariant the SDK itself broke.
 */

export const ErrorCode = {
  NONE: 0,
  UNKNOWN_SERVER_ERROR: -1,
  REQUEST_TIMED_OUT: 7,
  CLUSTER_AUTHORIZATION_FAILED: 31,
  NOT_CONTROLLER: 41,
  INVALID_REQUEST: 42,
  SECURITY_DISABLED: 54,
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export class AdminError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Error.captureStackTrace(this, new.target);
  }
}

export class ApiError extends AdminError {
  readonly code: number;

  constructor(code: number, message: string) {
    super(message);
    this.code = code;
  }
}

export class UnknownServerError extends ApiError {
  constructor(message = 'The server experienced an unexpected error', code: number = ErrorCode.UNKNOWN_SERVER_ERROR) {
    super(code, message);
  }
}

export class TimeoutError extends ApiError {
  constructor(message = 'The request timed out') {
    super(ErrorCode.REQUEST_TIMED_OUT, message);
  }
}

export class ClusterAuthorizationError extends ApiError {
  constructor(message = 'Cluster authorization failed') {
    super(ErrorCode.CLUSTER_AUTHORIZATION_FAILED, message);
  }
}

export class NotControllerError extends ApiError {
  constructor(message = 'This is not the correct controller for this cluster') {
    super(ErrorCode.NOT_CONTROLLER, message);
  }
}

export class InvalidRequestError extends ApiError {
  constructor(message = 'The request was malformed') {
    super(ErrorCode.INVALID_REQUEST, message);
  }
}

export class SecurityDisabledError extends ApiError {
  constructor(message = 'Security features are disabled on the broker') {
    super(ErrorCode.SECURITY_DISABLED, message);
  }
}

export class InternalAdminError extends AdminError {
  constructor(message: string, cause: Error) {
    super(message, { cause });
  }
}

/**
 * Maps a broker error code to its error class.
 * Returns null for NONE; codes without a dedicated class become UnknownServerError.
 */
export function errorForCode(code: number, message?: string): ApiError | null {
  switch (code) {
    case ErrorCode.NONE:
      return null;
    case ErrorCode.UNKNOWN_SERVER_ERROR:
      return new UnknownServerError(message);
    case ErrorCode.REQUEST_TIMED_OUT:
      return new TimeoutError(message);
    case ErrorCode.CLUSTER_AUTHORIZATION_FAILED:
      return new ClusterAuthorizationError(message);
    case ErrorCode.NOT_CONTROLLER:
      return new NotControllerError(message);
    case ErrorCode.INVALID_REQUEST:
      return new InvalidRequestError(message);
    case ErrorCode.SECURITY_DISABLED:
      return new SecurityDisabledError(message);
    default:
      return new UnknownServerError(message ?? `Unrecognized error code ${code}`, code);
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : String(value));
}
