import type { AuthErrorCode } from "./codes.js";

export type AuthError = {
  code: AuthErrorCode;
  message: string;
  details?: unknown;
};

export function err(
  code: AuthErrorCode,
  message: string,
  details?: unknown,
): AuthError {
  return { code, message, ...(details !== undefined ? { details } : {}) };
}

/**
 * Thrown while building a service or registry from bad configuration.
 * Request-time failures are returned as `AuthError` results instead.
 */
export class ConfigurationError extends Error {
  readonly code: AuthErrorCode = "AUTH_CONFIG_ERROR";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export type UserInfoFailureReason =
  | "NETWORK"
  | "HTTP_STATUS"
  | "MALFORMED_RESPONSE";

export class UserInfoRetrievalError extends Error {
  readonly reason: UserInfoFailureReason;
  readonly status?: number;
  readonly details?: Record<string, unknown>;

  constructor(
    reason: UserInfoFailureReason,
    message: string,
    options: {
      cause?: unknown;
      status?: number;
      details?: Record<string, unknown>;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "UserInfoRetrievalError";
    this.reason = reason;
    if (options.status !== undefined) this.status = options.status;
    if (options.details !== undefined) this.details = options.details;
  }
}
