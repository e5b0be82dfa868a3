export const AUTH_ERROR_CODES = {
  configuration_invalid: "configuration_invalid",
  transient_failure: "transient_failure",
  authentication_rejected: "authentication_rejected",
  authentication_failed: "authentication_failed",
  protocol_error: "protocol_error",
  request_cancelled: "request_cancelled",
  retries_exhausted: "retries_exhausted",
  provider_released: "provider_released",
} as const;

export type AuthErrorCode =
  (typeof AUTH_ERROR_CODES)[keyof typeof AUTH_ERROR_CODES];

export interface AuthErrorOptions {
  cause?: unknown;
  status?: number;
  retryable?: boolean;
}

export class AuthError extends Error {
  readonly code: AuthErrorCode;
  readonly status?: number;
  readonly retryable: boolean;

  constructor(code: AuthErrorCode, message: string, options?: AuthErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "AuthError";
    this.code = code;
    this.status = options?.status;
    this.retryable = options?.retryable ?? code === AUTH_ERROR_CODES.transient_failure;
  }
}

export function configurationError(message: string): AuthError {
  return new AuthError(AUTH_ERROR_CODES.configuration_invalid, message);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
