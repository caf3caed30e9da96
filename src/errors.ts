export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type RelayErrorCode =
  | "UNKNOWN_OPERATION"
  | "AUTH_EXPIRED"
  | "AUTH_TRANSIENT"
  | "ONBOARDING_FAILED"
  | "UPSTREAM_TIMEOUT"
  | "MALFORMED_UPSTREAM_RESPONSE"
  | "UPSTREAM_ERROR"
  | "INVALID_REQUEST"
  | "UNAUTHORIZED_CLIENT";

export type RelayError = {
  code: RelayErrorCode;
  message: string;
  statusCode: number;
  retryable: boolean;
  /** Seconds, as sent in a `Retry-After` header. */
  retryAfter?: string;
  /** Google RPC status name reported by the provider, when it sent one. */
  upstreamStatus?: string;
  cause?: unknown;
};

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail(error: RelayError): Result<never, RelayError> {
  return { ok: false, error };
}

export function unknownOperation(operationName: string): RelayError {
  return {
    code: "UNKNOWN_OPERATION",
    message: `Unknown upstream operation: ${operationName}`,
    statusCode: 500,
    retryable: false,
  };
}

export function authExpired(message: string, cause?: unknown): RelayError {
  return {
    code: "AUTH_EXPIRED",
    message,
    statusCode: 401,
    retryable: false,
    cause,
  };
}

export function authTransient(message: string, cause?: unknown): RelayError {
  return {
    code: "AUTH_TRANSIENT",
    message,
    statusCode: 503,
    retryable: true,
    cause,
  };
}

export function onboardingFailed(reason: string, cause?: unknown): RelayError {
  return {
    code: "ONBOARDING_FAILED",
    message: `Onboarding failed: ${reason}`,
    statusCode: 502,
    retryable: false,
    cause,
  };
}

export function upstreamTimeout(timeoutMs: number): RelayError {
  return {
    code: "UPSTREAM_TIMEOUT",
    message: `Upstream request timed out after ${timeoutMs}ms.`,
    statusCode: 504,
    retryable: true,
  };
}

export function malformedUpstreamResponse(field: string, message: string): RelayError {
  return {
    code: "MALFORMED_UPSTREAM_RESPONSE",
    message: `Malformed upstream response at ${field}: ${message}`,
    statusCode: 502,
    retryable: false,
  };
}

export function upstreamError(options: {
  statusCode: number;
  message: string;
  upstreamStatus?: string;
  retryAfter?: string;
}): RelayError {
  return {
    code: "UPSTREAM_ERROR",
    message: options.message,
    statusCode: options.statusCode,
    retryable: options.statusCode === 429 || options.statusCode >= 500,
    upstreamStatus: options.upstreamStatus,
    retryAfter: options.retryAfter,
  };
}

export function invalidRequest(message: string, statusCode = 400): RelayError {
  return {
    code: "INVALID_REQUEST",
    message,
    statusCode,
    retryable: false,
  };
}

export function unauthorizedClient(): RelayError {
  return {
    code: "UNAUTHORIZED_CLIENT",
    message: "Missing or invalid API key.",
    statusCode: 401,
    retryable: false,
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
