import type { RelayError, RelayErrorCode } from "../errors";

export const ERROR_DOMAIN = "code-assist-relay";

export type GeminiErrorBody = {
  error: {
    code: number;
    message: string;
    status: string;
    details: Array<{ "@type": string; reason: RelayErrorCode; domain: string }>;
  };
};

const STATUS_BY_CODE: Record<Exclude<RelayErrorCode, "UPSTREAM_ERROR">, string> = {
  UNKNOWN_OPERATION: "INTERNAL",
  AUTH_EXPIRED: "UNAUTHENTICATED",
  AUTH_TRANSIENT: "UNAVAILABLE",
  ONBOARDING_FAILED: "FAILED_PRECONDITION",
  UPSTREAM_TIMEOUT: "DEADLINE_EXCEEDED",
  MALFORMED_UPSTREAM_RESPONSE: "INTERNAL",
  INVALID_REQUEST: "INVALID_ARGUMENT",
  UNAUTHORIZED_CLIENT: "UNAUTHENTICATED",
};

const STATUS_BY_HTTP: Partial<Record<number, string>> = {
  400: "INVALID_ARGUMENT",
  401: "UNAUTHENTICATED",
  403: "PERMISSION_DENIED",
  404: "NOT_FOUND",
  409: "ALREADY_EXISTS",
  429: "RESOURCE_EXHAUSTED",
  499: "CANCELLED",
  500: "INTERNAL",
  501: "UNIMPLEMENTED",
  503: "UNAVAILABLE",
  504: "DEADLINE_EXCEEDED",
};

export function geminiStatusName(error: RelayError): string {
  if (error.code === "INVALID_REQUEST") {
    return STATUS_BY_HTTP[error.statusCode] ?? STATUS_BY_CODE.INVALID_REQUEST;
  }
  if (error.code !== "UPSTREAM_ERROR") {
    return STATUS_BY_CODE[error.code];
  }
  return (
    error.upstreamStatus ??
    STATUS_BY_HTTP[error.statusCode] ??
    (error.statusCode >= 500 ? "INTERNAL" : "UNKNOWN")
  );
}

/** Renders any relay failure as the error body a Gemini client expects. */
export function toGeminiError(error: RelayError): GeminiErrorBody {
  return {
    error: {
      code: error.statusCode,
      message: error.message,
      status: geminiStatusName(error),
      details: [
        {
          "@type": "type.googleapis.com/google.rpc.ErrorInfo",
          reason: error.code,
          domain: ERROR_DOMAIN,
        },
      ],
    },
  };
}

export function encodeSseError(error: RelayError): string {
  return `data: ${JSON.stringify(toGeminiError(error))}\n\n`;
}
