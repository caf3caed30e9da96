import { z } from "zod";

import { CODE_ASSIST_HEADERS } from "../config/code-assist";
import type { EndpointRegistry, OperationName } from "../config/endpoint-registry";
import { describeError, upstreamError, type RelayError, type Result } from "../errors";
import { NOOP_LOGGER, type Logger } from "../logging";
import { createDeadline } from "../utils/deadline";

export type CodeAssistCallOptions = {
  accessToken: string;
  body: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
  stream?: boolean;
};

export type UpstreamResponse = {
  response: Response;
  /** Must be called once the body has been consumed or abandoned. */
  release: () => void;
  /** True once the call's deadline, not the caller, cut it short. */
  timedOut: () => boolean;
};

export type CallFailure =
  | { kind: "unknown_operation"; error: RelayError }
  | { kind: "timeout"; timeoutMs: number }
  | { kind: "aborted" }
  | { kind: "network"; message: string; cause: unknown }
  | { kind: "http"; status: number; error: RelayError };

export type CodeAssistClient = {
  call: (
    operation: OperationName,
    options: CodeAssistCallOptions
  ) => Promise<Result<UpstreamResponse, CallFailure>>;
};

export type CreateCodeAssistClientOptions = {
  registry: EndpointRegistry;
  fetch?: typeof fetch;
  now?: () => number;
  logger?: Logger;
};

const GoogleErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
    details: z.array(z.unknown()).optional(),
  }),
});

const QuotaDetailSchema = z.object({
  metadata: z.object({ quotaResetTimeStamp: z.string() }),
});

export function createCodeAssistClient(
  options: CreateCodeAssistClientOptions
): CodeAssistClient {
  const fetcher = options.fetch ?? globalThis.fetch.bind(globalThis);
  const now = options.now ?? (() => Date.now());
  const logger = options.logger ?? NOOP_LOGGER;

  return {
    call: async (operation, callOptions) => {
      const endpoint = options.registry.resolve(operation);
      if (!endpoint.ok) {
        return { ok: false, error: { kind: "unknown_operation", error: endpoint.error } };
      }

      const deadline = createDeadline(callOptions.timeoutMs, callOptions.signal);
      const headers: Record<string, string> = {
        "Content-Type": "application/json",
        Authorization: `Bearer ${callOptions.accessToken}`,
        ...CODE_ASSIST_HEADERS,
      };
      if (callOptions.stream) {
        headers.Accept = "text/event-stream";
      }

      const start = now();
      let response: Response;
      try {
        response = await fetcher(endpoint.value.url, {
          method: endpoint.value.httpMethod,
          headers,
          body: JSON.stringify(callOptions.body),
          signal: deadline.signal,
        });
      } catch (error) {
        const timedOut = deadline.timedOut();
        deadline.dispose();
        if (timedOut) {
          logger.warn("upstream_call_timeout", { operation, timeoutMs: callOptions.timeoutMs });
          return { ok: false, error: { kind: "timeout", timeoutMs: callOptions.timeoutMs } };
        }
        if (callOptions.signal?.aborted) {
          logger.info("upstream_call_aborted", { operation });
          return { ok: false, error: { kind: "aborted" } };
        }
        logger.error("upstream_call_failed", { operation, message: describeError(error) });
        return {
          ok: false,
          error: { kind: "network", message: describeError(error), cause: error },
        };
      }

      logger.debug("upstream_call_end", {
        operation,
        status: response.status,
        durationMs: now() - start,
      });

      if (!response.ok) {
        const bodyText = await readResponseText(response);
        deadline.dispose();
        const mapped = toUpstreamError(response, bodyText, now());
        logger.warn("upstream_call_rejected", {
          operation,
          status: response.status,
          upstreamStatus: mapped.upstreamStatus,
        });
        return { ok: false, error: { kind: "http", status: response.status, error: mapped } };
      }

      return {
        ok: true,
        value: { response, release: deadline.dispose, timedOut: deadline.timedOut },
      };
    },
  };
}

export function toUpstreamError(
  response: Response,
  bodyText: string | undefined,
  now: number
): RelayError {
  const parsed = parseGoogleError(bodyText);
  const retryAfter =
    response.headers.get("Retry-After") ??
    (response.status === 429 ? quotaResetDelaySeconds(parsed?.details, now) : undefined);
  return upstreamError({
    statusCode: response.status,
    message: parsed?.message || defaultUpstreamMessage(response.status),
    upstreamStatus: parsed?.status,
    retryAfter,
  });
}

export function parseGoogleError(
  bodyText: string | undefined
): z.infer<typeof GoogleErrorSchema>["error"] | null {
  if (!bodyText?.trim()) {
    return null;
  }
  let json: unknown;
  try {
    json = JSON.parse(bodyText);
  } catch {
    return null;
  }
  // Error bodies sometimes arrive wrapped in a one-element array.
  const candidate = Array.isArray(json) ? json[0] : json;
  const parsed = GoogleErrorSchema.safeParse(candidate);
  return parsed.success ? parsed.data.error : null;
}

/** Seconds until the earliest `quotaResetTimeStamp` in the error details. */
export function quotaResetDelaySeconds(
  details: readonly unknown[] | undefined,
  now: number
): string | undefined {
  for (const detail of details ?? []) {
    const parsed = QuotaDetailSchema.safeParse(detail);
    if (!parsed.success) continue;
    const resetAt = Date.parse(parsed.data.metadata.quotaResetTimeStamp);
    if (Number.isNaN(resetAt)) continue;
    const seconds = Math.ceil((resetAt - now) / 1000);
    if (seconds > 0) {
      return String(seconds);
    }
  }
  return undefined;
}

function defaultUpstreamMessage(status: number): string {
  switch (status) {
    case 400:
      return "Invalid request";
    case 401:
      return "Authentication failed";
    case 403:
      return "Permission denied";
    case 404:
      return "Unknown model";
    case 429:
      return "Rate limit exceeded";
    default:
      return `Upstream error (${status})`;
  }
}

async function readResponseText(response: Response): Promise<string | undefined> {
  try {
    return await response.text();
  } catch {
    return undefined;
  }
}
