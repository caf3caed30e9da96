import { randomUUID } from "node:crypto";

import type { Authenticator } from "../auth/authenticator";
import { DEFAULT_UPSTREAM_TIMEOUT_MS } from "../config/code-assist";
import type { EndpointRegistry, OperationName } from "../config/endpoint-registry";
import {
  authExpired,
  describeError,
  fail,
  malformedUpstreamResponse,
  ok,
  upstreamError,
  upstreamTimeout,
  type RelayError,
  type Result,
} from "../errors";
import { NOOP_LOGGER, redactSecret, type Logger } from "../logging";
import type { OnboardingCoordinator } from "../onboarding/onboarding-coordinator";
import {
  isStreaming,
  toRaw,
  type GeminiAction,
  type GeminiRequest,
  type RawRequest,
} from "../transformer/request";
import { decodeRaw, fromRaw, type GeminiResponse } from "../transformer/response";
import { translateSseStream } from "../transformer/stream";
import type { CallFailure, CodeAssistClient, UpstreamResponse } from "./code-assist-client";

export type DispatchResult =
  | { kind: "json"; body: GeminiResponse }
  | { kind: "stream"; body: ReadableStream<Uint8Array> };

export type ProxyDispatcherOptions = {
  authenticator: Authenticator;
  onboarding: OnboardingCoordinator;
  client: CodeAssistClient;
  registry: EndpointRegistry;
  tenantId?: string;
  timeoutMs?: number;
  createPromptId?: () => string;
  logger?: Logger;
};

export type Dispatcher = Pick<ProxyDispatcher, "handle">;

const OPERATION_BY_ACTION: Record<GeminiAction, OperationName> = {
  generateContent: "codeAssist.generateContent",
  streamGenerateContent: "codeAssist.streamGenerateContent",
  countTokens: "codeAssist.countTokens",
};

const EXCERPT_LENGTH = 200;

export class ProxyDispatcher {
  private readonly authenticator: Authenticator;
  private readonly onboarding: OnboardingCoordinator;
  private readonly client: CodeAssistClient;
  private readonly registry: EndpointRegistry;
  private readonly tenantId: string | undefined;
  private readonly timeoutMs: number;
  private readonly createPromptId: () => string;
  private readonly logger: Logger;

  constructor(options: ProxyDispatcherOptions) {
    this.authenticator = options.authenticator;
    this.onboarding = options.onboarding;
    this.client = options.client;
    this.registry = options.registry;
    this.tenantId = options.tenantId;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_UPSTREAM_TIMEOUT_MS;
    this.createPromptId = options.createPromptId ?? randomUUID;
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  async handle(request: GeminiRequest): Promise<Result<DispatchResult, RelayError>> {
    const endpoint = this.registry.resolve(OPERATION_BY_ACTION[request.action]);
    if (!endpoint.ok) {
      return endpoint;
    }
    const operation = endpoint.value.operationName;

    const credential = await this.authenticator.ensureValid();
    if (!credential.ok) {
      return credential;
    }
    const tenant = await this.onboarding.ensureOnboarded(this.tenantId);
    if (!tenant.ok) {
      return tenant;
    }
    const raw = toRaw(request, {
      projectId: tenant.value.projectId,
      userPromptId: this.createPromptId(),
    });
    if (!raw.ok) {
      return raw;
    }

    const accessToken = credential.value.accessToken;
    let call = await this.send(operation, accessToken, raw.value, request.signal);
    if (isUnauthorized(call)) {
      this.logger.warn("upstream_unauthorized", {
        operation,
        token: redactSecret(accessToken),
        retry: true,
      });
      const refreshed = await this.authenticator.forceRefresh(accessToken);
      if (!refreshed.ok) {
        return refreshed;
      }
      call = await this.send(operation, refreshed.value.accessToken, raw.value, request.signal);
      if (isUnauthorized(call)) {
        this.logger.warn("upstream_unauthorized", { operation, retry: false });
        return fail(
          authExpired("Code Assist rejected the refreshed credential. Sign in again at /login.")
        );
      }
    }
    if (!call.ok) {
      return fail(this.toRelayError(call.error));
    }

    if (isStreaming(request)) {
      return this.stream(call.value);
    }
    return this.readJson(operation, request.action, call.value);
  }

  private send(
    operation: OperationName,
    accessToken: string,
    raw: RawRequest,
    signal: AbortSignal | undefined
  ): Promise<Result<UpstreamResponse, CallFailure>> {
    return this.client.call(operation, {
      accessToken,
      body: raw.body,
      timeoutMs: this.timeoutMs,
      signal,
      stream: raw.action === "streamGenerateContent",
    });
  }

  private stream(upstream: UpstreamResponse): Result<DispatchResult, RelayError> {
    const body = upstream.response.body;
    if (!body) {
      upstream.release();
      return fail(malformedUpstreamResponse("body", "stream response has no body"));
    }
    return ok<DispatchResult>({
      kind: "stream",
      body: translateSseStream(body, {
        logger: this.logger,
        mapReadError: (error) =>
          upstream.timedOut()
            ? upstreamTimeout(this.timeoutMs)
            : upstreamError({
                statusCode: 502,
                message: `Upstream stream failed: ${describeError(error)}`,
              }),
        onClose: upstream.release,
      }),
    });
  }

  private async readJson(
    operation: OperationName,
    action: GeminiAction,
    upstream: UpstreamResponse
  ): Promise<Result<DispatchResult, RelayError>> {
    let text: string;
    try {
      text = await upstream.response.text();
    } catch (error) {
      if (upstream.timedOut()) {
        return fail(upstreamTimeout(this.timeoutMs));
      }
      return fail(
        upstreamError({
          statusCode: 502,
          message: `Failed to read upstream response: ${describeError(error)}`,
        })
      );
    } finally {
      upstream.release();
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      return this.malformed(
        operation,
        malformedUpstreamResponse("$", "body is not valid JSON"),
        text
      );
    }

    const decoded = decodeRaw(action, payload);
    const translated = decoded.ok ? fromRaw(decoded.value) : decoded;
    if (!translated.ok) {
      if (translated.error.code === "MALFORMED_UPSTREAM_RESPONSE") {
        return this.malformed(operation, translated.error, text);
      }
      return translated;
    }
    return ok<DispatchResult>({ kind: "json", body: translated.value });
  }

  private malformed(
    operation: OperationName,
    error: RelayError,
    text: string
  ): Result<never, RelayError> {
    this.logger.error("malformed_upstream_response", {
      operation,
      message: error.message,
      excerpt: text.slice(0, EXCERPT_LENGTH),
    });
    return fail(error);
  }

  private toRelayError(failure: CallFailure): RelayError {
    switch (failure.kind) {
      case "unknown_operation":
        return failure.error;
      case "timeout":
        return upstreamTimeout(failure.timeoutMs);
      case "aborted":
        return upstreamError({
          statusCode: 499,
          message: "Client closed the request.",
          upstreamStatus: "CANCELLED",
        });
      case "network":
        return upstreamError({
          statusCode: 502,
          message: `Failed to reach Code Assist: ${failure.message}`,
        });
      case "http":
        return failure.error;
    }
  }
}

function isUnauthorized(call: Result<UpstreamResponse, CallFailure>): boolean {
  return !call.ok && call.error.kind === "http" && call.error.status === 401;
}
