import { describe, expect, it } from "vitest";

import { createEndpointRegistry, type EndpointRegistry } from "../src/config/endpoint-registry";
import {
  authExpired,
  fail,
  ok,
  onboardingFailed,
  unknownOperation,
  type RelayError,
  type Result,
} from "../src/errors";
import type {
  OnboardingCoordinator,
  TenantOnboardingState,
} from "../src/onboarding/onboarding-coordinator";
import { createCodeAssistClient } from "../src/proxy/code-assist-client";
import { ProxyDispatcher } from "../src/proxy/dispatcher";
import type { GeminiRequest } from "../src/transformer/request";
import { createCaptureLogger } from "./helpers/capture-logger";
import { FakeAuthenticator } from "./helpers/fake-authenticator";
import {
  createFetchStub,
  hangUntilAborted,
  jsonResponse,
  readAll,
  sseResponse,
  type StubHandler,
} from "./helpers/fetch-stub";

const GENERATE_URL = "https://cloudcode-pa.googleapis.com/v1internal:generateContent";

class StaticOnboarding implements OnboardingCoordinator {
  tenants: Array<string | undefined> = [];

  constructor(private readonly failure?: RelayError) {}

  async ensureOnboarded(tenantId?: string): Promise<Result<TenantOnboardingState, RelayError>> {
    this.tenants.push(tenantId);
    if (this.failure) {
      return fail(this.failure);
    }
    const state: TenantOnboardingState = { tenantId, onboarded: true, projectId: "managed-project" };
    return ok(state);
  }

  invalidate(): void {}
}

function setup(
  handler: StubHandler,
  options: {
    authenticator?: FakeAuthenticator;
    onboarding?: StaticOnboarding;
    registry?: EndpointRegistry;
    timeoutMs?: number;
  } = {}
) {
  const stub = createFetchStub(handler);
  const logger = createCaptureLogger();
  const authenticator = options.authenticator ?? new FakeAuthenticator();
  const onboarding = options.onboarding ?? new StaticOnboarding();
  const registry = options.registry ?? createEndpointRegistry();
  const dispatcher = new ProxyDispatcher({
    authenticator,
    onboarding,
    client: createCodeAssistClient({ registry, fetch: stub.fetch }),
    registry,
    tenantId: "my-project",
    timeoutMs: options.timeoutMs,
    createPromptId: () => "prompt-1",
    logger,
  });
  return { dispatcher, calls: stub.calls, authenticator, onboarding, logger };
}

const generate: GeminiRequest = {
  model: "gemini-2.5-pro",
  action: "generateContent",
  body: { contents: [{ role: "user", parts: [{ text: "Hello" }] }] },
};

const upstreamReply = {
  traceId: "trace-1",
  response: {
    candidates: [{ content: { role: "model", parts: [{ text: "Hi" }] }, finishReason: "STOP" }],
    modelVersion: "gemini-2.5-pro",
  },
};

describe("ProxyDispatcher", () => {
  it("wraps the request and unwraps the response", async () => {
    const { dispatcher, calls, onboarding } = setup(() => jsonResponse(upstreamReply));

    const result = await dispatcher.handle(generate);

    expect(result).toEqual({
      ok: true,
      value: {
        kind: "json",
        body: {
          candidates: upstreamReply.response.candidates,
          modelVersion: "gemini-2.5-pro",
        },
      },
    });
    expect(onboarding.tenants).toEqual(["my-project"]);
    expect(calls.map((call) => call.url)).toEqual([GENERATE_URL]);
    expect(JSON.parse(calls[0]?.body ?? "{}")).toEqual({
      model: "gemini-2.5-pro",
      project: "managed-project",
      user_prompt_id: "prompt-1",
      request: { contents: [{ role: "user", parts: [{ text: "Hello" }] }] },
    });
  });

  it("counts tokens through the countTokens route", async () => {
    const { dispatcher, calls } = setup(() => jsonResponse({ totalTokens: 7 }));

    const result = await dispatcher.handle({
      model: "models/gemini-2.5-pro",
      action: "countTokens",
      body: { contents: [{ parts: [{ text: "Count" }] }] },
    });

    expect(result).toEqual({ ok: true, value: { kind: "json", body: { totalTokens: 7 } } });
    expect(calls[0]?.url).toBe("https://cloudcode-pa.googleapis.com/v1internal:countTokens");
    expect(JSON.parse(calls[0]?.body ?? "{}")).toEqual({
      request: { model: "models/gemini-2.5-pro", contents: [{ parts: [{ text: "Count" }] }] },
    });
  });

  it("refreshes once and retries after a 401", async () => {
    const { dispatcher, calls, authenticator, logger } = setup((call) =>
      call.headers.get("authorization") === "Bearer access-1"
        ? jsonResponse({ error: { code: 401, message: "expired", status: "UNAUTHENTICATED" } }, 401)
        : jsonResponse(upstreamReply)
    );

    const result = await dispatcher.handle(generate);

    expect(result.ok).toBe(true);
    expect(authenticator.forceRefreshCalls).toEqual(["access-1"]);
    expect(logger.entries).toContainEqual({
      level: "warn",
      message: "upstream_unauthorized",
      context: { operation: "codeAssist.generateContent", token: "****", retry: true },
    });
    expect(calls.map((call) => call.headers.get("authorization"))).toEqual([
      "Bearer access-1",
      "Bearer access-2",
    ]);
  });

  it("returns AUTH_EXPIRED when the refreshed credential is also rejected", async () => {
    const { dispatcher, calls, authenticator } = setup(() =>
      jsonResponse({ error: { code: 401, message: "expired", status: "UNAUTHENTICATED" } }, 401)
    );

    const result = await dispatcher.handle(generate);

    expect(result).toEqual({
      ok: false,
      error: authExpired("Code Assist rejected the refreshed credential. Sign in again at /login."),
    });
    expect(calls).toHaveLength(2);
    expect(authenticator.forceRefreshCalls).toHaveLength(1);
  });

  it("does not retry other upstream errors", async () => {
    const { dispatcher, calls, authenticator } = setup(() =>
      jsonResponse({ error: { code: 403, message: "denied", status: "PERMISSION_DENIED" } }, 403)
    );

    const result = await dispatcher.handle(generate);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("UPSTREAM_ERROR");
      expect(result.error.statusCode).toBe(403);
      expect(result.error.message).toBe("denied");
    }
    expect(calls).toHaveLength(1);
    expect(authenticator.forceRefreshCalls).toEqual([]);
  });

  it("returns UPSTREAM_TIMEOUT when the call exceeds its deadline", async () => {
    const { dispatcher } = setup((call) => hangUntilAborted(call.signal), { timeoutMs: 20 });

    const result = await dispatcher.handle(generate);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("UPSTREAM_TIMEOUT");
      expect(result.error.statusCode).toBe(504);
      expect(result.error.message).toBe("Upstream request timed out after 20ms.");
    }
  });

  it("maps an unreachable upstream to a 502", async () => {
    const { dispatcher } = setup(() => Promise.reject(new TypeError("fetch failed")));

    const result = await dispatcher.handle(generate);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.statusCode).toBe(502);
      expect(result.error.message).toBe("Failed to reach Code Assist: fetch failed");
    }
  });

  it("reports a body that is not JSON as malformed and logs an excerpt", async () => {
    const { dispatcher, logger } = setup(() => new Response("<html>oops</html>", { status: 200 }));

    const result = await dispatcher.handle(generate);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("MALFORMED_UPSTREAM_RESPONSE");
      expect(result.error.message).toBe("Malformed upstream response at $: body is not valid JSON");
    }
    expect(logger.entries).toContainEqual({
      level: "error",
      message: "malformed_upstream_response",
      context: {
        operation: "codeAssist.generateContent",
        message: "Malformed upstream response at $: body is not valid JSON",
        excerpt: "<html>oops</html>",
      },
    });
  });

  it("translates a streaming response", async () => {
    const { dispatcher, calls } = setup(() =>
      sseResponse([
        'data: {"response":{"candidates":[{"content":{"parts":[{"text":"A"}]}}]}}\n',
        '\ndata: {"response":{"candidates":[{"content":{"parts":[{"text":"B"}]}}]}}\n\n',
      ])
    );

    const result = await dispatcher.handle({ ...generate, action: "streamGenerateContent" });

    expect(result.ok && result.value.kind).toBe("stream");
    if (result.ok && result.value.kind === "stream") {
      expect(await readAll(result.value.body)).toBe(
        'data: {"candidates":[{"content":{"parts":[{"text":"A"}]}}]}\n\n' +
          'data: {"candidates":[{"content":{"parts":[{"text":"B"}]}}]}\n\n'
      );
    }
    expect(calls[0]?.url).toBe(
      "https://cloudcode-pa.googleapis.com/v1internal:streamGenerateContent?alt=sse"
    );
    expect(calls[0]?.headers.get("accept")).toBe("text/event-stream");
  });

  it("fails fast when the registry does not know the operation", async () => {
    const authenticator = new FakeAuthenticator();
    const onboarding = new StaticOnboarding();
    const registry: EndpointRegistry = {
      ...createEndpointRegistry(),
      resolve: (operationName) => fail(unknownOperation(operationName)),
    };
    const { dispatcher, calls } = setup(() => jsonResponse(upstreamReply), {
      authenticator,
      onboarding,
      registry,
    });

    const result = await dispatcher.handle(generate);

    expect(result).toEqual({
      ok: false,
      error: unknownOperation("codeAssist.generateContent"),
    });
    expect(authenticator.ensureValidCalls).toBe(0);
    expect(onboarding.tenants).toEqual([]);
    expect(calls).toHaveLength(0);
  });

  it("stops before onboarding when authentication fails", async () => {
    const failure = authExpired("Authentication required.");
    const onboarding = new StaticOnboarding();
    const { dispatcher, calls } = setup(() => jsonResponse({}), {
      authenticator: new FakeAuthenticator({ failure }),
      onboarding,
    });

    expect(await dispatcher.handle(generate)).toEqual({ ok: false, error: failure });
    expect(onboarding.tenants).toEqual([]);
    expect(calls).toHaveLength(0);
  });

  it("stops before calling upstream when onboarding fails", async () => {
    const failure = onboardingFailed("no Code Assist project was assigned; set RELAY_PROJECT_ID");
    const { dispatcher, calls } = setup(() => jsonResponse({}), {
      onboarding: new StaticOnboarding(failure),
    });

    expect(await dispatcher.handle(generate)).toEqual({ ok: false, error: failure });
    expect(calls).toHaveLength(0);
  });

  it("rejects an invalid request body without calling upstream", async () => {
    const { dispatcher, calls } = setup(() => jsonResponse({}));

    const result = await dispatcher.handle({ ...generate, body: { contents: "Hello" } });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("INVALID_REQUEST");
      expect(result.error.message).toBe(
        "Invalid request body at contents: Expected array, received string"
      );
    }
    expect(calls).toHaveLength(0);
  });
});
