import { timingSafeEqual } from "node:crypto";
import { Hono, type Context } from "hono";

import { createModelCatalog, type ModelCatalog } from "../config/model-catalog";
import { describeError, invalidRequest, unauthorizedClient, type RelayError } from "../errors";
import { NOOP_LOGGER, type Logger } from "../logging";
import { toGeminiError } from "../transformer/gemini-error";
import { normalizeModelId, type GeminiAction } from "../transformer/request";
import type { Dispatcher } from "./dispatcher";

export type CreateProxyAppOptions = {
  dispatcher: Dispatcher;
  modelCatalog?: ModelCatalog;
  /** When set, every model route requires this key. */
  apiKey?: string;
  logger?: Logger;
};

const API_PREFIXES = ["/v1beta", "/v1"] as const;

const ACTIONS: readonly GeminiAction[] = [
  "generateContent",
  "streamGenerateContent",
  "countTokens",
];

const SSE_HEADERS = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
};

export function createProxyApp(options: CreateProxyAppOptions): Hono {
  const modelCatalog = options.modelCatalog ?? createModelCatalog();
  const logger = options.logger ?? NOOP_LOGGER;
  const app = new Hono();

  app.get("/healthz", (c) => c.json({ status: "ok" }, 200));

  for (const prefix of API_PREFIXES) {
    app.use(`${prefix}/*`, async (c, next) => {
      if (options.apiKey && !hasValidApiKey(c, options.apiKey)) {
        logger.warn("client_unauthorized", { path: c.req.path });
        return errorResponse(unauthorizedClient());
      }
      await next();
    });

    app.get(`${prefix}/models`, (c) => c.json({ models: modelCatalog.models }, 200));

    app.get(`${prefix}/models/:target`, (c) => {
      const id = normalizeModelId(c.req.param("target"));
      const model = modelCatalog.models.find((candidate) => candidate.baseModelId === id);
      if (!model) {
        return errorResponse(invalidRequest(`Model ${id} is not available.`, 404));
      }
      return c.json(model, 200);
    });

    app.post(`${prefix}/models/:target`, async (c) => {
      const target = parseModelAction(c.req.param("target"));
      if (!target) {
        return errorResponse(
          invalidRequest(`Unsupported model action: ${c.req.param("target")}`, 404)
        );
      }

      let body: unknown;
      try {
        body = await c.req.json();
      } catch {
        return errorResponse(invalidRequest("Request body must be valid JSON."));
      }

      const result = await options.dispatcher.handle({
        model: target.model,
        action: target.action,
        body,
        signal: c.req.raw.signal,
      });
      if (!result.ok) {
        logger.warn("request_failed", {
          action: target.action,
          code: result.error.code,
          status: result.error.statusCode,
        });
        return errorResponse(result.error);
      }
      if (result.value.kind === "stream") {
        return new Response(result.value.body, { status: 200, headers: SSE_HEADERS });
      }
      return c.json(result.value.body, 200);
    });
  }

  app.notFound((c) =>
    errorResponse(invalidRequest(`Unknown endpoint: ${c.req.method} ${c.req.path}`, 404))
  );

  app.onError((error) => {
    logger.error("unhandled_error", { message: describeError(error) });
    return jsonResponse(
      { error: { code: 500, message: "Unexpected error occurred.", status: "INTERNAL" } },
      500
    );
  });

  return app;
}

/** Splits `gemini-2.5-pro:generateContent` into its model and action. */
export function parseModelAction(
  target: string
): { model: string; action: GeminiAction } | null {
  const separator = target.lastIndexOf(":");
  if (separator <= 0) {
    return null;
  }
  const model = target.slice(0, separator);
  const action = ACTIONS.find((candidate) => candidate === target.slice(separator + 1));
  return action ? { model, action } : null;
}

export function errorResponse(error: RelayError): Response {
  const headers: Record<string, string> = {};
  if (error.retryAfter) {
    headers["Retry-After"] = error.retryAfter;
  }
  return jsonResponse(toGeminiError(error), error.statusCode, headers);
}

function jsonResponse(
  body: unknown,
  status: number,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json; charset=UTF-8", ...headers },
  });
}

function hasValidApiKey(c: Context, expected: string): boolean {
  const provided = c.req.header("x-goog-api-key") ?? c.req.query("key");
  if (!provided) {
    return false;
  }
  const expectedBytes = Buffer.from(expected);
  const providedBytes = Buffer.from(provided);
  return (
    expectedBytes.length === providedBytes.length &&
    timingSafeEqual(expectedBytes, providedBytes)
  );
}
