import {
  fail,
  malformedUpstreamResponse,
  ok,
  upstreamError,
  type RelayError,
  type Result,
} from "../errors";
import type { GeminiAction } from "./request";
import {
  GenerateContentResponseSchema,
  ProviderErrorSchema,
  type Candidate,
  type ProviderError,
} from "./schema";

export type GenerateContentResponse = {
  candidates?: Candidate[];
  usageMetadata?: Record<string, unknown>;
  modelVersion?: string;
  promptFeedback?: Record<string, unknown>;
  responseId?: string;
  createTime?: string;
};

export type CountTokensResponse = { totalTokens: number };

export type GeminiResponse = GenerateContentResponse | CountTokensResponse;

export type RawResponse =
  | { kind: "generate"; response: unknown; traceId?: string }
  | { kind: "countTokens"; totalTokens: number }
  | { kind: "error"; error: ProviderError };

/** Classifies a raw Code Assist payload once; `fromRaw` works on the result. */
export function decodeRaw(
  action: GeminiAction,
  payload: unknown
): Result<RawResponse, RelayError> {
  if (!isRecord(payload)) {
    return fail(malformedUpstreamResponse("$", "expected a JSON object"));
  }
  if (payload.error !== undefined) {
    const parsed = ProviderErrorSchema.safeParse(payload.error);
    return ok<RawResponse>({ kind: "error", error: parsed.success ? parsed.data : {} });
  }
  if (action === "countTokens") {
    if (typeof payload.totalTokens !== "number") {
      return fail(malformedUpstreamResponse("totalTokens", "expected a number"));
    }
    return ok<RawResponse>({ kind: "countTokens", totalTokens: payload.totalTokens });
  }
  if (!("response" in payload)) {
    return fail(malformedUpstreamResponse("response", "missing"));
  }
  const raw: Extract<RawResponse, { kind: "generate" }> = {
    kind: "generate",
    response: payload.response,
  };
  if (typeof payload.traceId === "string") {
    raw.traceId = payload.traceId;
  }
  return ok(raw);
}

export function fromRaw(raw: RawResponse): Result<GeminiResponse, RelayError> {
  switch (raw.kind) {
    case "generate":
      return fromGenerate(raw.response);
    case "countTokens":
      return ok({ totalTokens: raw.totalTokens });
    case "error":
      return fail(
        upstreamError({
          statusCode: toHttpStatus(raw.error.code),
          message: raw.error.message || "Upstream error",
          upstreamStatus: raw.error.status,
        })
      );
  }
}

function fromGenerate(response: unknown): Result<GenerateContentResponse, RelayError> {
  if (!isRecord(response)) {
    return fail(malformedUpstreamResponse("response", "expected an object"));
  }
  const parsed = GenerateContentResponseSchema.safeParse(response);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = ["response", ...(issue?.path ?? [])].join(".");
    return fail(malformedUpstreamResponse(field, issue?.message ?? "invalid"));
  }

  const { candidates, usageMetadata, modelVersion, promptFeedback, responseId, createTime } =
    parsed.data;
  const result: GenerateContentResponse = {};
  if (candidates !== undefined) result.candidates = candidates;
  if (usageMetadata !== undefined) result.usageMetadata = usageMetadata;
  if (modelVersion !== undefined) result.modelVersion = modelVersion;
  if (promptFeedback !== undefined) result.promptFeedback = promptFeedback;
  if (responseId !== undefined) result.responseId = responseId;
  if (createTime !== undefined) result.createTime = createTime;
  return ok(result);
}

function toHttpStatus(code: number | undefined): number {
  return code !== undefined && code >= 400 && code <= 599 ? code : 502;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
