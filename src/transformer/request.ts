import type { ZodError } from "zod";

import { fail, invalidRequest, ok, type RelayError, type Result } from "../errors";
import {
  CountTokensBodySchema,
  GenerateContentBodySchema,
  type Content,
  type GenerateContentBody,
} from "./schema";

export type GeminiAction = "generateContent" | "streamGenerateContent" | "countTokens";

export type GeminiRequest = {
  model: string;
  action: GeminiAction;
  body: unknown;
  signal?: AbortSignal;
};

export type RawGenerateRequest = {
  model: string;
  project: string;
  user_prompt_id?: string;
  request: GenerateContentBody;
};

export type RawCountTokensRequest = {
  request: { model: string; contents: Content[] };
};

export type RawRequest =
  | { action: "generateContent" | "streamGenerateContent"; body: RawGenerateRequest }
  | { action: "countTokens"; body: RawCountTokensRequest };

export type ToRawContext = {
  projectId: string;
  userPromptId?: string;
};

export function isStreaming(request: Pick<GeminiRequest, "action">): boolean {
  return request.action === "streamGenerateContent";
}

/** Accepts `gemini-2.5-pro` and `models/gemini-2.5-pro`. */
export function normalizeModelId(model: string): string {
  return model.trim().replace(/^models\//, "");
}

export function toRaw(
  request: GeminiRequest,
  context: ToRawContext
): Result<RawRequest, RelayError> {
  const model = normalizeModelId(request.model);
  if (!model) {
    return fail(invalidRequest("Model name is required."));
  }

  if (request.action === "countTokens") {
    const parsed = CountTokensBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return fail(invalidRequest(describeIssues(parsed.error)));
    }
    const contents =
      parsed.data.contents ?? parsed.data.generateContentRequest?.contents ?? [];
    const raw: RawRequest = {
      action: "countTokens",
      body: { request: { model: `models/${model}`, contents } },
    };
    return ok(raw);
  }

  const parsed = GenerateContentBodySchema.safeParse(request.body);
  if (!parsed.success) {
    return fail(invalidRequest(describeIssues(parsed.error)));
  }
  const body: RawGenerateRequest = {
    model,
    project: context.projectId,
    request: parsed.data,
  };
  if (context.userPromptId) {
    body.user_prompt_id = context.userPromptId;
  }
  const raw: RawRequest = { action: request.action, body };
  return ok(raw);
}

function describeIssues(error: ZodError): string {
  const [issue] = error.issues;
  if (!issue) {
    return "Invalid request body.";
  }
  const field = issue.path.length > 0 ? issue.path.join(".") : "body";
  return `Invalid request body at ${field}: ${issue.message}`;
}
