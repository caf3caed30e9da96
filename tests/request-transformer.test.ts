import { describe, expect, it } from "vitest";

import { normalizeModelId, toRaw } from "../src/transformer/request";

const context = { projectId: "managed-project", userPromptId: "prompt-1" };

describe("toRaw", () => {
  it("wraps a generation request in the Code Assist envelope", () => {
    const result = toRaw(
      {
        model: "gemini-2.5-pro",
        action: "generateContent",
        body: {
          contents: [{ role: "user", parts: [{ text: "Hello" }] }],
          generationConfig: { temperature: 0.2 },
          tools: [{ functionDeclarations: [{ name: "lookup" }] }],
        },
      },
      context
    );

    expect(result).toEqual({
      ok: true,
      value: {
        action: "generateContent",
        body: {
          model: "gemini-2.5-pro",
          project: "managed-project",
          user_prompt_id: "prompt-1",
          request: {
            contents: [{ role: "user", parts: [{ text: "Hello" }] }],
            generationConfig: { temperature: 0.2 },
            tools: [{ functionDeclarations: [{ name: "lookup" }] }],
          },
        },
      },
    });
  });

  it("accepts the snake_case system instruction alias", () => {
    const result = toRaw(
      {
        model: "models/gemini-2.5-flash",
        action: "streamGenerateContent",
        body: {
          contents: [{ role: "user", parts: [{ text: "Hi" }] }],
          system_instruction: { parts: [{ text: "Be brief." }] },
        },
      },
      { projectId: "managed-project" }
    );

    expect(result.ok).toBe(true);
    if (result.ok && result.value.action !== "countTokens") {
      expect(result.value.body.model).toBe("gemini-2.5-flash");
      expect(result.value.body.user_prompt_id).toBeUndefined();
      expect(result.value.body.request.systemInstruction).toEqual({
        parts: [{ text: "Be brief." }],
      });
      expect("system_instruction" in result.value.body.request).toBe(false);
    }
  });

  it("turns a string system instruction into a content", () => {
    const result = toRaw(
      {
        model: "gemini-2.5-pro",
        action: "generateContent",
        body: {
          contents: [{ parts: [{ text: "Hi" }] }],
          systemInstruction: "Answer in French.",
        },
      },
      context
    );

    expect(result.ok).toBe(true);
    if (result.ok && result.value.action === "generateContent") {
      expect(result.value.body.request.systemInstruction).toEqual({
        parts: [{ text: "Answer in French." }],
      });
    }
  });

  it("drops fields Gemini requests do not define", () => {
    const result = toRaw(
      {
        model: "gemini-2.5-pro",
        action: "generateContent",
        body: { contents: [{ parts: [{ text: "Hi" }] }], stream: true },
      },
      context
    );

    expect(result.ok).toBe(true);
    if (result.ok && result.value.action === "generateContent") {
      expect(Object.keys(result.value.body.request)).toEqual(["contents"]);
    }
  });

  it("builds the token counting envelope", () => {
    const result = toRaw(
      {
        model: "gemini-2.5-pro",
        action: "countTokens",
        body: { contents: [{ role: "user", parts: [{ text: "Count me" }] }] },
      },
      context
    );

    expect(result).toEqual({
      ok: true,
      value: {
        action: "countTokens",
        body: {
          request: {
            model: "models/gemini-2.5-pro",
            contents: [{ role: "user", parts: [{ text: "Count me" }] }],
          },
        },
      },
    });
  });

  it("counts tokens of a nested generateContentRequest", () => {
    const result = toRaw(
      {
        model: "gemini-2.5-pro",
        action: "countTokens",
        body: {
          generateContentRequest: {
            model: "models/gemini-2.5-pro",
            contents: [{ parts: [{ text: "Nested" }] }],
          },
        },
      },
      context
    );

    expect(result.ok && result.value.body.request).toEqual({
      model: "models/gemini-2.5-pro",
      contents: [{ parts: [{ text: "Nested" }] }],
    });
  });

  it("rejects a request without contents", () => {
    const result = toRaw(
      { model: "gemini-2.5-pro", action: "generateContent", body: { contents: [] } },
      context
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("INVALID_REQUEST");
      expect(result.error.statusCode).toBe(400);
      expect(result.error.message).toBe(
        "Invalid request body at contents: Array must contain at least 1 element(s)"
      );
    }
  });

  it("rejects a token count without contents", () => {
    const result = toRaw({ model: "gemini-2.5-pro", action: "countTokens", body: {} }, context);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        "Invalid request body at contents: Either contents or generateContentRequest is required"
      );
    }
  });

  it("rejects an empty model name", () => {
    const result = toRaw(
      { model: "models/", action: "generateContent", body: { contents: [] } },
      context
    );

    expect(result).toEqual({
      ok: false,
      error: {
        code: "INVALID_REQUEST",
        message: "Model name is required.",
        statusCode: 400,
        retryable: false,
      },
    });
  });
});

describe("normalizeModelId", () => {
  it("strips the models/ prefix", () => {
    expect(normalizeModelId("models/gemini-2.5-pro")).toBe("gemini-2.5-pro");
    expect(normalizeModelId(" gemini-2.5-pro ")).toBe("gemini-2.5-pro");
  });
});
