import { z } from "zod";

const PartSchema = z.record(z.unknown());

export const ContentSchema = z
  .object({
    role: z.string().optional(),
    parts: z.array(PartSchema),
  })
  .passthrough();

// Some clients send a bare string where Gemini expects a Content.
const SystemInstructionSchema = z.union([
  ContentSchema,
  z.string().transform((text) => ({ parts: [{ text }] })),
]);

export const GenerateContentBodySchema = z
  .object({
    contents: z.array(ContentSchema).min(1),
    systemInstruction: SystemInstructionSchema.optional(),
    system_instruction: SystemInstructionSchema.optional(),
    tools: z.array(z.record(z.unknown())).optional(),
    toolConfig: z.record(z.unknown()).optional(),
    generationConfig: z.record(z.unknown()).optional(),
    safetySettings: z.array(z.record(z.unknown())).optional(),
    cachedContent: z.string().optional(),
    labels: z.record(z.string()).optional(),
  })
  .transform(({ system_instruction: alias, ...rest }) => {
    const systemInstruction = rest.systemInstruction ?? alias;
    return systemInstruction === undefined ? rest : { ...rest, systemInstruction };
  });

export const CountTokensBodySchema = z
  .object({
    contents: z.array(ContentSchema).optional(),
    generateContentRequest: z
      .object({ contents: z.array(ContentSchema).min(1) })
      .passthrough()
      .optional(),
  })
  .refine((body) => Boolean(body.contents ?? body.generateContentRequest), {
    message: "Either contents or generateContentRequest is required",
    path: ["contents"],
  });

export const CandidateSchema = z
  .object({
    content: z
      .object({
        role: z.string().optional(),
        parts: z.array(PartSchema).optional(),
      })
      .passthrough()
      .optional(),
    finishReason: z.string().optional(),
    index: z.number().optional(),
  })
  .passthrough();

export const GenerateContentResponseSchema = z
  .object({
    candidates: z.array(CandidateSchema).optional(),
    usageMetadata: z.record(z.unknown()).optional(),
    modelVersion: z.string().optional(),
    promptFeedback: z.record(z.unknown()).optional(),
    responseId: z.string().optional(),
    createTime: z.string().optional(),
  })
  .passthrough();

export const ProviderErrorSchema = z.object({
  code: z.number().int().optional(),
  message: z.string().optional(),
  status: z.string().optional(),
});

export type Content = z.infer<typeof ContentSchema>;
export type GenerateContentBody = z.infer<typeof GenerateContentBodySchema>;
export type Candidate = z.infer<typeof CandidateSchema>;
export type ProviderError = z.infer<typeof ProviderErrorSchema>;
