import axios from "axios";
import { z } from "zod";
import type { GenerationSettings, SafetySetting } from "./config";
import { describeError, GeminiServiceError } from "./errors";
import { recordUsage } from "./usage_log";

export const GEMINI_API_BASE = "https://generativelanguage.googleapis.com/v1beta/models";

const GenerateContentResponseSchema = z
  .object({
    candidates: z
      .array(
        z
          .object({
            content: z
              .object({
                parts: z.array(z.object({ text: z.string().optional() }).passthrough()).optional()
              })
              .passthrough()
              .optional(),
            finishReason: z.string().optional()
          })
          .passthrough()
      )
      .optional(),
    promptFeedback: z.object({ blockReason: z.string().optional() }).passthrough().optional(),
    usageMetadata: z
      .object({
        promptTokenCount: z.number().optional(),
        candidatesTokenCount: z.number().optional()
      })
      .passthrough()
      .optional()
  })
  .passthrough();

export type GenerateContentResponse = z.infer<typeof GenerateContentResponseSchema>;

export type GenerateContentRequest = {
  model: string;
  prompt: string;
  generation: GenerationSettings;
  safety: readonly SafetySetting[];
};

/** Text in, text out. Rejects on transport, quota or safety-block failures. */
export type GenerateContent = (request: GenerateContentRequest) => Promise<string>;

export type GeminiTransportOptions = {
  apiKey: string;
  logsDir?: string;
  script?: string;
};

export function toGenerateContentBody(request: GenerateContentRequest) {
  return {
    contents: [{ role: "user", parts: [{ text: request.prompt }] }],
    generationConfig: {
      temperature: request.generation.temperature,
      topP: request.generation.top_p,
      topK: request.generation.top_k,
      maxOutputTokens: request.generation.max_output_tokens
    },
    safetySettings: request.safety.map((setting) => ({
      category: setting.category,
      threshold: setting.threshold
    }))
  };
}

export function extractResponseText(data: GenerateContentResponse): string {
  const candidate = data.candidates?.[0];
  const blockReason = data.promptFeedback?.blockReason;
  if (!candidate && blockReason) {
    throw new GeminiServiceError(`Prompt blocked by safety filters (${blockReason}).`);
  }

  const text = (candidate?.content?.parts ?? []).map((part) => part.text ?? "").join("");
  if (!text && candidate?.finishReason === "SAFETY") {
    throw new GeminiServiceError("Response blocked by safety filters (SAFETY).");
  }
  return text;
}

export async function callGemini(
  options: GeminiTransportOptions,
  request: GenerateContentRequest
): Promise<string> {
  const script = options.script ?? "llm_call";
  const url = `${GEMINI_API_BASE}/${encodeURIComponent(request.model)}:generateContent`;

  let data: GenerateContentResponse;
  try {
    const response = await axios.post<unknown>(url, toGenerateContentBody(request), {
      headers: {
        "x-goog-api-key": options.apiKey,
        "Content-Type": "application/json"
      }
    });
    data = GenerateContentResponseSchema.parse(response.data);
  } catch (error: unknown) {
    const message = describeError(error);
    await recordUsage(options.logsDir, {
      ts: new Date().toISOString(),
      script,
      model: request.model,
      input_tokens: 0,
      output_tokens: 0,
      success: false,
      error: message
    });
    throw new GeminiServiceError(`Gemini call failed: ${message}`);
  }

  await recordUsage(options.logsDir, {
    ts: new Date().toISOString(),
    script,
    model: request.model,
    input_tokens: data.usageMetadata?.promptTokenCount ?? 0,
    output_tokens: data.usageMetadata?.candidatesTokenCount ?? 0,
    success: true
  });

  return extractResponseText(data);
}

export function createGeminiTransport(options: GeminiTransportOptions): GenerateContent {
  return (request) => callGemini(options, request);
}
