import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_GENERATION, DEFAULT_SAFETY } from "../utils/config";
import { GeminiServiceError } from "../utils/errors";
import { callGemini, GEMINI_API_BASE, type GenerateContentRequest } from "../utils/gemini_client";

const { mockPost } = vi.hoisted(() => ({ mockPost: vi.fn() }));

vi.mock("axios", () => ({
  default: {
    post: mockPost,
    isAxiosError: (error: unknown) => typeof error === "object" && error !== null && "isAxiosError" in error
  }
}));

const request: GenerateContentRequest = {
  model: "gemini-1.5-flash",
  prompt: "Analise o mercado de coaching",
  generation: DEFAULT_GENERATION,
  safety: DEFAULT_SAFETY
};

async function readUsageLines(logsDir: string): Promise<unknown[]> {
  const raw = await fs.readFile(path.join(logsDir, "llm_usage.jsonl"), "utf8");
  return raw
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line));
}

describe("callGemini", () => {
  let logsDir: string;

  beforeEach(async () => {
    mockPost.mockReset();
    logsDir = await fs.mkdtemp(path.join(os.tmpdir(), "market-analyst-"));
  });

  afterEach(async () => {
    await fs.rm(logsDir, { recursive: true, force: true });
  });

  it("posts the prompt and settings to the generateContent endpoint", async () => {
    mockPost.mockResolvedValue({
      data: { candidates: [{ content: { parts: [{ text: '{"foo"' }, { text: ": 1}" }] } }] }
    });

    const text = await callGemini({ apiKey: "test-secret" }, request);

    expect(text).toBe('{"foo": 1}');
    expect(mockPost).toHaveBeenCalledWith(
      `${GEMINI_API_BASE}/gemini-1.5-flash:generateContent`,
      {
        contents: [{ role: "user", parts: [{ text: "Analise o mercado de coaching" }] }],
        generationConfig: { temperature: 0.8, topP: 0.9, topK: 40, maxOutputTokens: 32768 },
        safetySettings: [
          { category: "HARM_CATEGORY_HARASSMENT", threshold: "BLOCK_MEDIUM_AND_ABOVE" },
          { category: "HARM_CATEGORY_HATE_SPEECH", threshold: "BLOCK_MEDIUM_AND_ABOVE" },
          { category: "HARM_CATEGORY_SEXUALLY_EXPLICIT", threshold: "BLOCK_MEDIUM_AND_ABOVE" },
          { category: "HARM_CATEGORY_DANGEROUS_CONTENT", threshold: "BLOCK_MEDIUM_AND_ABOVE" }
        ]
      },
      { headers: { "x-goog-api-key": "test-secret", "Content-Type": "application/json" } }
    );
  });

  it("appends a usage line with token counts", async () => {
    mockPost.mockResolvedValue({
      data: {
        candidates: [{ content: { parts: [{ text: "OK" }] } }],
        usageMetadata: { promptTokenCount: 12, candidatesTokenCount: 1 }
      }
    });

    await callGemini({ apiKey: "test-secret", logsDir, script: "verify_env" }, request);

    const lines = await readUsageLines(logsDir);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      script: "verify_env",
      model: "gemini-1.5-flash",
      input_tokens: 12,
      output_tokens: 1,
      success: true
    });
  });

  it("wraps transport failures and records them", async () => {
    mockPost.mockRejectedValue(new Error("timeout of 60000ms exceeded"));

    const call = callGemini({ apiKey: "test-secret", logsDir }, request);

    await expect(call).rejects.toThrow(GeminiServiceError);
    await expect(call).rejects.toThrow("Gemini call failed: timeout of 60000ms exceeded");
    const lines = await readUsageLines(logsDir);
    expect(lines[0]).toMatchObject({
      script: "llm_call",
      success: false,
      input_tokens: 0,
      output_tokens: 0,
      error: "timeout of 60000ms exceeded"
    });
  });

  it("includes the API error body in the message", async () => {
    mockPost.mockRejectedValue(
      Object.assign(new Error("Request failed with status code 400"), {
        isAxiosError: true,
        response: { data: { error: { message: "API key not valid" } } }
      })
    );

    await expect(callGemini({ apiKey: "test-secret" }, request)).rejects.toThrow(
      'Gemini call failed: Request failed with status code 400 | API: {"error":{"message":"API key not valid"}}'
    );
  });

  it("rejects a prompt blocked by the safety filters", async () => {
    mockPost.mockResolvedValue({ data: { promptFeedback: { blockReason: "SAFETY" } } });

    await expect(callGemini({ apiKey: "test-secret" }, request)).rejects.toThrow(
      "Prompt blocked by safety filters (SAFETY)."
    );
  });

  it("rejects a reply withheld by the safety filters", async () => {
    mockPost.mockResolvedValue({ data: { candidates: [{ finishReason: "SAFETY" }] } });

    await expect(callGemini({ apiKey: "test-secret" }, request)).rejects.toThrow(
      "Response blocked by safety filters (SAFETY)."
    );
  });

  it("returns an empty string when there is no candidate", async () => {
    mockPost.mockResolvedValue({ data: { candidates: [] } });

    await expect(callGemini({ apiKey: "test-secret" }, request)).resolves.toBe("");
  });

  it("rejects a body that is not a generateContent response", async () => {
    mockPost.mockResolvedValue({ data: { candidates: "nope" } });

    await expect(callGemini({ apiKey: "test-secret" }, request)).rejects.toThrow(/^Gemini call failed: /);
  });
});
